// src/modules/users/users.service.ts

import { UserRole } from '@app-types/models/user.types';
import { normalizeEmail } from '@core/common/normalize/normalize.helper';
import { toConstraintViolation } from '@core/database/storage-error.translator';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { UserEntity } from './user.entity';

/** 创建用户的输入 */
export interface CreateUserInput {
  readonly email: string;
  readonly name?: string | null;
  readonly grade?: string | null;
  readonly studentId?: string | null;
  readonly role?: UserRole;
}

/**
 * 按邮箱解析用户的结果
 * - existing：邮箱已存在
 * - created：首次出现，已在当前事务内创建
 */
export type ResolvedUser =
  | { readonly kind: 'existing'; readonly user: UserEntity }
  | { readonly kind: 'created'; readonly user: UserEntity };

/**
 * 用户服务
 * 邮箱的规范化与形状校验在实体订阅者中完成，这里只负责读写
 */
@Injectable()
export class UsersService {
  constructor(
    @InjectRepository(UserEntity)
    private readonly userRepository: Repository<UserEntity>,
  ) {}

  private repo(manager?: EntityManager): Repository<UserEntity> {
    return manager ? manager.getRepository(UserEntity) : this.userRepository;
  }

  /**
   * 按邮箱查找用户（查询前规范化邮箱）
   * @param email 原始邮箱
   * @param manager 可选事务管理器
   */
  async findByEmail(email: string, manager?: EntityManager): Promise<UserEntity | null> {
    return await this.repo(manager).findOne({ where: { email: normalizeEmail(email) } });
  }

  /**
   * 创建用户
   * 邮箱格式不合法时由订阅者抛出 VALIDATION_ERROR；唯一约束冲突转为 CONSTRAINT_VIOLATION
   * @param input 用户字段
   * @param manager 可选事务管理器
   */
  async create(input: CreateUserInput, manager?: EntityManager): Promise<UserEntity> {
    const repo = this.repo(manager);
    const entity = repo.create({
      email: input.email,
      name: input.name ?? null,
      grade: input.grade ?? null,
      studentId: input.studentId ?? null,
      role: input.role ?? UserRole.STUDENT,
    });
    try {
      return await repo.save(entity);
    } catch (error) {
      throw toConstraintViolation(error) ?? error;
    }
  }

  /**
   * 按邮箱获取用户，不存在时创建
   * @param email 原始邮箱
   * @param manager 事务管理器：创建与后续报名须在同一事务内
   */
  async resolveOrCreateByEmail(email: string, manager?: EntityManager): Promise<ResolvedUser> {
    const existing = await this.findByEmail(email, manager);
    if (existing) return { kind: 'existing', user: existing };
    const user = await this.create({ email }, manager);
    return { kind: 'created', user };
  }

  /** 用户总数 */
  async count(manager?: EntityManager): Promise<number> {
    return await this.repo(manager).count();
  }
}
