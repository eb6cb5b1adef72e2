// src/modules/activities/activities.service.ts

import { normalizeActivityName } from '@core/common/normalize/normalize.helper';
import { toConstraintViolation } from '@core/database/storage-error.translator';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, In, IsNull, Repository, SelectQueryBuilder } from 'typeorm';
import { ActivityEntity } from './activity.entity';

/** 创建活动的输入 */
export interface CreateActivityInput {
  readonly name: string;
  readonly description: string;
  readonly schedule: string;
  readonly maxParticipants: number;
  readonly createdBy?: number | null;
}

/**
 * 活动服务
 * 读取时一并加载参与者（含用户），参与者按报名时间、用户 ID 排序
 */
@Injectable()
export class ActivitiesService {
  constructor(
    @InjectRepository(ActivityEntity)
    private readonly activityRepository: Repository<ActivityEntity>,
  ) {}

  private repo(manager?: EntityManager): Repository<ActivityEntity> {
    return manager ? manager.getRepository(ActivityEntity) : this.activityRepository;
  }

  private withParticipants(manager?: EntityManager): SelectQueryBuilder<ActivityEntity> {
    return this.repo(manager)
      .createQueryBuilder('activity')
      .leftJoinAndSelect('activity.enrollments', 'enrollment')
      .leftJoinAndSelect('enrollment.user', 'user');
  }

  /**
   * 按名称查找活动（含参与者）
   * @param name 活动名称（查询前去除首尾空格）
   * @param manager 可选事务管理器
   */
  async findByName(name: string, manager?: EntityManager): Promise<ActivityEntity | null> {
    return await this.withParticipants(manager)
      .where('activity.name = :name', { name: normalizeActivityName(name) })
      .orderBy('enrollment.enrolledAt', 'ASC')
      .addOrderBy('enrollment.userId', 'ASC')
      .getOne();
  }

  /**
   * 列出全部活动（含参与者），按 ID 升序
   * @param manager 可选事务管理器
   */
  async listAll(manager?: EntityManager): Promise<ActivityEntity[]> {
    return await this.withParticipants(manager)
      .orderBy('activity.id', 'ASC')
      .addOrderBy('enrollment.enrolledAt', 'ASC')
      .addOrderBy('enrollment.userId', 'ASC')
      .getMany();
  }

  /**
   * 创建活动，created_at 总是写入当前时间
   * @param input 活动字段
   * @param manager 可选事务管理器
   */
  async create(input: CreateActivityInput, manager?: EntityManager): Promise<ActivityEntity> {
    const repo = this.repo(manager);
    const entity = repo.create({
      name: input.name,
      description: input.description,
      schedule: input.schedule,
      maxParticipants: input.maxParticipants,
      createdBy: input.createdBy ?? null,
      createdAt: new Date(),
    });
    try {
      return await repo.save(entity);
    } catch (error) {
      throw toConstraintViolation(error) ?? error;
    }
  }

  /** 活动总数 */
  async count(manager?: EntityManager): Promise<number> {
    return await this.repo(manager).count();
  }

  /**
   * 查找 created_at 为空的活动（旧数据）
   * @param manager 可选事务管理器
   */
  async findMissingCreatedAt(manager?: EntityManager): Promise<ActivityEntity[]> {
    return await this.repo(manager).find({
      where: { createdAt: IsNull() },
      order: { id: 'ASC' },
    });
  }

  /**
   * 批量补齐 created_at
   * @param ids 活动 ID 列表
   * @param at 写入的时间
   * @param manager 可选事务管理器
   * @returns 受影响的行数
   */
  async backfillCreatedAt(
    ids: ReadonlyArray<number>,
    at: Date,
    manager?: EntityManager,
  ): Promise<number> {
    if (ids.length === 0) return 0;
    const result = await this.repo(manager).update({ id: In([...ids]) }, { createdAt: at });
    return result.affected ?? 0;
  }
}
