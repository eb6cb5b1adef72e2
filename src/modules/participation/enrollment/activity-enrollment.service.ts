// src/modules/participation/enrollment/activity-enrollment.service.ts

import { toConstraintViolation } from '@core/database/storage-error.translator';
import { Injectable } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { EntityManager, Repository } from 'typeorm';
import { ActivityParticipantEntity } from './activity-participant.entity';

/** 报名键：活动 ID + 用户 ID */
export interface EnrollmentKey {
  readonly activityId: number;
  readonly userId: number;
}

/**
 * 带容量条件的报名写入：仅当当前人数小于容量上限时插入一行
 * enrolled_at 使用数据库当前时间
 */
const INSERT_WITHIN_CAPACITY_SQL = `
  INSERT INTO activity_participants (activity_id, user_id, enrolled_at)
  SELECT a.id, ?, CURRENT_TIMESTAMP
  FROM activities a
  WHERE a.id = ?
    AND (SELECT COUNT(*) FROM activity_participants ap WHERE ap.activity_id = a.id) < a.max_participants
`;

/**
 * 活动报名服务
 * 提供报名关系（activity_participants）的基础读写能力
 */
@Injectable()
export class ActivityEnrollmentService {
  constructor(
    @InjectRepository(ActivityParticipantEntity)
    private readonly enrollmentRepository: Repository<ActivityParticipantEntity>,
  ) {}

  private repo(manager?: EntityManager): Repository<ActivityParticipantEntity> {
    return manager ? manager.getRepository(ActivityParticipantEntity) : this.enrollmentRepository;
  }

  /**
   * 是否已报名（显式存在性查询）
   * @param key 活动 ID + 用户 ID
   * @param manager 可选事务管理器
   */
  async isEnrolled(key: EnrollmentKey, manager?: EntityManager): Promise<boolean> {
    const count = await this.repo(manager).count({
      where: { activityId: key.activityId, userId: key.userId },
    });
    return count > 0;
  }

  /**
   * 直接写入报名（不检查容量），供初始化数据使用
   * @param key 活动 ID + 用户 ID
   * @param manager 可选事务管理器
   */
  async addParticipant(key: EnrollmentKey, manager?: EntityManager): Promise<void> {
    try {
      await this.repo(manager).insert({ activityId: key.activityId, userId: key.userId });
    } catch (error) {
      throw toConstraintViolation(error) ?? error;
    }
  }

  /**
   * 在容量范围内写入报名（单条条件语句）
   * @param key 活动 ID + 用户 ID
   * @param manager 事务管理器：与用户创建处于同一事务
   * @returns 是否写入成功；false 表示活动已满
   */
  async addParticipantWithinCapacity(
    key: EnrollmentKey,
    manager?: EntityManager,
  ): Promise<boolean> {
    const runner = manager ?? this.enrollmentRepository.manager;
    try {
      await runner.query(INSERT_WITHIN_CAPACITY_SQL, [key.userId, key.activityId]);
    } catch (error) {
      throw toConstraintViolation(error) ?? error;
    }
    return await this.isEnrolled(key, manager);
  }

  /**
   * 删除报名
   * @param key 活动 ID + 用户 ID
   * @param manager 可选事务管理器
   * @returns 是否删除了记录
   */
  async removeParticipant(key: EnrollmentKey, manager?: EntityManager): Promise<boolean> {
    const existed = await this.isEnrolled(key, manager);
    if (!existed) return false;
    await this.repo(manager).delete({ activityId: key.activityId, userId: key.userId });
    return true;
  }

  /**
   * 统计报名数
   * @param activityId 可选：仅统计某个活动
   * @param manager 可选事务管理器
   */
  async count(activityId?: number, manager?: EntityManager): Promise<number> {
    return await this.repo(manager).count({
      where: activityId === undefined ? {} : { activityId },
    });
  }
}
