// src/core/database/entity-constraint.subscriber.ts
import { normalizeActivityName, normalizeEmail } from '@core/common/normalize/normalize.helper';
import {
  assertActivityDescription,
  assertActivityName,
  assertActivitySchedule,
  assertEmailShape,
  assertMaxParticipants,
  assertUserGrade,
  assertUserRole,
} from '@core/common/validation/field-rules';
import {
  EntitySubscriberInterface,
  EventSubscriber,
  InsertEvent,
  ObjectLiteral,
  UpdateEvent,
} from 'typeorm';

/**
 * TypeORM 实体订阅者：存储边界上的字段规则
 * - 插入/更新前对 users 表规范化邮箱并校验邮箱形状、角色、年级
 * - 插入/更新前对 activities 表规范化名称并校验名称、描述、时间安排、容量
 * 只校验本次写入实际携带的字段，部分更新（如补齐 created_at）不受影响
 */
@EventSubscriber()
export class EntityConstraintSubscriber implements EntitySubscriberInterface<ObjectLiteral> {
  /** 实体插入前校验 */
  beforeInsert(event: InsertEvent<ObjectLiteral>): void {
    this.apply(event.metadata.tableName, event.entity);
  }

  /** 实体更新前校验 */
  beforeUpdate(event: UpdateEvent<ObjectLiteral>): void {
    if (event.entity) this.apply(event.metadata.tableName, event.entity);
  }

  private apply(tableName: string, entity: ObjectLiteral | undefined): void {
    if (!entity) return;
    switch (tableName) {
      case 'users':
        this.applyUserRules(entity);
        break;
      case 'activities':
        this.applyActivityRules(entity);
        break;
      default:
        break;
    }
  }

  private applyUserRules(entity: ObjectLiteral): void {
    if (typeof entity.email === 'string') {
      entity.email = normalizeEmail(entity.email);
      assertEmailShape(entity.email);
    }
    if (typeof entity.role === 'string') assertUserRole(entity.role);
    if (typeof entity.grade === 'string') assertUserGrade(entity.grade);
  }

  private applyActivityRules(entity: ObjectLiteral): void {
    if (typeof entity.name === 'string') {
      entity.name = normalizeActivityName(entity.name);
      assertActivityName(entity.name);
    }
    if (typeof entity.description === 'string') assertActivityDescription(entity.description);
    if (typeof entity.schedule === 'string') assertActivitySchedule(entity.schedule);
    if (entity.maxParticipants !== undefined) assertMaxParticipants(Number(entity.maxParticipants));
  }
}
