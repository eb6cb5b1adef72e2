// src/core/common/validation/field-rules.ts
// 实体字段规则：由存储边界（实体订阅者）统一调用，保证任何写入路径都经过同一套规则

import { USER_ROLES } from '@app-types/models/user.types';
import { isIn, isInt, matches, maxLength, minLength } from 'class-validator';
import { DomainError, VALIDATION_ERROR } from '../errors/domain-error';

/** 邮箱形状：local@domain.tld */
export const EMAIL_SHAPE = /^[^@]+@[^@]+\.[^@]+$/;

export const ACTIVITY_NAME_MIN_LENGTH = 3;
export const ACTIVITY_DESCRIPTION_MIN_LENGTH = 10;
export const ACTIVITY_SCHEDULE_MAX_LENGTH = 500;
export const USER_GRADE_MAX_LENGTH = 10;

function fail(field: string, message: string): never {
  throw new DomainError(VALIDATION_ERROR.INVALID_FIELD, message, { field });
}

export function assertEmailShape(email: string): void {
  if (!matches(email, EMAIL_SHAPE)) fail('email', 'Invalid email format');
}

export function assertUserRole(role: string): void {
  if (!isIn(role, USER_ROLES)) fail('role', `Role must be one of: ${USER_ROLES.join(', ')}`);
}

export function assertUserGrade(grade: string): void {
  if (!maxLength(grade, USER_GRADE_MAX_LENGTH)) {
    fail('grade', `Grade must be at most ${USER_GRADE_MAX_LENGTH} characters long`);
  }
}

export function assertActivityName(name: string): void {
  if (!minLength(name, ACTIVITY_NAME_MIN_LENGTH)) {
    fail('name', `Activity name must be at least ${ACTIVITY_NAME_MIN_LENGTH} characters long`);
  }
}

export function assertActivityDescription(description: string): void {
  if (!minLength(description, ACTIVITY_DESCRIPTION_MIN_LENGTH)) {
    fail(
      'description',
      `Activity description must be at least ${ACTIVITY_DESCRIPTION_MIN_LENGTH} characters long`,
    );
  }
}

export function assertActivitySchedule(schedule: string): void {
  if (!maxLength(schedule, ACTIVITY_SCHEDULE_MAX_LENGTH)) {
    fail('schedule', `Schedule must be at most ${ACTIVITY_SCHEDULE_MAX_LENGTH} characters long`);
  }
}

export function assertMaxParticipants(value: number): void {
  if (!isInt(value) || value <= 0) fail('maxParticipants', 'Maximum participants must be greater than 0');
}
