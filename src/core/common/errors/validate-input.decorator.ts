// src/core/common/errors/validate-input.decorator.ts

import { UsePipes, ValidationPipe } from '@nestjs/common';
import { ValidationError } from 'class-validator';
import { DomainError, VALIDATION_ERROR } from './domain-error';
import { summarizeValidationErrors } from './validation.formatter';

/**
 * 输入验证装饰器
 * 为 HTTP 控制器与 GraphQL resolver 方法提供统一的输入验证
 * 校验失败时抛出 VALIDATION_ERROR 领域错误，由全局异常过滤器映射为 400 / BAD_USER_INPUT
 */
// eslint-disable-next-line @typescript-eslint/naming-convention
export const ValidateInput = () =>
  UsePipes(
    new ValidationPipe({
      whitelist: true, // 自动移除非装饰器属性
      transform: true, // 自动转换类型
      disableErrorMessages: false,
      stopAtFirstError: false,
      validationError: {
        target: false, // 不在错误中包含目标对象
        value: false, // 不在错误中包含值
      },
      exceptionFactory: (errors: ValidationError[]) => {
        const { detail, fields } = summarizeValidationErrors(errors);
        return new DomainError(VALIDATION_ERROR.INVALID_FIELD, detail, { fields });
      },
    }),
  );
