// src/core/common/errors/validation.formatter.ts

import { ValidationError } from 'class-validator';

/** 输入校验失败的汇总：detail 作为错误响应正文，fields 写入错误详情 */
export interface ValidationSummary {
  readonly detail: string;
  readonly fields: string[];
}

const collect = (
  errors: ValidationError[],
  parentPath: string | null,
  messages: Set<string>,
  fields: string[],
): void => {
  for (const error of errors) {
    const path = parentPath === null ? error.property : `${parentPath}.${error.property}`;
    const constraintMessages = Object.values(error.constraints ?? {});
    if (constraintMessages.length > 0) {
      fields.push(path);
      constraintMessages.forEach((message) => messages.add(message));
    }
    if (error.children && error.children.length > 0) {
      collect(error.children, path, messages, fields);
    }
  }
};

/**
 * 汇总 class-validator 校验错误
 * 同一消息只保留一次；嵌套字段以点号路径记录（如 input.email）
 */
export function summarizeValidationErrors(errors: ValidationError[]): ValidationSummary {
  const messages = new Set<string>();
  const fields: string[] = [];
  collect(errors, null, messages, fields);
  return { detail: [...messages].join('; '), fields };
}
