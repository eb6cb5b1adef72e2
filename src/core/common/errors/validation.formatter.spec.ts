// src/core/common/errors/validation.formatter.spec.ts
import { ValidationError } from 'class-validator';
import { summarizeValidationErrors } from './validation.formatter';

function buildError(property: string, constraints: Record<string, string>): ValidationError {
  const error = new ValidationError();
  error.property = property;
  error.constraints = constraints;
  error.children = [];
  return error;
}

describe('summarizeValidationErrors', () => {
  it('拼接同一字段的多个约束消息', () => {
    const error = buildError('email', {
      isNotEmpty: 'email must not be empty',
      isString: 'email query parameter is required',
    });

    expect(summarizeValidationErrors([error])).toEqual({
      detail: 'email must not be empty; email query parameter is required',
      fields: ['email'],
    });
  });

  it('嵌套字段记录点号路径', () => {
    const child = buildError('activityName', { isNotEmpty: 'activityName is required' });
    const parent = new ValidationError();
    parent.property = 'input';
    parent.children = [child];

    expect(summarizeValidationErrors([parent])).toEqual({
      detail: 'activityName is required',
      fields: ['input.activityName'],
    });
  });

  it('重复消息只保留一次', () => {
    const first = buildError('activityName', { isString: 'value must be a string' });
    const second = buildError('email', { isString: 'value must be a string' });

    expect(summarizeValidationErrors([first, second])).toEqual({
      detail: 'value must be a string',
      fields: ['activityName', 'email'],
    });
  });
});
