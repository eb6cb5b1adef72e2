// src/core/common/errors/index.ts
// 领域错误、错误码与输入校验装饰器的统一入口

export * from './domain-error';
export { ValidateInput } from './validate-input.decorator';
