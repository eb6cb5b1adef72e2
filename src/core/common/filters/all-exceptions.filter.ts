// src/core/common/filters/all-exceptions.filter.ts
import { HttpErrorBody } from '@app-types/errors/http-error-body';
import {
  DomainError,
  ENROLLMENT_ERROR,
  isDomainError,
  MAINTENANCE_ERROR,
  STORAGE_ERROR,
  VALIDATION_ERROR,
} from '@core/common/errors';
import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus } from '@nestjs/common';
import { GqlArgumentsHost } from '@nestjs/graphql';
import { Response } from 'express';
import { GraphQLError, GraphQLResolveInfo } from 'graphql';
import { InjectPinoLogger, PinoLogger } from 'nestjs-pino';

/** 领域错误码 → HTTP 状态码 */
const HTTP_STATUS_BY_ERROR_CODE: Readonly<Record<string, HttpStatus>> = {
  [ENROLLMENT_ERROR.ACTIVITY_NOT_FOUND]: HttpStatus.NOT_FOUND,
  [ENROLLMENT_ERROR.CAPACITY_EXCEEDED]: HttpStatus.BAD_REQUEST,
  [ENROLLMENT_ERROR.ALREADY_ENROLLED]: HttpStatus.BAD_REQUEST,
  [ENROLLMENT_ERROR.NOT_ENROLLED]: HttpStatus.BAD_REQUEST,
  [VALIDATION_ERROR.INVALID_FIELD]: HttpStatus.BAD_REQUEST,
  [STORAGE_ERROR.CONSTRAINT_VIOLATION]: HttpStatus.BAD_REQUEST,
  [STORAGE_ERROR.STORAGE_FAILURE]: HttpStatus.INTERNAL_SERVER_ERROR,
  [MAINTENANCE_ERROR.RESET_NOT_CONFIRMED]: HttpStatus.BAD_REQUEST,
  [MAINTENANCE_ERROR.BACKUP_FAILED]: HttpStatus.INTERNAL_SERVER_ERROR,
};

/** 领域错误对应的 HTTP 状态码，未登记的视为客户端错误 */
export function statusForDomainError(error: DomainError): HttpStatus {
  return HTTP_STATUS_BY_ERROR_CODE[error.code] ?? HttpStatus.BAD_REQUEST;
}

/** 将 HTTP 状态码映射为 GraphQL 标准错误类别代码（extensions.code）
 *  注意：这是 GraphQL/Apollo 通用的大类，不是业务 errorCode（业务码放在 extensions.errorCode）
 */
function mapHttpToGqlCode(status: number): string {
  switch (status) {
    case 400:
    case 422:
      return 'BAD_USER_INPUT';
    case 404:
      return 'NOT_FOUND';
    default:
      return 'INTERNAL_SERVER_ERROR';
  }
}

/** 从 HttpException 中提取可读消息 */
function extractHttpMessage(exception: HttpException): string {
  const resp = exception.getResponse();
  if (typeof resp === 'string') return resp;
  if ('message' in resp) {
    const msg = resp.message;
    if (Array.isArray(msg)) return msg.join(', ');
    if (typeof msg === 'string') return msg;
  }
  return exception.message;
}

/** HTTP 状态码的名称作为错误码，如 503 → SERVICE_UNAVAILABLE */
function errorCodeForStatus(status: number): string {
  return HttpStatus[status] ?? 'INTERNAL_ERROR';
}

/** 获取 GraphQL 字段路径 */
function getGqlPath(host: ArgumentsHost): string[] | undefined {
  const gqlHost = GqlArgumentsHost.create(host);
  const info = gqlHost.getInfo<GraphQLResolveInfo | undefined>();
  const field = info?.fieldName;
  return field ? [field] : undefined;
}

interface NormalizedError {
  status: number;
  body: HttpErrorBody;
}

/**
 * 全局异常过滤器
 * - HTTP：渲染 { detail, errorCode } JSON 响应
 * - GraphQL：返回 GraphQLError，extensions.code 为大类，extensions.errorCode 为业务码
 * 5xx 错误只记录日志，不向调用方暴露内部细节
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  constructor(
    @InjectPinoLogger(AllExceptionsFilter.name)
    private readonly logger: PinoLogger,
  ) {}

  catch(exception: unknown, host: ArgumentsHost): GraphQLError | void {
    const normalized = this.normalize(exception);
    if (normalized.status >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(
        { errorCode: normalized.body.errorCode, err: exception },
        normalized.body.detail,
      );
    }

    if (host.getType() === 'http') {
      const response = host.switchToHttp().getResponse<Response>();
      response.status(normalized.status).json(normalized.body);
      return;
    }

    return new GraphQLError(normalized.body.detail, {
      path: getGqlPath(host),
      extensions: {
        code: mapHttpToGqlCode(normalized.status),
        errorCode: normalized.body.errorCode,
        httpStatus: normalized.status,
        ...(isDomainError(exception) && exception.details ? { details: exception.details } : {}),
      },
    });
  }

  private normalize(exception: unknown): NormalizedError {
    if (isDomainError(exception)) {
      return {
        status: statusForDomainError(exception),
        body: { detail: exception.message, errorCode: exception.code },
      };
    }
    if (exception instanceof HttpException) {
      const status = exception.getStatus();
      return {
        status,
        body: { detail: extractHttpMessage(exception), errorCode: errorCodeForStatus(status) },
      };
    }
    return {
      status: HttpStatus.INTERNAL_SERVER_ERROR,
      body: { detail: 'Internal server error', errorCode: 'INTERNAL_ERROR' },
    };
  }
}
