// src/types/errors/http-error-body.ts

/** REST 错误响应体 */
export interface HttpErrorBody {
  /** 可读错误描述 */
  detail: string;
  /** 业务错误码 */
  errorCode: string;
}
