// src/adapters/http/root.controller.ts
import { Controller, Get, HttpStatus, Redirect } from '@nestjs/common';

/** 前端入口 */
export const FRONTEND_ENTRY = '/static/index.html';

@Controller()
export class RootController {
  /** 根路径跳转到静态前端 */
  @Get()
  @Redirect(FRONTEND_ENTRY, HttpStatus.FOUND)
  redirectToFrontend(): void {
    // 由 @Redirect 完成跳转
  }
}
