// src/usecases/enrollment/enrollment.types.ts

/** 报名 / 退出的输入 */
export interface EnrollmentCommand {
  /** 活动名称（原样，查询前去空格） */
  readonly activityName: string;
  /** 学生邮箱（原样，查询前规范化） */
  readonly email: string;
}

/** 报名 / 退出的结果 */
export interface EnrollmentOutcome {
  readonly message: string;
}
