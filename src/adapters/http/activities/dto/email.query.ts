// src/adapters/http/activities/dto/email.query.ts
import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

/**
 * 报名 / 退出接口的查询参数：?email=
 */
export class EmailQuery {
  @IsString({ message: 'email query parameter is required' })
  @IsNotEmpty({ message: 'email must not be empty' })
  @MaxLength(255, { message: 'email must be at most 255 characters long' })
  email!: string;
}
