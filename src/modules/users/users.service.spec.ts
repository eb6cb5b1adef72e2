// src/modules/users/users.service.spec.ts
import { STORAGE_ERROR, VALIDATION_ERROR } from '@core/common/errors/domain-error';
import { TestingModule } from '@nestjs/testing';
import { captureDomainError } from '@src/utils/test/capture-domain-error';
import { createSqliteTestingModule } from '@src/utils/test/sqlite-testing';
import { UsersService } from './users.service';

describe('UsersService', () => {
  let moduleRef: TestingModule;
  let service: UsersService;

  beforeEach(async () => {
    moduleRef = await createSqliteTestingModule({});
    service = moduleRef.get(UsersService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('创建用户时邮箱去空格并转小写', async () => {
    const user = await service.create({ email: '  Alice@Mergington.EDU ' });

    expect(user.email).toBe('alice@mergington.edu');
    expect(user.role).toBe('student');
    expect(user.name).toBeNull();
  });

  it('按邮箱查找时同样规范化', async () => {
    await service.create({ email: 'bob@mergington.edu', name: 'Bob' });

    const found = await service.findByEmail(' BOB@mergington.edu');

    expect(found?.name).toBe('Bob');
  });

  it('邮箱格式不合法时抛出 VALIDATION_ERROR 且不写入', async () => {
    const error = await captureDomainError(() => service.create({ email: 'not-an-email' }));

    expect(error.code).toBe(VALIDATION_ERROR.INVALID_FIELD);
    expect(error.message).toBe('Invalid email format');
    expect(await service.count()).toBe(0);
  });

  it('年级超出长度时抛出 VALIDATION_ERROR', async () => {
    const error = await captureDomainError(() =>
      service.create({ email: 'x@mergington.edu', grade: 'grade-eleven' }),
    );

    expect(error.code).toBe(VALIDATION_ERROR.INVALID_FIELD);
    expect(error.details).toEqual({ field: 'grade' });
  });

  it('重复邮箱转为 CONSTRAINT_VIOLATION 并带出约束名', async () => {
    await service.create({ email: 'dup@mergington.edu' });

    const error = await captureDomainError(() => service.create({ email: 'DUP@mergington.edu' }));

    expect(error.code).toBe(STORAGE_ERROR.CONSTRAINT_VIOLATION);
    expect(error.details).toEqual({ rule: 'users.email' });
    expect(error.message).toBe('Data integrity error: users.email');
  });

  it('resolveOrCreateByEmail 区分已有用户与新建用户', async () => {
    const first = await service.resolveOrCreateByEmail('newkid@mergington.edu');
    const second = await service.resolveOrCreateByEmail('NewKid@mergington.edu');

    expect(first.kind).toBe('created');
    expect(second.kind).toBe('existing');
    expect(second.user.id).toBe(first.user.id);
    expect(await service.count()).toBe(1);
  });
});
