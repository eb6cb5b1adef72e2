// src/usecases/enrollment/signup-for-activity.usecase.spec.ts
import { ENROLLMENT_ERROR, STORAGE_ERROR, VALIDATION_ERROR } from '@core/common/errors/domain-error';
import { ActivitiesService } from '@modules/activities/activities.service';
import { toActivitySummary } from '@modules/activities/activity-summary.mapper';
import { ActivityEnrollmentService } from '@modules/participation/enrollment/activity-enrollment.service';
import { UsersService } from '@modules/users/users.service';
import { TestingModule } from '@nestjs/testing';
import { captureDomainError } from '@src/utils/test/capture-domain-error';
import { getLoggerMock } from '@src/utils/test/logger-mock';
import { createSqliteTestingModule } from '@src/utils/test/sqlite-testing';
import { BootstrapSeedDataUsecase } from '@usecases/maintenance/bootstrap-seed-data.usecase';
import { SignupForActivityUsecase } from './signup-for-activity.usecase';

describe('SignupForActivityUsecase', () => {
  let moduleRef: TestingModule;
  let usecase: SignupForActivityUsecase;
  let activities: ActivitiesService;
  let users: UsersService;
  let enrollments: ActivityEnrollmentService;

  /** 将 Math Club（容量 10，初始 2 人）补满 */
  async function fillMathClub(): Promise<void> {
    for (let i = 1; i <= 8; i += 1) {
      await usecase.execute({ activityName: 'Math Club', email: `solver${i}@mergington.edu` });
    }
  }

  beforeEach(async () => {
    moduleRef = await createSqliteTestingModule({
      providers: [SignupForActivityUsecase, BootstrapSeedDataUsecase],
      loggerContexts: [SignupForActivityUsecase.name, BootstrapSeedDataUsecase.name],
    });
    usecase = moduleRef.get(SignupForActivityUsecase);
    activities = moduleRef.get(ActivitiesService);
    users = moduleRef.get(UsersService);
    enrollments = moduleRef.get(ActivityEnrollmentService);
    await moduleRef.get(BootstrapSeedDataUsecase).execute();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('新学生报名成功：创建用户并写入报名', async () => {
    const outcome = await usecase.execute({
      activityName: 'Chess Club',
      email: 'newkid@mergington.edu',
    });

    expect(outcome).toEqual({ message: 'Signed up newkid@mergington.edu for Chess Club' });
    const chess = await activities.findByName('Chess Club');
    if (!chess) throw new Error('Chess Club 应存在');
    const summary = toActivitySummary(chess);
    expect(summary.participants.map((participant) => participant.email)).toEqual([
      'michael@mergington.edu',
      'daniel@mergington.edu',
      'newkid@mergington.edu',
    ]);
    expect(summary.availableSpots).toBe(9);
    expect(summary.isFull).toBe(false);
    expect(await users.count()).toBe(19);
  });

  it('已有用户报名其他活动时复用该用户', async () => {
    await usecase.execute({ activityName: 'Art Club', email: 'michael@mergington.edu' });

    expect(await users.count()).toBe(18);
    expect(await enrollments.count()).toBe(19);
  });

  it('活动名称前后空格被忽略，消息保留原始输入', async () => {
    const outcome = await usecase.execute({
      activityName: ' Chess Club ',
      email: 'newkid@mergington.edu',
    });

    expect(outcome.message).toBe('Signed up newkid@mergington.edu for  Chess Club ');
  });

  it('活动不存在时抛出 ACTIVITY_NOT_FOUND', async () => {
    const error = await captureDomainError(() =>
      usecase.execute({ activityName: 'Underwater Basket Weaving', email: 'x@mergington.edu' }),
    );

    expect(error.code).toBe(ENROLLMENT_ERROR.ACTIVITY_NOT_FOUND);
    expect(error.message).toBe('Activity not found');
    expect(await users.findByEmail('x@mergington.edu')).toBeNull();
  });

  it.each(['michael@mergington.edu', '  Michael@Mergington.EDU '])(
    '重复报名（%p）抛出 ALREADY_ENROLLED，人数不变',
    async (email) => {
      const error = await captureDomainError(() =>
        usecase.execute({ activityName: 'Chess Club', email }),
      );

      expect(error.code).toBe(ENROLLMENT_ERROR.ALREADY_ENROLLED);
      expect(error.message).toBe('Student is already signed up');
      const chess = await activities.findByName('Chess Club');
      expect(chess?.enrollments).toHaveLength(2);
    },
  );

  it('邮箱格式不合法时抛出 VALIDATION_ERROR，不创建用户', async () => {
    const error = await captureDomainError(() =>
      usecase.execute({ activityName: 'Chess Club', email: 'not-an-email' }),
    );

    expect(error.code).toBe(VALIDATION_ERROR.INVALID_FIELD);
    expect(error.message).toBe('Invalid email format');
    expect(await users.count()).toBe(18);
    expect(await enrollments.count()).toBe(18);
  });

  it('活动恰好满员时抛出 CAPACITY_EXCEEDED，不写入任何记录', async () => {
    await fillMathClub();
    const math = await activities.findByName('Math Club');
    expect(math?.enrollments).toHaveLength(10);

    const error = await captureDomainError(() =>
      usecase.execute({ activityName: 'Math Club', email: 'latecomer@mergington.edu' }),
    );

    expect(error.code).toBe(ENROLLMENT_ERROR.CAPACITY_EXCEEDED);
    expect(error.message).toBe('Activity is full');
    expect(await users.findByEmail('latecomer@mergington.edu')).toBeNull();
    expect(await enrollments.count(math?.id)).toBe(10);
  });

  it('读到过期的"未满"快照时仍被条件写入拒绝，并回滚新建的用户', async () => {
    await fillMathClub();
    const math = await activities.findByName('Math Club');
    if (!math) throw new Error('Math Club 应存在');
    jest.spyOn(activities, 'findByName').mockResolvedValueOnce({ ...math, enrollments: [] });

    const error = await captureDomainError(() =>
      usecase.execute({ activityName: 'Math Club', email: 'racer@mergington.edu' }),
    );

    expect(error.code).toBe(ENROLLMENT_ERROR.CAPACITY_EXCEEDED);
    expect(await users.findByEmail('racer@mergington.edu')).toBeNull();
    expect(await enrollments.count(math.id)).toBe(10);
  });

  it('存储故障转为 STORAGE_ERROR，使用通用消息并保留原始错误', async () => {
    const ioError = new Error('disk I/O error');
    jest.spyOn(activities, 'findByName').mockRejectedValueOnce(ioError);

    const error = await captureDomainError(() =>
      usecase.execute({ activityName: 'Chess Club', email: 'newkid@mergington.edu' }),
    );

    expect(error.code).toBe(STORAGE_ERROR.STORAGE_FAILURE);
    expect(error.message).toBe('Error processing signup request');
    expect(error.cause).toBe(ioError);
    expect(getLoggerMock(moduleRef, SignupForActivityUsecase.name).error).not.toHaveBeenCalled();
  });
});
