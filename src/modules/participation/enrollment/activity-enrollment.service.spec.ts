// src/modules/participation/enrollment/activity-enrollment.service.spec.ts
import { DomainError, STORAGE_ERROR } from '@core/common/errors/domain-error';
import { ActivitiesService } from '@modules/activities/activities.service';
import { UsersService } from '@modules/users/users.service';
import { TestingModule } from '@nestjs/testing';
import { createSqliteTestingModule } from '@src/utils/test/sqlite-testing';
import { ActivityEnrollmentService } from './activity-enrollment.service';

describe('ActivityEnrollmentService', () => {
  let moduleRef: TestingModule;
  let service: ActivityEnrollmentService;
  let users: UsersService;
  let activityId: number;

  beforeEach(async () => {
    moduleRef = await createSqliteTestingModule({});
    service = moduleRef.get(ActivityEnrollmentService);
    users = moduleRef.get(UsersService);
    const activity = await moduleRef.get(ActivitiesService).create({
      name: 'Robotics Lab',
      description: 'Design and program small competition robots',
      schedule: 'Saturdays, 10:00 AM - 12:00 PM',
      maxParticipants: 2,
    });
    activityId = activity.id;
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('报名后 isEnrolled 为 true，删除后恢复为 false', async () => {
    const user = await users.create({ email: 'ada@mergington.edu' });
    const key = { activityId, userId: user.id };

    await service.addParticipant(key);
    expect(await service.isEnrolled(key)).toBe(true);

    expect(await service.removeParticipant(key)).toBe(true);
    expect(await service.isEnrolled(key)).toBe(false);
    expect(await service.count(activityId)).toBe(0);
  });

  it('删除不存在的报名返回 false', async () => {
    const user = await users.create({ email: 'ghost@mergington.edu' });

    expect(await service.removeParticipant({ activityId, userId: user.id })).toBe(false);
  });

  it('重复报名转为 CONSTRAINT_VIOLATION', async () => {
    const user = await users.create({ email: 'ada@mergington.edu' });
    const key = { activityId, userId: user.id };
    await service.addParticipant(key);

    await expect(service.addParticipant(key)).rejects.toMatchObject({
      code: STORAGE_ERROR.CONSTRAINT_VIOLATION,
    });
    expect(await service.count()).toBe(1);
  });

  it('带容量条件的写入：未满时写入，满员后不写入', async () => {
    const first = await users.create({ email: 'a@mergington.edu' });
    const second = await users.create({ email: 'b@mergington.edu' });
    const third = await users.create({ email: 'c@mergington.edu' });

    expect(await service.addParticipantWithinCapacity({ activityId, userId: first.id })).toBe(true);
    expect(await service.addParticipantWithinCapacity({ activityId, userId: second.id })).toBe(
      true,
    );
    expect(await service.addParticipantWithinCapacity({ activityId, userId: third.id })).toBe(
      false,
    );
    expect(await service.count(activityId)).toBe(2);
  });

  it('不存在的活动上带条件写入不产生记录', async () => {
    const user = await users.create({ email: 'ada@mergington.edu' });

    expect(await service.addParticipantWithinCapacity({ activityId: 999, userId: user.id })).toBe(
      false,
    );
  });

  it('引用不存在的用户时转为 CONSTRAINT_VIOLATION', async () => {
    const error: unknown = await service.addParticipant({ activityId, userId: 404 }).then(
      () => null,
      (caught: unknown) => caught,
    );

    expect(error).toBeInstanceOf(DomainError);
    expect(error).toMatchObject({ code: STORAGE_ERROR.CONSTRAINT_VIOLATION });
  });
});
