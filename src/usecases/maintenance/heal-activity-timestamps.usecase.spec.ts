// src/usecases/maintenance/heal-activity-timestamps.usecase.spec.ts
import { ActivitiesService } from '@modules/activities/activities.service';
import { TestingModule } from '@nestjs/testing';
import { getDataSourceToken } from '@nestjs/typeorm';
import { createSqliteTestingModule } from '@src/utils/test/sqlite-testing';
import { DataSource } from 'typeorm';
import { BootstrapSeedDataUsecase } from './bootstrap-seed-data.usecase';
import { HealActivityTimestampsUsecase } from './heal-activity-timestamps.usecase';

describe('HealActivityTimestampsUsecase', () => {
  const now = new Date('2026-01-15T08:30:00.000Z');
  let moduleRef: TestingModule;
  let usecase: HealActivityTimestampsUsecase;
  let activities: ActivitiesService;

  beforeEach(async () => {
    moduleRef = await createSqliteTestingModule({
      providers: [HealActivityTimestampsUsecase, BootstrapSeedDataUsecase],
      loggerContexts: [HealActivityTimestampsUsecase.name, BootstrapSeedDataUsecase.name],
    });
    usecase = moduleRef.get(HealActivityTimestampsUsecase);
    activities = moduleRef.get(ActivitiesService);
    await moduleRef.get(BootstrapSeedDataUsecase).execute();
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  it('所有活动都有创建时间时不做修改', async () => {
    expect(await usecase.execute(now)).toEqual({ healed: 0 });
  });

  it('补齐缺失的创建时间，已有的保持不变', async () => {
    const dataSource = moduleRef.get<DataSource>(getDataSourceToken());
    const gymBefore = await activities.findByName('Gym Class');
    await dataSource.query(
      `UPDATE activities SET created_at = NULL WHERE name IN ('Chess Club', 'Art Club')`,
    );

    expect(await usecase.execute(now)).toEqual({ healed: 2 });

    const chess = await activities.findByName('Chess Club');
    const art = await activities.findByName('Art Club');
    const gym = await activities.findByName('Gym Class');
    expect(chess?.createdAt?.toISOString()).toBe('2026-01-15T08:30:00.000Z');
    expect(art?.createdAt?.toISOString()).toBe('2026-01-15T08:30:00.000Z');
    expect(gym?.createdAt?.toISOString()).toBe(gymBefore?.createdAt?.toISOString());
    expect(await usecase.execute(now)).toEqual({ healed: 0 });
  });
});
