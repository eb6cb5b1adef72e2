// test/01-activities/activities-rest.e2e-spec.ts
import type { ActivityListing } from '@app-types/models/activity.types';
import { NestExpressApplication } from '@nestjs/platform-express';
import request from 'supertest';
import { createE2eApp } from '../utils/e2e-app';

describe('01-Activities REST 接口', () => {
  let app: NestExpressApplication;

  const listActivities = async (): Promise<ActivityListing> => {
    const res = await request(app.getHttpServer()).get('/activities').expect(200);
    const listing: ActivityListing = res.body;
    return listing;
  };

  const signup = (activityName: string, email: string): request.Test =>
    request(app.getHttpServer())
      .post(`/activities/${encodeURIComponent(activityName)}/signup`)
      .query({ email });

  const unregister = (activityName: string, email: string): request.Test =>
    request(app.getHttpServer())
      .delete(`/activities/${encodeURIComponent(activityName)}/unregister`)
      .query({ email });

  beforeAll(async () => {
    app = await createE2eApp();
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  describe('GET /activities', () => {
    it('返回以活动名称为键的 9 个活动', async () => {
      const listing = await listActivities();

      expect(Object.keys(listing)).toHaveLength(9);
      expect(listing['Chess Club']).toEqual({
        description: 'Learn strategies and compete in chess tournaments',
        schedule: 'Fridays, 3:30 PM - 5:00 PM',
        max_participants: 12,
        participants: ['michael@mergington.edu', 'daniel@mergington.edu'],
        available_spots: 10,
        is_full: false,
      });
    });
  });

  describe('报名与退出', () => {
    it('新学生报名成功，名额减少', async () => {
      const res = await signup('Chess Club', 'newkid@mergington.edu').expect(200);
      expect(res.body).toEqual({ message: 'Signed up newkid@mergington.edu for Chess Club' });

      const chess = (await listActivities())['Chess Club'];
      expect(chess.participants).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
        'newkid@mergington.edu',
      ]);
      expect(chess.available_spots).toBe(9);
    });

    it('重复报名返回 400 ALREADY_ENROLLED', async () => {
      const res = await signup('Chess Club', 'NewKid@mergington.edu').expect(400);
      expect(res.body).toEqual({
        detail: 'Student is already signed up',
        errorCode: 'ALREADY_ENROLLED',
      });
    });

    it('活动不存在返回 404', async () => {
      const res = await signup('Underwater Basket Weaving', 'newkid@mergington.edu').expect(404);
      expect(res.body).toEqual({ detail: 'Activity not found', errorCode: 'ACTIVITY_NOT_FOUND' });
    });

    it('缺少 email 参数返回 400 VALIDATION_ERROR', async () => {
      const res = await request(app.getHttpServer())
        .post('/activities/Chess%20Club/signup')
        .expect(400);
      expect(res.body.errorCode).toBe('VALIDATION_ERROR');
      expect(res.body.detail).toContain('email query parameter is required');
    });

    it('邮箱格式不合法返回 400', async () => {
      const res = await signup('Chess Club', 'not-an-email').expect(400);
      expect(res.body).toEqual({ detail: 'Invalid email format', errorCode: 'VALIDATION_ERROR' });
    });

    it('退出成功后再次退出返回 NOT_ENROLLED', async () => {
      const res = await unregister('Chess Club', 'newkid@mergington.edu').expect(200);
      expect(res.body).toEqual({ message: 'Unregistered newkid@mergington.edu from Chess Club' });
      expect((await listActivities())['Chess Club'].participants).toEqual([
        'michael@mergington.edu',
        'daniel@mergington.edu',
      ]);

      const again = await unregister('Chess Club', 'newkid@mergington.edu').expect(400);
      expect(again.body).toEqual({
        detail: 'Student is not signed up for this activity',
        errorCode: 'NOT_ENROLLED',
      });
    });

    it('退出不存在的活动返回 404', async () => {
      await unregister('Knitting Circle', 'michael@mergington.edu').expect(404);
    });
  });

  describe('容量', () => {
    it('满员后报名返回 400 CAPACITY_EXCEEDED，人数不超过上限', async () => {
      for (let i = 1; i <= 8; i += 1) {
        await signup('Math Club', `solver${i}@mergington.edu`).expect(200);
      }
      const math = (await listActivities())['Math Club'];
      expect(math.participants).toHaveLength(10);
      expect(math.available_spots).toBe(0);
      expect(math.is_full).toBe(true);

      const res = await signup('Math Club', 'latecomer@mergington.edu').expect(400);
      expect(res.body).toEqual({ detail: 'Activity is full', errorCode: 'CAPACITY_EXCEEDED' });
      expect((await listActivities())['Math Club'].participants).toHaveLength(10);
    });
  });
});
