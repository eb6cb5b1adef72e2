// test/02-graphql/activities-graphql.e2e-spec.ts
import { NestExpressApplication } from '@nestjs/platform-express';
import { createE2eApp } from '../utils/e2e-app';
import { executeGql } from '../utils/e2e-graphql-utils';

interface ActivitiesData {
  activities: Array<{
    name: string;
    maxParticipants: number;
    availableSpots: number;
    isFull: boolean;
    participants: Array<{ email: string; role: string }>;
  }>;
}

interface SignupData {
  signupForActivity: { message: string };
}

interface UnregisterData {
  unregisterFromActivity: { message: string };
}

const SIGNUP_MUTATION = `
  mutation Signup($input: EnrollmentInput!) {
    signupForActivity(input: $input) { message }
  }
`;

const UNREGISTER_MUTATION = `
  mutation Unregister($input: EnrollmentInput!) {
    unregisterFromActivity(input: $input) { message }
  }
`;

describe('02-Activities GraphQL 接口', () => {
  let app: NestExpressApplication;

  beforeAll(async () => {
    app = await createE2eApp();
  });

  afterAll(async () => {
    if (app) {
      await app.close();
    }
  });

  it('查询全部活动及参与者', async () => {
    const body = await executeGql<ActivitiesData>({
      app,
      query: `
        query {
          activities {
            name
            maxParticipants
            availableSpots
            isFull
            participants { email role }
          }
        }
      `,
    });

    expect(body.errors).toBeUndefined();
    expect(body.data?.activities).toHaveLength(9);
    expect(body.data?.activities[0]).toEqual({
      name: 'Chess Club',
      maxParticipants: 12,
      availableSpots: 10,
      isFull: false,
      participants: [
        { email: 'michael@mergington.edu', role: 'STUDENT' },
        { email: 'daniel@mergington.edu', role: 'STUDENT' },
      ],
    });
  });

  it('报名与退出', async () => {
    const input = { activityName: 'Art Club', email: 'newkid@mergington.edu' };

    const signed = await executeGql<SignupData>({
      app,
      query: SIGNUP_MUTATION,
      variables: { input },
    });
    expect(signed.data?.signupForActivity.message).toBe(
      'Signed up newkid@mergington.edu for Art Club',
    );

    const left = await executeGql<UnregisterData>({
      app,
      query: UNREGISTER_MUTATION,
      variables: { input },
    });
    expect(left.data?.unregisterFromActivity.message).toBe(
      'Unregistered newkid@mergington.edu from Art Club',
    );
  });

  it('活动不存在时返回 NOT_FOUND 错误', async () => {
    const body = await executeGql<SignupData>({
      app,
      query: SIGNUP_MUTATION,
      variables: { input: { activityName: 'Knitting Circle', email: 'newkid@mergington.edu' } },
    });

    expect(body.data).toBeNull();
    expect(body.errors?.[0].message).toBe('Activity not found');
    expect(body.errors?.[0].extensions?.code).toBe('NOT_FOUND');
    expect(body.errors?.[0].extensions?.errorCode).toBe('ACTIVITY_NOT_FOUND');
  });

  it('邮箱为空时返回 BAD_USER_INPUT', async () => {
    const body = await executeGql<SignupData>({
      app,
      query: SIGNUP_MUTATION,
      variables: { input: { activityName: 'Art Club', email: '' } },
    });

    expect(body.errors?.[0].message).toBe('email is required');
    expect(body.errors?.[0].extensions?.code).toBe('BAD_USER_INPUT');
    expect(body.errors?.[0].extensions?.errorCode).toBe('VALIDATION_ERROR');
  });
});
