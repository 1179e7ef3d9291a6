import { QueryResult, QueryResultRow } from 'pg';
import { createApp } from '../src/app';
import { Database, Queryable } from '../src/config/database';
import { loadConfig } from '../src/config/environment';
import { RecommendationLookup } from '../src/services/recommendation.service';
import { Course, InteractionType, PublicUser, UserInteraction } from '../src/types';
import { AppContext } from '../src/types/context';
import { generateToken } from '../src/utils/jwt.util';

export const testConfig = loadConfig({
  NODE_ENV: 'test',
  JWT_SECRET: 'test-secret',
  BCRYPT_SALT_ROUNDS: '4'
});

export const queryResult = <R extends QueryResultRow>(
  rows: R[],
  rowCount: number = rows.length
): QueryResult<R> => ({
  command: '',
  rowCount,
  oid: 0,
  fields: [],
  rows
});

/**
 * Database stand-in whose `query` is a jest mock. `transaction` runs the
 * work against the same mock so tests see one ordered list of statements.
 */
export const createFakeDatabase = () => {
  const query = jest.fn();
  const transaction = jest.fn();
  const db: Database = { query, transaction };

  transaction.mockImplementation((work: (client: Queryable) => Promise<unknown>) => work(db));

  return { db, query, transaction };
};

export const createFakeRecommender = () => {
  const getRecommendationsByCourseId = jest.fn();
  const recommender: RecommendationLookup = { getRecommendationsByCourseId };
  return { recommender, getRecommendationsByCourseId };
};

export const buildTestApp = () => {
  const { db } = createFakeDatabase();
  const { recommender } = createFakeRecommender();
  const ctx: AppContext = { config: testConfig, db, recommender };
  return { app: createApp(ctx), ctx };
};

export const bearer = (username: string): string =>
  `Bearer ${generateToken({ username }, testConfig.jwt)}`;

export const makeUser = (overrides: Partial<PublicUser> = {}): PublicUser => ({
  id: 1,
  username: 'alice',
  email: 'alice@example.com',
  onboarding_done: false,
  used_in_collaborative: false,
  ...overrides
});

export const makeCourse = (overrides: Partial<Course> = {}): Course => ({
  course_id: 100,
  course_title: 'Intro to Testing',
  url: 'https://courses.example.com/intro-to-testing',
  is_paid: true,
  price: 20,
  num_subscribers: 1500,
  num_reviews: 40,
  num_lectures: 12,
  level: 'Beginner Level',
  content_duration: 2.5,
  published_timestamp: null,
  subject: 'Web Development',
  ...overrides
});

export const makeInteraction = (overrides: Partial<UserInteraction> = {}): UserInteraction => ({
  id: 10,
  user_id: 1,
  course_id: 100,
  interaction_type: InteractionType.VIEW,
  timestamp: new Date('2024-03-01T10:00:00.000Z'),
  ...overrides
});
