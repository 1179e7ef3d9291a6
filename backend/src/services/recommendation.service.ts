import axios, { AxiosInstance } from 'axios';
import Joi from 'joi';
import { Queryable } from '../config/database';
import { AppConfig } from '../config/environment';

/**
 * Source of "courses like this one". Implementations return course ids
 * ranked best first, at most `n` of them.
 */
export interface RecommendationLookup {
  getRecommendationsByCourseId(courseId: number, n: number): Promise<number[]>;
}

interface RecommenderResponse {
  course_ids: number[];
}

const recommenderResponseSchema = Joi.object<RecommenderResponse>({
  course_ids: Joi.array().items(Joi.number().integer()).required()
}).unknown(true);

export class HttpRecommendationLookup implements RecommendationLookup {
  private readonly client: AxiosInstance;

  constructor(baseURL: string, timeoutMs: number) {
    this.client = axios.create({ baseURL, timeout: timeoutMs });
  }

  async getRecommendationsByCourseId(courseId: number, n: number): Promise<number[]> {
    const response = await this.client.get<unknown>(`/recommendations/${courseId}`, {
      params: { n }
    });

    const { error, value } = recommenderResponseSchema.validate(response.data, { convert: false });
    if (error || value === undefined) {
      throw new Error(`Recommender returned an invalid response: ${error?.message ?? 'empty body'}`);
    }

    return value.course_ids.slice(0, n);
  }
}

// Most-subscribed other courses in the same subject
export class SubjectRecommendationLookup implements RecommendationLookup {
  constructor(private readonly db: Queryable) {}

  async getRecommendationsByCourseId(courseId: number, n: number): Promise<number[]> {
    const result = await this.db.query<{ course_id: number }>(
      `SELECT c.course_id
       FROM courses c
       JOIN courses source ON source.course_id = $1
       WHERE c.subject = source.subject AND c.course_id <> source.course_id
       ORDER BY c.num_subscribers DESC, c.course_id
       LIMIT $2`,
      [courseId, n]
    );

    return result.rows.map((row) => row.course_id);
  }
}

export const createRecommendationLookup = (config: AppConfig, db: Queryable): RecommendationLookup => {
  if (config.recommender.url) {
    return new HttpRecommendationLookup(config.recommender.url, config.recommender.timeoutMs);
  }

  return new SubjectRecommendationLookup(db);
};
