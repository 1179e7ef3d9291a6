import { Queryable } from '../config/database';
import { SUBJECTS } from '../config/catalog';
import { Course } from '../types';
import { isSerialId } from '../utils/validators.util';
import { RecommendationLookup } from './recommendation.service';

const COURSE_COLUMNS = `course_id, course_title, url, is_paid, price, num_subscribers,
  num_reviews, num_lectures, level, content_duration, published_timestamp, subject`;

export const getAllCourses = async (db: Queryable): Promise<Course[]> => {
  const result = await db.query<Course>(
    `SELECT ${COURSE_COLUMNS} FROM courses ORDER BY course_id`
  );

  return result.rows;
};

export const getCourseById = async (db: Queryable, courseId: number): Promise<Course | null> => {
  const result = await db.query<Course>(
    `SELECT ${COURSE_COLUMNS} FROM courses WHERE course_id = $1`,
    [courseId]
  );

  return result.rows[0] ?? null;
};

/**
 * Picks up to `n` courses at random from each catalogue subject, grouped in
 * subject order. A subject with fewer than `n` courses contributes all of them.
 */
export const getRandomCourses = async (db: Queryable, n = 2): Promise<Course[]> => {
  const courses: Course[] = [];

  for (const subject of SUBJECTS) {
    const result = await db.query<Course>(
      `SELECT ${COURSE_COLUMNS}
       FROM courses
       WHERE subject = $1
       ORDER BY RANDOM()
       LIMIT $2`,
      [subject, n]
    );
    courses.push(...result.rows);
  }

  return courses;
};

export const getRecommendedCoursesByCourseId = async (
  db: Queryable,
  lookup: RecommendationLookup,
  courseId: number,
  n: number
): Promise<Course[]> => {
  // Ids outside the integer column's range cannot be in the catalogue
  const courseIds = (await lookup.getRecommendationsByCourseId(courseId, n)).filter(isSerialId);
  if (courseIds.length === 0) {
    return [];
  }

  const result = await db.query<Course>(
    `SELECT ${COURSE_COLUMNS} FROM courses WHERE course_id = ANY($1::int[])`,
    [courseIds]
  );

  // Keep the recommender's ranking; ids unknown to the catalogue are dropped
  const byId = new Map(result.rows.map((course) => [course.course_id, course]));
  return courseIds.flatMap((id) => {
    const course = byId.get(id);
    return course ? [course] : [];
  });
};
