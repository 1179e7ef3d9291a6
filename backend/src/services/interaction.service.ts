import { Queryable } from '../config/database';
import { InteractionType, ServiceResult, UserInteraction } from '../types';
import { fail, ok } from '../utils/result.util';
import { getCourseById } from './course.service';

const INTERACTION_COLUMNS = 'id, user_id, course_id, interaction_type, timestamp';

export const addUserInteraction = async (
  db: Queryable,
  userId: number,
  courseId: number,
  interactionType: InteractionType
): Promise<ServiceResult<UserInteraction>> => {
  const course = await getCourseById(db, courseId);
  if (!course) {
    return fail('NotFound', 'Course not found');
  }

  const result = await db.query<UserInteraction>(
    `INSERT INTO user_interactions (user_id, course_id, interaction_type)
     VALUES ($1, $2, $3)
     RETURNING ${INTERACTION_COLUMNS}`,
    [userId, courseId, interactionType]
  );

  return ok(result.rows[0]);
};

// Newest first
export const getUserInteractions = async (
  db: Queryable,
  userId: number
): Promise<UserInteraction[]> => {
  const result = await db.query<UserInteraction>(
    `SELECT ${INTERACTION_COLUMNS}
     FROM user_interactions
     WHERE user_id = $1
     ORDER BY timestamp DESC, id DESC`,
    [userId]
  );

  return result.rows;
};

/**
 * Deletes an interaction by id regardless of which user logged it.
 * A missing id is not an error; the returned message says what happened.
 */
export const deleteUserInteractionById = async (db: Queryable, id: number): Promise<string> => {
  const result = await db.query('DELETE FROM user_interactions WHERE id = $1', [id]);

  return (result.rowCount ?? 0) > 0
    ? 'Interaction deleted successfully'
    : `Interaction ${id} not found`;
};
