import { Request, Response } from 'express';
import {
  getAllCourses,
  getCourseById,
  getRandomCourses,
  getRecommendedCoursesByCourseId
} from '../services/course.service';
import { AppContext } from '../types/context';
import { errorText, sendError, sendServiceError, sendSuccess } from '../utils/response.util';
import { countQuerySchema, parseId, validateQuery } from '../utils/validators.util';

const randomCountSchema = countQuerySchema(2, 20);
const recommendationCountSchema = countQuerySchema(5, 50);

export const createCourseController = ({ db, recommender }: AppContext) => {
  const getCourses = async (_req: Request, res: Response): Promise<void> => {
    try {
      const courses = await getAllCourses(db);
      sendSuccess(res, 200, 'Courses retrieved successfully', { courses });
    } catch (error) {
      console.error('Get courses error:', error);
      sendError(res, 500, `Error retrieving courses: ${errorText(error)}`);
    }
  };

  const getRandom = async (req: Request, res: Response): Promise<void> => {
    const query = validateQuery(randomCountSchema, req.query);
    if (!query.ok) {
      sendServiceError(res, query.error);
      return;
    }

    try {
      const courses = await getRandomCourses(db, query.value.n);
      sendSuccess(res, 200, 'Random courses retrieved successfully', { courses });
    } catch (error) {
      console.error('Get random courses error:', error);
      sendError(res, 500, `Error retrieving random courses: ${errorText(error)}`);
    }
  };

  const getCourse = async (req: Request, res: Response): Promise<void> => {
    const courseId = parseId(req.params.id);
    if (courseId === null) {
      sendError(res, 400, 'Invalid course id');
      return;
    }

    try {
      const course = await getCourseById(db, courseId);
      if (!course) {
        sendError(res, 404, 'Course not found');
        return;
      }

      sendSuccess(res, 200, 'Course retrieved successfully', course);
    } catch (error) {
      console.error('Get course by ID error:', error);
      sendError(res, 500, `Error retrieving course: ${errorText(error)}`);
    }
  };

  const getRecommendations = async (req: Request, res: Response): Promise<void> => {
    const courseId = parseId(req.params.id);
    if (courseId === null) {
      sendError(res, 400, 'Invalid course id');
      return;
    }

    const query = validateQuery(recommendationCountSchema, req.query);
    if (!query.ok) {
      sendServiceError(res, query.error);
      return;
    }

    try {
      const course = await getCourseById(db, courseId);
      if (!course) {
        sendError(res, 404, 'Course not found');
        return;
      }

      const courses = await getRecommendedCoursesByCourseId(db, recommender, courseId, query.value.n);
      sendSuccess(res, 200, 'Recommended courses retrieved successfully', { courses });
    } catch (error) {
      console.error('Get recommendations error:', error);
      sendError(res, 500, `Error retrieving recommendations: ${errorText(error)}`);
    }
  };

  return { getCourses, getRandom, getCourse, getRecommendations };
};
