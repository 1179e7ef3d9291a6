import { Response } from 'express';
import { AuthRequest, resolveCurrentUser } from '../middleware/auth.middleware';
import {
  addUserInteraction,
  deleteUserInteractionById,
  getUserInteractions
} from '../services/interaction.service';
import { UserInteraction } from '../types';
import { AppContext } from '../types/context';
import { errorText, sendError, sendServiceError, sendSuccess } from '../utils/response.util';
import { interactionSchema, parseId, validatePayload } from '../utils/validators.util';

export type InteractionView = Omit<UserInteraction, 'user_id'>;

// The owner is implied by the token, so it is left out of listings
export const toInteractionView = ({ user_id: _userId, ...interaction }: UserInteraction): InteractionView =>
  interaction;

export const createInteractionController = ({ db }: AppContext) => {
  const logInteraction = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      // Validation
      const payload = validatePayload(interactionSchema, req.body);
      if (!payload.ok) {
        sendServiceError(res, payload.error);
        return;
      }

      // The service checks that the course exists
      const { course_id, interaction_type } = payload.value;
      const result = await addUserInteraction(db, user.id, course_id, interaction_type);
      if (!result.ok) {
        sendServiceError(res, result.error);
        return;
      }

      sendSuccess(res, 201, 'Interaction logged successfully', result.value);
    } catch (error) {
      console.error('Log interaction error:', error);
      sendError(res, 500, `Error logging interaction: ${errorText(error)}`);
    }
  };

  const listInteractions = async (req: AuthRequest, res: Response): Promise<void> => {
    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      const interactions = await getUserInteractions(db, user.id);

      sendSuccess(res, 200, 'Interactions retrieved successfully', {
        interactions: interactions.map(toInteractionView)
      });
    } catch (error) {
      console.error('List interactions error:', error);
      sendError(res, 500, `Error retrieving interactions: ${errorText(error)}`);
    }
  };

  const deleteInteraction = async (req: AuthRequest, res: Response): Promise<void> => {
    const id = parseId(req.params.id);
    if (id === null) {
      sendError(res, 400, 'Invalid interaction id');
      return;
    }

    try {
      const user = await resolveCurrentUser(db, req, res);
      if (!user) {
        return;
      }

      // TODO: restrict deletion to the caller's own interactions once the
      // ownership rule for shared/admin accounts is settled
      const message = await deleteUserInteractionById(db, id);

      sendSuccess(res, 200, message);
    } catch (error) {
      console.error('Delete interaction error:', error);
      sendError(res, 500, `Error deleting interaction: ${errorText(error)}`);
    }
  };

  return { logInteraction, listInteractions, deleteInteraction };
};
