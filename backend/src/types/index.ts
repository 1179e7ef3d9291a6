export enum InteractionType {
  VIEW = 'view',
  ENROLLED = 'enrolled',
  COMPLETE = 'complete',
  BUY = 'buy'
}

export enum PreferenceType {
  SUBJECT = 'subject',
  LEVEL = 'level'
}

export interface User {
  id: number;
  username: string;
  email: string;
  password_hash: string;
  onboarding_done: boolean;
  used_in_collaborative: boolean;
  created_at: Date;
}

// What every endpoint is allowed to expose about a user
export type PublicUser = Omit<User, 'password_hash' | 'created_at'>;

export interface UserPreferences {
  subject: string[];
  level: string[];
}

export interface UserInteraction {
  id: number;
  user_id: number;
  course_id: number;
  interaction_type: InteractionType;
  timestamp: Date;
}

export interface Course {
  course_id: number;
  course_title: string;
  url: string | null;
  is_paid: boolean;
  price: number;
  num_subscribers: number;
  num_reviews: number;
  num_lectures: number;
  level: string | null;
  content_duration: number | null;
  published_timestamp: Date | null;
  subject: string;
}

export interface JWTPayload {
  username: string;
}

export type ServiceErrorKind =
  | 'NotFound'
  | 'Conflict'
  | 'ValidationFailed'
  | 'StateViolation'
  | 'Unauthorized';

export interface ServiceError {
  kind: ServiceErrorKind;
  message: string;
}

export type ServiceResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: ServiceError };
