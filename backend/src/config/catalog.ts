// Subjects and levels used by the course catalogue
export const SUBJECTS = [
  'Business Finance',
  'Graphics Design',
  'Web Development',
  'Musical Instruments'
] as const;

export const LEVELS = [
  'All Levels',
  'Beginner Level',
  'Intermediate Level',
  'Expert Level'
] as const;
