import bcrypt from 'bcryptjs';

export const hashPassword = (password: string, saltRounds: number): Promise<string> => {
  return bcrypt.hash(password, saltRounds);
};

export const verifyPassword = (password: string, passwordHash: string): Promise<boolean> => {
  return bcrypt.compare(password, passwordHash);
};
