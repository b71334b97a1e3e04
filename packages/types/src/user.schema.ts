import { z } from 'zod';

export const USERNAME_PATTERN = /^[A-Za-z0-9_-]{4,15}$/;

// 4-15 characters: letters, digits, underscore and hyphen
export const UsernameSchema = z.string().regex(USERNAME_PATTERN, 'Username not valid.');

export type Username = z.infer<typeof UsernameSchema>;
