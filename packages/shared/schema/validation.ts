import { z } from "zod";

/** Largest value a serial / integer column holds. */
export const MAX_ID = 2147483647;

const USERNAME_PATTERN = /^[a-zA-Z0-9_-]+$/;

export const usernameSchema = z
  .string()
  .min(3, "Username must be at least 3 characters")
  .max(15, "Username must be at most 15 characters")
  .regex(USERNAME_PATTERN, "Username can only contain letters, numbers, '_' and '-'");

export const passwordSchema = z
  .string()
  .min(8, "Password is too short (<8 characters)")
  .max(64, "Password is too long (>64 characters)")
  .refine(
    (value) =>
      /[a-z]/.test(value) && /[A-Z]/.test(value) && /\d/.test(value) && /[^a-zA-Z0-9]/.test(value),
    "Password is missing requirements (at least 1 upper, 1 lower, 1 number and 1 special character)"
  );

export const emailSchema = z.string().trim().email("Invalid email address").max(255);
