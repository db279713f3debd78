import type { Response } from "express";
import type { z } from "zod";
import { Errors } from "../utils/apiError";

/**
 * Parse request input against a schema. On failure the 422 response is
 * already sent and undefined is returned, so handlers just `return`.
 */
export function parseInput<T extends z.ZodTypeAny>(
  schema: T,
  input: unknown,
  res: Response
): z.infer<T> | undefined {
  const result = schema.safeParse(input);
  if (!result.success) {
    Errors.validation(res, result.error.flatten());
    return undefined;
  }
  return result.data;
}
