/**
 * Query-string schemas and handler helpers shared by the routers
 */

import type { Request, Response } from "express";
import { z } from "zod";
import { GAME_STATUSES, INVITATION_STATUSES, MAX_ID } from "@shared/schema";
import { DatabaseUnavailableError } from "../db";
import { DEFAULT_LIMIT, DEFAULT_SKIP, MAX_LIMIT, listQuery } from "../storage/query";
import {
  USER_ORDER_FIELDS,
  type GameQuery,
  type InvitationQuery,
  type MoveQuery,
  type UserQuery,
} from "../storage/types";
import { Errors, sendServiceFailure } from "../utils/apiError";
import type { ServiceResult } from "../services/types";

// ============================================================================
// Schemas
// ============================================================================

export const idSchema = z.coerce.number().int().positive().max(MAX_ID);

const booleanParam = z
  .enum(["true", "false"])
  .default("false")
  .transform((value) => value === "true");

const pagination = {
  skip: z.coerce.number().int().min(0).default(DEFAULT_SKIP),
  limit: z.coerce.number().int().min(1).max(MAX_LIMIT).default(DEFAULT_LIMIT),
  reverse: booleanParam,
};

export const idParamsSchema = z.object({ id: idSchema });

export const userListQuerySchema = z
  .object({
    userId: idSchema.optional(),
    name: z.string().min(1).optional(),
    orderBy: z.enum(USER_ORDER_FIELDS).default("dateJoined"),
    ...pagination,
  })
  .transform((q): UserQuery => listQuery({ id: q.userId, name: q.name }, q.orderBy, q));

export const invitationListQuerySchema = z
  .object({
    invitationId: idSchema.optional(),
    fromId: idSchema.optional(),
    toId: idSchema.optional(),
    status: z.enum(INVITATION_STATUSES).optional(),
    ...pagination,
  })
  .transform(
    (q): InvitationQuery =>
      listQuery(
        { id: q.invitationId, fromId: q.fromId, toId: q.toId, status: q.status },
        "dateSent",
        q
      )
  );

export const gameListQuerySchema = z
  .object({
    gameId: idSchema.optional(),
    invitationId: idSchema.optional(),
    player1Id: idSchema.optional(),
    player2Id: idSchema.optional(),
    whomstId: idSchema.optional(),
    winnerId: idSchema.optional(),
    status: z.enum(GAME_STATUSES).optional(),
    ...pagination,
  })
  .transform(
    (q): GameQuery =>
      listQuery(
        {
          id: q.gameId,
          invitationId: q.invitationId,
          player1: q.player1Id,
          player2: q.player2Id,
          whomst: q.whomstId,
          winner: q.winnerId,
          status: q.status,
        },
        "dateStarted",
        q
      )
  );

export const moveListQuerySchema = z
  .object({
    moveId: idSchema.optional(),
    userId: idSchema.optional(),
    gameId: idSchema.optional(),
    ...pagination,
  })
  .transform(
    (q): MoveQuery => listQuery({ id: q.moveId, userId: q.userId, gameId: q.gameId }, "timestamp", q)
  );

// ============================================================================
// Helpers
// ============================================================================

/** Send a service result: the data with `status` on success, the mapped error otherwise. */
export function sendResult<T>(
  res: Response,
  result: ServiceResult<T>,
  status = 200,
  present: (data: T) => unknown = (data) => data
): Response {
  if (!result.ok) return sendServiceFailure(res, result);
  return res.status(status).json(present(result.data));
}

/** Last-resort handler for errors a service did not turn into a result. */
export function sendUnexpected(req: Request, res: Response, error: unknown, message: string): Response {
  if (error instanceof DatabaseUnavailableError) {
    return Errors.dbUnavailable(res);
  }
  req.log.error(message, { error, method: req.method, url: req.originalUrl });
  return Errors.internal(res);
}
