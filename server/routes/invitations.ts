import { Router, type RequestHandler } from "express";
import { createInvitationSchema } from "@shared/schema";
import type { InvitationService } from "../services/invitation";
import { parseInput } from "../middleware/validation";
import { Errors } from "../utils/apiError";
import { idParamsSchema, invitationListQuerySchema, sendResult, sendUnexpected } from "./shared";

export interface InvitationsRouterDeps {
  invitations: InvitationService;
  authenticate: RequestHandler;
}

export function createInvitationsRouter({
  invitations,
  authenticate,
}: InvitationsRouterDeps): Router {
  const router = Router();

  // POST /invitations: invite another user to a game
  router.post("/", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const body = parseInput(createInvitationSchema, req.body, res);
    if (!body) return;

    try {
      const result = await invitations.create(user, { toId: body.toId, gameType: body.gameType });
      sendResult(res, result, 201);
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to create invitation");
    }
  });

  // GET /invitations: invitations sent or received by the caller
  router.get("/", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const query = parseInput(invitationListQuerySchema, req.query, res);
    if (!query) return;

    try {
      sendResult(res, await invitations.list(user, query));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to list invitations");
    }
  });

  // PUT /invitations/:id/accept: recipient accepts; starts the game
  router.put("/:id/accept", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;

    try {
      const result = await invitations.accept(user, params.id);
      sendResult(res, result, 200, (accepted) => ({ gameId: accepted.gameId }));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to accept invitation");
    }
  });

  // PUT /invitations/:id/decline: recipient declines
  router.put("/:id/decline", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;

    try {
      sendResult(res, await invitations.decline(user, params.id));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to decline invitation");
    }
  });

  // PUT /invitations/:id/cancel: sender withdraws
  router.put("/:id/cancel", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;

    try {
      sendResult(res, await invitations.cancel(user, params.id));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to cancel invitation");
    }
  });

  return router;
}
