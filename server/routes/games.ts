/**
 * Game Routes
 * Listing, moves, forfeit and move suggestions. Every state change goes
 * through GameService; handlers only parse input and map results.
 */

import { Router, type RequestHandler } from "express";
import { moveSchema } from "@shared/schema";
import type { GameService } from "../services/game";
import { parseInput } from "../middleware/validation";
import { Errors } from "../utils/apiError";
import { gameListQuerySchema, idParamsSchema, sendResult, sendUnexpected } from "./shared";

export interface GamesRouterDeps {
  games: GameService;
  authenticate: RequestHandler;
}

export function createGamesRouter({ games, authenticate }: GamesRouterDeps): Router {
  const router = Router();

  // GET /games: any game, with both players' names
  router.get("/", authenticate, async (req, res) => {
    const query = parseInput(gameListQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.json(await games.listGames(query));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to list games");
    }
  });

  // POST /games/:id/move: play a move on the caller's turn
  router.post("/:id/move", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;
    const body = parseInput(moveSchema, req.body, res);
    if (!body) return;

    try {
      sendResult(res, await games.move(user, params.id, body.move));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to apply move");
    }
  });

  // POST /games/:id/forfeit: concede; the opponent wins
  router.post("/:id/forfeit", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;

    try {
      sendResult(res, await games.forfeit(user, params.id));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to forfeit game");
    }
  });

  // GET /games/:id/suggest: engine suggestion for the current position
  router.get("/:id/suggest", authenticate, async (req, res) => {
    const user = req.currentUser;
    if (!user) return Errors.unauthorized(res);
    const params = parseInput(idParamsSchema, req.params, res);
    if (!params) return;

    try {
      sendResult(res, await games.suggest(user, params.id));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to suggest move");
    }
  });

  return router;
}
