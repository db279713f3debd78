import { Router, type RequestHandler } from "express";
import type { GameService } from "../services/game";
import { parseInput } from "../middleware/validation";
import { moveListQuerySchema, sendUnexpected } from "./shared";

export interface MovesRouterDeps {
  games: GameService;
  authenticate: RequestHandler;
}

export function createMovesRouter({ games, authenticate }: MovesRouterDeps): Router {
  const router = Router();

  // GET /moves: ply history, oldest first unless reversed
  router.get("/", authenticate, async (req, res) => {
    const query = parseInput(moveListQuerySchema, req.query, res);
    if (!query) return;

    try {
      res.json(await games.listMoves(query));
    } catch (error) {
      sendUnexpected(req, res, error, "Failed to list moves");
    }
  });

  return router;
}
