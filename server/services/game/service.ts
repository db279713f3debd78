import type { Game, GameWithPlayers, Move, User } from "@shared/schema";
import type { GameQuery, IStorage, MoveQuery } from "../../storage/types";
import logger from "../../logger";
import { failure, success, type ServiceFailure, type ServiceResult } from "../types";
import { MoveEngineError, MoveRejectedError } from "./errors";
import type { MovesClient } from "./movesClient";
import {
  classifyChessOutcome,
  isTerminal,
  nextGameState,
  type GameTransition,
  type OutcomeClassifier,
} from "./stateMachine";

const gameNotFound = (id: number): ServiceFailure =>
  failure(404, "GAME_NOT_FOUND", `game with ID '${id}' does not exist`);

const notAPlayer = (userId: number, gameId: number): ServiceFailure =>
  failure(403, "NOT_A_PLAYER", `user '${userId}' not a player in game '${gameId}'`);

const notActive = (game: Game): ServiceFailure =>
  failure(400, "GAME_NOT_ACTIVE", `game with ID '${game.id}' has '${game.status}' status`, {
    status: game.status,
  });

function engineFailure(error: unknown): ServiceFailure | undefined {
  if (error instanceof MoveRejectedError) {
    return failure(400, "ILLEGAL_MOVE", error.message);
  }
  if (error instanceof MoveEngineError) {
    return failure(500, "MOVE_ENGINE_FAILURE", "move could not be validated");
  }
  return undefined;
}

export class GameService {
  constructor(
    private readonly storage: IStorage,
    private readonly movesClient: MovesClient,
    private readonly classifyOutcome: OutcomeClassifier = classifyChessOutcome
  ) {}

  listGames(query: GameQuery): Promise<GameWithPlayers[]> {
    return this.storage.listGames(query);
  }

  listMoves(query: MoveQuery): Promise<Move[]> {
    return this.storage.listMoves(query);
  }

  /**
   * Validates the move with the workers service, then commits it in one
   * compare-and-set write. No transaction is open while the workers call runs.
   */
  async move(actor: User, gameId: number, move: string): Promise<ServiceResult<Game>> {
    const loaded = await this.loadForPlayer(actor, gameId);
    if (!loaded.ok) return loaded;
    const game = loaded.data;

    if (game.whomst !== actor.id) {
      return failure(400, "NOT_YOUR_TURN", `it is not the turn of user with id '${actor.id}'`);
    }

    let fen: string;
    let states: Game["states"];
    let engineStatus: string;
    try {
      ({ fen, states, status: engineStatus } = await this.movesClient.applyMove({
        fen: game.fen,
        move,
        states: game.states,
      }));
    } catch (error) {
      const mapped = engineFailure(error);
      if (!mapped) throw error;
      logger.warn("Move not applied", { gameId, userId: actor.id, move, error: mapped.error });
      return mapped;
    }

    let transition: GameTransition | undefined;
    try {
      transition = nextGameState(game, {
        type: "move",
        actor: actor.id,
        outcome: this.classifyOutcome(engineStatus),
      });
    } catch (error) {
      const mapped = engineFailure(error);
      if (!mapped) throw error;
      logger.error("Unrecognised engine status", { gameId, engineStatus });
      return mapped;
    }
    if (!transition) return notActive(game);

    const committed = await this.storage.commitMove({
      gameId,
      userId: actor.id,
      move,
      expectedFen: game.fen,
      fen,
      states,
      nextWhomst: transition.nextWhomst,
      status: transition.status,
      winner: transition.winner,
    });

    if (!committed) {
      return failure(409, "GAME_STATE_CHANGED", `game with ID '${gameId}' changed during the move`);
    }

    if (isTerminal(committed.game.status)) {
      logger.info("Game finished", {
        gameId,
        status: committed.game.status,
        winner: committed.game.winner,
      });
    }
    return success(committed.game);
  }

  async forfeit(actor: User, gameId: number): Promise<ServiceResult<Game>> {
    const loaded = await this.loadForPlayer(actor, gameId);
    if (!loaded.ok) return loaded;

    const transition = nextGameState(loaded.data, { type: "forfeit", actor: actor.id });
    if (!transition || transition.status === "ACTIVE") return notActive(loaded.data);

    const finished = await this.storage.finishGame({
      gameId,
      status: transition.status,
      winner: transition.winner,
    });
    if (!finished) {
      const current = await this.storage.getGame(gameId);
      return current ? notActive(current) : gameNotFound(gameId);
    }

    logger.info("Game forfeited", { gameId, userId: actor.id, winner: finished.winner });
    return success(finished);
  }

  /** Read-only; suggestions are offered on any turn. */
  async suggest(actor: User, gameId: number): Promise<ServiceResult<{ move: string }>> {
    const loaded = await this.loadForPlayer(actor, gameId);
    if (!loaded.ok) return loaded;

    try {
      const move = await this.movesClient.suggestMove({
        fen: loaded.data.fen,
        states: loaded.data.states,
      });
      return success({ move });
    } catch (error) {
      const mapped = engineFailure(error);
      if (!mapped) throw error;
      return mapped;
    }
  }

  // Not found, then not a player, then not active
  private async loadForPlayer(actor: User, gameId: number): Promise<ServiceResult<Game>> {
    const game = await this.storage.getGame(gameId);
    if (!game) return gameNotFound(gameId);
    if (game.player1 !== actor.id && game.player2 !== actor.id) {
      return notAPlayer(actor.id, gameId);
    }
    if (isTerminal(game.status)) return notActive(game);
    return success(game);
  }
}
