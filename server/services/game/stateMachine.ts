import type { Game, GameStatus } from "@shared/schema";
import { MoveEngineError } from "./errors";

/** What a validated move did to the game, independent of who made it. */
export type MoveOutcome = "ongoing" | "draw" | "decisive";

export type GameEvent =
  | { type: "move"; actor: number; outcome: MoveOutcome }
  | { type: "forfeit"; actor: number };

export interface GameTransition {
  status: GameStatus;
  winner: number | null;
  nextWhomst: number;
}

/** Maps the engine's status string to an outcome; throw for anything unknown. */
export type OutcomeClassifier = (engineStatus: string) => MoveOutcome;

const ONGOING = new Set(["ACTIVE", "MOVEOK", "CHECK"]);
const DECISIVE = new Set(["GAMEOVER", "CHECKMATE"]);
const DRAWN = new Set(["DRAW", "STALEMATE"]);

export const classifyChessOutcome: OutcomeClassifier = (engineStatus) => {
  const status = engineStatus.toUpperCase();
  if (ONGOING.has(status)) return "ongoing";
  if (DECISIVE.has(status)) return "decisive";
  if (DRAWN.has(status)) return "draw";
  throw new MoveEngineError(`unrecognised engine status '${engineStatus}'`);
};

export function isTerminal(status: GameStatus): boolean {
  return status !== "ACTIVE";
}

export function opponentOf(game: Game, userId: number): number {
  return game.player1 === userId ? game.player2 : game.player1;
}

// Player 1 plays white
function winsFor(game: Game, userId: number): GameStatus {
  return game.player1 === userId ? "WHITEWINS" : "BLACKWINS";
}

/**
 * The single transition function for games. Returns undefined when the game
 * is already terminal; callers check player and turn before calling.
 */
export function nextGameState(game: Game, event: GameEvent): GameTransition | undefined {
  if (isTerminal(game.status)) return undefined;

  const opponent = opponentOf(game, event.actor);

  if (event.type === "forfeit") {
    return { status: winsFor(game, opponent), winner: opponent, nextWhomst: game.whomst };
  }

  switch (event.outcome) {
    case "ongoing":
      return { status: "ACTIVE", winner: null, nextWhomst: opponent };
    case "draw":
      return { status: "DRAW", winner: null, nextWhomst: opponent };
    case "decisive":
      return { status: winsFor(game, event.actor), winner: event.actor, nextWhomst: opponent };
  }
}
