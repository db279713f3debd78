export { GameService } from "./service";
export { WorkersClient } from "./movesClient";
export type { MovesClient, MoveRequest, MoveResult } from "./movesClient";
export { MoveEngineError, MoveRejectedError } from "./errors";
export { classifyChessOutcome, nextGameState, opponentOf } from "./stateMachine";
export type { GameEvent, GameTransition, MoveOutcome, OutcomeClassifier } from "./stateMachine";
