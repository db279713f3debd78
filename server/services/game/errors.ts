/** The workers service refused the move (4xx); the message is shown to the player. */
export class MoveRejectedError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MoveRejectedError";
  }
}

/** The workers service failed, timed out or answered with something unusable. */
export class MoveEngineError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "MoveEngineError";
  }
}
