/**
 * Workers client - HTTP calls to the chess workers service
 *
 * The workers service owns the rules: it validates a move against a board and
 * returns the new board, its opaque engine state and a status string. This
 * client only maps transport results onto MoveRejectedError (the player's
 * fault) and MoveEngineError (ours).
 */

import { z } from "zod";
import type { EngineStates } from "@shared/schema";
import type { AppConfig } from "../../config/env";
import logger from "../../logger";
import { MoveEngineError, MoveRejectedError } from "./errors";

export interface MoveRequest {
  fen: string;
  move: string;
  states: EngineStates;
}

export interface MoveResult {
  status: string;
  fen: string;
  states: EngineStates;
}

/** Collaborator seam; tests substitute a fake. */
export interface MovesClient {
  /**
   * @throws MoveRejectedError when the move is illegal
   * @throws MoveEngineError for any other failure
   */
  applyMove(request: MoveRequest): Promise<MoveResult>;
  suggestMove(position: { fen: string; states: EngineStates }): Promise<string>;
}

const moveResultSchema = z.object({
  status: z.string().min(1),
  fen: z.string().min(1),
  states: z.record(z.unknown()).default({}),
});

const suggestionSchema = z.object({
  move: z.string().min(1),
});

const rejectionSchema = z.object({
  message: z.string().min(1),
});

export class WorkersClient implements MovesClient {
  constructor(private readonly options: AppConfig["workers"]) {}

  async applyMove(request: MoveRequest): Promise<MoveResult> {
    const body = await this.post("/move", request);
    const parsed = moveResultSchema.safeParse(body);
    if (!parsed.success) {
      throw new MoveEngineError("workers service returned a malformed move result");
    }
    return parsed.data;
  }

  async suggestMove(position: { fen: string; states: EngineStates }): Promise<string> {
    const body = await this.post("/suggest", position);
    const parsed = suggestionSchema.safeParse(body);
    if (!parsed.success) {
      throw new MoveEngineError("workers service returned a malformed suggestion");
    }
    return parsed.data.move;
  }

  private async post(path: string, payload: unknown): Promise<unknown> {
    const url = `${this.options.baseUrl}${path}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.options.timeoutMs);

    let response: Response;
    try {
      response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(payload),
        signal: controller.signal,
      });
    } catch (error) {
      clearTimeout(timeout);
      const timedOut = controller.signal.aborted;
      logger.error("Workers service request failed", { url, timedOut, error });
      throw new MoveEngineError(
        timedOut ? "workers service timed out" : "workers service unreachable",
        { cause: error }
      );
    }

    try {
      if (response.status >= 400 && response.status < 500) {
        const rejection = rejectionSchema.safeParse(await readJson(response));
        if (rejection.success) throw new MoveRejectedError(rejection.data.message);
      }

      if (response.status !== 200) {
        // Release the connection when the body was never read
        if (!response.bodyUsed) await response.body?.cancel();
        logger.error("Workers service returned an error status", { url, status: response.status });
        throw new MoveEngineError(`workers service responded with status ${response.status}`);
      }

      return await readJson(response);
    } finally {
      clearTimeout(timeout);
    }
  }
}

async function readJson(response: Response): Promise<unknown> {
  try {
    return await response.json();
  } catch (error) {
    throw new MoveEngineError("workers service returned invalid JSON", { cause: error });
  }
}
