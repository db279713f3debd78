/**
 * @fileoverview Tests for GET /moves
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("express", async () =>
  (await import("../../__tests__/helpers/mockRouter")).createMockExpressModule()
);
vi.mock("../../logger", async () =>
  (await import("../../__tests__/helpers/mockAuth")).createMockLoggerModule()
);

import type { Move } from "@shared/schema";
import { GameService } from "../../services/game";
import { MemStorage } from "../../storage/memStorage";
import { createMockRequest, createMockResponse, invokeRoute, passThrough } from "../../__tests__/helpers";
import { createMovesRouter } from "../moves";

describe("moves routes", () => {
  let storage: MemStorage;

  beforeEach(async () => {
    storage = new MemStorage();
    const games = new GameService(storage, { applyMove: vi.fn(), suggestMove: vi.fn() });
    createMovesRouter({ games, authenticate: passThrough });

    const alice = await storage.createUser({ name: "alice", email: "alice@example.com", passwordHash: "h" });
    const bob = await storage.createUser({ name: "bob", email: "bob@example.com", passwordHash: "h" });
    const invitation = await storage.createInvitation({ fromId: alice.id, toId: bob.id, gameType: "CHESS" });
    const accepted = await storage.acceptInvitation(invitation.id);
    if (!accepted) throw new Error("seed failed");
    const { game } = accepted;

    const plies: Array<[number, number, string, string]> = [
      [alice.id, bob.id, "e2e4", "fen-1"],
      [bob.id, alice.id, "e7e5", "fen-2"],
      [alice.id, bob.id, "g1f3", "fen-3"],
    ];
    let expectedFen = game.fen;
    for (const [userId, nextWhomst, move, fen] of plies) {
      await storage.commitMove({
        gameId: game.id,
        userId,
        move,
        expectedFen,
        fen,
        states: {},
        nextWhomst,
        status: "ACTIVE",
        winner: null,
      });
      expectedFen = fen;
    }
  });

  async function list(query: Record<string, string>) {
    const req = createMockRequest({ query });
    const res = createMockResponse();
    await invokeRoute("GET /", req, res);
    return res;
  }

  it("lists moves oldest first", async () => {
    const res = await list({ gameId: "1" });
    expect(res.json.mock.calls[0][0].map((m: Move) => m.move)).toEqual(["e2e4", "e7e5", "g1f3"]);
  });

  it("reverses and paginates", async () => {
    const res = await list({ gameId: "1", reverse: "true", limit: "2" });
    expect(res.json.mock.calls[0][0].map((m: Move) => m.move)).toEqual(["g1f3", "e7e5"]);
  });

  it("filters by user", async () => {
    const res = await list({ userId: "2" });
    expect(res.json.mock.calls[0][0].map((m: Move) => m.fen)).toEqual(["fen-2"]);
  });

  it("answers 422 for a bad reverse flag", async () => {
    const res = await list({ reverse: "yes" });
    expect(res.status).toHaveBeenCalledWith(422);
  });
});
