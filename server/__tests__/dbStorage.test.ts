/**
 * @fileoverview DbStorage against the mock drizzle chain
 *
 * Covers the compare-and-set transitions (empty `returning()` means the row
 * had already moved on), unique-violation mapping and stats bookkeeping.
 */

import { describe, it, expect, vi, beforeEach } from "vitest";

vi.mock("../logger", async () => (await import("./helpers/mockAuth")).createMockLoggerModule());

import logger from "../logger";
import { games, users, type Game, type Invitation } from "../../packages/shared/schema";
import { DbStorage } from "../storage/dbStorage";
import { DatabaseUnavailableError } from "../db";
import { DuplicateIdentityError } from "../storage/errors";
import { listQuery } from "../storage/query";
import { asDatabase, createMockDb, createMockUser, resetMockUserCounter, type MockDb } from "./helpers";

const invitation: Invitation = {
  id: 5,
  dateSent: new Date("2026-04-01T00:00:00.000Z"),
  dateAnswered: new Date("2026-04-01T00:05:00.000Z"),
  fromId: 1,
  toId: 2,
  gameType: "CHESS",
  status: "ACCEPTED",
};

function makeGame(overrides: Partial<Game> = {}): Game {
  return {
    id: 9,
    gameType: "CHESS",
    invitationId: 5,
    dateStarted: new Date("2026-04-01T00:05:00.000Z"),
    dateEnded: null,
    player1: 1,
    player2: 2,
    whomst: 1,
    winner: null,
    status: "ACTIVE",
    fen: "start",
    states: {},
    ...overrides,
  };
}

describe("DbStorage", () => {
  let db: MockDb;
  let storage: DbStorage;

  beforeEach(() => {
    vi.clearAllMocks();
    resetMockUserCounter();
    db = createMockDb();
    storage = new DbStorage(asDatabase(db));
  });

  describe("users", () => {
    it("getUser returns the first row", async () => {
      const user = createMockUser();
      db._setResult([user]);

      expect(await storage.getUser(user.id)).toEqual(user);
      expect(db.from).toHaveBeenCalledWith(users);
      expect(db.limit).toHaveBeenCalledWith(1);
    });

    it("getUser returns undefined when no row matches", async () => {
      expect(await storage.getUser(42)).toBeUndefined();
    });

    it("maps a unique violation to DuplicateIdentityError", async () => {
      db._setError(Object.assign(new Error("duplicate key"), { code: "23505" }));

      await expect(
        storage.createUser({ name: "alice", email: "a@example.com", passwordHash: "h" })
      ).rejects.toBeInstanceOf(DuplicateIdentityError);
    });

    it("rethrows other insert failures", async () => {
      const failure = new Error("connection reset");
      db._setError(failure);

      await expect(
        storage.createUser({ name: "alice", email: "a@example.com", passwordHash: "h" })
      ).rejects.toBe(failure);
    });

    it("softDeleteUser reports whether a row flipped", async () => {
      db._setSequentialResults([[{ id: 3 }], []]);

      expect(await storage.softDeleteUser(3)).toBe(true);
      expect(await storage.softDeleteUser(3)).toBe(false);
      expect(db.set).toHaveBeenCalledWith({ deleted: true, email: null, passwordHash: null });
    });

    it("listUsers applies pagination", async () => {
      const rows = [createMockUser(), createMockUser()];
      db._setResult(rows);

      const result = await storage.listUsers(listQuery({}, "wins", { skip: 20, limit: 5 }));

      expect(result).toEqual(rows);
      expect(db.limit).toHaveBeenCalledWith(5);
      expect(db.offset).toHaveBeenCalledWith(20);
      expect(db.where).toHaveBeenCalledWith(undefined);
    });
  });

  describe("invitations", () => {
    it("createInvitation inserts a pending invitation", async () => {
      db._setResult([{ ...invitation, status: "PENDING", dateAnswered: null }]);

      const created = await storage.createInvitation({ fromId: 1, toId: 2, gameType: "CHESS" });

      expect(created.status).toBe("PENDING");
      expect(db.values).toHaveBeenCalledWith({
        fromId: 1,
        toId: 2,
        gameType: "CHESS",
        status: "PENDING",
      });
    });

    it("answerInvitation returns undefined when the invitation was not pending", async () => {
      expect(await storage.answerInvitation(5, "DECLINED")).toBeUndefined();
    });

    it("acceptInvitation inserts the game inside the transaction", async () => {
      const game = makeGame();
      db._setSequentialResults([[invitation], [game]]);

      const result = await storage.acceptInvitation(5);

      expect(result).toEqual({ invitation, game });
      expect(db.transaction).toHaveBeenCalledTimes(1);
      expect(db.insert).toHaveBeenCalledWith(games);
      expect(db.values).toHaveBeenCalledWith(
        expect.objectContaining({ invitationId: 5, player1: 1, player2: 2, whomst: 1, status: "ACTIVE" })
      );
    });

    it("acceptInvitation writes no game when the invitation moved on", async () => {
      db._setSequentialResults([[]]);

      expect(await storage.acceptInvitation(5)).toBeUndefined();
      expect(db.insert).not.toHaveBeenCalled();
    });
  });

  describe("games", () => {
    it("listGames flattens the joined player names", async () => {
      const game = makeGame();
      db._setResult([{ game, player1Name: "alice", player2Name: "bob" }]);

      const result = await storage.listGames(listQuery({ player1: 1 }, "dateStarted"));

      expect(result).toEqual([{ ...game, player1Name: "alice", player2Name: "bob" }]);
      expect(db.innerJoin).toHaveBeenCalledTimes(2);
    });

    it("commitMove on a stale game writes nothing", async () => {
      db._setSequentialResults([[]]);

      const result = await storage.commitMove({
        gameId: 9,
        userId: 1,
        move: "e2e4",
        expectedFen: "start",
        fen: "next",
        states: {},
        nextWhomst: 2,
        status: "ACTIVE",
        winner: null,
      });

      expect(result).toBeUndefined();
      expect(db.insert).not.toHaveBeenCalled();
    });

    it("a non-terminal move leaves stats alone", async () => {
      const game = makeGame({ fen: "next", whomst: 2 });
      const move = { id: 1, userId: 1, gameId: 9, timestamp: new Date(), move: "e2e4", fen: "next" };
      db._setSequentialResults([[game], [move]]);

      const result = await storage.commitMove({
        gameId: 9,
        userId: 1,
        move: "e2e4",
        expectedFen: "start",
        fen: "next",
        states: {},
        nextWhomst: 2,
        status: "ACTIVE",
        winner: null,
      });

      expect(result).toEqual({ game, move });
      expect(db.update).toHaveBeenCalledTimes(1);
      expect(db.set).toHaveBeenCalledWith(
        expect.objectContaining({ status: "ACTIVE", winner: null, dateEnded: null, whomst: 2 })
      );
    });

    it("a decisive move credits the winner and the loser", async () => {
      const game = makeGame({ status: "WHITEWINS", winner: 1, dateEnded: new Date() });
      db._setSequentialResults([[game], [{ id: 1 }]]);

      await storage.commitMove({
        gameId: 9,
        userId: 1,
        move: "d1h5",
        expectedFen: "start",
        fen: "mate",
        states: {},
        nextWhomst: 2,
        status: "WHITEWINS",
        winner: 1,
      });

      expect(db.update).toHaveBeenCalledTimes(3);
      expect(db.update).toHaveBeenNthCalledWith(2, users);
      expect(db.update).toHaveBeenNthCalledWith(3, users);
      expect(db.set.mock.calls[1][0]).toEqual({ wins: expect.anything() });
      expect(db.set.mock.calls[2][0]).toEqual({ losses: expect.anything() });
    });

    it("finishGame with no winner credits a draw to both players", async () => {
      db._setSequentialResults([[makeGame({ status: "DRAW", dateEnded: new Date() })]]);

      const finished = await storage.finishGame({ gameId: 9, status: "DRAW", winner: null });

      expect(finished?.status).toBe("DRAW");
      expect(db.update).toHaveBeenCalledTimes(2);
      expect(db.set.mock.calls[1][0]).toEqual({ draws: expect.anything() });
    });

    it("finishGame returns undefined when the game already ended", async () => {
      db._setSequentialResults([[]]);

      expect(await storage.finishGame({ gameId: 9, status: "DRAW", winner: null })).toBeUndefined();
      expect(db.update).toHaveBeenCalledTimes(1);
    });
  });

  describe("connection failures", () => {
    it("surfaces a refused connection as DatabaseUnavailableError", async () => {
      const refused = Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:5432"), {
        code: "ECONNREFUSED",
      });
      db._setError(refused);

      const error = await storage.listUsers(listQuery({}, "id")).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(DatabaseUnavailableError);
      expect(error).toHaveProperty("message", "Database unreachable");
      expect(error).toHaveProperty("cause", refused);
      expect(logger.error).toHaveBeenCalledWith("Database unreachable", {
        error: "connect ECONNREFUSED 127.0.0.1:5432",
      });
    });

    it.each(["08006", "08001", "57P01", "57P03", "ETIMEDOUT", "ECONNRESET"])(
      "maps code %s inside a transaction too",
      async (code) => {
        db._setError(Object.assign(new Error("lost"), { code }));

        await expect(storage.acceptInvitation(5)).rejects.toBeInstanceOf(DatabaseUnavailableError);
      }
    );

    it("maps a lost connection during signup rather than calling it a duplicate", async () => {
      db._setError(Object.assign(new Error("terminating connection"), { code: "57P01" }));

      await expect(
        storage.createUser({ name: "alice", email: "a@example.com", passwordHash: "h" })
      ).rejects.toBeInstanceOf(DatabaseUnavailableError);
    });

    it("leaves query errors alone", async () => {
      const outOfRange = Object.assign(new Error("value out of range"), { code: "22003" });
      db._setError(outOfRange);

      await expect(storage.getGame(9)).rejects.toBe(outOfRange);
    });
  });

  describe("ping", () => {
    it("returns true when the query succeeds", async () => {
      expect(await storage.ping()).toBe(true);
      expect(db.execute).toHaveBeenCalledTimes(1);
    });

    it("returns false and warns when the query fails", async () => {
      db._setError(new Error("ECONNREFUSED"));

      expect(await storage.ping()).toBe(false);
      expect(logger.warn).toHaveBeenCalledWith("Database ping failed", { error: "ECONNREFUSED" });
    });
  });
});
