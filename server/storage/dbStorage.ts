import { and, eq, inArray, sql } from "drizzle-orm";
import { alias, type PgColumn } from "drizzle-orm/pg-core";
import {
  users,
  invitations,
  games,
  moves,
  INITIAL_FEN,
  type User,
  type Invitation,
  type Game,
  type GameWithPlayers,
  type Move,
} from "../../packages/shared/schema";
import { DatabaseUnavailableError, type Database } from "../db";
import logger from "../logger";
import { DuplicateIdentityError, isConnectionFailure, isUniqueViolation } from "./errors";
import { buildOrderBy, buildWhere } from "./query";
import type {
  IStorage,
  CreateUser,
  CreateInvitation,
  InvitationAnswer,
  CommitMove,
  FinishGame,
  UserFilter,
  UserQuery,
  InvitationFilter,
  InvitationQuery,
  GameFilter,
  GameQuery,
  MoveFilter,
  MoveQuery,
} from "./types";

// Filterable / orderable columns per entity, declared once
const USER_COLUMNS = {
  id: users.id,
  name: users.name,
  deleted: users.deleted,
  dateJoined: users.dateJoined,
  wins: users.wins,
  draws: users.draws,
  losses: users.losses,
} satisfies Record<keyof UserFilter, PgColumn> & Record<string, PgColumn>;

const INVITATION_COLUMNS = {
  id: invitations.id,
  fromId: invitations.fromId,
  toId: invitations.toId,
  status: invitations.status,
  gameType: invitations.gameType,
  dateSent: invitations.dateSent,
  dateAnswered: invitations.dateAnswered,
} satisfies Record<keyof InvitationFilter, PgColumn> & Record<string, PgColumn>;

const GAME_COLUMNS = {
  id: games.id,
  invitationId: games.invitationId,
  player1: games.player1,
  player2: games.player2,
  whomst: games.whomst,
  winner: games.winner,
  status: games.status,
  dateStarted: games.dateStarted,
  dateEnded: games.dateEnded,
} satisfies Record<keyof GameFilter, PgColumn> & Record<string, PgColumn>;

const MOVE_COLUMNS = {
  id: moves.id,
  userId: moves.userId,
  gameId: moves.gameId,
  timestamp: moves.timestamp,
} satisfies Record<keyof MoveFilter, PgColumn> & Record<string, PgColumn>;

const player1User = alias(users, "player1_user");
const player2User = alias(users, "player2_user");

type Executor = Pick<Database, "update">;

/** Winner +1 win and loser +1 loss, or +1 draw each when there is no winner. */
async function recordResult(tx: Executor, game: Game): Promise<void> {
  if (game.winner === null) {
    await tx
      .update(users)
      .set({ draws: sql`${users.draws} + 1` })
      .where(inArray(users.id, [game.player1, game.player2]));
    return;
  }

  const loser = game.winner === game.player1 ? game.player2 : game.player1;
  await tx
    .update(users)
    .set({ wins: sql`${users.wins} + 1` })
    .where(eq(users.id, game.winner));
  await tx
    .update(users)
    .set({ losses: sql`${users.losses} + 1` })
    .where(eq(users.id, loser));
}

export class DbStorage implements IStorage {
  constructor(private readonly db: Database) {}

  /** Runs a store call, surfacing a lost or refused connection as DatabaseUnavailableError. */
  private async run<T>(operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      if (isConnectionFailure(error)) {
        logger.error("Database unreachable", {
          error: error instanceof Error ? error.message : String(error),
        });
        throw new DatabaseUnavailableError("Database unreachable", { cause: error });
      }
      throw error;
    }
  }

  getUser(id: number): Promise<User | undefined> {
    return this.run(async () => {
      const [user] = await this.db.select().from(users).where(eq(users.id, id)).limit(1);
      return user;
    });
  }

  getUserByName(name: string): Promise<User | undefined> {
    return this.run(async () => {
      const [user] = await this.db.select().from(users).where(eq(users.name, name)).limit(1);
      return user;
    });
  }

  createUser(data: CreateUser): Promise<User> {
    return this.run(async () => {
      try {
        const [user] = await this.db.insert(users).values(data).returning();
        return user;
      } catch (error) {
        if (isUniqueViolation(error)) {
          throw new DuplicateIdentityError();
        }
        throw error;
      }
    });
  }

  listUsers(query: UserQuery): Promise<User[]> {
    return this.run(async () =>
      this.db
        .select()
        .from(users)
        .where(buildWhere(USER_COLUMNS, query.filter))
        .orderBy(...buildOrderBy(USER_COLUMNS, users.id, query.orderBy, query.reverse))
        .limit(query.limit)
        .offset(query.skip)
    );
  }

  softDeleteUser(id: number): Promise<boolean> {
    return this.run(async () => {
      const updated = await this.db
        .update(users)
        .set({ deleted: true, email: null, passwordHash: null })
        .where(and(eq(users.id, id), eq(users.deleted, false)))
        .returning({ id: users.id });
      return updated.length > 0;
    });
  }

  getInvitation(id: number): Promise<Invitation | undefined> {
    return this.run(async () => {
      const [invitation] = await this.db
        .select()
        .from(invitations)
        .where(eq(invitations.id, id))
        .limit(1);
      return invitation;
    });
  }

  createInvitation(data: CreateInvitation): Promise<Invitation> {
    return this.run(async () => {
      const [invitation] = await this.db
        .insert(invitations)
        .values({ ...data, status: "PENDING" })
        .returning();
      return invitation;
    });
  }

  listInvitations(query: InvitationQuery): Promise<Invitation[]> {
    return this.run(async () =>
      this.db
        .select()
        .from(invitations)
        .where(buildWhere(INVITATION_COLUMNS, query.filter))
        .orderBy(...buildOrderBy(INVITATION_COLUMNS, invitations.id, query.orderBy, query.reverse))
        .limit(query.limit)
        .offset(query.skip)
    );
  }

  answerInvitation(id: number, status: InvitationAnswer): Promise<Invitation | undefined> {
    return this.run(async () => {
      const [invitation] = await this.db
        .update(invitations)
        .set({ status, dateAnswered: new Date() })
        .where(and(eq(invitations.id, id), eq(invitations.status, "PENDING")))
        .returning();
      return invitation;
    });
  }

  acceptInvitation(id: number): Promise<{ invitation: Invitation; game: Game } | undefined> {
    return this.run(async () =>
      this.db.transaction(async (tx) => {
        const [invitation] = await tx
          .update(invitations)
          .set({ status: "ACCEPTED", dateAnswered: new Date() })
          .where(and(eq(invitations.id, id), eq(invitations.status, "PENDING")))
          .returning();

        if (!invitation) return undefined;

        const [game] = await tx
          .insert(games)
          .values({
            gameType: invitation.gameType,
            invitationId: invitation.id,
            player1: invitation.fromId,
            player2: invitation.toId,
            whomst: invitation.fromId,
            status: "ACTIVE",
            fen: INITIAL_FEN,
            states: {},
          })
          .returning();

        logger.debug("Invitation accepted", { invitationId: invitation.id, gameId: game.id });
        return { invitation, game };
      })
    );
  }

  getGame(id: number): Promise<Game | undefined> {
    return this.run(async () => {
      const [game] = await this.db.select().from(games).where(eq(games.id, id)).limit(1);
      return game;
    });
  }

  listGames(query: GameQuery): Promise<GameWithPlayers[]> {
    return this.run(async () => {
      const rows = await this.db
        .select({
          game: games,
          player1Name: player1User.name,
          player2Name: player2User.name,
        })
        .from(games)
        .innerJoin(player1User, eq(games.player1, player1User.id))
        .innerJoin(player2User, eq(games.player2, player2User.id))
        .where(buildWhere(GAME_COLUMNS, query.filter))
        .orderBy(...buildOrderBy(GAME_COLUMNS, games.id, query.orderBy, query.reverse))
        .limit(query.limit)
        .offset(query.skip);

      return rows.map((row) => ({
        ...row.game,
        player1Name: row.player1Name,
        player2Name: row.player2Name,
      }));
    });
  }

  commitMove(data: CommitMove): Promise<{ game: Game; move: Move } | undefined> {
    return this.run(async () =>
      this.db.transaction(async (tx) => {
        const terminal = data.status !== "ACTIVE";
        const [game] = await tx
          .update(games)
          .set({
            fen: data.fen,
            states: data.states,
            whomst: data.nextWhomst,
            status: data.status,
            winner: terminal ? data.winner : null,
            dateEnded: terminal ? new Date() : null,
          })
          .where(
            and(
              eq(games.id, data.gameId),
              eq(games.status, "ACTIVE"),
              eq(games.whomst, data.userId),
              eq(games.fen, data.expectedFen)
            )
          )
          .returning();

        if (!game) return undefined;

        const [move] = await tx
          .insert(moves)
          .values({ userId: data.userId, gameId: data.gameId, move: data.move, fen: data.fen })
          .returning();

        if (terminal) await recordResult(tx, game);
        return { game, move };
      })
    );
  }

  finishGame(data: FinishGame): Promise<Game | undefined> {
    return this.run(async () =>
      this.db.transaction(async (tx) => {
        const [game] = await tx
          .update(games)
          .set({ status: data.status, winner: data.winner, dateEnded: new Date() })
          .where(and(eq(games.id, data.gameId), eq(games.status, "ACTIVE")))
          .returning();

        if (!game) return undefined;

        await recordResult(tx, game);
        return game;
      })
    );
  }

  listMoves(query: MoveQuery): Promise<Move[]> {
    return this.run(async () =>
      this.db
        .select()
        .from(moves)
        .where(buildWhere(MOVE_COLUMNS, query.filter))
        .orderBy(...buildOrderBy(MOVE_COLUMNS, moves.id, query.orderBy, query.reverse))
        .limit(query.limit)
        .offset(query.skip)
    );
  }

  async ping(): Promise<boolean> {
    try {
      await this.db.execute(sql`select 1`);
      return true;
    } catch (error) {
      logger.warn("Database ping failed", {
        error: error instanceof Error ? error.message : String(error),
      });
      return false;
    }
  }
}
