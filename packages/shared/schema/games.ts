import { z } from "zod";
import {
  pgTable,
  serial,
  integer,
  timestamp,
  varchar,
  text,
  jsonb,
  index,
  check,
} from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { sql } from "drizzle-orm";
import { users } from "./auth";
import { MAX_ID } from "./validation";

// Closed set of game types; the workers service only plays chess today
export const GAME_TYPES = ["CHESS"] as const;
export type GameType = (typeof GAME_TYPES)[number];

// PENDING is the only non-terminal status
export const INVITATION_STATUSES = ["PENDING", "ACCEPTED", "DECLINED", "CANCELLED"] as const;
export type InvitationStatus = (typeof INVITATION_STATUSES)[number];

// Player 1 plays white
export const GAME_STATUSES = ["ACTIVE", "DRAW", "WHITEWINS", "BLACKWINS"] as const;
export type GameStatus = (typeof GAME_STATUSES)[number];

export const INITIAL_FEN = "rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR w KQkq - 0 1";

/** Opaque engine state, round-tripped through the workers service untouched. */
export type EngineStates = Record<string, unknown>;

export const invitations = pgTable(
  "invitations",
  {
    id: serial("id").primaryKey(),
    dateSent: timestamp("date_sent").defaultNow().notNull(),
    dateAnswered: timestamp("date_answered"),
    fromId: integer("from_id")
      .notNull()
      .references(() => users.id),
    toId: integer("to_id")
      .notNull()
      .references(() => users.id),
    gameType: varchar("game_type", { length: 20 }).$type<GameType>().notNull().default("CHESS"),
    status: varchar("status", { length: 20 })
      .$type<InvitationStatus>()
      .notNull()
      .default("PENDING"),
  },
  (table) => ({
    noSelfInvite: check("invitations_no_self_invite", sql`${table.fromId} <> ${table.toId}`),
    fromIdx: index("IDX_invitations_from").on(table.fromId, table.status),
    toIdx: index("IDX_invitations_to").on(table.toId, table.status),
  })
);

export const games = pgTable(
  "games",
  {
    id: serial("id").primaryKey(),
    gameType: varchar("game_type", { length: 20 }).$type<GameType>().notNull().default("CHESS"),
    invitationId: integer("invitation_id")
      .notNull()
      .unique()
      .references(() => invitations.id),
    dateStarted: timestamp("date_started").defaultNow().notNull(),
    dateEnded: timestamp("date_ended"),
    player1: integer("player_1")
      .notNull()
      .references(() => users.id),
    player2: integer("player_2")
      .notNull()
      .references(() => users.id),
    whomst: integer("whomst")
      .notNull()
      .references(() => users.id),
    winner: integer("winner").references(() => users.id),
    status: varchar("status", { length: 20 }).$type<GameStatus>().notNull().default("ACTIVE"),
    fen: text("fen").notNull().default(INITIAL_FEN),
    states: jsonb("states").$type<EngineStates>().notNull().default({}),
  },
  (table) => ({
    player1Idx: index("IDX_games_player_1").on(table.player1),
    player2Idx: index("IDX_games_player_2").on(table.player2),
  })
);

// Append-only ply history
export const moves = pgTable(
  "moves",
  {
    id: serial("id").primaryKey(),
    userId: integer("user_id")
      .notNull()
      .references(() => users.id),
    gameId: integer("game_id")
      .notNull()
      .references(() => games.id),
    timestamp: timestamp("timestamp").defaultNow().notNull(),
    move: varchar("move", { length: 16 }).notNull(),
    fen: text("fen").notNull(),
  },
  (table) => ({
    gameIdx: index("IDX_moves_game").on(table.gameId, table.timestamp),
  })
);

export const insertInvitationSchema = createInsertSchema(invitations).pick({
  toId: true,
  gameType: true,
});

export const createInvitationSchema = insertInvitationSchema.extend({
  toId: z.number().int().positive().max(MAX_ID),
  gameType: z.enum(GAME_TYPES).default("CHESS"),
});

export const moveSchema = z.object({
  move: z.string().trim().min(1, "Move is required").max(16),
});

export type Invitation = typeof invitations.$inferSelect;
export type Game = typeof games.$inferSelect;
export type Move = typeof moves.$inferSelect;

/** Game row with both players' names resolved, as returned by listings. */
export type GameWithPlayers = Game & {
  player1Name: string;
  player2Name: string;
};
