import type {
  User,
  Invitation,
  Game,
  GameWithPlayers,
  Move,
  GameType,
  GameStatus,
  InvitationStatus,
  EngineStates,
} from "../../packages/shared/schema";
import type { ListQuery } from "./query";

// Filters are type aliases (not interfaces) so they stay assignable to Record<string, unknown>
export type UserFilter = {
  id?: number;
  name?: string;
  deleted?: boolean;
};

export const USER_ORDER_FIELDS = ["id", "name", "dateJoined", "wins", "draws", "losses"] as const;
export type UserOrderField = (typeof USER_ORDER_FIELDS)[number];

export type InvitationFilter = {
  id?: number;
  fromId?: number;
  toId?: number;
  status?: InvitationStatus;
  gameType?: GameType;
};

export const INVITATION_ORDER_FIELDS = ["id", "dateSent", "dateAnswered"] as const;
export type InvitationOrderField = (typeof INVITATION_ORDER_FIELDS)[number];

export type GameFilter = {
  id?: number;
  invitationId?: number;
  player1?: number;
  player2?: number;
  whomst?: number;
  winner?: number;
  status?: GameStatus;
};

export const GAME_ORDER_FIELDS = ["id", "dateStarted", "dateEnded"] as const;
export type GameOrderField = (typeof GAME_ORDER_FIELDS)[number];

export type MoveFilter = {
  id?: number;
  userId?: number;
  gameId?: number;
};

export const MOVE_ORDER_FIELDS = ["id", "timestamp"] as const;
export type MoveOrderField = (typeof MOVE_ORDER_FIELDS)[number];

export type UserQuery = ListQuery<UserFilter, UserOrderField>;
export type InvitationQuery = ListQuery<InvitationFilter, InvitationOrderField>;
export type GameQuery = ListQuery<GameFilter, GameOrderField>;
export type MoveQuery = ListQuery<MoveFilter, MoveOrderField>;

export type CreateUser = {
  name: string;
  email: string;
  passwordHash: string;
};

export type CreateInvitation = {
  fromId: number;
  toId: number;
  gameType: GameType;
};

/** Terminal invitation statuses an answer may move a PENDING invitation to. */
export type InvitationAnswer = Exclude<InvitationStatus, "PENDING">;

/**
 * A committed ply. `expectedFen` is the board the mover saw; the commit only
 * applies while the game is still ACTIVE, still the mover's turn and still on
 * that board.
 */
export type CommitMove = {
  gameId: number;
  userId: number;
  move: string;
  expectedFen: string;
  fen: string;
  states: EngineStates;
  nextWhomst: number;
  status: GameStatus;
  winner: number | null;
};

export type FinishGame = {
  gameId: number;
  status: Exclude<GameStatus, "ACTIVE">;
  winner: number | null;
};

export interface IStorage {
  // Users
  getUser(id: number): Promise<User | undefined>;
  getUserByName(name: string): Promise<User | undefined>;
  /** @throws DuplicateIdentityError when name or email is taken */
  createUser(data: CreateUser): Promise<User>;
  listUsers(query: UserQuery): Promise<User[]>;
  /** Returns true only for the call that actually flipped `deleted`. */
  softDeleteUser(id: number): Promise<boolean>;

  // Invitations
  getInvitation(id: number): Promise<Invitation | undefined>;
  createInvitation(data: CreateInvitation): Promise<Invitation>;
  listInvitations(query: InvitationQuery): Promise<Invitation[]>;
  /** Compare-and-set from PENDING; undefined when the invitation was no longer PENDING. */
  answerInvitation(id: number, status: InvitationAnswer): Promise<Invitation | undefined>;
  /**
   * Compare-and-set PENDING -> ACCEPTED and insert the game in one transaction.
   * Undefined when the invitation was no longer PENDING (nothing is written).
   */
  acceptInvitation(id: number): Promise<{ invitation: Invitation; game: Game } | undefined>;

  // Games & moves
  getGame(id: number): Promise<Game | undefined>;
  listGames(query: GameQuery): Promise<GameWithPlayers[]>;
  /** Undefined when the game changed since it was read (nothing is written). */
  commitMove(data: CommitMove): Promise<{ game: Game; move: Move } | undefined>;
  /** Ends an ACTIVE game; undefined when it was no longer ACTIVE. */
  finishGame(data: FinishGame): Promise<Game | undefined>;
  listMoves(query: MoveQuery): Promise<Move[]>;

  /** Cheap liveness probe for /health. */
  ping(): Promise<boolean>;
}
