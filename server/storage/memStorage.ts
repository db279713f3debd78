import {
  INITIAL_FEN,
  type User,
  type Invitation,
  type Game,
  type GameWithPlayers,
  type Move,
} from "../../packages/shared/schema";
import { DuplicateIdentityError } from "./errors";
import { applyQuery } from "./query";
import type {
  IStorage,
  CreateUser,
  CreateInvitation,
  InvitationAnswer,
  CommitMove,
  FinishGame,
  UserQuery,
  InvitationQuery,
  GameQuery,
  MoveQuery,
} from "./types";

/**
 * In-process store with the same compare-and-set semantics as DbStorage.
 * Each mutation runs synchronously between awaits, so it is atomic with
 * respect to other requests on the event loop.
 */
export class MemStorage implements IStorage {
  private users = new Map<number, User>();
  private invitations = new Map<number, Invitation>();
  private games = new Map<number, Game>();
  private moves = new Map<number, Move>();
  private nextId = { user: 1, invitation: 1, game: 1, move: 1 };

  async getUser(id: number): Promise<User | undefined> {
    const user = this.users.get(id);
    return user && { ...user };
  }

  async getUserByName(name: string): Promise<User | undefined> {
    const user = Array.from(this.users.values()).find((u) => u.name === name);
    return user && { ...user };
  }

  async createUser(data: CreateUser): Promise<User> {
    const taken = Array.from(this.users.values()).some(
      (u) => u.name === data.name || (u.email !== null && u.email === data.email)
    );
    if (taken) throw new DuplicateIdentityError();

    const user: User = {
      id: this.nextId.user++,
      name: data.name,
      email: data.email,
      passwordHash: data.passwordHash,
      deleted: false,
      dateJoined: new Date(),
      wins: 0,
      draws: 0,
      losses: 0,
    };
    this.users.set(user.id, user);
    return { ...user };
  }

  async listUsers(query: UserQuery): Promise<User[]> {
    return applyQuery(Array.from(this.users.values()), query).map((u) => ({ ...u }));
  }

  async softDeleteUser(id: number): Promise<boolean> {
    const user = this.users.get(id);
    if (!user || user.deleted) return false;
    this.users.set(id, { ...user, deleted: true, email: null, passwordHash: null });
    return true;
  }

  async getInvitation(id: number): Promise<Invitation | undefined> {
    const invitation = this.invitations.get(id);
    return invitation && { ...invitation };
  }

  async createInvitation(data: CreateInvitation): Promise<Invitation> {
    const invitation: Invitation = {
      id: this.nextId.invitation++,
      dateSent: new Date(),
      dateAnswered: null,
      fromId: data.fromId,
      toId: data.toId,
      gameType: data.gameType,
      status: "PENDING",
    };
    this.invitations.set(invitation.id, invitation);
    return { ...invitation };
  }

  async listInvitations(query: InvitationQuery): Promise<Invitation[]> {
    return applyQuery(Array.from(this.invitations.values()), query).map((i) => ({ ...i }));
  }

  async answerInvitation(id: number, status: InvitationAnswer): Promise<Invitation | undefined> {
    const invitation = this.invitations.get(id);
    if (!invitation || invitation.status !== "PENDING") return undefined;

    const answered: Invitation = { ...invitation, status, dateAnswered: new Date() };
    this.invitations.set(id, answered);
    return { ...answered };
  }

  async acceptInvitation(id: number): Promise<{ invitation: Invitation; game: Game } | undefined> {
    const invitation = this.invitations.get(id);
    if (!invitation || invitation.status !== "PENDING") return undefined;

    const accepted: Invitation = { ...invitation, status: "ACCEPTED", dateAnswered: new Date() };
    const game: Game = {
      id: this.nextId.game++,
      gameType: invitation.gameType,
      invitationId: invitation.id,
      dateStarted: new Date(),
      dateEnded: null,
      player1: invitation.fromId,
      player2: invitation.toId,
      whomst: invitation.fromId,
      winner: null,
      status: "ACTIVE",
      fen: INITIAL_FEN,
      states: {},
    };
    this.invitations.set(id, accepted);
    this.games.set(game.id, game);
    return { invitation: { ...accepted }, game: { ...game } };
  }

  async getGame(id: number): Promise<Game | undefined> {
    const game = this.games.get(id);
    return game && { ...game };
  }

  async listGames(query: GameQuery): Promise<GameWithPlayers[]> {
    const rows: GameWithPlayers[] = Array.from(this.games.values()).map((game) => ({
      ...game,
      player1Name: this.users.get(game.player1)?.name ?? "",
      player2Name: this.users.get(game.player2)?.name ?? "",
    }));
    return applyQuery(rows, query);
  }

  async commitMove(data: CommitMove): Promise<{ game: Game; move: Move } | undefined> {
    const current = this.games.get(data.gameId);
    if (
      !current ||
      current.status !== "ACTIVE" ||
      current.whomst !== data.userId ||
      current.fen !== data.expectedFen
    ) {
      return undefined;
    }

    const now = new Date();
    const terminal = data.status !== "ACTIVE";
    const game: Game = {
      ...current,
      fen: data.fen,
      states: data.states,
      whomst: data.nextWhomst,
      status: data.status,
      winner: terminal ? data.winner : null,
      dateEnded: terminal ? now : null,
    };
    const move: Move = {
      id: this.nextId.move++,
      userId: data.userId,
      gameId: data.gameId,
      timestamp: now,
      move: data.move,
      fen: data.fen,
    };

    this.games.set(game.id, game);
    this.moves.set(move.id, move);
    if (terminal) this.recordResult(game);
    return { game: { ...game }, move: { ...move } };
  }

  async finishGame(data: FinishGame): Promise<Game | undefined> {
    const current = this.games.get(data.gameId);
    if (!current || current.status !== "ACTIVE") return undefined;

    const game: Game = { ...current, status: data.status, winner: data.winner, dateEnded: new Date() };
    this.games.set(game.id, game);
    this.recordResult(game);
    return { ...game };
  }

  async listMoves(query: MoveQuery): Promise<Move[]> {
    return applyQuery(Array.from(this.moves.values()), query).map((m) => ({ ...m }));
  }

  async ping(): Promise<boolean> {
    return true;
  }

  private recordResult(game: Game): void {
    if (game.winner === null) {
      this.bump(game.player1, "draws");
      this.bump(game.player2, "draws");
      return;
    }
    const loser = game.winner === game.player1 ? game.player2 : game.player1;
    this.bump(game.winner, "wins");
    this.bump(loser, "losses");
  }

  private bump(userId: number, field: "wins" | "draws" | "losses"): void {
    const user = this.users.get(userId);
    if (user) this.users.set(userId, { ...user, [field]: user[field] + 1 });
  }
}
