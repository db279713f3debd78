import type { Game, GameType, Invitation, User } from "@shared/schema";
import type { IStorage, InvitationQuery } from "../../storage/types";
import logger from "../../logger";
import { failure, success, type ServiceFailure, type ServiceResult } from "../types";
import { checkTransition, type InvitationEvent } from "./stateMachine";

export interface CreateInvitationRequest {
  toId: number;
  gameType: GameType;
}

export interface AcceptedInvitation {
  gameId: number;
  invitation: Invitation;
  game: Game;
}

const notFound = (id: number): ServiceFailure =>
  failure(404, "INVITATION_NOT_FOUND", `invitation with ID '${id}' does not exist`);

const alreadyAnswered = (invitation: Invitation): ServiceFailure =>
  failure(
    400,
    "INVITATION_ALREADY_ANSWERED",
    `invitation with ID '${invitation.id}' already has '${invitation.status}' status`,
    { status: invitation.status }
  );

const wrongActor = (event: InvitationEvent, invitation: Invitation, userId: number): ServiceFailure =>
  event === "cancel"
    ? failure(
        403,
        "NOT_INVITATION_SENDER",
        `invitation with ID '${invitation.id}' was not sent by user with ID '${userId}'`
      )
    : failure(
        403,
        "NOT_INVITATION_RECIPIENT",
        `invitation with ID '${invitation.id}' not addressed to user with ID '${userId}'`
      );

export class InvitationService {
  constructor(private readonly storage: IStorage) {}

  async create(actor: User, request: CreateInvitationRequest): Promise<ServiceResult<Invitation>> {
    if (request.toId === actor.id) {
      return failure(400, "SELF_INVITE", "cannot invite self");
    }

    const recipient = await this.storage.getUser(request.toId);
    if (!recipient) {
      return failure(400, "RECIPIENT_NOT_FOUND", "addressee does not exist");
    }
    if (recipient.deleted) {
      return failure(400, "RECIPIENT_DELETED", `user '${recipient.id}' has been deleted`);
    }

    const invitation = await this.storage.createInvitation({
      fromId: actor.id,
      toId: recipient.id,
      gameType: request.gameType,
    });
    logger.info("Invitation sent", { invitationId: invitation.id, fromId: actor.id, toId: recipient.id });
    return success(invitation);
  }

  /** Only invitations the actor sent or received are visible. */
  async list(actor: User, query: InvitationQuery): Promise<ServiceResult<Invitation[]>> {
    const { fromId, toId } = query.filter;
    if (fromId === undefined && toId === undefined) {
      return failure(400, "INVITATION_PARTY_REQUIRED", "'toId' or 'fromId' must be supplied");
    }
    if (fromId !== actor.id && toId !== actor.id) {
      return failure(
        403,
        "INVITATION_NOT_VISIBLE",
        "cannot view invitations sent to or from other users"
      );
    }
    return success(await this.storage.listInvitations(query));
  }

  async accept(actor: User, id: number): Promise<ServiceResult<AcceptedInvitation>> {
    const checked = await this.checkAnswer(actor, id, "accept");
    if (!checked.ok) return checked;

    const accepted = await this.storage.acceptInvitation(id);
    if (!accepted) return this.lostRace(id);

    logger.info("Invitation accepted", { invitationId: id, gameId: accepted.game.id });
    return success({ gameId: accepted.game.id, ...accepted });
  }

  decline(actor: User, id: number): Promise<ServiceResult<Invitation>> {
    return this.answer(actor, id, "decline");
  }

  cancel(actor: User, id: number): Promise<ServiceResult<Invitation>> {
    return this.answer(actor, id, "cancel");
  }

  private async answer(
    actor: User,
    id: number,
    event: "decline" | "cancel"
  ): Promise<ServiceResult<Invitation>> {
    const checked = await this.checkAnswer(actor, id, event);
    if (!checked.ok) return checked;

    const answered = await this.storage.answerInvitation(id, checked.data);
    if (!answered) return this.lostRace(id);

    logger.info("Invitation answered", { invitationId: id, status: answered.status });
    return success(answered);
  }

  /**
   * Not found, then actor, then (for the recipient's answers) a live sender,
   * then status. Yields the status the invitation should move to.
   */
  private async checkAnswer(
    actor: User,
    id: number,
    event: InvitationEvent
  ): Promise<ServiceResult<Exclude<Invitation["status"], "PENDING">>> {
    const invitation = await this.storage.getInvitation(id);
    if (!invitation) return notFound(id);

    const check = checkTransition(invitation, event, actor.id);
    if (!check.allowed && check.reason === "WRONG_ACTOR") {
      return wrongActor(event, invitation, actor.id);
    }

    if (event !== "cancel") {
      const sender = await this.storage.getUser(invitation.fromId);
      if (!sender || sender.deleted) {
        return failure(404, "INVITER_NOT_FOUND", "inviting user does not exist or has been deleted");
      }
    }

    if (!check.allowed) return alreadyAnswered(invitation);
    return success(check.to);
  }

  // Another request answered the invitation between our read and our write
  private async lostRace(id: number): Promise<ServiceFailure> {
    const current = await this.storage.getInvitation(id);
    return current ? alreadyAnswered(current) : notFound(id);
  }
}
