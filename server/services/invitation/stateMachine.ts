import type { Invitation, InvitationStatus } from "@shared/schema";

export type InvitationEvent = "accept" | "decline" | "cancel";
export type InvitationActor = "sender" | "recipient";

interface Edge {
  from: InvitationStatus;
  to: Exclude<InvitationStatus, "PENDING">;
  actor: InvitationActor;
}

export const INVITATION_TRANSITIONS: Readonly<Record<InvitationEvent, Edge>> = {
  accept: { from: "PENDING", to: "ACCEPTED", actor: "recipient" },
  decline: { from: "PENDING", to: "DECLINED", actor: "recipient" },
  cancel: { from: "PENDING", to: "CANCELLED", actor: "sender" },
};

export type TransitionCheck =
  | { allowed: true; to: Exclude<InvitationStatus, "PENDING"> }
  | { allowed: false; reason: "WRONG_ACTOR" | "ALREADY_ANSWERED" };

export function isTerminal(status: InvitationStatus): boolean {
  return !Object.values(INVITATION_TRANSITIONS).some((edge) => edge.from === status);
}

/** Actor is checked before status, so a stranger never learns the status. */
export function checkTransition(
  invitation: Invitation,
  event: InvitationEvent,
  userId: number
): TransitionCheck {
  const edge = INVITATION_TRANSITIONS[event];
  const expectedActor = edge.actor === "recipient" ? invitation.toId : invitation.fromId;
  if (expectedActor !== userId) return { allowed: false, reason: "WRONG_ACTOR" };
  if (invitation.status !== edge.from) return { allowed: false, reason: "ALREADY_ANSWERED" };
  return { allowed: true, to: edge.to };
}
