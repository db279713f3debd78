export { InvitationService } from "./service";
export type { CreateInvitationRequest, AcceptedInvitation } from "./service";
export { INVITATION_TRANSITIONS, checkTransition, isTerminal } from "./stateMachine";
export type { InvitationEvent, TransitionCheck } from "./stateMachine";
