export { InviteService, effectiveState, tokenPrefix } from './invite.service';
export type { CreateInviteInput, InvitePreview, InviteServiceOptions } from './types';
