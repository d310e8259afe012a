/**
 * Actor Context - who is calling the API
 *
 * The bot front end authenticates as a service and names the chat user
 * it acts for; every file operation is scoped to that owner.
 */
export interface ActorContext {
  type: 'service' | 'anonymous';
  ownerId?: string;
  requestId: string;
  ip?: string;
  userAgent?: string;
}
