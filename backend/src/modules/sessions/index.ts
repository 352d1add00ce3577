/**
 * backend/src/modules/sessions/index.ts
 *
 * Public surface of the sessions module.
 */

export { SessionService } from './session.service';
export { listSessionsForUser } from './queries/session.queries';
export type { Session, IssuedSession } from './session.types';
