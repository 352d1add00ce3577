/**
 * backend/src/modules/emails/index.ts
 *
 * Public surface of the emails module.
 */

export { buildEmailSearchCriteria } from './policies/email-search-criteria.policy';
export type { Email, EmailSearchCriteria, EmailView } from './email.types';
