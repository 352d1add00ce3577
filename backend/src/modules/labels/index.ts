/**
 * backend/src/modules/labels/index.ts
 *
 * Public surface of the labels module.
 */

export { LabelRepo } from './dal/label.repo';
export { listLabelsForUser, getLabelsByNames } from './queries/label.queries';
export { DEFAULT_LABELS } from './label.constants';
export type { Label } from './label.types';
