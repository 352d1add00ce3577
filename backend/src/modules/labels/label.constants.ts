/**
 * backend/src/modules/labels/label.constants.ts
 */

/** Created for every new account, in this order. */
export const DEFAULT_LABELS = [
  { name: 'Important', color: '#FF0000' },
  { name: 'Personal', color: '#00FF00' },
  { name: 'Work', color: '#0000FF' },
] as const;
