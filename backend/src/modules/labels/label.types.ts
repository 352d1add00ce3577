/**
 * backend/src/modules/labels/label.types.ts
 *
 * Labels belong to one user; names are unique per user.
 */

export type Label = {
  id: string;
  userId: string;
  name: string;
  color: string;
};

export type LabelView = {
  id: string;
  name: string;
  color: string;
};
