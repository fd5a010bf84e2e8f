export const SUBJECT_PREFIX = 'todo: ';

export interface TodoItem {
  /** Arguments as typed, space-joined. */
  title: string;
  subject: string;
  lines: string[];
}

export type TodoOutcome =
  | { status: 'sent'; attempts: number; id?: string }
  | { status: 'cancelled' };
