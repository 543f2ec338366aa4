/**
 * Per-request user context, supplied by the caller.
 * tact reads it but does not own it.
 */

export interface UserContext {
  userId: string;
  isPremium: boolean;
  totalMessageCount: number;
  /** Epoch ms, most recent first. Merged with the guard's own window. */
  recentAutoResponseTimestamps: readonly number[];
  firstName?: string;
  username?: string;
  /** Extra values templates can reference by name */
  attributes?: Readonly<Record<string, string>>;
}
