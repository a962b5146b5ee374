/**
 * @file moderation.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license MIT
 */

/**
 * Read-only boundary to the block relationships owned by the moderation store.
 */
export interface ModerationGate {
  /**
   * Whether the user has blocked the given display name.
   */
  isBlocked(userId: string, displayName: string): Promise<boolean>;
}

export interface ReportInput {
  reporterId: string;
  reportedUsername: string;
  reason: string;
  messageId?: string;
}

export interface Report extends ReportInput {
  id: string;
  createdAt: string;
}

/**
 * Port for moderation mutations. Results are reported to the requesting connection only.
 */
export interface ModerationStore {
  block(userId: string, username: string): Promise<void>;

  unblock(userId: string, username: string): Promise<void>;

  getBlocked(userId: string): Promise<string[]>;

  report(input: ReportInput): Promise<Report>;
}
