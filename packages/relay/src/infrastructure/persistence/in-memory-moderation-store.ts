/**
 * @file in-memory-moderation-store.ts
 * @copyright 2025 Roman Barinov <rbarinov@gmail.com>
 * @license FSL-1.1-NC
 */

import type {
  ModerationGate,
  ModerationStore,
  Report,
  ReportInput,
} from '../../domain/ports/moderation.js';

export interface InMemoryModerationStoreOptions {
  generateReportId: () => string;
  now?: () => Date;
}

/**
 * In-memory block lists and report log.
 * Stands in for the account service's storage; contents are lost on restart.
 */
export class InMemoryModerationStore implements ModerationStore, ModerationGate {
  private readonly blocks = new Map<string, Set<string>>();
  private readonly reports: Report[] = [];
  private readonly generateReportId: () => string;
  private readonly now: () => Date;

  constructor(options: InMemoryModerationStoreOptions) {
    this.generateReportId = options.generateReportId;
    this.now = options.now ?? (() => new Date());
  }

  async isBlocked(userId: string, displayName: string): Promise<boolean> {
    return this.blocks.get(userId)?.has(displayName) ?? false;
  }

  async block(userId: string, username: string): Promise<void> {
    const blocked = this.blocks.get(userId) ?? new Set<string>();
    blocked.add(username);
    this.blocks.set(userId, blocked);
  }

  async unblock(userId: string, username: string): Promise<void> {
    const blocked = this.blocks.get(userId);
    if (!blocked) {
      return;
    }
    blocked.delete(username);
    if (blocked.size === 0) {
      this.blocks.delete(userId);
    }
  }

  async getBlocked(userId: string): Promise<string[]> {
    return Array.from(this.blocks.get(userId) ?? []);
  }

  async report(input: ReportInput): Promise<Report> {
    const report: Report = {
      ...input,
      id: this.generateReportId(),
      createdAt: this.now().toISOString(),
    };
    this.reports.push(report);
    return report;
  }

  getReports(): Report[] {
    return [...this.reports];
  }
}
