/**
 * Audit Log - records per-item outcomes of a run
 *
 * Entries are kept in memory for the run summary and each one is written to
 * stderr as an `[Audit]` line.
 *
 * @module services/audit
 */

import { v4 as uuidv4 } from 'uuid';

import type { ErrorCategory } from '../core/errors.js';

export type AuditAction = 'item_failed' | 'item_succeeded' | 'metadata_defaulted' | 'artifact_written';

export interface AuditEntry {
  /** UUID v4 identifier */
  id: string;
  /** ISO 8601 timestamp */
  timestamp: string;
  action: AuditAction;
  /** gs:// URI or video URL the entry is about */
  subject: string;
  category: ErrorCategory | null;
  message: string;
  details: Record<string, unknown>;
}

export class AuditLog {
  private readonly log: AuditEntry[] = [];

  constructor(
    private readonly sink: (line: string) => void = (line) => console.error(line),
    private readonly now: () => Date = () => new Date()
  ) {}

  record(params: {
    action: AuditAction;
    subject: string;
    message: string;
    category?: ErrorCategory | null;
    details?: Record<string, unknown>;
  }): AuditEntry {
    const entry: AuditEntry = {
      id: uuidv4(),
      timestamp: this.now().toISOString(),
      action: params.action,
      subject: params.subject,
      category: params.category ?? null,
      message: params.message,
      details: params.details ?? {},
    };
    this.log.push(entry);
    const category = entry.category ? ` category=${entry.category}` : '';
    this.sink(`[Audit] ${entry.action} ${entry.subject}${category}: ${entry.message}`);
    return entry;
  }

  entries(): readonly AuditEntry[] {
    return [...this.log];
  }

  failures(): readonly AuditEntry[] {
    return this.log.filter((e) => e.action === 'item_failed');
  }
}
