/**
 * Formats rename outcomes into console lines
 */

import type { OutputSink } from '../utils/output.js';
import type { RenameOutcome, RenameStatus } from './types.js';

export type ReportLevel = keyof OutputSink;

export interface ReportLine {
  level: ReportLevel;
  message: string;
}

/**
 * Running totals of outcomes by status
 */
export type RenameSummary = Record<RenameStatus, number>;

/**
 * Format a single outcome
 *
 * Renames are only listed in verbose mode; dry-run previews always are.
 */
export function formatOutcome(outcome: RenameOutcome): ReportLine {
  switch (outcome.status) {
    case 'renamed':
      return { level: 'verbose', message: `'${outcome.source}' -> '${outcome.destination}'` };
    case 'planned':
      return { level: 'result', message: `'${outcome.source}' -> '${outcome.destination}'` };
    case 'unchanged':
      return {
        level: 'verbose',
        message: `'${outcome.source}' is already in the target convention`,
      };
    case 'skipped':
      return {
        level: 'warn',
        message: `Skipped '${outcome.source}': '${outcome.destination}' already exists`,
      };
    case 'failed':
      return { level: 'error', message: `Error: ${outcome.error.message}` };
  }
}

export function emptySummary(): RenameSummary {
  return { renamed: 0, planned: 0, unchanged: 0, skipped: 0, failed: 0 };
}

/**
 * Reporter that writes each outcome to `sink` and keeps a summary
 */
export function createReporter(sink: OutputSink) {
  const summary = emptySummary();

  return {
    summary,
    report(outcome: RenameOutcome): void {
      summary[outcome.status]++;
      const line = formatOutcome(outcome);
      sink[line.level](line.message);
    },
  };
}

export function formatSummary(summary: RenameSummary): string {
  const parts = [
    `${summary.renamed} renamed`,
    summary.planned > 0 ? `${summary.planned} planned` : undefined,
    `${summary.unchanged} unchanged`,
    `${summary.skipped} skipped`,
    `${summary.failed} failed`,
  ];
  return parts.filter((part) => part !== undefined).join(', ');
}
