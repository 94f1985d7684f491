import {
  isSuccessfulOutcome,
  type MirrorFailureKind,
  type MirrorOutcome,
  type MirrorSkipReason,
  type MirrorWarning,
} from '../types/mirror.js';

export type RepositoryResult = {
  name: string;
  outcome: MirrorOutcome;
};

export type RunSummary = {
  total: number;
  succeeded: number;
  counts: Record<MirrorOutcome['status'], number>;
  failed: Array<{ name: string; kind: MirrorFailureKind; reason: string }>;
  skipped: Array<{ name: string; reason: MirrorSkipReason }>;
  warnings: Array<{ name: string } & MirrorWarning>;
  results: RepositoryResult[];
  cancelled: boolean;
  toolMissing: boolean;
};

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CANCELLED = 130;

/**
 * `cancelled` marks a run the operator interrupted even when no repository was
 * left to skip, e.g. a signal during the last one.
 */
export function summarizeResults(
  results: RepositoryResult[],
  options: { cancelled?: boolean } = {},
): RunSummary {
  const summary: RunSummary = {
    total: results.length,
    succeeded: 0,
    counts: { cloned: 0, fetched: 0, 'url-updated-fetched': 0, skipped: 0, failed: 0 },
    failed: [],
    skipped: [],
    warnings: [],
    results,
    cancelled: options.cancelled ?? false,
    toolMissing: false,
  };

  for (const { name, outcome } of results) {
    summary.counts[outcome.status] += 1;
    if (isSuccessfulOutcome(outcome)) summary.succeeded += 1;
    switch (outcome.status) {
      case 'fetched':
        summary.warnings.push(...outcome.warnings.map((warning) => ({ name, ...warning })));
        break;
      case 'skipped':
        summary.skipped.push({ name, reason: outcome.reason });
        if (outcome.reason === 'cancelled') summary.cancelled = true;
        break;
      case 'failed':
        summary.failed.push({ name, kind: outcome.kind, reason: outcome.reason });
        summary.warnings.push(...outcome.warnings.map((warning) => ({ name, ...warning })));
        if (outcome.kind === 'tool_missing') summary.toolMissing = true;
        break;
    }
  }

  return summary;
}

export function resolveExitCode(summary: RunSummary): number {
  if (summary.cancelled) return EXIT_CANCELLED;
  return summary.failed.length ? EXIT_FAILURE : EXIT_OK;
}

function countLabel(count: number, singular: string, plural: string): string {
  return `${count} ${count === 1 ? singular : plural}`;
}

export function formatSummary(summary: RunSummary): string {
  const lines = [
    `Processed ${countLabel(summary.total, 'repository', 'repositories')}: ` +
      `${summary.succeeded} succeeded, ${summary.failed.length} failed, ` +
      `${summary.skipped.length} skipped.`,
    `  cloned: ${summary.counts.cloned}, fetched: ${summary.counts.fetched}, ` +
      `remote updated and fetched: ${summary.counts['url-updated-fetched']}`,
  ];

  if (summary.failed.length) {
    lines.push('Failed:');
    for (const entry of summary.failed) {
      lines.push(`  - ${entry.name} (${entry.kind}): ${entry.reason}`);
    }
  }
  if (summary.skipped.length) {
    lines.push('Skipped:');
    for (const entry of summary.skipped) {
      lines.push(`  - ${entry.name} (${entry.reason})`);
    }
  }
  if (summary.warnings.length) {
    lines.push('Warnings:');
    for (const entry of summary.warnings) {
      lines.push(`  - ${entry.name} (${entry.kind}): ${entry.reason}`);
    }
  }
  if (summary.toolMissing) {
    lines.push('git could not be found. Install Git and make sure it is on your PATH.');
  }
  if (summary.cancelled) {
    lines.push('Operation cancelled by user.');
  }

  return lines.join('\n');
}
