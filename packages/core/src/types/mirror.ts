import type { GitFailureKind } from '../git/errors.js';

export type MirrorTarget = {
  name: string;
  localPath: string;
  /** Clone URL with current credentials injected. Never log it; use redactUrl. */
  desiredUrl: string;
};

export type MirrorState = { kind: 'absent' } | { kind: 'present'; storedUrl: string | null };

export type MirrorFailureKind = GitFailureKind | 'tool_missing' | 'unexpected_error';

export type MirrorSkipReason = 'tool_missing' | 'cancelled' | 'invalid_name';

export type MirrorWarning = {
  kind: 'remote_update_error';
  reason: string;
};

export type MirrorOutcome =
  | { status: 'cloned' }
  | { status: 'fetched'; warnings: MirrorWarning[] }
  | { status: 'url-updated-fetched' }
  | { status: 'skipped'; reason: MirrorSkipReason }
  | { status: 'failed'; kind: MirrorFailureKind; reason: string; warnings: MirrorWarning[] };

export function isSuccessfulOutcome(outcome: MirrorOutcome): boolean {
  return (
    outcome.status === 'cloned' ||
    outcome.status === 'fetched' ||
    outcome.status === 'url-updated-fetched'
  );
}
