import { existsSync } from 'node:fs';
import { rm } from 'node:fs/promises';
import { logger } from '../logger.js';
import type { MirrorOutcome, MirrorState, MirrorTarget, MirrorWarning } from '../types/mirror.js';
import { stringifyError } from '../utils/errors.js';
import { redactUrl } from './credentials.js';
import { GitOperationError } from './errors.js';
import type { GitMirrorClient } from './gitClient.js';

export type ReconcileOptions = {
  git: GitMirrorClient;
  signal?: AbortSignal;
};

async function inspectMirror(
  target: MirrorTarget,
  git: GitMirrorClient,
  warnings: MirrorWarning[],
): Promise<MirrorState> {
  if (!existsSync(target.localPath)) return { kind: 'absent' };
  try {
    return { kind: 'present', storedUrl: await git.readRemoteUrl(target.localPath) };
  } catch (err) {
    if (!(err instanceof GitOperationError)) throw err;
    warnings.push({ kind: 'remote_update_error', reason: err.message });
    logger.warn(
      { repo: target.name, path: target.localPath, reason: err.message },
      'Could not read the stored remote URL',
    );
    return { kind: 'present', storedUrl: null };
  }
}

async function removePartialClone(target: MirrorTarget, signal?: AbortSignal): Promise<void> {
  // An interrupted run leaves the in-flight directory for the next run to inspect.
  if (signal?.aborted) return;
  if (!existsSync(target.localPath)) return;
  try {
    await rm(target.localPath, { recursive: true, force: true });
    logger.info({ repo: target.name, path: target.localPath }, 'Removed partial mirror');
  } catch (err) {
    logger.warn(
      { repo: target.name, path: target.localPath, reason: stringifyError(err) },
      'Could not remove partial mirror',
    );
  }
}

/**
 * Brings one local bare mirror in line with its remote: a mirror clone when the
 * directory is absent, otherwise a remote URL refresh (when the stored URL
 * differs from the desired one) followed by `fetch --all --prune`.
 *
 * Git failures come back as a `failed` outcome. ToolMissingError is rethrown
 * since no later repository can succeed either.
 */
export async function reconcileMirror(
  target: MirrorTarget,
  options: ReconcileOptions,
): Promise<MirrorOutcome> {
  const { git, signal } = options;
  const warnings: MirrorWarning[] = [];
  const state = await inspectMirror(target, git, warnings);

  if (state.kind === 'absent') {
    logger.info(
      { repo: target.name, path: target.localPath, url: redactUrl(target.desiredUrl) },
      'Mirror cloning repository',
    );
    try {
      await git.cloneMirror(target.desiredUrl, target.localPath);
    } catch (err) {
      if (!(err instanceof GitOperationError)) throw err;
      await removePartialClone(target, signal);
      return { status: 'failed', kind: 'clone_error', reason: err.message, warnings };
    }
    return { status: 'cloned' };
  }

  let urlUpdated = false;
  if (state.storedUrl !== null && state.storedUrl !== target.desiredUrl) {
    logger.info(
      { repo: target.name, url: redactUrl(target.desiredUrl) },
      'Updating stored remote URL',
    );
    try {
      await git.setRemoteUrl(target.localPath, target.desiredUrl);
      urlUpdated = true;
    } catch (err) {
      if (!(err instanceof GitOperationError)) throw err;
      warnings.push({ kind: 'remote_update_error', reason: err.message });
      logger.warn(
        { repo: target.name, reason: err.message },
        'Failed to update remote URL; fetching with the stored one',
      );
    }
  }

  logger.info({ repo: target.name, path: target.localPath }, 'Fetching updates');
  try {
    await git.fetchAll(target.localPath);
  } catch (err) {
    if (!(err instanceof GitOperationError)) throw err;
    return { status: 'failed', kind: 'fetch_error', reason: err.message, warnings };
  }

  if (urlUpdated) return { status: 'url-updated-fetched' };
  return { status: 'fetched', warnings };
}
