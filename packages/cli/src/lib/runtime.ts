import { resolve } from 'node:path';
import process from 'node:process';
import { config as loadDotenv } from 'dotenv';
import { CatalogError } from '@mirrorsync/core/catalog/errors.js';
import {
  loadBitbucketConfig,
  loadGitHubConfig,
  type BitbucketOverrides,
  type GitHubOverrides,
  type MirrorSyncConfig,
} from '@mirrorsync/core/config/config.js';
import { assertGitAvailable } from '@mirrorsync/core/git/preflight.js';
import { logger } from '@mirrorsync/core/logger.js';
import { redactSecrets } from '@mirrorsync/core/runner/commandRunner.js';
import {
  EXIT_CANCELLED,
  EXIT_FAILURE,
  EXIT_OK,
  formatSummary,
  resolveExitCode,
} from '@mirrorsync/core/sync/summary.js';
import { planMirrorSync, runMirrorSync } from '@mirrorsync/core/sync/syncMirrors.js';
import { stringifyError } from '@mirrorsync/core/utils/errors.js';
import { formatRows } from './format.js';

export type SyncCommandKind = 'github' | 'bitbucket';

export type RuntimeOptions = {
  env?: string;
};

export type SyncCommandOptions = RuntimeOptions & GitHubOverrides & BitbucketOverrides;

function writeOut(text: string): void {
  process.stdout.write(`${text}\n`);
}

function writeErr(text: string): void {
  process.stderr.write(`${text}\n`);
}

function loadEnvFile(path: string | undefined, cwd: string): void {
  const envPath = resolve(cwd, path ?? '.env');
  const result = loadDotenv({ path: envPath });
  if (result.error && path) {
    throw new Error(`Could not read env file ${envPath}: ${result.error.message}`);
  }
}

function buildConfig(kind: SyncCommandKind, options: SyncCommandOptions): MirrorSyncConfig {
  const context = { env: process.env, cwd: process.cwd() };
  return kind === 'github'
    ? loadGitHubConfig(options, context)
    : loadBitbucketConfig(options, context);
}

async function printPlan(config: MirrorSyncConfig): Promise<number> {
  const planned = await planMirrorSync(config);
  writeOut(`Target directory: ${config.mirrorRoot}`);
  if (!planned.length) {
    writeOut('No repositories found to mirror.');
    return EXIT_OK;
  }
  writeOut(
    formatRows(
      planned.map((entry) => ({
        name: entry.name,
        state: entry.state,
        url: entry.url,
        path: entry.localPath,
      })),
      ['name', 'state', 'url', 'path'],
    ),
  );
  return EXIT_OK;
}

/**
 * Runs one sync for the given provider and resolves to the process exit code.
 * Fatal errors are reported here; nothing is thrown to the caller.
 */
export async function runSyncCommand(
  kind: SyncCommandKind,
  options: SyncCommandOptions,
): Promise<number> {
  const cwd = process.cwd();
  let config: MirrorSyncConfig;
  try {
    loadEnvFile(options.env, cwd);
    config = buildConfig(kind, options);
  } catch (err) {
    writeErr(`Error: ${stringifyError(err)}`);
    return EXIT_FAILURE;
  }

  const secrets = [config.credentials.secret, config.credentials.principal].filter(
    (value): value is string => Boolean(value),
  );

  if (config.dryRun) {
    try {
      return await printPlan(config);
    } catch (err) {
      writeErr(`Error: ${redactSecrets(stringifyError(err), secrets)}`);
      return EXIT_FAILURE;
    }
  }

  try {
    const version = await assertGitAvailable();
    logger.debug({ version }, 'git preflight passed');
  } catch (err) {
    writeErr(`Error: ${stringifyError(err)}`);
    return EXIT_FAILURE;
  }

  const controller = new AbortController();
  const onSignal = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      writeErr('\nForced exit.');
      process.exit(EXIT_CANCELLED);
    }
    writeErr(`\n${signal} received: finishing the current repository, then stopping.`);
    controller.abort();
  };
  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  try {
    writeOut(`Target directory: ${config.mirrorRoot}`);
    const summary = await runMirrorSync(config, { signal: controller.signal });
    writeOut('');
    writeOut(formatSummary(summary));
    return resolveExitCode(summary);
  } catch (err) {
    const message = redactSecrets(stringifyError(err), secrets);
    if (err instanceof CatalogError) {
      logger.error({ kind: err.name }, 'Could not list repositories');
    } else {
      logger.error({ reason: message }, 'Sync aborted');
    }
    writeErr(`Error: ${message}`);
    return EXIT_FAILURE;
  } finally {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  }
}
