import type { RepositoryCatalog } from '../catalog/types.js';
import type { Credentials } from '../git/credentials.js';
import { ToolMissingError } from '../git/errors.js';
import type { GitMirrorClient } from '../git/gitClient.js';
import { reconcileMirror } from '../git/mirror.js';
import { logger } from '../logger.js';
import { redactSecrets } from '../runner/commandRunner.js';
import type { MirrorOutcome, MirrorSkipReason } from '../types/mirror.js';
import { stringifyError } from '../utils/errors.js';
import { summarizeResults, type RepositoryResult, type RunSummary } from './summary.js';
import { buildMirrorTarget, isValidRepositoryName } from './targets.js';

export type BatchRunnerOptions = {
  mirrorRoot: string;
  credentials: Credentials;
  git: GitMirrorClient;
  signal?: AbortSignal;
};

export type BatchRunner = {
  run(catalog: RepositoryCatalog): Promise<RunSummary>;
};

function logOutcome(name: string, outcome: MirrorOutcome) {
  switch (outcome.status) {
    case 'failed':
      logger.error({ repo: name, kind: outcome.kind, reason: outcome.reason }, 'Repository failed');
      break;
    case 'skipped':
      logger.warn({ repo: name, reason: outcome.reason }, 'Repository skipped');
      break;
    default:
      logger.info({ repo: name, status: outcome.status }, 'Repository mirrored');
  }
}

export function createBatchRunner(options: BatchRunnerOptions): BatchRunner {
  const { mirrorRoot, credentials, git, signal } = options;
  const secrets = [credentials.secret, credentials.principal].filter(
    (value): value is string => Boolean(value),
  );

  async function mirrorOne(name: string, cloneUrl: string): Promise<MirrorOutcome> {
    const target = buildMirrorTarget(mirrorRoot, name, cloneUrl, credentials);
    try {
      return await reconcileMirror(target, { git, ...(signal ? { signal } : {}) });
    } catch (err) {
      if (err instanceof ToolMissingError) {
        return { status: 'failed', kind: 'tool_missing', reason: err.message, warnings: [] };
      }
      return {
        status: 'failed',
        kind: 'unexpected_error',
        reason: redactSecrets(stringifyError(err), secrets),
        warnings: [],
      };
    }
  }

  return {
    async run(catalog) {
      const results: RepositoryResult[] = [];
      let halted: MirrorSkipReason | null = null;

      for (const [name, cloneUrl] of catalog) {
        if (!halted && signal?.aborted) {
          logger.warn('Cancellation requested; remaining repositories will be skipped');
          halted = 'cancelled';
        }
        if (halted) {
          results.push({ name, outcome: { status: 'skipped', reason: halted } });
          continue;
        }

        let outcome: MirrorOutcome;
        if (!isValidRepositoryName(name)) {
          outcome = { status: 'skipped', reason: 'invalid_name' };
        } else {
          logger.info({ repo: name }, 'Processing repository');
          outcome = await mirrorOne(name, cloneUrl);
          if (outcome.status === 'failed' && outcome.kind === 'tool_missing') {
            halted = 'tool_missing';
          }
        }

        logOutcome(name, outcome);
        results.push({ name, outcome });
      }

      return summarizeResults(results, { cancelled: signal?.aborted ?? false });
    },
  };
}
