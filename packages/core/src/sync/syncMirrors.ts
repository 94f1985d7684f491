import { existsSync } from 'node:fs';
import { createCatalogProvider } from '../catalog/providers.js';
import type { CatalogProvider } from '../catalog/types.js';
import type { MirrorSyncConfig } from '../config/types.js';
import { redactUrl } from '../git/credentials.js';
import { createGitMirrorClient, type GitMirrorClient } from '../git/gitClient.js';
import { logger } from '../logger.js';
import { createBatchRunner } from './batchRunner.js';
import type { RunSummary } from './summary.js';
import { buildMirrorTarget, isValidRepositoryName } from './targets.js';

export type SyncDependencies = {
  provider?: CatalogProvider;
  git?: GitMirrorClient;
  signal?: AbortSignal;
};

export type PlannedMirror = {
  name: string;
  url: string;
  localPath: string;
  state: 'absent' | 'present' | 'invalid_name';
};

function configuredSecrets(config: MirrorSyncConfig): string[] {
  const { principal, secret } = config.credentials;
  return [secret, principal].filter((value): value is string => Boolean(value));
}

export function createConfiguredGitClient(config: MirrorSyncConfig): GitMirrorClient {
  return createGitMirrorClient({
    env: config.gitEnv,
    echo: !config.quiet,
    redact: configuredSecrets(config),
    ...(config.logFilePath ? { logFilePath: config.logFilePath } : {}),
  });
}

/**
 * Lists the remote catalog and mirrors every repository in it. Catalog errors
 * (authentication, network, malformed responses) propagate; per-repository
 * failures are reported in the returned summary.
 */
export async function runMirrorSync(
  config: MirrorSyncConfig,
  deps: SyncDependencies = {},
): Promise<RunSummary> {
  const provider = deps.provider ?? createCatalogProvider(config);
  const catalog = await provider.listRepositories();
  logger.info(
    { count: catalog.size, target: config.mirrorRoot },
    `Found ${catalog.size} ${provider.displayName} repositories to sync`,
  );

  const runner = createBatchRunner({
    mirrorRoot: config.mirrorRoot,
    credentials: config.credentials,
    git: deps.git ?? createConfiguredGitClient(config),
    ...(deps.signal ? { signal: deps.signal } : {}),
  });
  return runner.run(catalog);
}

export async function planMirrorSync(
  config: MirrorSyncConfig,
  deps: Pick<SyncDependencies, 'provider'> = {},
): Promise<PlannedMirror[]> {
  const provider = deps.provider ?? createCatalogProvider(config);
  const catalog = await provider.listRepositories();
  return [...catalog].map(([name, cloneUrl]) => {
    const target = buildMirrorTarget(config.mirrorRoot, name, cloneUrl, config.credentials);
    return {
      name,
      url: redactUrl(cloneUrl),
      localPath: target.localPath,
      state: !isValidRepositoryName(name)
        ? 'invalid_name'
        : existsSync(target.localPath)
          ? 'present'
          : 'absent',
    };
  });
}
