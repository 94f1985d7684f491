import { resolve } from 'node:path';
import type { GitHubRepoType } from '../catalog/github.js';
import type { CloneProtocol } from '../catalog/types.js';
import type { Credentials } from '../git/credentials.js';
import { resolveMirrorRoot } from '../sync/targets.js';
import { resolveFlag, resolvePathValue, resolveSecret, resolveStringValue } from './resolve.js';
import { getTomlTable, loadTomlConfig, resolveConfigPath, type TomlTable } from './toml.js';
import {
  DEFAULT_BITBUCKET_API_BASE_URL,
  DEFAULT_BITBUCKET_FOLDER,
  DEFAULT_GITHUB_API_BASE_URL,
  DEFAULT_GITHUB_FOLDER,
  type BitbucketOverrides,
  type CommonOverrides,
  type GitHubOverrides,
  type MirrorSyncConfig,
} from './types.js';

export type { MirrorSyncConfig, GitHubOverrides, BitbucketOverrides } from './types.js';

export type ConfigContext = {
  env: NodeJS.ProcessEnv;
  cwd: string;
};

type MirrorSettings = Pick<
  MirrorSyncConfig,
  'folder' | 'mirrorRoot' | 'logFilePath' | 'quiet' | 'dryRun' | 'gitEnv'
>;

const repoTypes: readonly GitHubRepoType[] = ['public', 'private', 'all'];

function parseRepoType(raw: string): GitHubRepoType {
  const normalized = raw.trim().toLowerCase();
  const match = repoTypes.find((value) => value === normalized);
  if (!match) {
    throw new Error(`Invalid GitHub repo type: ${raw}. Expected one of: public, private, all.`);
  }
  return match;
}

/**
 * A principal is only meaningful together with a secret. Refuse it alone
 * instead of silently mirroring anonymously.
 */
export function validateCredentials(
  credentials: Credentials,
  names: { principal: string; secret: string },
): Credentials {
  if (credentials.principal && !credentials.secret) {
    throw new Error(
      `${names.principal} is set but ${names.secret} is missing. Provide both, or neither for anonymous access.`,
    );
  }
  return credentials;
}

function loadFileConfig(overrides: CommonOverrides, context: ConfigContext): TomlTable {
  return loadTomlConfig(resolveConfigPath(context.env, overrides.configPath, context.cwd));
}

function resolveMirrorSettings(
  overrides: CommonOverrides,
  context: ConfigContext,
  mirrorToml: TomlTable | undefined,
  defaultFolder: string,
  identity: string,
): MirrorSettings {
  const { env, cwd } = context;
  const folder = resolve(
    cwd,
    resolvePathValue(env, 'MIRROR_FOLDER', mirrorToml?.folder, {
      cliValue: overrides.folder,
      defaultValue: defaultFolder,
    }) ?? defaultFolder,
  );
  const logFile = resolvePathValue(env, 'MIRROR_LOG_FILE', mirrorToml?.log_file, {
    cliValue: overrides.logFile,
  });
  return {
    folder,
    mirrorRoot: resolveMirrorRoot(folder, identity),
    ...(logFile ? { logFilePath: resolve(cwd, logFile) } : {}),
    quiet: resolveFlag(env, 'MIRROR_QUIET', mirrorToml?.quiet, { cliValue: overrides.quiet }),
    dryRun: overrides.dryRun ?? false,
    gitEnv: env,
  };
}

function resolveProtocol(
  env: NodeJS.ProcessEnv,
  envName: string,
  tomlValue: unknown,
  cliValue: boolean | undefined,
): CloneProtocol {
  return resolveFlag(env, envName, tomlValue, { cliValue }) ? 'ssh' : 'https';
}

export function loadGitHubConfig(
  overrides: GitHubOverrides,
  context: ConfigContext,
): MirrorSyncConfig {
  const { env } = context;
  const toml = loadFileConfig(overrides, context);
  const githubToml = getTomlTable(toml.github, 'github');
  const mirrorToml = getTomlTable(toml.mirror, 'mirror');

  const username = resolveStringValue(env, 'GH_USERNAME', githubToml?.username, {
    cliValue: overrides.username,
  });
  const org = overrides.userOnly
    ? undefined
    : resolveStringValue(env, 'GH_ORG', githubToml?.org, { cliValue: overrides.org });
  if (!username && !org) {
    throw new Error(
      'A GitHub username or organization is required: pass --username/--org or set GH_USERNAME/GH_ORG.',
    );
  }
  const repoType = parseRepoType(
    resolveStringValue(env, 'GH_REPO_TYPE', githubToml?.repo_type, {
      cliValue: overrides.repoType,
      defaultValue: 'all',
    }) ?? 'all',
  );
  const token = resolveSecret(env, 'GH_TOKEN', overrides.token);
  const identity = org ?? username ?? '';

  return {
    source: {
      provider: 'github',
      apiBaseUrl:
        resolveStringValue(env, 'GITHUB_API_BASE_URL', githubToml?.api_base_url, {
          defaultValue: DEFAULT_GITHUB_API_BASE_URL,
        }) ?? DEFAULT_GITHUB_API_BASE_URL,
      ...(username ? { username } : {}),
      ...(org ? { org } : {}),
      repoType,
      protocol: resolveProtocol(env, 'GH_USE_SSH', githubToml?.use_ssh, overrides.ssh),
    },
    credentials: token ? { secret: token } : {},
    identity,
    ...resolveMirrorSettings(overrides, context, mirrorToml, DEFAULT_GITHUB_FOLDER, identity),
  };
}

export function loadBitbucketConfig(
  overrides: BitbucketOverrides,
  context: ConfigContext,
): MirrorSyncConfig {
  const { env } = context;
  const toml = loadFileConfig(overrides, context);
  const bitbucketToml = getTomlTable(toml.bitbucket, 'bitbucket');
  const mirrorToml = getTomlTable(toml.mirror, 'mirror');

  const workspace = resolveStringValue(env, 'BB_WORKSPACE', bitbucketToml?.workspace, {
    cliValue: overrides.workspace,
  });
  if (!workspace) {
    throw new Error('A Bitbucket workspace is required: pass --workspace or set BB_WORKSPACE.');
  }
  const user = resolveStringValue(env, 'BB_USER', bitbucketToml?.user, {
    cliValue: overrides.user,
  });
  const token = resolveSecret(env, 'BB_TOKEN', overrides.token);
  const credentials = validateCredentials(
    { ...(user ? { principal: user } : {}), ...(token ? { secret: token } : {}) },
    { principal: 'BB_USER', secret: 'BB_TOKEN' },
  );

  return {
    source: {
      provider: 'bitbucket',
      apiBaseUrl:
        resolveStringValue(env, 'BITBUCKET_API_BASE_URL', bitbucketToml?.api_base_url, {
          defaultValue: DEFAULT_BITBUCKET_API_BASE_URL,
        }) ?? DEFAULT_BITBUCKET_API_BASE_URL,
      workspace,
      protocol: resolveProtocol(env, 'BB_USE_SSH', bitbucketToml?.use_ssh, overrides.ssh),
    },
    credentials,
    identity: workspace,
    ...resolveMirrorSettings(overrides, context, mirrorToml, DEFAULT_BITBUCKET_FOLDER, workspace),
  };
}
