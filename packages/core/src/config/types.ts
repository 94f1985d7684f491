import type { GitHubRepoType } from '../catalog/github.js';
import type { CloneProtocol } from '../catalog/types.js';
import type { Credentials } from '../git/credentials.js';

export type GitHubSourceConfig = {
  provider: 'github';
  apiBaseUrl: string;
  username?: string;
  org?: string;
  repoType: GitHubRepoType;
  protocol: CloneProtocol;
};

export type BitbucketSourceConfig = {
  provider: 'bitbucket';
  apiBaseUrl: string;
  workspace: string;
  protocol: CloneProtocol;
};

export type SourceConfig = GitHubSourceConfig | BitbucketSourceConfig;

export type MirrorSyncConfig = {
  source: SourceConfig;
  credentials: Credentials;
  /** Org, user or workspace the mirrors belong to. */
  identity: string;
  folder: string;
  mirrorRoot: string;
  logFilePath?: string;
  quiet: boolean;
  dryRun: boolean;
  /** Environment handed to git child processes. */
  gitEnv: NodeJS.ProcessEnv;
};

export type CommonOverrides = {
  configPath?: string;
  folder?: string;
  ssh?: boolean;
  token?: string;
  logFile?: string;
  quiet?: boolean;
  dryRun?: boolean;
};

export type GitHubOverrides = CommonOverrides & {
  username?: string;
  org?: string;
  userOnly?: boolean;
  repoType?: string;
};

export type BitbucketOverrides = CommonOverrides & {
  workspace?: string;
  user?: string;
};

export const DEFAULT_GITHUB_API_BASE_URL = 'https://api.github.com';
export const DEFAULT_BITBUCKET_API_BASE_URL = 'https://api.bitbucket.org/2.0';
export const DEFAULT_GITHUB_FOLDER = 'github_sync';
export const DEFAULT_BITBUCKET_FOLDER = 'bitbucket_sync';
