import { logger } from '../logger.js';
import { fetchCatalogJson, isRecord } from './http.js';
import { collectPages } from './pagination.js';
import type { CatalogProvider, CloneProtocol } from './types.js';
import { CatalogRequestError } from './errors.js';

export type GitHubRepoType = 'public' | 'private' | 'all';

export type GitHubCatalogConfig = {
  apiBaseUrl: string;
  username?: string;
  org?: string;
  repoType: GitHubRepoType;
  protocol: CloneProtocol;
  token?: string;
};

const perPage = 100;

export function resolveGitHubListPath(config: GitHubCatalogConfig): string {
  if (config.org) return `/orgs/${encodeURIComponent(config.org)}/repos`;
  // The authenticated endpoint also returns the token owner's private repositories.
  if (config.token) return '/user/repos';
  if (!config.username) {
    throw new Error('A GitHub username or organization is required.');
  }
  return `/users/${encodeURIComponent(config.username)}/repos`;
}

function buildHeaders(config: GitHubCatalogConfig): Record<string, string> {
  return {
    Accept: 'application/vnd.github+json',
    'X-GitHub-Api-Version': '2022-11-28',
    'User-Agent': 'mirrorsync',
    ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
  };
}

export function createGitHubCatalogProvider(config: GitHubCatalogConfig): CatalogProvider {
  const identity = config.org ?? config.username ?? '';
  const urlField = config.protocol === 'ssh' ? 'ssh_url' : 'clone_url';

  return {
    id: 'github',
    displayName: 'GitHub',
    identity,
    async listRepositories() {
      const listUrl = `${config.apiBaseUrl.replace(/\/$/, '')}${resolveGitHubListPath(config)}`;
      logger.info(
        { owner: identity, repoType: config.repoType, kind: config.org ? 'organization' : 'user' },
        'Listing GitHub repositories',
      );

      return collectPages<unknown, number>({
        first: 1,
        async fetchPage(page) {
          const url = `${listUrl}?type=${config.repoType}&per_page=${perPage}&page=${page}`;
          const data = await fetchCatalogJson({
            url,
            headers: buildHeaders(config),
            label: 'GitHub',
            authGuidance: ['Check GH_TOKEN (a personal access token with repository read access).'],
          });
          if (!Array.isArray(data)) {
            throw new CatalogRequestError(`GitHub returned an unexpected payload for page ${page}.`);
          }
          return { items: data, next: page + 1 };
        },
        toEntry(item) {
          if (!isRecord(item) || typeof item.name !== 'string' || !item.name) {
            logger.warn('Skipping a GitHub repository entry without a name');
            return null;
          }
          const cloneUrl = item[urlField];
          if (typeof cloneUrl !== 'string' || !cloneUrl) {
            logger.warn(
              { repo: item.name, protocol: config.protocol },
              `No ${config.protocol} clone URL found; repository excluded`,
            );
            return null;
          }
          return [item.name, cloneUrl] as const;
        },
      });
    },
  };
}
