import type { Credentials } from '../git/credentials.js';
import { logger } from '../logger.js';
import { CatalogRequestError } from './errors.js';
import { fetchCatalogJson, isRecord } from './http.js';
import { collectPages } from './pagination.js';
import type { CatalogProvider, CloneProtocol } from './types.js';

export type BitbucketCatalogConfig = {
  apiBaseUrl: string;
  workspace: string;
  protocol: CloneProtocol;
  credentials: Credentials;
};

const pageLength = 100;

function buildHeaders(credentials: Credentials): Record<string, string> {
  const headers: Record<string, string> = { Accept: 'application/json' };
  const { principal, secret } = credentials;
  if (principal && secret) {
    headers.Authorization = `Basic ${Buffer.from(`${principal}:${secret}`).toString('base64')}`;
  } else if (secret) {
    headers.Authorization = `Bearer ${secret}`;
  }
  return headers;
}

export function findCloneLink(links: unknown, protocol: CloneProtocol): string | null {
  if (!isRecord(links) || !Array.isArray(links.clone)) return null;
  for (const link of links.clone) {
    if (isRecord(link) && link.name === protocol && typeof link.href === 'string' && link.href) {
      return link.href;
    }
  }
  return null;
}

export function createBitbucketCatalogProvider(config: BitbucketCatalogConfig): CatalogProvider {
  return {
    id: 'bitbucket',
    displayName: 'Bitbucket',
    identity: config.workspace,
    async listRepositories() {
      const base = config.apiBaseUrl.replace(/\/$/, '');
      const first = `${base}/repositories/${encodeURIComponent(config.workspace)}?pagelen=${pageLength}`;
      logger.info({ workspace: config.workspace }, 'Listing Bitbucket repositories');

      return collectPages<unknown, string>({
        first,
        async fetchPage(url) {
          const data = await fetchCatalogJson({
            url,
            headers: buildHeaders(config.credentials),
            label: 'Bitbucket',
            authGuidance: [
              'Verify BB_USER (Atlassian account email) and BB_TOKEN (Atlassian API token).',
            ],
          });
          if (!isRecord(data)) {
            throw new CatalogRequestError('Bitbucket returned an unexpected payload.');
          }
          const values = data.values ?? [];
          if (!Array.isArray(values)) {
            throw new CatalogRequestError('Bitbucket returned a page without a values list.');
          }
          const next = typeof data.next === 'string' && data.next ? data.next : null;
          return { items: values, next };
        },
        toEntry(item) {
          if (!isRecord(item) || typeof item.name !== 'string' || !item.name) {
            logger.warn('Skipping a Bitbucket repository entry without a name');
            return null;
          }
          const cloneUrl = findCloneLink(item.links, config.protocol);
          if (!cloneUrl) {
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
