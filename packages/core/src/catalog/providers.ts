import type { MirrorSyncConfig } from '../config/types.js';
import { createBitbucketCatalogProvider } from './bitbucket.js';
import { createGitHubCatalogProvider } from './github.js';
import type { CatalogProvider } from './types.js';

export function createCatalogProvider(config: MirrorSyncConfig): CatalogProvider {
  const { source, credentials } = config;
  switch (source.provider) {
    case 'github':
      return createGitHubCatalogProvider({
        apiBaseUrl: source.apiBaseUrl,
        ...(source.username ? { username: source.username } : {}),
        ...(source.org ? { org: source.org } : {}),
        repoType: source.repoType,
        protocol: source.protocol,
        ...(credentials.secret ? { token: credentials.secret } : {}),
      });
    case 'bitbucket':
      return createBitbucketCatalogProvider({
        apiBaseUrl: source.apiBaseUrl,
        workspace: source.workspace,
        protocol: source.protocol,
        credentials,
      });
  }
}
