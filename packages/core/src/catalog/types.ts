/** Repository name -> clone URL, in the order the provider listed them. */
export type RepositoryCatalog = Map<string, string>;

export type CatalogProviderId = 'github' | 'bitbucket';

export type CloneProtocol = 'https' | 'ssh';

export type CatalogProvider = {
  id: CatalogProviderId;
  displayName: string;
  /** Org, user or workspace the catalog belongs to. */
  identity: string;
  listRepositories(): Promise<RepositoryCatalog>;
};
