export type Credentials = {
  principal?: string;
  secret?: string;
};

function parseHttpsUrl(url: string): URL | null {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return null;
  }
  return parsed.protocol === 'https:' ? parsed : null;
}

export function isHttpsUrl(url: string): boolean {
  return parseHttpsUrl(url) !== null;
}

/**
 * Credential-free form of an HTTPS clone URL. Anything that is not an HTTPS
 * URL comes back untouched.
 */
export function stripCredentials(url: string): string {
  const parsed = parseHttpsUrl(url);
  if (!parsed) return url;
  parsed.username = '';
  parsed.password = '';
  return parsed.toString();
}

/**
 * Embeds credentials in the authority of an HTTPS clone URL:
 * `principal:secret@` when both are set, `secret@` for a bare token.
 *
 * The URL is rebuilt from its credential-free form, so injecting twice yields
 * the same value as injecting once. SSH and scp-like URLs are returned as-is,
 * as are HTTPS URLs when no secret is available.
 */
export function injectCredentials(url: string, credentials: Credentials): string {
  const secret = credentials.secret?.trim();
  if (!secret) return url;
  const parsed = parseHttpsUrl(url);
  if (!parsed) return url;

  parsed.username = '';
  parsed.password = '';
  const principal = credentials.principal?.trim();
  if (principal) {
    parsed.username = principal;
    parsed.password = secret;
  } else {
    parsed.username = secret;
  }
  return parsed.toString();
}

/**
 * Printable form of a clone URL: scheme, host and path only.
 */
export function redactUrl(url: string): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    // scp-like ssh syntax (git@host:org/repo.git) carries no secret beyond the user
    const scpLike = /^(?:[^@/\s]+@)?([^:/\s]+):(.+)$/.exec(url);
    if (scpLike) return `${scpLike[1] ?? ''}:${scpLike[2] ?? ''}`;
    return '[unparseable url]';
  }
  return `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
}
