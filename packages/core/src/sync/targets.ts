import { join } from 'node:path';
import { injectCredentials, type Credentials } from '../git/credentials.js';
import type { MirrorTarget } from '../types/mirror.js';

export const MIRROR_SUFFIX = '.git';

const pathSegmentSanitizePattern = /[^A-Za-z0-9._-]+/g;

export function sanitizePathSegment(value: string): string {
  return value
    .trim()
    .replace(pathSegmentSanitizePattern, '-')
    .replace(/^-+/, '')
    .replace(/-+$/, '');
}

export function resolveMirrorRoot(folder: string, identity: string): string {
  const segment = sanitizePathSegment(identity);
  if (!segment || segment === '.' || segment === '..') {
    throw new Error(`Cannot derive a mirror directory from identity: ${JSON.stringify(identity)}`);
  }
  return join(folder, segment);
}

/** Names become a single directory under the mirror root, so separators are refused. */
export function isValidRepositoryName(name: string): boolean {
  if (!name.trim()) return false;
  if (name === '.' || name === '..') return false;
  return !/[/\\\0]/.test(name);
}

export function buildMirrorTarget(
  mirrorRoot: string,
  name: string,
  cloneUrl: string,
  credentials: Credentials,
): MirrorTarget {
  return {
    name,
    localPath: join(mirrorRoot, `${name}${MIRROR_SUFFIX}`),
    desiredUrl: injectCredentials(cloneUrl, credentials),
  };
}
