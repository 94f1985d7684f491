import { describe, expect, it } from 'vitest';
import {
  buildMirrorTarget,
  isValidRepositoryName,
  resolveMirrorRoot,
  sanitizePathSegment,
} from './targets.js';

describe('sync/targets', () => {
  it('sanitizes identities into a single path segment', () => {
    expect(sanitizePathSegment(' Acme Corp ')).toBe('Acme-Corp');
    expect(sanitizePathSegment('team/../x')).toBe('team-..-x');
    expect(resolveMirrorRoot('/srv/mirrors', 'acme')).toBe('/srv/mirrors/acme');
  });

  it('refuses identities that do not name a directory', () => {
    expect(() => resolveMirrorRoot('/srv/mirrors', '..')).toThrow(
      'Cannot derive a mirror directory from identity: ".."',
    );
    expect(() => resolveMirrorRoot('/srv/mirrors', '///')).toThrow();
  });

  it('accepts ordinary repository names only', () => {
    expect(isValidRepositoryName('api')).toBe(true);
    expect(isValidRepositoryName('my.repo-name_2')).toBe(true);
    expect(isValidRepositoryName('')).toBe(false);
    expect(isValidRepositoryName('..')).toBe(false);
    expect(isValidRepositoryName('a/b')).toBe(false);
    expect(isValidRepositoryName('a\\b')).toBe(false);
  });

  it('builds the local path and the credentialed URL', () => {
    expect(
      buildMirrorTarget('/srv/mirrors/acme', 'api', 'https://github.test/acme/api.git', {
        secret: 'test-token',
      }),
    ).toEqual({
      name: 'api',
      localPath: '/srv/mirrors/acme/api.git',
      desiredUrl: 'https://test-token@github.test/acme/api.git',
    });
  });
});
