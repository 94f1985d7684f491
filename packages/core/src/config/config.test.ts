import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadBitbucketConfig, loadGitHubConfig, validateCredentials } from './config.js';

describe('config/config', () => {
  let cwd: string;

  beforeEach(() => {
    cwd = mkdtempSync(join(tmpdir(), 'mirrorsync-config-'));
  });

  afterEach(() => {
    rmSync(cwd, { recursive: true, force: true });
  });

  function writeToml(contents: string, name = 'mirrorsync.toml') {
    writeFileSync(join(cwd, name), contents);
  }

  describe('loadGitHubConfig', () => {
    it('reads the environment and applies defaults', () => {
      const env = { GH_USERNAME: 'octo', GH_TOKEN: 'test-token', HOME: '/home/tester' };

      const config = loadGitHubConfig({}, { env, cwd });

      expect(config).toEqual({
        source: {
          provider: 'github',
          apiBaseUrl: 'https://api.github.com',
          username: 'octo',
          repoType: 'all',
          protocol: 'https',
        },
        credentials: { secret: 'test-token' },
        identity: 'octo',
        folder: join(cwd, 'github_sync'),
        mirrorRoot: join(cwd, 'github_sync', 'octo'),
        quiet: false,
        dryRun: false,
        gitEnv: env,
      });
    });

    it('lets command line values win over the environment and the file', () => {
      writeToml('[github]\norg = "acme-file"\nrepo_type = "private"\n');
      const env = { GH_ORG: 'acme-env', GH_USE_SSH: 'true' };

      const config = loadGitHubConfig(
        { org: 'acme-cli', ssh: false, token: 'cli-token', folder: 'out' },
        { env: { ...env, GH_TOKEN: 'env-token' }, cwd },
      );

      expect(config.source).toMatchObject({ org: 'acme-cli', repoType: 'private', protocol: 'https' });
      expect(config.credentials).toEqual({ secret: 'cli-token' });
      expect(config.mirrorRoot).toBe(join(cwd, 'out', 'acme-cli'));
    });

    it('ignores the organization when limited to the user', () => {
      const config = loadGitHubConfig(
        { userOnly: true },
        { env: { GH_USERNAME: 'octo', GH_ORG: 'acme' }, cwd },
      );

      expect(config.identity).toBe('octo');
      expect(config.source).not.toHaveProperty('org');
    });

    it('requires a username or an organization', () => {
      expect(() => loadGitHubConfig({}, { env: {}, cwd })).toThrow(
        'A GitHub username or organization is required: pass --username/--org or set GH_USERNAME/GH_ORG.',
      );
    });

    it('rejects unknown repository types', () => {
      expect(() =>
        loadGitHubConfig({ repoType: 'forks' }, { env: { GH_ORG: 'acme' }, cwd }),
      ).toThrow('Invalid GitHub repo type: forks. Expected one of: public, private, all.');
    });

    it('rejects an unparseable boolean', () => {
      expect(() =>
        loadGitHubConfig({}, { env: { GH_ORG: 'acme', GH_USE_SSH: 'maybe' }, cwd }),
      ).toThrow('Invalid GH_USE_SSH value: maybe. Use true/false.');
    });
  });

  describe('loadBitbucketConfig', () => {
    it('builds principal and secret credentials', () => {
      const config = loadBitbucketConfig(
        {},
        {
          env: { BB_WORKSPACE: 'team', BB_USER: 'dev@example.com', BB_TOKEN: 'test-secret' },
          cwd,
        },
      );

      expect(config.credentials).toEqual({ principal: 'dev@example.com', secret: 'test-secret' });
      expect(config.source).toEqual({
        provider: 'bitbucket',
        apiBaseUrl: 'https://api.bitbucket.org/2.0',
        workspace: 'team',
        protocol: 'https',
      });
      expect(config.mirrorRoot).toBe(join(cwd, 'bitbucket_sync', 'team'));
    });

    it('refuses a user without a token', () => {
      expect(() =>
        loadBitbucketConfig({}, { env: { BB_WORKSPACE: 'team', BB_USER: 'dev' }, cwd }),
      ).toThrow(
        'BB_USER is set but BB_TOKEN is missing. Provide both, or neither for anonymous access.',
      );
    });

    it('requires a workspace', () => {
      expect(() => loadBitbucketConfig({}, { env: {}, cwd })).toThrow(
        'A Bitbucket workspace is required: pass --workspace or set BB_WORKSPACE.',
      );
    });

    it('reads mirror settings from the TOML file with home expansion', () => {
      writeToml(
        [
          '[bitbucket]',
          'workspace = "team"',
          'use_ssh = true',
          '',
          '[mirror]',
          'folder = "~/backups"',
          'quiet = true',
          'log_file = "logs/git.log"',
        ].join('\n'),
      );

      const config = loadBitbucketConfig({}, { env: { HOME: '/home/tester' }, cwd });

      expect(config).toMatchObject({
        folder: '/home/tester/backups',
        mirrorRoot: '/home/tester/backups/team',
        logFilePath: join(cwd, 'logs', 'git.log'),
        quiet: true,
        credentials: {},
      });
      expect(config.source.protocol).toBe('ssh');
    });

    it('loads an explicitly named config file', () => {
      writeToml('[bitbucket]\nworkspace = "from-file"\n', 'custom.toml');

      const config = loadBitbucketConfig(
        { configPath: 'custom.toml' },
        { env: { MIRRORSYNC_CONFIG_PATH: 'ignored.toml' }, cwd },
      );

      expect(config.identity).toBe('from-file');
    });

    it('fails when an explicitly named config file is missing', () => {
      expect(() =>
        loadBitbucketConfig({}, { env: { MIRRORSYNC_CONFIG_PATH: 'missing.toml' }, cwd }),
      ).toThrow(/ENOENT/);
    });
  });

  it('accepts anonymous and complete credentials', () => {
    const names = { principal: 'BB_USER', secret: 'BB_TOKEN' };

    expect(validateCredentials({}, names)).toEqual({});
    expect(validateCredentials({ principal: 'dev', secret: 's' }, names)).toEqual({
      principal: 'dev',
      secret: 's',
    });
  });
});
