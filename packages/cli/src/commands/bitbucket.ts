import type { Command } from 'commander';
import { appendSyncOptions, createSyncAction } from './sync.js';

export function registerBitbucketCommand(program: Command) {
  appendSyncOptions(
    program
      .command('bitbucket')
      .description('Mirror the repositories of a Bitbucket workspace')
      .option('--workspace <name>', 'Bitbucket workspace (env: BB_WORKSPACE)')
      .option('--user <email>', 'Atlassian account email for API token auth (env: BB_USER)'),
  ).action(createSyncAction('bitbucket'));
}
