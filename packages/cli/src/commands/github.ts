import type { Command } from 'commander';
import { appendSyncOptions, createSyncAction } from './sync.js';

export function registerGitHubCommand(program: Command) {
  appendSyncOptions(
    program
      .command('github')
      .description('Mirror the repositories of a GitHub user or organization')
      .option('--username <name>', 'GitHub username (env: GH_USERNAME)')
      .option('--org <name>', 'GitHub organization (env: GH_ORG)')
      .option('--user-only', 'Sync the user even when GH_ORG is set')
      .option('--repo-type <type>', 'Repositories to list: public, private or all (default: all)'),
  ).action(createSyncAction('github'));
}
