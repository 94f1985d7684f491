import type { Command } from 'commander';
import { runSyncCommand, type SyncCommandKind, type SyncCommandOptions } from '../lib/runtime.js';

export function appendSyncOptions(command: Command): Command {
  return command
    .option('--token <token>', 'Access token (overrides the provider token env var)')
    .option('--ssh', 'Clone over SSH instead of HTTPS')
    .option('--no-ssh', 'Clone over HTTPS even when SSH is enabled in env or config')
    .option('--folder <path>', 'Base folder for mirrors; a subfolder is created per owner')
    .option('--config <path>', 'Path to mirrorsync.toml')
    .option('--env <path>', 'Path to .env file (default: ./.env)')
    .option('--log-file <path>', 'Append git command output to this file')
    .option('--quiet', 'Do not echo git progress output')
    .option('--dry-run', 'List what would be mirrored without running git');
}

type CommanderSyncOptions = Omit<SyncCommandOptions, 'configPath'> & { config?: string };

export function toSyncCommandOptions(options: CommanderSyncOptions): SyncCommandOptions {
  const { config, ...rest } = options;
  return { ...rest, ...(config ? { configPath: config } : {}) };
}

export function createSyncAction(kind: SyncCommandKind) {
  return async (options: CommanderSyncOptions): Promise<void> => {
    process.exitCode = await runSyncCommand(kind, toSyncCommandOptions(options));
  };
}
