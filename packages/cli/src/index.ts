#!/usr/bin/env node
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command } from 'commander';
import { registerBitbucketCommand } from './commands/bitbucket.js';
import { registerGitHubCommand } from './commands/github.js';

function resolveVersion(): string {
  try {
    const distDir = dirname(fileURLToPath(import.meta.url));
    const pkgPath = join(distDir, '..', 'package.json');
    const raw = readFileSync(pkgPath, 'utf8');
    const parsed = JSON.parse(raw) as { version?: string };
    return parsed.version ?? '0.0.0';
  } catch {
    return '0.0.0';
  }
}

const program = new Command();

program
  .name('mirrorsync')
  .description('Keep local bare mirrors of every repository an account owns')
  .version(resolveVersion());

registerGitHubCommand(program);
registerBitbucketCommand(program);

await program.parseAsync(process.argv);
