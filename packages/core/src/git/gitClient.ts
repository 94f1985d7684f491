import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { runCommand, type RunOptions, type RunResult } from '../runner/commandRunner.js';
import { stringifyError } from '../utils/errors.js';
import {
  GitOperationError,
  ToolMissingError,
  isCommandNotFound,
  type GitFailureKind,
} from './errors.js';

export type GitMirrorClient = {
  cloneMirror(url: string, localPath: string): Promise<void>;
  readRemoteUrl(localPath: string): Promise<string>;
  setRemoteUrl(localPath: string, url: string): Promise<void>;
  fetchAll(localPath: string): Promise<void>;
};

export type GitMirrorClientOptions = {
  env: NodeJS.ProcessEnv;
  gitBinary?: string;
  logFilePath?: string;
  echo?: boolean;
  redact?: Array<string | RegExp>;
};

export function summarizeStderr(stderr: string): string {
  const lines = stderr
    .split(/[\r\n]+/)
    .map((line) => line.trim())
    .filter(Boolean);
  const fatal = lines.find((line) => /^(fatal|error):/i.test(line));
  return fatal ?? lines.at(-1) ?? '';
}

export function createGitMirrorClient(options: GitMirrorClientOptions): GitMirrorClient {
  const git = options.gitBinary ?? 'git';
  const common: RunOptions = {
    env: { ...options.env, GIT_TERMINAL_PROMPT: '0' },
    allowFailure: true,
    ...(options.logFilePath ? { logFilePath: options.logFilePath } : {}),
    ...(options.redact ? { redact: options.redact } : {}),
  };

  /**
   * `gitDir` pins the command to that repository. Without it git searches upward
   * from the working directory and may act on an enclosing checkout.
   */
  async function runGit(
    kind: GitFailureKind,
    args: string[],
    extra: Pick<RunOptions, 'echo' | 'rawStdout'> & { gitDir?: string } = {},
  ): Promise<RunResult> {
    const { gitDir, ...runOptions } = extra;
    const fullArgs = gitDir ? [`--git-dir=${gitDir}`, ...args] : args;
    let result: RunResult;
    try {
      result = await runCommand(git, fullArgs, { ...common, ...runOptions });
    } catch (err) {
      if (isCommandNotFound(err)) {
        throw new ToolMissingError(git);
      }
      throw err;
    }
    if ((result.exitCode ?? 1) !== 0) {
      const reason = summarizeStderr(result.stderr);
      throw new GitOperationError(
        kind,
        `git ${args[0] ?? ''} failed (${result.exitCode ?? 'unknown'})${reason ? `: ${reason}` : ''}`,
        { exitCode: result.exitCode, stderr: result.stderr },
      );
    }
    return result;
  }

  return {
    async cloneMirror(url, localPath) {
      try {
        await mkdir(dirname(localPath), { recursive: true });
      } catch (err) {
        throw new GitOperationError(
          'clone_error',
          `Could not create ${dirname(localPath)}: ${stringifyError(err)}`,
        );
      }
      await runGit('clone_error', ['clone', '--mirror', '--progress', url, localPath], {
        echo: options.echo ?? false,
      });
    },

    async readRemoteUrl(localPath) {
      const result = await runGit('remote_update_error', ['config', '--get', 'remote.origin.url'], {
        gitDir: localPath,
        rawStdout: true,
      });
      return result.stdout.trim();
    },

    async setRemoteUrl(localPath, url) {
      await runGit('remote_update_error', ['remote', 'set-url', 'origin', url], {
        gitDir: localPath,
      });
    },

    async fetchAll(localPath) {
      await runGit('fetch_error', ['fetch', '--all', '--prune', '--progress'], {
        gitDir: localPath,
        echo: options.echo ?? false,
      });
    },
  };
}
