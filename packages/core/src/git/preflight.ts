import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import { stringifyError } from '../utils/errors.js';
import { ToolMissingError, isCommandNotFound } from './errors.js';

export type ExecFileLike = (
  file: string,
  args: string[],
) => Promise<{ stdout: string; stderr: string }>;

export const execFileAsync: ExecFileLike = promisify(execFile);

/** Resolves to the installed git version string, e.g. "git version 2.43.0". */
export async function assertGitAvailable(runExec: ExecFileLike = execFileAsync): Promise<string> {
  try {
    const { stdout } = await runExec('git', ['--version']);
    return stdout.trim();
  } catch (err) {
    if (isCommandNotFound(err)) {
      throw new ToolMissingError('git');
    }
    const guidance = [
      'Git preflight failed: `git --version` did not succeed.',
      'Mirroring needs a working git installation on PATH.',
      `Git error: ${stringifyError(err)}`,
    ].join('\n');
    throw new Error(guidance);
  }
}
