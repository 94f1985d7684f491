export type GitFailureKind = 'clone_error' | 'fetch_error' | 'remote_update_error';

export class GitOperationError extends Error {
  readonly kind: GitFailureKind;
  readonly exitCode: number | null;
  readonly stderr: string;

  constructor(
    kind: GitFailureKind,
    message: string,
    details: { exitCode?: number | null; stderr?: string } = {},
  ) {
    super(message);
    this.name = 'GitOperationError';
    this.kind = kind;
    this.exitCode = details.exitCode ?? null;
    this.stderr = details.stderr ?? '';
  }
}

export class ToolMissingError extends Error {
  readonly tool: string;

  constructor(tool: string) {
    super(`'${tool}' command not found. Is it installed and on your PATH?`);
    this.name = 'ToolMissingError';
    this.tool = tool;
  }
}

export function isCommandNotFound(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
