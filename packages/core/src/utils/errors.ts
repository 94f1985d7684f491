export function stringifyError(err: unknown): string {
  if (typeof err === 'object' && err !== null) {
    if ('stderr' in err && typeof err.stderr === 'string' && err.stderr.trim()) {
      return err.stderr.trim();
    }
    if ('message' in err && typeof err.message === 'string' && err.message.trim()) {
      return err.message.trim();
    }
  }
  return String(err);
}
