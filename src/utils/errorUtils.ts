/**
 * Readable message for anything caught in a `catch` block.
 * Node's system errors keep their code, e.g. "ENOENT: no such file or directory, open 'x.json'".
 */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  try {
    return JSON.stringify(error) ?? String(error);
  } catch {
    return String(error);
  }
}
