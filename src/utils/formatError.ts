const MAX_CAUSE_DEPTH = 8;

/** Extract a human-readable message from anything thrown. */
export function formatError(e: unknown): string {
  if (typeof e === "string") return e;
  if (e instanceof Error) return e.message;
  if (e === null || e === undefined) return "Unknown error";
  return String(e);
}

/**
 * The message of `e` followed by one indented "caused by" line per link of
 * its `cause` chain, outermost first.
 */
export function describeError(e: unknown): [string, ...string[]] {
  const lines: [string, ...string[]] = [formatError(e)];
  let current = e;
  while (current instanceof Error && current.cause !== undefined && lines.length <= MAX_CAUSE_DEPTH) {
    current = current.cause;
    lines.push(`  caused by: ${formatError(current)}`);
  }
  return lines;
}
