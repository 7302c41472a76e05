/**
 * Print a failure the way the CLI reports it: `Error: <message>`, plus the
 * stack trace when DEBUG is set
 */
export function reportError(error: unknown): void {
  if (error instanceof Error) {
    console.error('Error:', error.message);
    if (process.env.DEBUG) {
      console.error(error.stack);
    }
  } else {
    console.error('Error:', String(error));
  }
}
