/**
 * Raised for problems with how the tool was invoked (missing folders,
 * bad option values, unusable report path). These are the only fatal errors;
 * everything that goes wrong below the root/file level is recorded and skipped.
 */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
