import { JdexError } from "@jdex/core/errors";

/** Bad command line: unknown command, misplaced flag or missing argument. */
export class UsageError extends JdexError {
  constructor(message: string, details?: Record<string, unknown>) {
    super("USAGE_ERROR", message, details);
  }
}
