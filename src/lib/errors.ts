import { printError } from "./output.ts";

/**
 * Structured CLI error with guidance message.
 * Every error includes what went wrong + how to fix it.
 */
export class CliError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliError";
  }
}

/**
 * Run a CLI action, catching CliError and database driver errors
 * and printing them on the error channel.
 */
export async function handleAction(fn: () => Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err) {
    if (err instanceof CliError) {
      printError(err.message);
      return;
    }

    // mysql2 rejects with an Error carrying the server or socket error code
    if (isDatabaseError(err)) {
      printError(formatDatabaseError(err));
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    printError(message);
  }
}

interface DatabaseError {
  code: string;
  message: string;
}

export function isDatabaseError(err: unknown): err is DatabaseError {
  return (
    err instanceof Error &&
    "code" in err &&
    typeof err.code === "string"
  );
}

function formatDatabaseError(err: DatabaseError): string {
  switch (err.code) {
    case "ER_ACCESS_DENIED_ERROR":
      return "Access denied for database user. Check 'db.user' and 'db.password' with 'wp-comment config set'.";
    case "ECONNREFUSED":
      return "Database server refused the connection. Check 'db.host' and 'db.port' (or WP_DB_HOST / WP_DB_PORT).";
    case "ENOTFOUND":
      return "Database host not found. Check 'db.host' (or WP_DB_HOST).";
    case "ER_BAD_DB_ERROR":
      return "Unknown database. Check 'db.name' (or WP_DB_NAME).";
    case "ER_NO_SUCH_TABLE":
      return "Comment tables not found. Check 'db.tablePrefix' (or WP_TABLE_PREFIX).";
    default:
      return `Database error (${err.code}): ${err.message}`;
  }
}
