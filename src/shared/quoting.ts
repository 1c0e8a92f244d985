import { split } from 'shlex';
import { ExecError, ExecErrorCode, describeCause } from './errors.js';

const NEEDS_QUOTES = /'|\s|^$/;

/**
 * Render an argument list as one command line. Double quotes inside an
 * argument are escaped with a backslash; arguments containing a single quote or
 * whitespace, and empty arguments, are wrapped in double quotes.
 */
export function toQuotedString(args: readonly string[]): string {
  return args
    .map((arg) => {
      const escaped = arg.replace(/"/g, '\\"');
      return NEEDS_QUOTES.test(escaped) ? `"${escaped}"` : escaped;
    })
    .join(' ');
}

/**
 * Split a command line into arguments using POSIX quoting rules.
 *
 * Only unquoted whitespace separates arguments. Operators, `#` and variable
 * references are ordinary characters here; nothing is expanded.
 */
export function splitQuoted(commandLine: string): string[] {
  try {
    return split(commandLine);
  } catch (err) {
    throw new ExecError(ExecErrorCode.INVALID_INVOCATION, `Cannot split command line: ${commandLine}`, {
      cause: describeCause(err),
    });
  }
}
