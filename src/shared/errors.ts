export enum ExecErrorCode {
  INVALID_INVOCATION = 'INVALID_INVOCATION',
  INVALID_ARGUMENT = 'INVALID_ARGUMENT',
  COMMAND_NOT_FOUND = 'COMMAND_NOT_FOUND',
  SPAWN_FAILED = 'SPAWN_FAILED',
  COMMAND_FAILED = 'COMMAND_FAILED',
  CONFIG_INVALID = 'CONFIG_INVALID',
  REGISTRY_INVALID = 'REGISTRY_INVALID',
}

export class ExecError extends Error {
  readonly code: ExecErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(code: ExecErrorCode, message: string, context?: Record<string, unknown>) {
    super(message);
    this.name = 'ExecError';
    this.code = code;
    this.context = context;
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
