import type { LaunchDescriptor } from '../process/types.js';

export enum LauncherErrorCode {
  SPAWN_FAILED = 'SPAWN_FAILED',
  INVALID_CONFIG = 'INVALID_CONFIG',
}

export class LauncherError extends Error {
  readonly code: LauncherErrorCode;
  readonly context?: Record<string, unknown>;

  constructor(
    code: LauncherErrorCode,
    message: string,
    context?: Record<string, unknown>,
    options?: ErrorOptions
  ) {
    super(message, options);
    this.name = 'LauncherError';
    this.code = code;
    this.context = context;
  }

  /**
   * The OS refused to start a service. `command` and `cwd` are what was
   * actually handed to the OS, which differ from the descriptor when the
   * command runs inside a shell. The original error is kept as `cause`.
   */
  static spawnFailed(
    service: Pick<LaunchDescriptor, 'name' | 'label'>,
    command: string,
    cwd: string,
    cause: unknown
  ): LauncherError {
    return new LauncherError(
      LauncherErrorCode.SPAWN_FAILED,
      `Failed to start ${service.label}`,
      { service: service.name, command, cwd, cause: describeCause(cause) },
      { cause }
    );
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
