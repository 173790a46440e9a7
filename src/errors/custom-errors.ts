/**
 * Base error class for podkeep
 */
export class PodkeepError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PodkeepError';
  }
}

/**
 * Configuration error (application config or a subscription definition)
 */
export class ConfigError extends PodkeepError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A named subscription does not exist
 */
export class NotFoundError extends PodkeepError {
  constructor(public readonly subscriptionName: string) {
    super(`No subscription named "${subscriptionName}"`);
    this.name = 'NotFoundError';
  }
}

/**
 * A subscription with that name already exists
 */
export class AlreadyExistsError extends PodkeepError {
  constructor(public readonly subscriptionName: string) {
    super(`A subscription named "${subscriptionName}" already exists`);
    this.name = 'AlreadyExistsError';
  }
}

/**
 * The episode index cannot be read or written
 */
export class StoreError extends PodkeepError {
  constructor(
    message: string,
    public readonly path: string,
  ) {
    super(message);
    this.name = 'StoreError';
  }
}

/**
 * Feed unreachable or unparsable
 */
export class FetchError extends PodkeepError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'FetchError';
  }
}

/**
 * Media download failure for one enclosure
 */
export class DownloadError extends PodkeepError {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
  ) {
    super(message);
    this.name = 'DownloadError';
  }
}

/**
 * Local disk failure (disk full, permission denied, ...)
 */
export class FilesystemError extends PodkeepError {
  constructor(
    message: string,
    public readonly path: string,
    public readonly code?: string,
  ) {
    super(message);
    this.name = 'FilesystemError';
  }
}

/**
 * Filename template cannot be rendered
 */
export class InvalidTemplateError extends PodkeepError {
  constructor(
    message: string,
    public readonly template: string,
  ) {
    super(message);
    this.name = 'InvalidTemplateError';
  }
}

/**
 * Hook executable failed
 */
export class HookError extends PodkeepError {
  constructor(
    message: string,
    public readonly executable: string,
  ) {
    super(message);
    this.name = 'HookError';
  }
}

/**
 * The configured player cannot play an episode
 */
export class PlayerError extends PodkeepError {
  constructor(message: string) {
    super(message);
    this.name = 'PlayerError';
  }
}

/**
 * Daemon lifecycle error
 */
export class DaemonError extends PodkeepError {
  constructor(message: string) {
    super(message);
    this.name = 'DaemonError';
  }
}

/**
 * Node.js system error with an errno code
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Wrap a low-level fs error so callers can report it per episode
 */
export function toFilesystemError(error: unknown, path: string): FilesystemError {
  if (error instanceof FilesystemError) {
    return error;
  }
  const code = isErrnoException(error) ? error.code : undefined;
  return new FilesystemError(`${errorMessage(error)} (${path})`, path, code);
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Error class name and message, as carried by reports
 */
export function toErrorInfo(error: unknown): { kind: string; message: string } {
  if (error instanceof Error) {
    return { kind: error.name, message: error.message };
  }
  return { kind: 'Error', message: String(error) };
}
