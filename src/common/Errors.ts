/**
 * Custom error types for the key-value server.
 *
 * Typed errors let each layer decide what reaches the client.
 * CommandError and ProtocolError become error replies on the issuing
 * connection; SnapshotError and ConfigError surface to the operator.
 */

export class StorageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'StorageError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class CommandError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export class UnknownCommandError extends CommandError {
  readonly command: string;

  constructor(command: string) {
    super('ERROR: unknown command');
    this.name = 'UnknownCommandError';
    this.command = command;
  }
}

export class ArityError extends CommandError {
  readonly command: string;
  readonly actual: number;

  constructor(command: string, actual: number) {
    super('ERROR: wrong number of arguments');
    this.name = 'ArityError';
    this.command = command;
    this.actual = actual;
  }
}

export class InvalidArgumentError extends CommandError {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentError';
  }
}

export class ProtocolError extends StorageError {
  constructor(message: string) {
    super(`ERROR: protocol error: ${message}`);
    this.name = 'ProtocolError';
  }
}

export class SnapshotError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'SnapshotError';
  }
}

export class SnapshotCorruptError extends SnapshotError {
  constructor(message: string) {
    super(`Corrupt snapshot: ${message}`);
    this.name = 'SnapshotCorruptError';
  }
}

export class ConfigError extends StorageError {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
