import { ExitCode } from '../shared/ipc.js';

export type FlasherErrorKind =
  | 'enumeration'
  | 'unmount'
  | 'source'
  | 'flash'
  | 'verification'
  | 'privilege'
  | 'config'
  | 'cancelled';

/** Base de todos los fallos esperables de una escritura. */
export abstract class FlasherError extends Error {
  abstract readonly kind: FlasherErrorKind;
  abstract readonly exitCode: ExitCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class EnumerationError extends FlasherError {
  readonly kind = 'enumeration';
  readonly exitCode = ExitCode.Failure;
}

export class UnmountError extends FlasherError {
  readonly kind = 'unmount';
  readonly exitCode = ExitCode.UnmountFailed;

  constructor(
    public readonly attempted: readonly string[],
    public readonly unmounted: readonly string[],
    public readonly failed: readonly string[],
  ) {
    super(`Failed to unmount: ${failed.join(', ')}`);
  }
}

export class SourceError extends FlasherError {
  readonly kind = 'source';
  readonly exitCode = ExitCode.WriteFailed;
}

export class FlashError extends FlasherError {
  readonly kind = 'flash';
  readonly exitCode = ExitCode.WriteFailed;

  constructor(
    message: string,
    public readonly devicePath: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class VerificationError extends FlasherError {
  readonly kind = 'verification';
  readonly exitCode = ExitCode.VerificationFailed;

  /** `offset` es null si falló antes de comparar ningún byte. */
  constructor(
    message: string,
    public readonly offset: number | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }

  static mismatch(offset: number): VerificationError {
    return new VerificationError(`Verification failed at offset ${offset}`, offset);
  }
}

export class PrivilegeError extends FlasherError {
  readonly kind = 'privilege';
  readonly exitCode = ExitCode.PrivilegeUnavailable;

  constructor(public readonly mechanism: string) {
    super(
      `Root privileges are required. Install polkit (${mechanism}) or run the command with sudo.`,
    );
  }
}

export class ConfigError extends FlasherError {
  readonly kind = 'config';
  readonly exitCode = ExitCode.MissingArguments;
}

export class CancelledError extends FlasherError {
  readonly kind = 'cancelled';
  readonly exitCode = ExitCode.Cancelled;

  constructor() {
    super('Operation cancelled');
  }
}

export function isFlasherError(e: unknown): e is FlasherError {
  return e instanceof FlasherError;
}

export function describeError(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === 'string') return e;
  try {
    return JSON.stringify(e);
  } catch {
    return String(e);
  }
}

export function exitCodeFor(e: unknown): ExitCode {
  return isFlasherError(e) ? e.exitCode : ExitCode.Unexpected;
}

/** Código errno de un error de sistema de Node, si lo hay. */
export function errnoOf(e: unknown): string | undefined {
  if (typeof e === 'object' && e !== null && 'code' in e && typeof e.code === 'string') {
    return e.code;
  }
  return undefined;
}
