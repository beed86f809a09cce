type ErrorOptions = { cause?: unknown };

export class ConnectionError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly address: string,
    options?: ErrorOptions,
  ) {
    super(message);
    this.name = "ConnectionError";
    this.cause = options?.cause;
  }
}

export class RemoteFilesystemError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message);
    this.name = "RemoteFilesystemError";
    this.cause = options?.cause;
  }
}

export class TransferError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly localPath: string,
    public readonly remotePath: string,
    options?: ErrorOptions,
  ) {
    super(message);
    this.name = "TransferError";
    this.cause = options?.cause;
  }
}

export class ProcessSpawnError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(message);
    this.name = "ProcessSpawnError";
    this.cause = options?.cause;
  }
}

/** Raised from the output sequence of a running program, never at end of stream. */
export class StreamReadError extends Error {
  override readonly cause?: unknown;
  constructor(
    message: string,
    public readonly command: string,
    options?: ErrorOptions,
  ) {
    super(message);
    this.name = "StreamReadError";
    this.cause = options?.cause;
  }
}

export class TimeoutError extends Error {
  constructor(
    message: string,
    public readonly timeoutMs: number,
  ) {
    super(message);
    this.name = "TimeoutError";
  }
}

export class UnsupportedAddressError extends Error {
  constructor(
    message: string,
    public readonly address: string,
  ) {
    super(message);
    this.name = "UnsupportedAddressError";
  }
}

export class DeviceNotFoundError extends Error {
  constructor(
    message: string,
    public readonly query: string,
  ) {
    super(message);
    this.name = "DeviceNotFoundError";
  }
}

export class CompileError extends Error {
  constructor(
    message: string,
    public readonly code: number | null,
    public readonly stderr = "",
  ) {
    super(message);
    this.name = "CompileError";
  }
}

export class SessionStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SessionStateError";
  }
}

export function describeError(err: unknown): string {
  if (err instanceof Error) {
    const cause =
      err.cause instanceof Error && err.cause.message !== err.message
        ? ` (${err.cause.message})`
        : "";
    return `${err.message}${cause}`;
  }
  return String(err);
}
