export enum TransportErrorCode {
  CONNECT_FAILED = 'CONNECT_FAILED',
  CONNECT_TIMEOUT = 'CONNECT_TIMEOUT',
  READ_TIMEOUT = 'READ_TIMEOUT',
  WRITE_TIMEOUT = 'WRITE_TIMEOUT',
  READ_FAILED = 'READ_FAILED',
  WRITE_FAILED = 'WRITE_FAILED',
  EOF = 'EOF',
  CLOSED = 'CLOSED',
}

export class TransportError extends Error {
  constructor(
    public readonly code: TransportErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TransportError';
  }

  get isTimeout(): boolean {
    return (
      this.code === TransportErrorCode.CONNECT_TIMEOUT ||
      this.code === TransportErrorCode.READ_TIMEOUT ||
      this.code === TransportErrorCode.WRITE_TIMEOUT
    );
  }
}

export function isTransportError(err: unknown, code?: TransportErrorCode): err is TransportError {
  return err instanceof TransportError && (code === undefined || err.code === code);
}
