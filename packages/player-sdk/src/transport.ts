import net from 'node:net';
import { TransportError, TransportErrorCode } from './errors.js';

/**
 * Line-oriented duplex channel. Every call arms its own deadline relative to
 * the moment it starts.
 */
export interface Transport {
  sendLine(line: string, timeoutMs: number): Promise<void>;
  readLine(timeoutMs: number): Promise<string>;
  close(): void;
}

export interface TransportOpenOptions {
  connectTimeoutMs: number;
}

export type TransportFactory = (address: string, options: TransportOpenOptions) => Promise<Transport>;

export interface HostPort {
  host: string;
  port: number;
}

/** Parses `host:port` or `[v6]:port`. */
export function parseAddress(address: string): HostPort {
  const idx = address.lastIndexOf(':');
  if (idx <= 0 || idx === address.length - 1) {
    throw new TypeError(`Invalid address "${address}": expected host:port`);
  }
  let host = address.slice(0, idx);
  const portText = address.slice(idx + 1);
  if (host.startsWith('[') && host.endsWith(']')) {
    host = host.slice(1, -1);
  }
  const port = Number(portText);
  if (!/^\d+$/.test(portText) || !Number.isInteger(port) || port < 1 || port > 65535) {
    throw new TypeError(`Invalid address "${address}": port must be 1-65535`);
  }
  if (host.length === 0) {
    throw new TypeError(`Invalid address "${address}": empty host`);
  }
  return { host, port };
}

interface PendingRead {
  resolve: (line: string) => void;
  reject: (err: TransportError) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Newline-delimited text over a TCP socket.
 */
export class LineTransport implements Transport {
  private buffer = '';
  private lines: string[] = [];
  private ended = false;
  private closed = false;
  private failure: Error | null = null;
  private pendingRead: PendingRead | null = null;

  private constructor(private readonly socket: net.Socket) {
    socket.setEncoding('utf8');
    socket.setNoDelay(true);
    socket.on('data', (chunk: string) => this.onData(chunk));
    socket.on('end', () => this.onEnd());
    socket.on('close', () => this.onEnd());
    socket.on('error', (err) => {
      this.failure = err;
      this.settlePendingRead();
    });
  }

  static open(address: string, options: TransportOpenOptions): Promise<LineTransport> {
    return new Promise((resolve, reject) => {
      let target: HostPort;
      try {
        target = parseAddress(address);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        reject(new TransportError(TransportErrorCode.CONNECT_FAILED, message, { cause: err }));
        return;
      }

      const socket = net.createConnection({ host: target.host, port: target.port });

      const cleanup = () => {
        clearTimeout(timer);
        socket.off('connect', onConnect);
        socket.off('error', onError);
      };
      const onConnect = () => {
        cleanup();
        resolve(new LineTransport(socket));
      };
      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new TransportError(TransportErrorCode.CONNECT_FAILED, `Connect to ${address} failed: ${err.message}`, {
            cause: err,
          }),
        );
      };
      const timer = setTimeout(() => {
        cleanup();
        socket.destroy();
        reject(
          new TransportError(
            TransportErrorCode.CONNECT_TIMEOUT,
            `Connect to ${address} timed out after ${options.connectTimeoutMs}ms`,
          ),
        );
      }, options.connectTimeoutMs);

      socket.once('connect', onConnect);
      socket.once('error', onError);
    });
  }

  sendLine(line: string, timeoutMs: number): Promise<void> {
    if (this.closed) {
      return Promise.reject(new TransportError(TransportErrorCode.CLOSED, 'Transport is closed'));
    }
    if (this.failure || this.socket.destroyed) {
      return Promise.reject(
        new TransportError(TransportErrorCode.WRITE_FAILED, 'Socket is no longer writable', { cause: this.failure }),
      );
    }
    if (line.includes('\n')) {
      return Promise.reject(new TransportError(TransportErrorCode.WRITE_FAILED, 'Line contains a newline'));
    }

    return new Promise((resolve, reject) => {
      let settled = false;
      const timer = setTimeout(() => {
        settled = true;
        reject(new TransportError(TransportErrorCode.WRITE_TIMEOUT, `Write timed out after ${timeoutMs}ms`));
      }, timeoutMs);

      this.socket.write(`${line}\n`, (err) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        if (err) {
          reject(new TransportError(TransportErrorCode.WRITE_FAILED, `Write failed: ${err.message}`, { cause: err }));
        } else {
          resolve();
        }
      });
    });
  }

  readLine(timeoutMs: number): Promise<string> {
    if (this.closed) {
      return Promise.reject(new TransportError(TransportErrorCode.CLOSED, 'Transport is closed'));
    }
    if (this.pendingRead) {
      return Promise.reject(new TransportError(TransportErrorCode.READ_FAILED, 'A read is already in progress'));
    }

    const next = this.lines.shift();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    const terminal = this.terminalReadError();
    if (terminal) {
      return Promise.reject(terminal);
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        reject(new TransportError(TransportErrorCode.READ_TIMEOUT, `Read timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      this.pendingRead = { resolve, reject, timer };
    });
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.socket.destroy();
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.reject(new TransportError(TransportErrorCode.CLOSED, 'Transport closed during read'));
    }
  }

  isClosed(): boolean {
    return this.closed;
  }

  private onData(chunk: string): void {
    this.buffer += chunk;
    let idx = this.buffer.indexOf('\n');
    while (idx !== -1) {
      this.lines.push(this.buffer.slice(0, idx));
      this.buffer = this.buffer.slice(idx + 1);
      idx = this.buffer.indexOf('\n');
    }
    this.settlePendingRead();
  }

  private onEnd(): void {
    this.ended = true;
    this.settlePendingRead();
  }

  private terminalReadError(): TransportError | null {
    if (this.failure) {
      return new TransportError(TransportErrorCode.READ_FAILED, `Read failed: ${this.failure.message}`, {
        cause: this.failure,
      });
    }
    if (this.ended) {
      return new TransportError(TransportErrorCode.EOF, 'Connection closed by peer');
    }
    return null;
  }

  private settlePendingRead(): void {
    const pending = this.pendingRead;
    if (!pending) return;

    const next = this.lines.shift();
    if (next !== undefined) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.resolve(next);
      return;
    }
    const terminal = this.terminalReadError();
    if (terminal) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.reject(terminal);
    }
  }
}

export const openLineTransport: TransportFactory = (address, options) => LineTransport.open(address, options);
