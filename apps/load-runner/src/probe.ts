import { LineTransport } from '@table-swarm/player-sdk';
import { fetchSender, type RequestSender } from './flood.js';

/** The run cannot begin: the target is unreachable. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export async function probeTcp(address: string, connectTimeoutMs: number): Promise<void> {
  let transport: LineTransport;
  try {
    transport = await LineTransport.open(address, { connectTimeoutMs });
  } catch (err) {
    throw new StartupError(`Cannot reach game server at ${address}`, { cause: err });
  }
  transport.close();
}

/** Any HTTP status counts as reachable. */
export async function probeHttp(url: string, timeoutMs: number, send: RequestSender = fetchSender): Promise<number> {
  try {
    return await send(url, timeoutMs);
  } catch (err) {
    throw new StartupError(`Cannot reach ${url}`, { cause: err });
  }
}
