import type { WireObject } from '../wire/types';

/**
 * Result of one query round trip
 * Done for a generic null reply, Failed for an engine error, Data otherwise
 */
export enum ExecutionStatus {
  Done = 'done',
  Data = 'data',
  Failed = 'failed',
}

export type ExecutionOutcome =
  | { status: ExecutionStatus.Done }
  | { status: ExecutionStatus.Data; data: WireObject }
  | { status: ExecutionStatus.Failed; message: string };

/**
 * Sends query text to the engine and returns its reply
 * A lost connection rejects with ConnectionLostError instead of resolving
 */
export interface QueryExecutor {
  execute(query: string): Promise<ExecutionOutcome>;
}

export function outcomeOf(object: WireObject): ExecutionOutcome {
  switch (object.kind) {
    case 'null':
      return { status: ExecutionStatus.Done };
    case 'error':
      return { status: ExecutionStatus.Failed, message: object.message };
    default:
      return { status: ExecutionStatus.Data, data: object };
  }
}

/**
 * The part of a stream socket a session uses
 */
export interface SessionSocket {
  write(data: Uint8Array): boolean;
  end(): void;
  destroy(): void;
  on(event: 'data', listener: (chunk: Uint8Array) => void): this;
  on(event: 'close', listener: () => void): this;
  on(event: 'error', listener: (error: Error) => void): this;
}

export interface SessionOptions {
  /** 0 disables the per-query timeout */
  queryTimeoutMs: number;
  handshakeTimeoutMs: number;
}

/**
 * A socket that is still connecting
 */
export interface ConnectingSocket extends SessionSocket {
  once(event: 'connect', listener: () => void): this;
  once(event: 'error', listener: (error: Error) => void): this;
  removeListener(event: 'error', listener: (error: Error) => void): this;
}

export type SocketFactory = (host: string, port: number) => ConnectingSocket;

export const SOCKET_FACTORY = Symbol('SOCKET_FACTORY');
