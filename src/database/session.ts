import { Logger } from '@nestjs/common';
import { ConnectionLostError, errorMessage } from '../common/errors';
import { truncateForLog } from '../common/logging.utils';
import { decodeMessage, encodeQuery, MessageType } from '../wire/codec';
import { MessageBuffer } from '../wire/message-buffer';
import { ExecutionOutcome, outcomeOf, QueryExecutor, SessionOptions, SessionSocket } from './types';

/** Capability requested during the handshake: compression and 2GB+ messages */
const REQUESTED_CAPABILITY = 3;

interface PendingCall {
  query: string;
  resolve(outcome: ExecutionOutcome): void;
  reject(error: Error): void;
  timer?: NodeJS.Timeout;
}

interface Waiter {
  resolve(): void;
  reject(error: Error): void;
}

/**
 * One authenticated connection to the engine
 * Replies arrive in request order; callers keep at most one call in flight
 */
export class KdbSession implements QueryExecutor {
  private readonly logger = new Logger(KdbSession.name);
  private readonly buffer = new MessageBuffer();
  private readonly pending: PendingCall[] = [];
  private readonly closeWaiters: Array<() => void> = [];
  private readonly closeListeners: Array<() => void> = [];
  private handshakeWaiter?: Waiter;
  private authenticated = false;
  private closed = false;
  private negotiated = 0;

  constructor(
    private readonly socket: SessionSocket,
    private readonly options: SessionOptions,
  ) {
    socket.on('data', chunk => this.handleData(chunk));
    socket.on('close', () => this.handleClose());
    socket.on('error', error => this.fail(new ConnectionLostError(`Connection error: ${error.message}`)));
  }

  get capability(): number {
    return this.negotiated;
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  /**
   * Send credentials and wait for the one-byte capability reply
   * The engine closes the socket instead of replying when it rejects the credentials
   */
  handshake(user: string, password: string): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ConnectionLostError('Session is closed'));
    }
    const credentials = new TextEncoder().encode(`${user}:${password}`);
    const message = new Uint8Array(credentials.length + 2);
    message.set(credentials);
    message[credentials.length] = REQUESTED_CAPABILITY;

    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        this.fail(new ConnectionLostError(`Handshake timed out after ${this.options.handshakeTimeoutMs}ms`));
      }, this.options.handshakeTimeoutMs);
      this.handshakeWaiter = {
        resolve: () => {
          clearTimeout(timer);
          resolve();
        },
        reject: error => {
          clearTimeout(timer);
          reject(error);
        },
      };
      this.socket.write(message);
    });
  }

  execute(query: string): Promise<ExecutionOutcome> {
    if (this.closed) {
      return Promise.reject(new ConnectionLostError('Session is closed'));
    }
    this.logger.debug(`Executing: ${truncateForLog(query)}`);

    return new Promise<ExecutionOutcome>((resolve, reject) => {
      const call: PendingCall = { query, resolve, reject };
      if (this.options.queryTimeoutMs > 0) {
        call.timer = setTimeout(() => {
          this.fail(new ConnectionLostError(`Query timed out after ${this.options.queryTimeoutMs}ms`));
        }, this.options.queryTimeoutMs);
      }
      this.pending.push(call);
      this.socket.write(encodeQuery(query));
    });
  }

  /**
   * Run the listener once the session is closed, whichever side closed it
   */
  onClose(listener: () => void): void {
    if (this.closed) {
      listener();
      return;
    }
    this.closeListeners.push(listener);
  }

  /**
   * Close the socket; resolves once it has closed
   */
  close(): Promise<void> {
    if (this.closed) {
      return Promise.resolve();
    }
    return new Promise<void>(resolve => {
      this.closeWaiters.push(resolve);
      this.socket.end();
    });
  }

  private handleData(chunk: Uint8Array): void {
    let data = chunk;
    if (!this.authenticated) {
      if (data.length === 0) {
        return;
      }
      this.authenticated = true;
      this.negotiated = data[0];
      this.handshakeWaiter?.resolve();
      this.handshakeWaiter = undefined;
      data = data.subarray(1);
    }

    let messages: Uint8Array[];
    try {
      messages = this.buffer.processChunk(data);
    } catch (error) {
      // Framing is lost, so no later reply can be matched to its call
      this.logger.error(`Unreadable reply framing: ${errorMessage(error)}`);
      this.fail(new ConnectionLostError(`Connection framing lost: ${errorMessage(error)}`));
      return;
    }
    for (const message of messages) {
      this.handleMessage(message);
    }
  }

  private handleMessage(message: Uint8Array): void {
    let outcome: ExecutionOutcome;
    try {
      const decoded = decodeMessage(message);
      if (decoded.messageType !== MessageType.Response) {
        this.logger.warn(`Ignoring unsolicited message of type ${decoded.messageType}`);
        return;
      }
      outcome = outcomeOf(decoded.object);
    } catch (error) {
      // Framing is intact, so only the call this reply belongs to fails
      this.settleNext(call => call.reject(error instanceof Error ? error : new Error(errorMessage(error))));
      return;
    }
    this.settleNext(call => call.resolve(outcome));
  }

  private settleNext(settle: (call: PendingCall) => void): void {
    const call = this.pending.shift();
    if (!call) {
      this.logger.warn('Received a reply with no call waiting for it');
      return;
    }
    clearTimeout(call.timer);
    settle(call);
  }

  private handleClose(): void {
    const wasOpen = !this.closed;
    this.fail(new ConnectionLostError(this.authenticated ? 'Connection closed' : 'Authentication rejected'));
    if (wasOpen) {
      this.logger.log('Session closed');
    }
    for (const resolve of this.closeWaiters.splice(0)) {
      resolve();
    }
  }

  /**
   * Reject everything in flight; the session cannot be reused afterwards
   */
  private fail(error: ConnectionLostError): void {
    const calls = this.pending.splice(0);
    const waiter = this.handshakeWaiter;
    this.handshakeWaiter = undefined;
    this.buffer.clear();
    if (!this.closed) {
      this.closed = true;
      this.socket.destroy();
    }
    for (const listener of this.closeListeners.splice(0)) {
      listener();
    }

    waiter?.reject(error);
    for (const call of calls) {
      clearTimeout(call.timer);
      this.logger.error(`Query failed: ${truncateForLog(call.query)}`);
      call.reject(error);
    }
  }
}
