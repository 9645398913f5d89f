import { Inject, Injectable, OnModuleDestroy, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { createConnection } from 'net';
import type { KdbConfig } from '../config/kdb.config';
import { ConnectionLostError, errorMessage } from '../common/errors';
import { KdbSession } from './session';
import { ConnectingSocket, SOCKET_FACTORY, SocketFactory } from './types';

export const tcpSocketFactory: SocketFactory = (host, port) => createConnection({ host, port });

/**
 * Engine connection management service
 * Opens authenticated sessions and closes whatever is left on shutdown
 */
@Injectable()
export class KdbConnectionService implements OnModuleDestroy {
  private readonly logger = new Logger(KdbConnectionService.name);
  private sessions: Set<KdbSession> = new Set();

  constructor(
    private configService: ConfigService,
    @Inject(SOCKET_FACTORY) private socketFactory: SocketFactory,
  ) {}

  /**
   * Connect and authenticate a new session
   */
  async connect(): Promise<KdbSession> {
    const config = this.configService.get<KdbConfig>('kdb');

    if (!config) {
      throw new Error('Engine configuration not found');
    }

    this.logger.log(`Connecting to engine at ${config.host}:${config.port}`);

    try {
      const socket = await this.openSocket(config);
      const session = new KdbSession(socket, {
        queryTimeoutMs: config.queryTimeoutMs,
        handshakeTimeoutMs: config.connectTimeoutMs,
      });
      await session.handshake(config.user, config.password);
      this.sessions.add(session);
      session.onClose(() => this.sessions.delete(session));
      this.logger.log(`Connected to engine (capability ${session.capability})`);
      return session;
    } catch (error) {
      this.logger.error('Failed to connect to engine');
      throw new ConnectionLostError(`Engine connection failed: ${errorMessage(error)}`);
    }
  }

  /**
   * Disconnect a specific session
   */
  async disconnect(session: KdbSession): Promise<void> {
    try {
      await session.close();
      this.logger.log('Engine connection closed');
    } finally {
      this.sessions.delete(session);
    }
  }

  get openSessions(): number {
    return this.sessions.size;
  }

  /**
   * Cleanup all sessions on module destroy
   */
  async onModuleDestroy(): Promise<void> {
    this.logger.log(`Closing ${this.sessions.size} engine connections`);

    const disconnectPromises = Array.from(this.sessions).map(session =>
      this.disconnect(session).catch(error =>
        this.logger.error(`Error closing connection during shutdown: ${errorMessage(error)}`),
      ),
    );

    await Promise.all(disconnectPromises);
  }

  private openSocket(config: KdbConfig): Promise<ConnectingSocket> {
    return new Promise<ConnectingSocket>((resolve, reject) => {
      const socket = this.socketFactory(config.host, config.port);
      const timer = setTimeout(() => {
        socket.destroy();
        reject(new Error(`Timed out after ${config.connectTimeoutMs}ms`));
      }, config.connectTimeoutMs);
      const onError = (error: Error): void => {
        clearTimeout(timer);
        reject(error);
      };

      socket.once('error', onError);
      socket.once('connect', () => {
        clearTimeout(timer);
        socket.removeListener('error', onError);
        resolve(socket);
      });
    });
  }
}
