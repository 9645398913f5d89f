import { Module } from '@nestjs/common';
import { KdbConnectionService, tcpSocketFactory } from './connection.service';
import { SOCKET_FACTORY } from './types';

/**
 * Database module provides engine connectivity
 * Exports KdbConnectionService for opening sessions
 */
@Module({
  providers: [
    KdbConnectionService,
    { provide: SOCKET_FACTORY, useValue: tcpSocketFactory },
  ],
  exports: [
    KdbConnectionService
  ],
})
export class DatabaseModule {}
