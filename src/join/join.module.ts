import { Module } from '@nestjs/common';
import { JoinService } from './join.service';

/**
 * Join module provides staged keyed, time-based and union joins
 */
@Module({
  providers: [JoinService],
  exports: [JoinService],
})
export class JoinModule {}
