import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import kdbConfig from './config/kdb.config';
import { DatabaseModule } from './database/database.module';
import { SelectionModule } from './query/selection.module';
import { JoinModule } from './join/join.module';

/**
 * Root module wiring configuration, engine connectivity, selection and joins
 * Configuration is loaded first and available globally
 */
@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      load: [kdbConfig],
    }),

    DatabaseModule,    // Engine sessions
    SelectionModule,   // Metadata, iloc and loc
    JoinModule,        // Staged joins
  ],
})
export class AppModule {}
