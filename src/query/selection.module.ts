import { Module } from '@nestjs/common';
import { MetadataService } from './metadata.service';
import { SelectionService } from './selection.service';
import { TableService } from './table.service';

/**
 * Selection module provides schema reads, positional and conditional selection
 */
@Module({
  providers: [
    MetadataService,
    TableService,
    SelectionService
  ],
  exports: [
    MetadataService,
    TableService,
    SelectionService
  ],
})
export class SelectionModule {}
