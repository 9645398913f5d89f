import 'reflect-metadata';

export { AppModule } from './app.module';
export { DatabaseModule } from './database/database.module';
export { SelectionModule } from './query/selection.module';
export { JoinModule } from './join/join.module';

export { KdbConnectionService } from './database/connection.service';
export { KdbSession } from './database/session';
export { ExecutionStatus, outcomeOf, SOCKET_FACTORY } from './database/types';
export type { ExecutionOutcome, QueryExecutor, SocketFactory } from './database/types';

export { MetadataService } from './query/metadata.service';
export type { ColumnDescription } from './query/metadata.service';
export { SelectionService } from './query/selection.service';
export { TableService } from './query/table.service';
export { convert } from './query/value-converter';
export { shapeGrid, shapeList, shapeTable } from './query/result-shaper';
export { parseCondition, parseConditions, splitConditions } from './query/condition-parser';

export { JoinService } from './join/join.service';
export { JoinKind } from './join/types';
export type { AsofJoinRequest, JoinRequest, JoinResult, WindowJoinRequest } from './join/types';

export * from './common/types';
export * from './common/errors';
export {
  descriptorFor,
  descriptorForTag,
  descriptorForValue,
  formatValue,
  inferType,
  isNullRaw,
  literal,
  registeredTypes,
} from './common/type-map';
export type { TypeDescriptor } from './common/type-map';
export { decodeMessage, encodeQuery, MessageType } from './wire/codec';
export { rowCount, unkey, WireType } from './wire/types';
export type { WireObject, WireTable } from './wire/types';
export { KdbConfig } from './config/kdb.config';
