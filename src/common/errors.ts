/**
 * Error taxonomy shared by every module
 */
export class QueryBridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * The session to the engine closed, errored or timed out mid-call
 * Fatal to the in-flight operation and never retried
 */
export class ConnectionLostError extends QueryBridgeError {}

/**
 * Condition text that does not parse; raised before any query is sent
 */
export class InvalidConditionError extends QueryBridgeError {
  constructor(
    readonly condition: string,
    reason: string,
  ) {
    super(`Invalid condition '${condition}': ${reason}`);
  }
}

export class OutOfBoundsError extends QueryBridgeError {
  constructor(
    readonly axis: 'row' | 'column' | 'element',
    readonly index: number,
    readonly limit: number,
  ) {
    super(`${axis[0].toUpperCase()}${axis.slice(1)} index out of bounds: ${index} (size ${limit})`);
  }
}

/**
 * Wire type code the registry has no descriptor for
 */
export class UnsupportedTypeError extends QueryBridgeError {
  constructor(readonly typeCode: number) {
    super(`Unsupported wire type: ${typeCode}`);
  }
}

export class SchemaMismatchError extends QueryBridgeError {}

export enum JoinStage {
  Validate = 'validate',
  Stage = 'stage',
  Execute = 'execute',
  Fetch = 'fetch',
}

export class JoinFailureError extends QueryBridgeError {
  constructor(
    readonly stage: JoinStage,
    message: string,
  ) {
    super(`Join failed during ${stage}: ${message}`);
  }
}

/**
 * The engine answered a query with an error, or with no payload where one was needed
 */
export class QueryExecutionError extends QueryBridgeError {
  constructor(
    readonly query: string,
    message: string,
  ) {
    super(`Query failed: ${message}`);
  }
}

export class WireFormatError extends QueryBridgeError {}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
