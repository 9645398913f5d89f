import type { WireTable } from '../wire/types';

export enum JoinKind {
  Inner = 'inner',
  Left = 'left',
  Right = 'right',
  Asof = 'asof',
  Window = 'window',
  Union = 'union',
}

/**
 * Two global tables to combine and the global name the result is stored under
 */
export interface JoinRequest {
  left: string;
  right: string;
  resultName: string;
  /** Equality columns; empty means a natural join on the first shared column */
  joinColumns?: readonly string[];
}

export interface AsofJoinRequest extends JoinRequest {
  leftTime: string;
  rightTime: string;
}

export interface WindowJoinRequest extends AsofJoinRequest {
  /** Half-width of the window around each left time */
  windowSeconds: number;
}

export interface JoinResult {
  name: string;
  table: WireTable;
}
