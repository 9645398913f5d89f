import { formatClock } from '../common/temporal';

export function stagingName(table: string): string {
  return `${table}_unkeyed`;
}

export function adjustedName(stagedRight: string): string {
  return `${stagedRight}_adj`;
}

export function windowName(resultName: string): string {
  return `${resultName}_window`;
}

/** Unkeyed working copy of a table */
export function stageQuery(table: string): string {
  return `${stagingName(table)}: 0!(${table})`;
}

export function deleteQuery(name: string): string {
  return `delete ${name} from \`.`;
}

/** `a`b`c */
export function symbolList(columns: readonly string[]): string {
  return columns.map(column => `\`${column}`).join('');
}

function keyClause(left: string, right: string, columns: readonly string[]): string {
  return columns.length > 0 ? symbolList(columns) : `(enlist first cols[${left}] inter cols[${right}])`;
}

/**
 * Keyed join of two staged tables: ij keeps matches only, lj keeps every left row
 */
export function keyedJoinQuery(
  operator: 'ij' | 'lj',
  resultName: string,
  left: string,
  right: string,
  columns: readonly string[],
): string {
  return `${resultName}: ${left} ${operator} ${keyClause(left, right, columns)} xkey ${right}`;
}

export function unionJoinQuery(resultName: string, left: string, right: string): string {
  return `${resultName}: ${left} uj ${right}`;
}

/**
 * Right copy keeping its own time as <rightTime>2, with the time also under the left name
 */
export function asofAdjustQuery(stagedRight: string, leftTime: string, rightTime: string): string {
  const alias = leftTime === rightTime ? '' : `, ${leftTime}:${rightTime}`;
  return `${adjustedName(stagedRight)}: update ${rightTime}2:${rightTime}${alias} from ${stagedRight}`;
}

export function asofJoinQuery(
  resultName: string,
  left: string,
  adjusted: string,
  leftTime: string,
  columns: readonly string[],
): string {
  return `${resultName}: aj[${symbolList([...columns, leftTime])}; ${left}; ${adjusted}]`;
}

/**
 * Right copy sorted by the join columns then time, with the time under the left name
 */
export function windowAdjustQuery(
  stagedRight: string,
  leftTime: string,
  rightTime: string,
  columns: readonly string[],
): string {
  const source = leftTime === rightTime ? stagedRight : `update ${leftTime}:${rightTime} from ${stagedRight}`;
  return `${adjustedName(stagedRight)}: ${symbolList([...columns, leftTime])} xasc ${source}`;
}

/** Symmetric time literal pair, e.g. (-00:01:00.000 00:01:00.000) */
export function windowInterval(seconds: number): string {
  const width = formatClock(Math.round(seconds * 1000), 'millis');
  return `(-${width} ${width})`;
}

export function windowBoundsQuery(resultName: string, left: string, leftTime: string, seconds: number): string {
  return `${windowName(resultName)}: ${windowInterval(seconds)} +\\: ${left}\`${leftTime}`;
}

/** Right columns that get aggregated: everything but the join and time columns */
export function dataColumnsQuery(adjusted: string, excluded: readonly string[]): string {
  return `(cols ${adjusted}) except ${symbolList(excluded)}`;
}

export function windowJoinQuery(
  resultName: string,
  left: string,
  adjusted: string,
  leftTime: string,
  columns: readonly string[],
  dataColumns: readonly string[],
): string {
  const keys = [...columns, leftTime].map(column => `\`${column}`).join(',');
  const aggregates = [adjusted, ...dataColumns.map(column => `(last;\`${column})`)].join('; ');
  return `${resultName}: wj[${windowName(resultName)}; ${keys}; ${left}; (${aggregates})]`;
}
