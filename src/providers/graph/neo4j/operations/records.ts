/**
 * Result Record Helpers
 *
 * Typed reads of scalar columns from driver records.
 */

import neo4j, { type Record as Neo4jRecord } from 'neo4j-driver';
import { StoreError } from '../../types';

/** Read a count column, whether the driver returned an Integer or a number. */
export function readCount(record: Neo4jRecord | undefined, key: string): number {
  if (!record) return 0;
  const value: unknown = record.get(key);
  if (typeof value === 'number') return value;
  if (neo4j.isInt(value)) return value.toNumber();
  throw new StoreError(`Expected integer column '${key}'`, 'QUERY_ERROR');
}

/** Read a string column. */
export function readString(record: Neo4jRecord, key: string): string {
  const value: unknown = record.get(key);
  if (typeof value !== 'string') {
    throw new StoreError(`Expected string column '${key}'`, 'QUERY_ERROR');
  }
  return value;
}
