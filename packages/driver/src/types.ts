import type { Context } from '@opentelemetry/api';

/**
 * Identification of the Cassandra node involved in an event. Every field is
 * optional because the driver does not always know which node served a
 * request (a request that failed before reaching a node, for instance).
 */
export interface HostDescriptor {
  address?: string;
  port?: number;
  /** Cassandra release version reported by the node, e.g. `4.1.3` */
  version?: string;
  up?: boolean;
}

export type Row = Record<string, unknown>;

export enum BatchType {
  Logged = 'logged',
  Unlogged = 'unlogged',
  Counter = 'counter',
}

export interface BatchEntry {
  statement: string;
  values: readonly unknown[];
}

export interface ObservedConnect {
  host: HostDescriptor;
  start: Date;
  end: Date;
  error?: Error;
}

export interface ObservedQuery {
  keyspace: string;
  statement: string;
  values: readonly unknown[];
  /** Context the query was executed under */
  context: Context;
  host?: HostDescriptor;
  start: Date;
  end: Date;
  /** Rows in the fetched page, 0 on failure */
  rows: number;
  error?: Error;
}

export interface ObservedBatch {
  keyspace: string;
  statements: readonly string[];
  context: Context;
  host?: HostDescriptor;
  start: Date;
  end: Date;
  error?: Error;
}

export interface ConnectObserver {
  observeConnect(observed: ObservedConnect): void;
}

export interface QueryObserver {
  observeQuery(observed: ObservedQuery): void;
}

export interface BatchObserver {
  observeBatch(observed: ObservedBatch): void;
}
