import type { HostDescriptor } from '@cqltrace/driver';

export type HostState = 'UP' | 'DOWN' | 'UNKNOWN';

/**
 * Attribute keys shared by spans and metrics. These are an external contract
 * consumed by dashboards and must not change with span names.
 */
export const ATTRIBUTES = {
  SYSTEM: 'db.system',
  OPERATION: 'db.operation',
  STATEMENT: 'db.statement',
  HOST: 'db.cassandra.host',
  PORT: 'db.cassandra.port',
  VERSION: 'db.cassandra.version',
  HOST_STATE: 'db.cassandra.host.state',
  KEYSPACE: 'db.cassandra.keyspace',
  BATCH_STATEMENTS: 'db.cassandra.batch.statements',
  BATCH_QUERIES: 'db.cassandra.batch.queries',
  ROWS_RETURNED: 'db.cassandra.rows.returned',
  ERROR_MESSAGE: 'db.cassandra.error.message',
} as const;

export const DB_SYSTEM = 'cassandra';

export interface HostAttributeSet {
  [ATTRIBUTES.HOST]: string;
  [ATTRIBUTES.PORT]: number;
  [ATTRIBUTES.VERSION]: string;
  [ATTRIBUTES.HOST_STATE]: HostState;
}

function hostState(up: boolean | undefined): HostState {
  if (up === true) {
    return 'UP';
  }
  return up === false ? 'DOWN' : 'UNKNOWN';
}

/**
 * Describes the node involved in an event. Missing fields fall back to empty
 * values so partially known hosts still produce a complete set.
 */
export function hostAttributes(host?: HostDescriptor): HostAttributeSet {
  const port = host?.port;

  return {
    [ATTRIBUTES.HOST]: host?.address ?? '',
    [ATTRIBUTES.PORT]:
      port !== undefined && Number.isFinite(port) ? Math.trunc(port) : 0,
    [ATTRIBUTES.VERSION]: host?.version ?? '',
    [ATTRIBUTES.HOST_STATE]: hostState(host?.up),
  };
}
