import { DEFAULT_LOGGER, type Logger } from '@cqltrace/logger';
import { CassandraTransport } from './cassandra';
import { ClusterConfigError } from './errors';
import { Session } from './session';
import type { TransportFactory } from './transport';
import type { BatchObserver, ConnectObserver, QueryObserver } from './types';

export const DEFAULT_PORT = 9042;
export const DEFAULT_LOCAL_DATA_CENTER = 'datacenter1';
export const DEFAULT_PAGE_SIZE = 5000;

export interface Credentials {
  username: string;
  password: string;
}

export interface ClusterOptions {
  /** Contact points, host names or IP addresses without port */
  hosts: string[];
  port?: number;
  keyspace?: string;
  localDataCenter?: string;
  /** Highest native protocol version to negotiate */
  protoVersion?: number;
  credentials?: Credentials;
  pageSize?: number;
  logger?: Logger;
  /** Defaults to a `cassandra-driver` backed transport */
  transport?: TransportFactory;
  connectObserver?: ConnectObserver;
  queryObserver?: QueryObserver;
  batchObserver?: BatchObserver;
}

/**
 * Connection configuration for a Cassandra cluster.
 *
 * The three observer slots are read when a session is created; assigning them
 * afterwards only affects sessions created later.
 *
 * @example
 * ```typescript
 * const cluster = new Cluster({ hosts: ['127.0.0.1'], keyspace: 'shop' });
 * cluster.queryObserver = {
 *   observeQuery: (q) => console.log(q.statement, q.end.getTime() - q.start.getTime()),
 * };
 *
 * const session = await cluster.createSession();
 * ```
 */
export class Cluster {
  readonly hosts: readonly string[];
  readonly port: number;
  readonly keyspace: string;
  readonly localDataCenter: string;
  readonly protoVersion?: number;
  readonly credentials?: Credentials;
  readonly pageSize: number;
  readonly logger: Logger;

  connectObserver?: ConnectObserver;
  queryObserver?: QueryObserver;
  batchObserver?: BatchObserver;

  private readonly transport: TransportFactory;

  constructor(options: ClusterOptions) {
    if (options.hosts.length === 0) {
      throw new ClusterConfigError('A cluster needs at least one contact point', [
        { path: 'hosts', message: 'must not be empty' },
      ]);
    }

    this.hosts = [...options.hosts];
    this.port = options.port ?? DEFAULT_PORT;
    this.keyspace = options.keyspace ?? '';
    this.localDataCenter = options.localDataCenter ?? DEFAULT_LOCAL_DATA_CENTER;
    this.protoVersion = options.protoVersion;
    this.credentials = options.credentials;
    this.pageSize = options.pageSize ?? DEFAULT_PAGE_SIZE;
    this.logger = (options.logger ?? DEFAULT_LOGGER).child({
      module: 'cassandra',
    });
    this.transport =
      options.transport ?? ((cluster) => new CassandraTransport(cluster));
    this.connectObserver = options.connectObserver;
    this.queryObserver = options.queryObserver;
    this.batchObserver = options.batchObserver;
  }

  /**
   * Opens a session. Rejects with the transport's own error when no contact
   * point can be reached.
   */
  async createSession(): Promise<Session> {
    const session = new Session(this, this.transport(this), {
      connect: this.connectObserver,
      query: this.queryObserver,
      batch: this.batchObserver,
    });

    await session.connect();
    return session;
  }
}
