import { Client, type ClientOptions, type Host } from 'cassandra-driver';
import type { Logger } from '@cqltrace/logger';
import type { Cluster } from './cluster';
import type {
  BatchResult,
  PageRequest,
  PageResult,
  Transport,
} from './transport';
import { type BatchEntry, BatchType, type HostDescriptor } from './types';

/**
 * Splits a `cassandra-driver` endpoint (`address:port`, IPv6 addresses
 * possibly bracketed) into its parts.
 */
export function splitEndpoint(endpoint: string): {
  address: string;
  port?: number;
} {
  const separator = endpoint.lastIndexOf(':');
  if (separator <= 0) {
    return { address: endpoint };
  }

  const port = Number(endpoint.slice(separator + 1));
  if (!Number.isInteger(port)) {
    return { address: endpoint };
  }

  return {
    address: endpoint.slice(0, separator).replace(/^\[(.*)\]$/, '$1'),
    port,
  };
}

export function describeHost(
  host: Pick<Host, 'address' | 'cassandraVersion' | 'isUp'>,
): HostDescriptor {
  return {
    ...splitEndpoint(host.address),
    version: host.cassandraVersion || undefined,
    up: host.isUp(),
  };
}

/**
 * Transport backed by the DataStax `cassandra-driver` client. Statements are
 * always prepared.
 */
export class CassandraTransport implements Transport {
  private readonly client: Client;
  private readonly logger: Logger;

  constructor(cluster: Cluster) {
    const options: ClientOptions = {
      contactPoints: [...cluster.hosts],
      localDataCenter: cluster.localDataCenter,
      protocolOptions: { port: cluster.port },
    };
    if (cluster.protoVersion !== undefined) {
      options.protocolOptions = {
        port: cluster.port,
        maxVersion: cluster.protoVersion,
      };
    }
    if (cluster.keyspace) {
      options.keyspace = cluster.keyspace;
    }
    if (cluster.credentials) {
      options.credentials = { ...cluster.credentials };
    }

    this.logger = cluster.logger.child({ transport: 'cassandra-driver' });
    this.client = new Client(options);
    this.client.on(
      'log',
      (level: string, className: string, message: string) => {
        this.forwardLog(level, className, message);
      },
    );
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  hosts(): HostDescriptor[] {
    return this.client.hosts.values().map(describeHost);
  }

  async execute(
    statement: string,
    values: readonly unknown[],
    page: PageRequest,
  ): Promise<PageResult> {
    const result = await this.client.execute(statement, [...values], {
      prepare: true,
      fetchSize: page.pageSize,
      pageState: page.pageState,
    });

    return {
      rows: result.rows,
      host: this.lookupHost(result.info.queriedHost),
      pageState: result.pageState || undefined,
    };
  }

  async batch(
    entries: readonly BatchEntry[],
    type: BatchType,
  ): Promise<BatchResult> {
    const result = await this.client.batch(
      entries.map((entry) => ({
        query: entry.statement,
        params: [...entry.values],
      })),
      {
        prepare: true,
        logged: type !== BatchType.Unlogged,
        counter: type === BatchType.Counter,
      },
    );

    return { host: this.lookupHost(result.info.queriedHost) };
  }

  onHostUp(listener: (host: HostDescriptor) => void): void {
    this.client.on('hostUp', (host: Host) => listener(describeHost(host)));
  }

  async shutdown(): Promise<void> {
    await this.client.shutdown();
  }

  private lookupHost(endpoint: string | undefined): HostDescriptor | undefined {
    if (!endpoint) {
      return undefined;
    }

    const host: Host | undefined = this.client.hosts.get(endpoint);
    return host ? describeHost(host) : splitEndpoint(endpoint);
  }

  private forwardLog(level: string, className: string, message: string): void {
    switch (level) {
      case 'error':
        this.logger.error({ className }, message);
        break;
      case 'warning':
        this.logger.warn({ className }, message);
        break;
      case 'info':
        this.logger.debug({ className }, message);
        break;
      default:
        this.logger.trace({ className }, message);
    }
  }
}
