import { type Context, context } from '@opentelemetry/api';
import type { Logger } from '@cqltrace/logger';
import type { Cluster } from './cluster';
import { DriverError, SessionClosedError, toError } from './errors';
import type { PageRequest, PageResult, Transport } from './transport';
import {
  type BatchEntry,
  type BatchObserver,
  BatchType,
  type ConnectObserver,
  type HostDescriptor,
  type ObservedBatch,
  type ObservedConnect,
  type ObservedQuery,
  type QueryObserver,
  type Row,
} from './types';

/**
 * Observers captured when the session was created.
 */
export interface SessionObservers {
  connect?: ConnectObserver;
  query?: QueryObserver;
  batch?: BatchObserver;
}

/**
 * A single statement bound to its values.
 *
 * The execution context is an explicit argument of `exec`, `first` and
 * `iter`; when omitted, the context active at call time is used.
 */
export class Query {
  private fetchSize?: number;

  constructor(
    private readonly session: Session,
    readonly statement: string,
    readonly values: readonly unknown[],
  ) {}

  /** @throws {DriverError} `INVALID_PAGE_SIZE` unless `size` is a positive integer */
  pageSize(size: number): this {
    if (!Number.isInteger(size) || size <= 0) {
      throw new DriverError(
        'INVALID_PAGE_SIZE',
        `Page size must be a positive integer, got ${size}`,
      );
    }
    this.fetchSize = size;
    return this;
  }

  async exec(ctx: Context = context.active()): Promise<void> {
    await this.session.fetchPage(this, ctx, { pageSize: this.fetchSize });
  }

  async first(ctx: Context = context.active()): Promise<Row | undefined> {
    const page = await this.session.fetchPage(this, ctx, { pageSize: 1 });
    return page.rows[0];
  }

  /**
   * Iterates every row, fetching pages lazily. Each page fetch is observed
   * as one query.
   */
  async *iter(ctx: Context = context.active()): AsyncGenerator<Row, void> {
    let pageState: string | undefined;

    do {
      const page = await this.session.fetchPage(this, ctx, {
        pageSize: this.fetchSize,
        pageState,
      });
      yield* page.rows;
      pageState = page.pageState;
    } while (pageState);
  }
}

export class Batch {
  private readonly entries: BatchEntry[] = [];

  constructor(
    private readonly session: Session,
    readonly type: BatchType,
  ) {}

  query(statement: string, ...values: unknown[]): this {
    this.entries.push({ statement, values });
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  get statements(): string[] {
    return this.entries.map((entry) => entry.statement);
  }

  exec(ctx: Context = context.active()): Promise<void> {
    return this.session.runBatch([...this.entries], this.type, ctx);
  }
}

/**
 * An open connection pool to a cluster. Every query page fetch and every
 * batch execution is reported to the observers captured at creation, after
 * the driver answered and before the returned promise settles.
 */
export class Session {
  private isClosed = false;
  private readonly logger: Logger;

  constructor(
    private readonly cluster: Cluster,
    private readonly transport: Transport,
    private readonly observers: SessionObservers,
  ) {
    this.logger = cluster.logger.child({ keyspace: cluster.keyspace });
  }

  get keyspace(): string {
    return this.cluster.keyspace;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /**
   * Connects the transport. One connect event is reported per known node on
   * success, or one failed event per contact point on failure.
   */
  async connect(): Promise<void> {
    const start = new Date();

    try {
      await this.transport.connect();
    } catch (error) {
      const end = new Date();
      const failure = toError(error);
      for (const address of this.cluster.hosts) {
        this.notifyConnect({
          host: { address, port: this.cluster.port },
          start,
          end,
          error: failure,
        });
      }
      this.logger.error(
        { hosts: this.cluster.hosts, error: failure.message },
        'Failed to connect to cluster',
      );
      await this.releaseTransport();
      throw error;
    }

    const end = new Date();
    const hosts = this.transport.hosts();
    for (const host of hosts) {
      this.notifyConnect({ host, start, end });
    }

    this.transport.onHostUp((host) => {
      const now = new Date();
      this.logger.info({ host: host.address }, 'Host up');
      this.notifyConnect({ host, start: now, end: now });
    });

    this.logger.debug({ hosts: hosts.length }, 'Session connected');
  }

  query(statement: string, ...values: unknown[]): Query {
    return new Query(this, statement, values);
  }

  batch(type: BatchType = BatchType.Logged): Batch {
    return new Batch(this, type);
  }

  executeBatch(batch: Batch, ctx: Context = context.active()): Promise<void> {
    return batch.exec(ctx);
  }

  async close(): Promise<void> {
    if (this.isClosed) {
      return;
    }
    this.isClosed = true;
    await this.transport.shutdown();
    this.logger.debug('Session closed');
  }

  /** @internal used by {@link Query} */
  async fetchPage(
    query: Query,
    ctx: Context,
    page: PageRequest,
  ): Promise<PageResult> {
    this.assertOpen();

    const observed = {
      keyspace: this.keyspace,
      statement: query.statement,
      values: query.values,
      context: ctx,
      start: new Date(),
    };

    let result: PageResult;
    try {
      result = await this.transport.execute(query.statement, query.values, {
        ...page,
        pageSize: page.pageSize ?? this.cluster.pageSize,
      });
    } catch (error) {
      this.notifyQuery({
        ...observed,
        end: new Date(),
        rows: 0,
        error: toError(error),
      });
      throw error;
    }

    this.notifyQuery({
      ...observed,
      host: result.host,
      end: new Date(),
      rows: result.rows.length,
    });
    return result;
  }

  /** @internal used by {@link Batch} */
  async runBatch(
    entries: BatchEntry[],
    type: BatchType,
    ctx: Context,
  ): Promise<void> {
    this.assertOpen();

    const observed = {
      keyspace: this.keyspace,
      statements: entries.map((entry) => entry.statement),
      context: ctx,
      start: new Date(),
    };

    let host: HostDescriptor | undefined;
    try {
      ({ host } = await this.transport.batch(entries, type));
    } catch (error) {
      this.notifyBatch({ ...observed, end: new Date(), error: toError(error) });
      throw error;
    }

    this.notifyBatch({ ...observed, host, end: new Date() });
  }

  private async releaseTransport(): Promise<void> {
    try {
      await this.transport.shutdown();
    } catch (error) {
      this.logger.warn(
        { error: toError(error).message },
        'Failed to shut down transport after connect failure',
      );
    }
  }

  private assertOpen(): void {
    if (this.isClosed) {
      throw new SessionClosedError();
    }
  }

  private notifyConnect(observed: ObservedConnect): void {
    try {
      this.observers.connect?.observeConnect(observed);
    } catch (error) {
      this.logger.warn({ error }, 'Connect observer failed');
    }
  }

  private notifyQuery(observed: ObservedQuery): void {
    try {
      this.observers.query?.observeQuery(observed);
    } catch (error) {
      this.logger.warn({ error }, 'Query observer failed');
    }
  }

  private notifyBatch(observed: ObservedBatch): void {
    try {
      this.observers.batch?.observeBatch(observed);
    } catch (error) {
      this.logger.warn({ error }, 'Batch observer failed');
    }
  }
}
