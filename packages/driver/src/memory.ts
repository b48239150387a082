import { HostUnavailableError } from './errors';
import type {
  BatchResult,
  PageRequest,
  PageResult,
  Transport,
} from './transport';
import type { BatchEntry, BatchType, HostDescriptor, Row } from './types';

export interface MemoryTransportOptions {
  /**
   * Nodes the transport pretends to be connected to.
   * @default one node, 127.0.0.1:9042 running 4.1.3
   */
  hosts?: HostDescriptor[];
}

type StatementMatcher = string | RegExp;
type RowSource = Row[] | ((values: readonly unknown[]) => Row[]);

interface Rule {
  matcher: StatementMatcher;
  rows?: RowSource;
  error?: Error;
}

export interface ExecutedStatement {
  statement: string;
  values: readonly unknown[];
}

export interface ExecutedBatch {
  entries: readonly BatchEntry[];
  type: BatchType;
}

function matches(matcher: StatementMatcher, statement: string): boolean {
  return typeof matcher === 'string'
    ? matcher === statement
    : matcher.test(statement);
}

/**
 * In-process transport for tests. Results and failures are scripted per
 * statement; everything executed is recorded.
 *
 * @example
 * ```typescript
 * const transport = new MemoryTransport();
 * transport.respond('SELECT * FROM users', [{ id: 1 }]);
 *
 * const cluster = new Cluster({ hosts: ['127.0.0.1'], transport: () => transport });
 * const session = await cluster.createSession();
 * ```
 */
export class MemoryTransport implements Transport {
  readonly executed: ExecutedStatement[] = [];
  readonly batches: ExecutedBatch[] = [];

  private readonly nodes: HostDescriptor[];
  private readonly rules: Rule[] = [];
  private readonly hostUpListeners: Array<(host: HostDescriptor) => void> =
    [];
  private connectError?: Error;
  private connected = false;
  private shutdownCount = 0;

  constructor(options: MemoryTransportOptions = {}) {
    this.nodes = (
      options.hosts ?? [
        { address: '127.0.0.1', port: 9042, version: '4.1.3', up: true },
      ]
    ).map((host) => ({ ...host }));
  }

  get isConnected(): boolean {
    return this.connected;
  }

  get shutdowns(): number {
    return this.shutdownCount;
  }

  /** Rows returned for statements matching `matcher`; later rules win */
  respond(matcher: StatementMatcher, rows: RowSource): this {
    this.rules.unshift({ matcher, rows });
    return this;
  }

  /** Makes statements matching `matcher` fail with `error` */
  fail(matcher: StatementMatcher, error: Error): this {
    this.rules.unshift({ matcher, error });
    return this;
  }

  failConnect(error: Error): this {
    this.connectError = error;
    return this;
  }

  markDown(address: string): void {
    this.setUp(address, false);
  }

  /** Marks a node up and notifies listeners, as a reconnect would */
  markUp(address: string): void {
    const host = this.setUp(address, true);
    for (const listener of this.hostUpListeners) {
      listener({ ...host });
    }
  }

  async connect(): Promise<void> {
    if (this.connectError) {
      throw this.connectError;
    }
    this.connected = true;
  }

  hosts(): HostDescriptor[] {
    return this.nodes.map((host) => ({ ...host }));
  }

  async execute(
    statement: string,
    values: readonly unknown[],
    page: PageRequest,
  ): Promise<PageResult> {
    const host = this.pickHost();
    this.executed.push({ statement, values });

    const rule = this.rules.find((candidate) =>
      matches(candidate.matcher, statement),
    );
    if (rule?.error) {
      throw rule.error;
    }

    const source = rule?.rows ?? [];
    const rows = typeof source === 'function' ? source(values) : source;

    const offset = page.pageState ? Number(page.pageState) : 0;
    const limit =
      page.pageSize !== undefined && page.pageSize > 0
        ? page.pageSize
        : rows.length;
    const next = offset + limit;

    return {
      rows: rows.slice(offset, next),
      host,
      pageState: next < rows.length ? String(next) : undefined,
    };
  }

  async batch(
    entries: readonly BatchEntry[],
    type: BatchType,
  ): Promise<BatchResult> {
    const host = this.pickHost();
    this.batches.push({ entries: [...entries], type });

    for (const entry of entries) {
      const rule = this.rules.find((candidate) =>
        matches(candidate.matcher, entry.statement),
      );
      if (rule?.error) {
        throw rule.error;
      }
    }

    return { host };
  }

  onHostUp(listener: (host: HostDescriptor) => void): void {
    this.hostUpListeners.push(listener);
  }

  async shutdown(): Promise<void> {
    this.connected = false;
    this.shutdownCount++;
  }

  private pickHost(): HostDescriptor {
    const host = this.nodes.find((node) => node.up);
    if (!host) {
      throw new HostUnavailableError(this.nodes[0]?.address ?? 'none');
    }
    return { ...host };
  }

  private setUp(address: string, up: boolean): HostDescriptor {
    const host = this.nodes.find((node) => node.address === address);
    if (!host) {
      throw new Error(`Unknown host ${address}`);
    }
    host.up = up;
    return host;
  }
}
