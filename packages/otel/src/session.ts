import type { Cluster, Session } from '@cqltrace/driver';
import { buildTracingConfig, type TracingOption } from './config';
import { createInstruments } from './metrics';
import { BatchTracer, ConnectTracer, QueryTracer } from './observers';

/**
 * Installs tracing adapters on the cluster's observer slots. An observer
 * already in a slot keeps receiving events, ahead of those passed as options;
 * an adapter left by an earlier call is replaced, not wrapped.
 * Adapters are installed for disabled categories too, so observers registered
 * for them are still called.
 */
export function instrumentCluster(
  cluster: Cluster,
  ...options: TracingOption[]
): Cluster {
  const config = buildTracingConfig(...options);
  const instruments = createInstruments(config.meter);
  const { connectObserver, queryObserver, batchObserver } = cluster;

  cluster.connectObserver = new ConnectTracer(
    config,
    instruments,
    connectObserver instanceof ConnectTracer
      ? connectObserver.wrapped
      : connectObserver,
  );
  cluster.queryObserver = new QueryTracer(
    config,
    instruments,
    queryObserver instanceof QueryTracer ? queryObserver.wrapped : queryObserver,
  );
  cluster.batchObserver = new BatchTracer(
    config,
    instruments,
    batchObserver instanceof BatchTracer ? batchObserver.wrapped : batchObserver,
  );

  return cluster;
}

/**
 * Creates a session whose connections, queries and batches are traced.
 * Rejects with the driver's own error when the session cannot be created.
 *
 * @example
 * ```typescript
 * const cluster = new Cluster({ hosts: ['127.0.0.1'], keyspace: 'shop' });
 * const session = await newSessionWithTracing(
 *   cluster,
 *   withConnectInstrumentation(false),
 * );
 *
 * await tracer.startActiveSpan('checkout', async (span) => {
 *   await session.query('INSERT INTO orders (id) VALUES (?)', 42).exec();
 *   span.end();
 * });
 * ```
 */
export async function newSessionWithTracing(
  cluster: Cluster,
  ...options: TracingOption[]
): Promise<Session> {
  return instrumentCluster(cluster, ...options).createSession();
}

export function createConnectObserver(
  ...options: TracingOption[]
): ConnectTracer {
  return new ConnectTracer(buildTracingConfig(...options));
}

export function createQueryObserver(...options: TracingOption[]): QueryTracer {
  return new QueryTracer(buildTracingConfig(...options));
}

export function createBatchObserver(...options: TracingOption[]): BatchTracer {
  return new BatchTracer(buildTracingConfig(...options));
}
