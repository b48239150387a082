import type {
  Attributes,
  Counter,
  Histogram,
  Meter,
} from '@opentelemetry/api';
import type {
  HostDescriptor,
  ObservedBatch,
  ObservedConnect,
  ObservedQuery,
} from '@cqltrace/driver';
import { ATTRIBUTES, hostAttributes } from './attributes';
import { SPAN_NAMES, type SpanName } from './spans';

export const METRIC_NAMES = {
  QUERIES: 'cassandra.queries',
  BATCHES: 'cassandra.batch.queries',
  CONNECTIONS: 'cassandra.connections',
  ERRORS: 'cassandra.errors',
  ROWS: 'cassandra.rows',
  LATENCY: 'cassandra.latency',
} as const;

export interface CassandraInstruments {
  queries: Counter;
  batches: Counter;
  connections: Counter;
  errors: Counter;
  rows: Histogram;
  latency: Histogram;
}

export function createInstruments(meter: Meter): CassandraInstruments {
  return {
    queries: meter.createCounter(METRIC_NAMES.QUERIES, {
      description: 'Number of queries executed',
      unit: '{query}',
    }),
    batches: meter.createCounter(METRIC_NAMES.BATCHES, {
      description: 'Number of batches executed',
      unit: '{batch}',
    }),
    connections: meter.createCounter(METRIC_NAMES.CONNECTIONS, {
      description: 'Number of connection attempts observed',
      unit: '{connection}',
    }),
    errors: meter.createCounter(METRIC_NAMES.ERRORS, {
      description: 'Number of failed connects, queries and batches',
      unit: '{error}',
    }),
    rows: meter.createHistogram(METRIC_NAMES.ROWS, {
      description: 'Rows returned per query page',
      unit: '{row}',
    }),
    latency: meter.createHistogram(METRIC_NAMES.LATENCY, {
      description: 'Time from request to completion',
      unit: 'ms',
    }),
  };
}

function metricAttributes(
  operation: SpanName,
  host: HostDescriptor | undefined,
  keyspace = '',
): Attributes {
  const described = hostAttributes(host);
  const attributes: Attributes = {
    [ATTRIBUTES.HOST]: described[ATTRIBUTES.HOST],
    [ATTRIBUTES.PORT]: described[ATTRIBUTES.PORT],
    [ATTRIBUTES.OPERATION]: operation,
  };
  if (keyspace) {
    attributes[ATTRIBUTES.KEYSPACE] = keyspace;
  }
  return attributes;
}

function elapsedMs(start: Date, end: Date): number {
  return Math.max(0, end.getTime() - start.getTime());
}

function recordCommon(
  instruments: CassandraInstruments,
  event: { start: Date; end: Date; error?: Error },
  attributes: Attributes,
): void {
  instruments.latency.record(elapsedMs(event.start, event.end), attributes);
  if (event.error) {
    instruments.errors.add(1, attributes);
  }
}

export function recordConnect(
  instruments: CassandraInstruments,
  event: ObservedConnect,
): void {
  const attributes = metricAttributes(SPAN_NAMES.connect, event.host);
  instruments.connections.add(1, attributes);
  recordCommon(instruments, event, attributes);
}

export function recordQuery(
  instruments: CassandraInstruments,
  event: ObservedQuery,
): void {
  const attributes = metricAttributes(
    SPAN_NAMES.query,
    event.host,
    event.keyspace,
  );
  instruments.queries.add(1, attributes);
  instruments.rows.record(event.rows, attributes);
  recordCommon(instruments, event, attributes);
}

export function recordBatch(
  instruments: CassandraInstruments,
  event: ObservedBatch,
): void {
  const attributes = metricAttributes(
    SPAN_NAMES.batch,
    event.host,
    event.keyspace,
  );
  instruments.batches.add(1, attributes);
  recordCommon(instruments, event, attributes);
}
