import {
  type Attributes,
  type Context,
  ROOT_CONTEXT,
  type Span,
  SpanKind,
} from '@opentelemetry/api';
import type {
  BatchObserver,
  ConnectObserver,
  HostDescriptor,
  ObservedBatch,
  ObservedConnect,
  ObservedQuery,
  QueryObserver,
} from '@cqltrace/driver';
import type { TracingConfig } from './config';
import {
  type CassandraInstruments,
  createInstruments,
  recordBatch,
  recordConnect,
  recordQuery,
} from './metrics';
import {
  attributesFor,
  type EventKind,
  recordSpanError,
  spanNameFor,
} from './spans';

interface TimedEvent {
  host?: HostDescriptor;
  start: Date;
  end: Date;
  error?: Error;
}

/**
 * Shared lifecycle of the three adapters: span, then metrics, then the extra
 * observers. Each step is isolated so a failure in one never skips the others
 * and nothing escapes to the driver.
 *
 * `wrapped` is the observer the adapter replaced on a cluster slot; it is
 * notified before the configured observers.
 */
abstract class EventTracer<E extends TimedEvent, O> {
  protected abstract readonly kind: EventKind;

  constructor(
    protected readonly config: TracingConfig,
    protected readonly instruments: CassandraInstruments = createInstruments(
      config.meter,
    ),
    readonly wrapped?: O,
  ) {}

  protected abstract get enabled(): boolean;
  protected abstract get observers(): readonly O[];
  protected abstract parentContext(event: E): Context;
  protected abstract attributes(event: E): Attributes;
  protected abstract recordMetrics(event: E): void;
  protected abstract notify(observer: O, event: E): void;

  protected handle(event: E): void {
    if (this.enabled) {
      this.guard('Failed to record span', () => this.traceEvent(event));
      this.guard('Failed to record metrics', () => this.recordMetrics(event));
    }

    const observers = this.wrapped
      ? [this.wrapped, ...this.observers]
      : this.observers;
    for (const observer of observers) {
      this.guard('Observer threw while handling event', () =>
        this.notify(observer, event),
      );
    }
  }

  private traceEvent(event: E): void {
    let span: Span | undefined;
    try {
      span = this.config.tracer.startSpan(
        spanNameFor(this.kind),
        { kind: SpanKind.CLIENT, startTime: event.start },
        this.parentContext(event),
      );
      span.setAttributes(this.attributes(event));
      if (event.error) {
        recordSpanError(span, event.error);
      }
    } finally {
      span?.end(event.end);
    }
  }

  private guard(message: string, step: () => void): void {
    try {
      step();
    } catch (error) {
      this.config.logger.warn(
        { error, operation: spanNameFor(this.kind) },
        message,
      );
    }
  }
}

/**
 * Turns connection attempts into `connect` spans. Connect spans are always
 * roots: a connection opened while a query runs is not part of that query.
 */
export class ConnectTracer
  extends EventTracer<ObservedConnect, ConnectObserver>
  implements ConnectObserver
{
  protected readonly kind = 'connect';

  observeConnect(observed: ObservedConnect): void {
    this.handle(observed);
  }

  protected get enabled(): boolean {
    return this.config.instrumentConnect;
  }

  protected parentContext(): Context {
    return ROOT_CONTEXT;
  }

  protected attributes(event: ObservedConnect): Attributes {
    return attributesFor('connect', event);
  }

  protected recordMetrics(event: ObservedConnect): void {
    recordConnect(this.instruments, event);
  }

  protected get observers(): readonly ConnectObserver[] {
    return this.config.connectObservers;
  }

  protected notify(observer: ConnectObserver, event: ObservedConnect): void {
    observer.observeConnect(event);
  }
}

/**
 * Turns executed statements into `query` spans, children of the context the
 * statement was executed under.
 */
export class QueryTracer
  extends EventTracer<ObservedQuery, QueryObserver>
  implements QueryObserver
{
  protected readonly kind = 'query';

  observeQuery(observed: ObservedQuery): void {
    this.handle(observed);
  }

  protected get enabled(): boolean {
    return this.config.instrumentQuery;
  }

  protected parentContext(event: ObservedQuery): Context {
    return event.context;
  }

  protected attributes(event: ObservedQuery): Attributes {
    return attributesFor('query', event);
  }

  protected recordMetrics(event: ObservedQuery): void {
    recordQuery(this.instruments, event);
  }

  protected get observers(): readonly QueryObserver[] {
    return this.config.queryObservers;
  }

  protected notify(observer: QueryObserver, event: ObservedQuery): void {
    observer.observeQuery(event);
  }
}

export class BatchTracer
  extends EventTracer<ObservedBatch, BatchObserver>
  implements BatchObserver
{
  protected readonly kind = 'batch';

  observeBatch(observed: ObservedBatch): void {
    this.handle(observed);
  }

  protected get enabled(): boolean {
    return this.config.instrumentBatch;
  }

  protected parentContext(event: ObservedBatch): Context {
    return event.context;
  }

  protected attributes(event: ObservedBatch): Attributes {
    return attributesFor('batch', event);
  }

  protected recordMetrics(event: ObservedBatch): void {
    recordBatch(this.instruments, event);
  }

  protected get observers(): readonly BatchObserver[] {
    return this.config.batchObservers;
  }

  protected notify(observer: BatchObserver, event: ObservedBatch): void {
    observer.observeBatch(event);
  }
}
