import { type Meter, metrics, type Tracer, trace } from '@opentelemetry/api';
import type {
  BatchObserver,
  ConnectObserver,
  QueryObserver,
} from '@cqltrace/driver';
import { DEFAULT_LOGGER, type Logger } from '@cqltrace/logger';

export const INSTRUMENTATION_NAME = '@cqltrace/otel';
export const INSTRUMENTATION_VERSION = '0.1.0';

/**
 * Resolved instrumentation settings. Built once by `buildTracingConfig` and
 * frozen, observer lists included.
 */
export interface TracingConfig {
  readonly tracer: Tracer;
  readonly meter: Meter;
  readonly logger: Logger;
  readonly connectObservers: readonly ConnectObserver[];
  readonly queryObservers: readonly QueryObserver[];
  readonly batchObservers: readonly BatchObserver[];
  readonly instrumentConnect: boolean;
  readonly instrumentQuery: boolean;
  readonly instrumentBatch: boolean;
}

/**
 * Mutable view of the configuration handed to each option while building.
 */
export interface TracingConfigDraft {
  tracer: Tracer;
  meter: Meter;
  logger: Logger;
  connectObservers: ConnectObserver[];
  queryObservers: QueryObserver[];
  batchObservers: BatchObserver[];
  instrumentConnect: boolean;
  instrumentQuery: boolean;
  instrumentBatch: boolean;
}

export type TracingOption = (draft: TracingConfigDraft) => void;

/**
 * Uses the given tracer instead of the globally registered provider's.
 * A missing tracer keeps the default.
 */
export function withTracer(tracer: Tracer | null | undefined): TracingOption {
  return (draft) => {
    if (tracer) {
      draft.tracer = tracer;
    }
  };
}

/**
 * Uses the given meter instead of the globally registered provider's.
 * A missing meter keeps the default.
 */
export function withMeter(meter: Meter | null | undefined): TracingOption {
  return (draft) => {
    if (meter) {
      draft.meter = meter;
    }
  };
}

/** Logger for telemetry failures and misbehaving observers */
export function withLogger(logger: Logger): TracingOption {
  return (draft) => {
    draft.logger = logger;
  };
}

export function withConnectObserver(observer: ConnectObserver): TracingOption {
  return (draft) => {
    draft.connectObservers.push(observer);
  };
}

export function withQueryObserver(observer: QueryObserver): TracingOption {
  return (draft) => {
    draft.queryObservers.push(observer);
  };
}

export function withBatchObserver(observer: BatchObserver): TracingOption {
  return (draft) => {
    draft.batchObservers.push(observer);
  };
}

/**
 * Toggles connect spans and metrics. Connect observers registered through
 * `withConnectObserver` are called either way.
 */
export function withConnectInstrumentation(enabled: boolean): TracingOption {
  return (draft) => {
    draft.instrumentConnect = enabled;
  };
}

export function withQueryInstrumentation(enabled: boolean): TracingOption {
  return (draft) => {
    draft.instrumentQuery = enabled;
  };
}

export function withBatchInstrumentation(enabled: boolean): TracingOption {
  return (draft) => {
    draft.instrumentBatch = enabled;
  };
}

/**
 * Applies the options, in order, on top of the defaults.
 *
 * @example
 * ```typescript
 * const config = buildTracingConfig(
 *   withTracer(provider.getTracer('orders')),
 *   withConnectInstrumentation(false),
 * );
 * ```
 */
export function buildTracingConfig(...options: TracingOption[]): TracingConfig {
  const draft: TracingConfigDraft = {
    tracer: trace.getTracer(INSTRUMENTATION_NAME, INSTRUMENTATION_VERSION),
    meter: metrics.getMeter(INSTRUMENTATION_NAME, INSTRUMENTATION_VERSION),
    logger: DEFAULT_LOGGER,
    connectObservers: [],
    queryObservers: [],
    batchObservers: [],
    instrumentConnect: true,
    instrumentQuery: true,
    instrumentBatch: true,
  };

  for (const option of options) {
    option(draft);
  }

  return Object.freeze({
    ...draft,
    logger: draft.logger.child({ instrumentation: INSTRUMENTATION_NAME }),
    connectObservers: Object.freeze([...draft.connectObservers]),
    queryObservers: Object.freeze([...draft.queryObservers]),
    batchObservers: Object.freeze([...draft.batchObservers]),
  });
}
