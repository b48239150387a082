export {
  ATTRIBUTES,
  DB_SYSTEM,
  type HostAttributeSet,
  type HostState,
  hostAttributes,
} from './attributes';
export {
  buildTracingConfig,
  INSTRUMENTATION_NAME,
  INSTRUMENTATION_VERSION,
  type TracingConfig,
  type TracingConfigDraft,
  type TracingOption,
  withBatchInstrumentation,
  withBatchObserver,
  withConnectInstrumentation,
  withConnectObserver,
  withLogger,
  withMeter,
  withQueryInstrumentation,
  withQueryObserver,
  withTracer,
} from './config';
export {
  type CassandraInstruments,
  createInstruments,
  METRIC_NAMES,
  recordBatch,
  recordConnect,
  recordQuery,
} from './metrics';
export { BatchTracer, ConnectTracer, QueryTracer } from './observers';
export {
  createBatchObserver,
  createConnectObserver,
  createQueryObserver,
  instrumentCluster,
  newSessionWithTracing,
} from './session';
export {
  attributesFor,
  type EventKind,
  recordSpanError,
  SPAN_NAMES,
  type SpanName,
  spanNameFor,
} from './spans';
