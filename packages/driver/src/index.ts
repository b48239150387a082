export {
  Cluster,
  type ClusterOptions,
  type Credentials,
  DEFAULT_LOCAL_DATA_CENTER,
  DEFAULT_PAGE_SIZE,
  DEFAULT_PORT,
} from './cluster';
export { CassandraTransport, describeHost, splitEndpoint } from './cassandra';
export { type ClusterEnv, clusterEnvSchema, loadClusterOptions } from './config';
export {
  ClusterConfigError,
  type ConfigIssue,
  DriverError,
  HostUnavailableError,
  SessionClosedError,
  toError,
} from './errors';
export {
  type ExecutedBatch,
  type ExecutedStatement,
  MemoryTransport,
  type MemoryTransportOptions,
} from './memory';
export { Batch, Query, Session, type SessionObservers } from './session';
export type {
  BatchResult,
  PageRequest,
  PageResult,
  Transport,
  TransportFactory,
} from './transport';
export {
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
