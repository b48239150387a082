import type { Cluster } from './cluster';
import type { BatchEntry, BatchType, HostDescriptor, Row } from './types';

export interface PageRequest {
  pageSize?: number;
  /** Opaque paging token returned with the previous page */
  pageState?: string;
}

export interface PageResult {
  rows: Row[];
  /** Node that served the page, when the transport knows it */
  host?: HostDescriptor;
  pageState?: string;
}

export interface BatchResult {
  host?: HostDescriptor;
}

/**
 * The seam between a session and the wire. A session owns exactly one
 * transport and shuts it down when closed.
 */
export interface Transport {
  connect(): Promise<void>;
  /** Nodes known after `connect` resolved */
  hosts(): HostDescriptor[];
  execute(
    statement: string,
    values: readonly unknown[],
    page: PageRequest,
  ): Promise<PageResult>;
  batch(entries: readonly BatchEntry[], type: BatchType): Promise<BatchResult>;
  /** Called whenever a node comes (back) up after the initial connect */
  onHostUp(listener: (host: HostDescriptor) => void): void;
  shutdown(): Promise<void>;
}

export type TransportFactory = (cluster: Cluster) => Transport;
