import {
  type Attributes,
  type AttributeValue,
  type Span,
  SpanStatusCode,
} from '@opentelemetry/api';
import {
  type ObservedBatch,
  type ObservedConnect,
  type ObservedQuery,
  toError,
} from '@cqltrace/driver';
import { ATTRIBUTES, DB_SYSTEM, hostAttributes } from './attributes';

export type EventKind = 'connect' | 'query' | 'batch';

export const SPAN_NAMES = {
  connect: 'connect',
  query: 'query',
  batch: 'batch-query',
} as const satisfies Record<EventKind, string>;

export type SpanName = (typeof SPAN_NAMES)[EventKind];

export function spanNameFor(kind: EventKind): SpanName {
  return SPAN_NAMES[kind];
}

/**
 * Builds the attribute set for an observed event: the host attributes, the
 * system marker and whatever the event kind adds on top.
 */
export function attributesFor(kind: 'connect', event: ObservedConnect): Attributes;
export function attributesFor(kind: 'query', event: ObservedQuery): Attributes;
export function attributesFor(kind: 'batch', event: ObservedBatch): Attributes;
export function attributesFor(
  kind: EventKind,
  event: ObservedConnect | ObservedQuery | ObservedBatch,
): Attributes {
  const attributes: Record<string, AttributeValue> = {
    [ATTRIBUTES.SYSTEM]: DB_SYSTEM,
    ...hostAttributes(event.host),
  };

  if (kind === 'query' && 'statement' in event) {
    attributes[ATTRIBUTES.STATEMENT] = event.statement;
    if (event.keyspace) {
      attributes[ATTRIBUTES.KEYSPACE] = event.keyspace;
    }
    if (!event.error) {
      attributes[ATTRIBUTES.ROWS_RETURNED] = event.rows;
    }
  } else if (kind === 'batch' && 'statements' in event) {
    attributes[ATTRIBUTES.BATCH_STATEMENTS] = [...event.statements];
    attributes[ATTRIBUTES.BATCH_QUERIES] = event.statements.length;
    if (event.keyspace) {
      attributes[ATTRIBUTES.KEYSPACE] = event.keyspace;
    }
  }

  return attributes;
}

/**
 * Marks a span as failed with the driver's error.
 */
export function recordSpanError(span: Span, error: unknown): void {
  const err = toError(error);
  span.recordException(err);
  span.setStatus({ code: SpanStatusCode.ERROR, message: err.message });
  span.setAttribute(ATTRIBUTES.ERROR_MESSAGE, err.message);
}
