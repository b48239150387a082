import type { Meter, Tracer } from '@opentelemetry/api';
import {
  DataPointType,
  type MetricData,
  MeterProvider,
  MetricReader,
} from '@opentelemetry/sdk-metrics';
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  type ReadableSpan,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-base';

class CollectingReader extends MetricReader {
  protected async onForceFlush(): Promise<void> {}

  protected async onShutdown(): Promise<void> {}
}

export interface TestTelemetry {
  tracer: Tracer;
  meter: Meter;
  spans(): ReadableSpan[];
  span(name: string): ReadableSpan | undefined;
  metric(name: string): Promise<MetricData | undefined>;
}

/**
 * Tracer and meter backed by in-memory SDK components, independent of the
 * globally registered providers.
 */
export function createTestTelemetry(): TestTelemetry {
  const exporter = new InMemorySpanExporter();
  const tracerProvider = new BasicTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });
  const reader = new CollectingReader();
  const meterProvider = new MeterProvider({ readers: [reader] });

  return {
    tracer: tracerProvider.getTracer('cqltrace-test'),
    meter: meterProvider.getMeter('cqltrace-test'),
    spans: () => exporter.getFinishedSpans(),
    span: (name) =>
      exporter.getFinishedSpans().find((span) => span.name === name),
    metric: async (name) => {
      const { resourceMetrics } = await reader.collect();
      return resourceMetrics.scopeMetrics
        .flatMap((scope) => scope.metrics)
        .find((metric) => metric.descriptor.name === name);
    },
  };
}

/** Sum of every data point of a counter, 0 when nothing was recorded */
export function counterTotal(metric: MetricData | undefined): number {
  if (metric?.dataPointType !== DataPointType.SUM) {
    return 0;
  }
  return metric.dataPoints.reduce((total, point) => total + point.value, 0);
}

/** Number of values recorded by a histogram */
export function histogramCount(metric: MetricData | undefined): number {
  if (metric?.dataPointType !== DataPointType.HISTOGRAM) {
    return 0;
  }
  return metric.dataPoints.reduce(
    (total, point) => total + point.value.count,
    0,
  );
}

/** Sum of the values recorded by a histogram */
export function histogramSum(metric: MetricData | undefined): number {
  if (metric?.dataPointType !== DataPointType.HISTOGRAM) {
    return 0;
  }
  return metric.dataPoints.reduce(
    (total, point) => total + (point.value.sum ?? 0),
    0,
  );
}
