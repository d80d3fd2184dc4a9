import { metricSnapshotSchema, type MetricSnapshot } from '@wellness-automation/shared';

export type MetricSnapshotHandler = (snapshot: MetricSnapshot) => Promise<void>;

export interface MetricFeed {
  subscribe(handler: MetricSnapshotHandler): () => void;
}

/**
 * Boundary stand-in for the ingestion pipeline. Payloads are validated at
 * the edge; a non-numeric metric value rejects the whole snapshot.
 */
export class InMemoryMetricFeed implements MetricFeed {
  private readonly handlers = new Set<MetricSnapshotHandler>();

  subscribe(handler: MetricSnapshotHandler): () => void {
    this.handlers.add(handler);
    return () => {
      this.handlers.delete(handler);
    };
  }

  async publish(payload: unknown): Promise<MetricSnapshot> {
    const snapshot = metricSnapshotSchema.parse(payload);
    for (const handler of this.handlers) {
      await handler(snapshot);
    }

    return snapshot;
  }
}
