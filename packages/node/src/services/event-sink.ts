/**
 * Observing event sink.
 *
 * Logs every committed vault event and counts it by type.
 */

import type { VaultEvent, VaultEventSink } from "@custody/types";
import type { MetricsCollector } from "../middleware/metrics.js";

export interface EventLogger {
  info(obj: Record<string, unknown>, msg: string): void;
}

function payloadFields(event: VaultEvent): Record<string, string> {
  const fields: Record<string, string> = {};
  for (const [key, value] of Object.entries(event.payload)) {
    fields[key] = String(value);
  }
  return fields;
}

export class ObservingEventSink implements VaultEventSink {
  constructor(
    private readonly logger?: EventLogger,
    private readonly metrics?: MetricsCollector,
  ) {}

  emit(event: VaultEvent): void {
    this.metrics?.incrementCounter("custody_events_total", { type: event.type });
    this.logger?.info(
      {
        eventType: event.type,
        eventId: event.metadata.eventId,
        correlationId: event.metadata.correlationId,
        ...payloadFields(event),
      },
      event.type,
    );
  }
}
