/**
 * Vault events — builders and an in-memory sink.
 */

import { randomUUID } from "node:crypto";
import type {
  BalanceChangedEvent,
  BalanceChangedPayload,
  DepositCompletedEvent,
  DepositCompletedPayload,
  EventMetadata,
  VaultEvent,
  VaultEventSink,
  VaultEventType,
  WithdrawCompletedEvent,
  WithdrawCompletedPayload,
} from "@custody/types";

function metadata(correlationId: string, now: number): EventMetadata {
  return {
    eventId: randomUUID(),
    timestamp: new Date(now).toISOString(),
    correlationId,
  };
}

export function depositCompleted(
  payload: DepositCompletedPayload,
  correlationId: string,
  now: number,
): DepositCompletedEvent {
  return { type: "deposit.completed", metadata: metadata(correlationId, now), payload };
}

export function withdrawCompleted(
  payload: WithdrawCompletedPayload,
  correlationId: string,
  now: number,
): WithdrawCompletedEvent {
  return { type: "withdraw.completed", metadata: metadata(correlationId, now), payload };
}

export function balanceChanged(
  payload: BalanceChangedPayload,
  correlationId: string,
  now: number,
): BalanceChangedEvent {
  return { type: "balance.changed", metadata: metadata(correlationId, now), payload };
}

// ─── Recording sink ──────────────────────────────────────────────────────

/**
 * Keeps every emitted event in order. Useful for tests and for
 * inspecting a vault's history in development.
 */
export class RecordingEventSink implements VaultEventSink {
  private readonly recorded: VaultEvent[] = [];

  emit(event: VaultEvent): void {
    this.recorded.push(event);
  }

  get events(): readonly VaultEvent[] {
    return [...this.recorded];
  }

  types(): VaultEventType[] {
    return this.recorded.map((e) => e.type);
  }

  clear(): void {
    this.recorded.length = 0;
  }
}
