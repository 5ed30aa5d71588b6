/**
 * Event Types
 *
 * Every committed vault operation is reported as a DomainEvent.
 *
 * Rules:
 * - Events are immutable after creation
 * - Events are emitted only after an operation fully commits
 * - A rejected operation emits nothing
 */

import type { AccountId, AccountingValue, AssetId, Balance } from "./financial.js";

/**
 * Metadata common to all domain events.
 */
export interface EventMetadata {
  /** Unique event ID */
  readonly eventId: string;

  /** ISO 8601 timestamp */
  readonly timestamp: string;

  /** Groups the events emitted by one operation */
  readonly correlationId: string;
}

/**
 * A domain event, discriminated by `type`.
 */
export interface DomainEvent<
  TType extends string = string,
  TPayload extends object = Readonly<Record<string, unknown>>,
> {
  readonly type: TType;
  readonly metadata: EventMetadata;
  readonly payload: TPayload;
}

export interface DepositCompletedPayload {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
  readonly accountingValue: AccountingValue;
}

export interface WithdrawCompletedPayload {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly amount: Balance;
}

export interface BalanceChangedPayload {
  readonly account: AccountId;
  readonly asset: AssetId;
  readonly newBalance: Balance;
}

export type DepositCompletedEvent = DomainEvent<"deposit.completed", DepositCompletedPayload>;
export type WithdrawCompletedEvent = DomainEvent<"withdraw.completed", WithdrawCompletedPayload>;
export type BalanceChangedEvent = DomainEvent<"balance.changed", BalanceChangedPayload>;

export type VaultEvent =
  | DepositCompletedEvent
  | WithdrawCompletedEvent
  | BalanceChangedEvent;

export type VaultEventType = VaultEvent["type"];

/**
 * Observability sink. Called synchronously after commit; a throwing
 * sink never undoes the operation that produced the event.
 */
export interface VaultEventSink {
  emit(event: VaultEvent): void;
}
