/**
 * Post-commit domain events.
 *
 * Services publish an event only after the transaction it describes has
 * committed. Consumers (notifications) run outside that transaction and can
 * neither undo nor block it; the activity trail stays the record of what
 * happened.
 */

import { randomUUID } from 'node:crypto';
import type { ContractStatus, VersionSource } from './types';

/** Payload carried by each event type. */
export interface DomainEventPayloads {
  ContractCreated: { title: string; duplicatedFrom?: string };
  ContractContentUpdated: { version: number; source: VersionSource };
  ContractStatusChanged: { oldStatus: ContractStatus; newStatus: ContractStatus; reason: string | null };
  ContractDeleted: Record<string, never>;
  SignatureRequested: { partyId: string; email: string; name: string; signUrl: string };
  PartySigned: { partyId: string; signatureId: string };
}

export type DomainEventType = keyof DomainEventPayloads;

export interface DomainEventOf<K extends DomainEventType> {
  type: K;
  contractId: string;
  /** Null when a guest acted through a signing token. */
  actorId: string | null;
  payload: DomainEventPayloads[K];
  occurredAt: Date;
  correlationId: string;
}

/** Any domain event; `type` narrows `payload`. */
export type DomainEvent = { [K in DomainEventType]: DomainEventOf<K> }[DomainEventType];

export type EventHandler<K extends DomainEventType> = (event: DomainEventOf<K>) => Promise<void> | void;

export function createDomainEvent<K extends DomainEventType>(
  type: K,
  contractId: string,
  actorId: string | null,
  payload: DomainEventPayloads[K],
  correlationId: string = randomUUID(),
): DomainEventOf<K> {
  return { type, contractId, actorId, payload, occurredAt: new Date(), correlationId };
}

function isEventOf<K extends DomainEventType>(event: { type: DomainEventType }, type: K): event is DomainEventOf<K> {
  return event.type === type;
}

export interface EventBus {
  /** Resolves once every handler of the event's type has settled. */
  publish(event: DomainEvent): Promise<void>;
  /** Returns the function that removes this subscription. */
  subscribe<K extends DomainEventType>(type: K, handler: EventHandler<K>): () => void;
}

export interface InProcessEventBusOptions {
  /** Receives every handler failure; the other handlers still run. */
  onHandlerError?: (error: unknown, event: DomainEvent) => void;
}

type Listener = (event: DomainEvent) => Promise<void> | void;

export class InProcessEventBus implements EventBus {
  private readonly listeners = new Map<DomainEventType, Set<Listener>>();

  constructor(private readonly options: InProcessEventBusOptions = {}) {}

  async publish(event: DomainEvent): Promise<void> {
    const listeners = [...(this.listeners.get(event.type) ?? [])];
    const results = await Promise.allSettled(listeners.map(async (listener) => listener(event)));
    for (const result of results) {
      if (result.status === 'rejected') this.options.onHandlerError?.(result.reason, event);
    }
  }

  subscribe<K extends DomainEventType>(type: K, handler: EventHandler<K>): () => void {
    const listener: Listener = (event) => (isEventOf(event, type) ? handler(event) : undefined);
    const forType = this.listeners.get(type) ?? new Set<Listener>();
    this.listeners.set(type, forType.add(listener));

    return () => {
      forType.delete(listener);
      if (forType.size === 0 && this.listeners.get(type) === forType) this.listeners.delete(type);
    };
  }
}
