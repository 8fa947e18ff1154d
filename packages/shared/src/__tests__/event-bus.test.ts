import { describe, it, expect, vi } from 'vitest';
import { createDomainEvent, InProcessEventBus } from '../event-bus';
import type { DomainEvent } from '../event-bus';

const signed = createDomainEvent('PartySigned', 'contract-1', null, { partyId: 'party-1', signatureId: 'sig-1' });
const completed = createDomainEvent(
  'ContractStatusChanged',
  'contract-1',
  'user-owner',
  { oldStatus: 'SIGNING', newStatus: 'SIGNED', reason: 'All parties signed' },
  'req-7',
);

describe('createDomainEvent', () => {
  it('carries the contract, actor, payload and correlation id', () => {
    expect(completed).toEqual({
      type: 'ContractStatusChanged',
      contractId: 'contract-1',
      actorId: 'user-owner',
      payload: { oldStatus: 'SIGNING', newStatus: 'SIGNED', reason: 'All parties signed' },
      occurredAt: expect.any(Date),
      correlationId: 'req-7',
    });
  });

  it('draws a fresh correlation id when none is given', () => {
    const other = createDomainEvent('PartySigned', 'contract-1', null, { partyId: 'party-1', signatureId: 'sig-1' });

    expect(signed.correlationId).toMatch(/^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/);
    expect(other.correlationId).not.toBe(signed.correlationId);
  });
});

describe('InProcessEventBus', () => {
  it('delivers an event only to handlers of its type', async () => {
    const bus = new InProcessEventBus();
    const onSigned = vi.fn();
    const onStatus = vi.fn();
    bus.subscribe('PartySigned', onSigned);
    bus.subscribe('ContractStatusChanged', onStatus);

    await bus.publish(signed);

    expect(onSigned).toHaveBeenCalledWith(signed);
    expect(onStatus).not.toHaveBeenCalled();
  });

  it('narrows the payload for typed handlers', async () => {
    const bus = new InProcessEventBus();
    const statuses: string[] = [];
    bus.subscribe('ContractStatusChanged', (event) => {
      statuses.push(`${event.payload.oldStatus}->${event.payload.newStatus}`);
    });

    await bus.publish(completed);

    expect(statuses).toEqual(['SIGNING->SIGNED']);
  });

  it('waits for async handlers before publish resolves', async () => {
    const bus = new InProcessEventBus();
    const delivered: string[] = [];
    bus.subscribe('PartySigned', async (event) => {
      await new Promise((resolve) => setTimeout(resolve, 5));
      delivered.push(event.payload.partyId);
    });

    await bus.publish(signed);

    expect(delivered).toEqual(['party-1']);
  });

  it('stops delivering once the subscription is removed', async () => {
    const bus = new InProcessEventBus();
    const handler = vi.fn();
    const unsubscribe = bus.subscribe('PartySigned', handler);

    await bus.publish(signed);
    unsubscribe();
    unsubscribe();
    await bus.publish(signed);

    expect(handler).toHaveBeenCalledTimes(1);
  });

  it('keeps other subscriptions of the same type when one is removed', async () => {
    const bus = new InProcessEventBus();
    const first = vi.fn();
    const second = vi.fn();
    const removeFirst = bus.subscribe('PartySigned', first);
    bus.subscribe('PartySigned', second);

    removeFirst();
    await bus.publish(signed);

    expect(first).not.toHaveBeenCalled();
    expect(second).toHaveBeenCalledTimes(1);
  });

  it('reports a failing handler and still runs the others', async () => {
    const failures: Array<{ error: unknown; event: DomainEvent }> = [];
    const bus = new InProcessEventBus({ onHandlerError: (error, event) => failures.push({ error, event }) });
    const boom = new Error('smtp down');
    const after = vi.fn();
    bus.subscribe('PartySigned', () => {
      throw boom;
    });
    bus.subscribe('PartySigned', after);

    await expect(bus.publish(signed)).resolves.toBeUndefined();

    expect(after).toHaveBeenCalledTimes(1);
    expect(failures).toEqual([{ error: boom, event: signed }]);
  });

  it('publishes with no subscribers', async () => {
    const onHandlerError = vi.fn();
    const bus = new InProcessEventBus({ onHandlerError });

    await bus.publish(createDomainEvent('ContractDeleted', 'contract-1', 'user-owner', {}));

    expect(onHandlerError).not.toHaveBeenCalled();
  });
});
