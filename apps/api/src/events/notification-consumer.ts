/**
 * Notification consumer.
 *
 * Turns post-commit domain events into notifications for the parties and the
 * owner. Delivery sits behind `Notifier`; the default one only logs, so the
 * API runs without a mail provider.
 *
 * A failed delivery rejects the handler; the bus logs it and the other
 * consumers carry on.
 */

import type { DomainEvent, EventBus } from '@quill/shared';
import { logger } from '../shared/logger';

export type NotificationTemplate =
  | 'signature_invitation'
  | 'party_signed'
  | 'contract_completed'
  | 'contract_cancelled';

export interface Notification {
  template: NotificationTemplate;
  contractId: string;
  /** Email address, or null when the owner is notified through the app. */
  recipient: string | null;
  data: Record<string, unknown>;
  correlationId: string;
}

export interface Notifier {
  send(notification: Notification): Promise<void>;
}

export class LogNotifier implements Notifier {
  async send(notification: Notification): Promise<void> {
    // data may carry a sign URL with its token; keep it out of the log
    logger.info(
      {
        template: notification.template,
        contractId: notification.contractId,
        recipient: notification.recipient,
        correlationId: notification.correlationId,
      },
      'Notification ready for delivery',
    );
  }
}

/** Maps an event to its notification, or null when nobody needs to hear about it. */
export function toNotification(event: DomainEvent): Notification | null {
  const base = { contractId: event.contractId, correlationId: event.correlationId };

  switch (event.type) {
    case 'SignatureRequested':
      return {
        ...base,
        template: 'signature_invitation',
        recipient: event.payload.email,
        data: { name: event.payload.name, signUrl: event.payload.signUrl },
      };
    case 'PartySigned':
      return { ...base, template: 'party_signed', recipient: null, data: { partyId: event.payload.partyId } };
    case 'ContractStatusChanged':
      if (event.payload.newStatus === 'SIGNED') {
        return { ...base, template: 'contract_completed', recipient: null, data: {} };
      }
      if (event.payload.newStatus === 'CANCELLED') {
        return { ...base, template: 'contract_cancelled', recipient: null, data: { reason: event.payload.reason } };
      }
      return null;
    default:
      return null;
  }
}

let unsubscribers: Array<() => void> | null = null;

/**
 * Subscribes the consumer on the bus. Calling it again while registered is a no-op.
 */
export function registerNotificationConsumer(bus: EventBus, notifier: Notifier = new LogNotifier()): void {
  if (unsubscribers) {
    logger.warn('Notification consumer already registered, skipping');
    return;
  }

  const deliver = async (event: DomainEvent): Promise<void> => {
    const notification = toNotification(event);
    if (notification) await notifier.send(notification);
  };

  unsubscribers = [
    bus.subscribe('SignatureRequested', deliver),
    bus.subscribe('PartySigned', deliver),
    bus.subscribe('ContractStatusChanged', deliver),
  ];
  logger.info('Notification consumer registered');
}

export function unregisterNotificationConsumer(): void {
  for (const unsubscribe of unsubscribers ?? []) unsubscribe();
  unsubscribers = null;
}
