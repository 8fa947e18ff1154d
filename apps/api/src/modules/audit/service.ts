/**
 * Read-only projection of the activity trail for auditors.
 * Events are listed oldest first, the order in which they happened.
 */

import type { AuditEventDto, AuditService, AuditTrailDto, Identity } from '@quill/shared';
import type { ActivityRecord, ContractRecord, ContractStore } from '../../store/types';
import { loadOwnedContract } from '../contract/access';
import { renderPdf } from '../document/pdf';

export function toAuditEvent(entry: ActivityRecord): AuditEventDto {
  return {
    id: entry.id,
    eventType: entry.action,
    actor: entry.userName,
    actorId: entry.userId,
    timestamp: entry.timestamp.toISOString(),
    details: entry.details,
  };
}

/** One line per event: time, type, actor and the details as JSON. */
export function formatAuditLine(event: AuditEventDto): string {
  const details = Object.keys(event.details).length > 0 ? `  ${JSON.stringify(event.details)}` : '';
  return `${event.timestamp}  ${event.eventType}  ${event.actor}${details}`;
}

export class AuditProjection implements AuditService {
  constructor(
    private readonly store: ContractStore,
    private readonly clock: () => Date = () => new Date(),
  ) {}

  async getTrail(identity: Identity, contractId: string): Promise<AuditTrailDto> {
    const { trail } = await this.load(identity, contractId);
    return trail;
  }

  async exportTrail(identity: Identity, contractId: string): Promise<Uint8Array> {
    const { contract, trail } = await this.load(identity, contractId);
    return renderPdf({
      title: `Audit Trail: ${contract.title}`,
      subtitle: `Contract ${contract.id} - generated ${trail.generatedAt}`,
      lines: trail.events.length > 0 ? trail.events.map(formatAuditLine) : ['No recorded events.'],
    });
  }

  private load(identity: Identity, contractId: string): Promise<{ contract: ContractRecord; trail: AuditTrailDto }> {
    return this.store.transaction(async (session) => {
      const contract = await loadOwnedContract(session, contractId, identity);
      const entries = await session.activity.list(contractId);
      return {
        contract,
        trail: {
          contractId,
          events: [...entries].reverse().map(toAuditEvent),
          generatedAt: this.clock().toISOString(),
        },
      };
    });
  }
}
