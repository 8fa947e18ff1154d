import type { ContractDetailDto } from '@quill/shared';
import { htmlToText, renderPdf } from './pdf';

/** The printable contract: its latest content followed by the signing roster. */
export function renderContractDocument(contract: ContractDetailDto): Promise<Uint8Array> {
  const body = contract.content ? htmlToText(contract.content) : 'No content has been written yet.';
  const roster = contract.parties.map(
    (p) => `${p.order}. ${p.role}: ${p.name} <${p.email}> - ${p.signatureStatus}${p.signedAt ? ` ${p.signedAt}` : ''}`,
  );

  return renderPdf({
    title: contract.title,
    subtitle: `Status ${contract.status} - contract ${contract.id}`,
    lines: roster.length > 0 ? [body, '', 'Parties', ...roster] : [body],
  });
}
