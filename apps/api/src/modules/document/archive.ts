import { PassThrough } from 'node:stream';
import archiver from 'archiver';
import type { ContractContentDto } from '@quill/shared';

export interface ArchiveEntry {
  name: string;
  data: string | Uint8Array;
}

const UNSAFE_FILENAME_CHARS = /[\\/:*?"<>|\u0000-\u001f]/g;

/** `Lease Agreement_6f1c2a7e.html`: title (at most 50 chars) plus the id prefix. */
export function contractEntryName(contract: Pick<ContractContentDto, 'id' | 'title'>): string {
  const title = contract.title.replace(UNSAFE_FILENAME_CHARS, '-').slice(0, 50);
  return `${title}_${contract.id.slice(0, 8)}.html`;
}

/** Builds a deflated ZIP in memory. */
export async function buildZip(entries: ArchiveEntry[]): Promise<Buffer> {
  const archive = archiver('zip', { zlib: { level: 9 } });
  const sink = new PassThrough();
  const chunks: Buffer[] = [];

  const done = new Promise<Buffer>((resolve, reject) => {
    sink.on('data', (chunk: Buffer) => chunks.push(chunk));
    sink.on('end', () => resolve(Buffer.concat(chunks)));
    sink.on('error', reject);
    archive.on('error', reject);
  });

  archive.pipe(sink);
  for (const entry of entries) {
    archive.append(Buffer.from(entry.data), { name: entry.name });
  }
  await archive.finalize();
  return done;
}

/** One HTML file per contract, named so that equal titles do not collide. */
export function buildContractArchive(contents: ContractContentDto[]): Promise<Buffer> {
  return buildZip(contents.map((contract) => ({ name: contractEntryName(contract), data: contract.content ?? '' })));
}
