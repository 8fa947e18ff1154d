import type { Response } from 'express';

/** Sends PDF bytes as a download. */
export function sendPdf(res: Response, bytes: Uint8Array, filename: string): void {
  res.setHeader('Content-Type', 'application/pdf');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(Buffer.from(bytes));
}

export function sendZip(res: Response, bytes: Buffer, filename: string): void {
  res.setHeader('Content-Type', 'application/zip');
  res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
  res.send(bytes);
}
