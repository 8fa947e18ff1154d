/**
 * Plain-text PDF rendering with pdf-lib.
 *
 * Standard Helvetica only speaks WinAnsi, so every line is mapped onto that
 * charset before drawing. Used for contract downloads, audit exports and
 * signature certificates.
 */

import { PDFDocument, StandardFonts, rgb } from 'pdf-lib';
import type { PDFFont, PDFPage } from 'pdf-lib';

export interface PdfInput {
  title: string;
  subtitle?: string;
  lines: string[];
}

const PAGE_WIDTH = 612; // US Letter
const PAGE_HEIGHT = 792;
const MARGIN = 50;
const FONT_SIZE = 11;
const HEADING_SIZE = 16;
const LINE_HEIGHT = 14;
const TEXT_WIDTH = PAGE_WIDTH - MARGIN * 2;

// cp1252 code points outside Latin-1
const WIN_ANSI_EXTRAS = new Set('€‚ƒ„…†‡ˆ‰Š‹ŒŽ‘’“”•–—˜™š›œžŸ');

export function toWinAnsi(text: string): string {
  let out = '';
  for (const ch of text.replace(/\t/g, '    ')) {
    const code = ch.codePointAt(0) ?? 0;
    const printable = (code >= 0x20 && code <= 0x7e) || (code >= 0xa0 && code <= 0xff);
    out += printable || WIN_ANSI_EXTRAS.has(ch) ? ch : '?';
  }
  return out;
}

/** Flattens contract HTML into text lines; block elements become line breaks. */
export function htmlToText(html: string): string {
  return html
    .replace(/<(style|script)[^>]*>[\s\S]*?<\/\1>/gi, '')
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<li[^>]*>/gi, '• ')
    .replace(/<\/(p|div|h[1-6]|li|tr|ul|ol|table)>/gi, '\n')
    .replace(/<[^>]+>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function wrapText(text: string, font: PDFFont, size: number, maxWidth: number): string[] {
  const fits = (value: string) => font.widthOfTextAtSize(value, size) <= maxWidth;
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(' ')) {
    const candidate = current ? `${current} ${word}` : word;
    if (fits(candidate)) {
      current = candidate;
      continue;
    }
    if (current) lines.push(current);
    current = '';
    // Words wider than a line (URLs, hashes) break between characters
    for (const char of word) {
      if (current && !fits(current + char)) {
        lines.push(current);
        current = char;
      } else {
        current += char;
      }
    }
  }
  lines.push(current);
  return lines;
}

export async function renderPdf(input: PdfInput): Promise<Uint8Array> {
  const doc = await PDFDocument.create();
  doc.setTitle(input.title);
  const regular = await doc.embedFont(StandardFonts.Helvetica);
  const bold = await doc.embedFont(StandardFonts.HelveticaBold);

  let page: PDFPage = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
  let y = PAGE_HEIGHT - MARGIN;

  const draw = (text: string, font: PDFFont, size: number, lineHeight: number) => {
    if (y < MARGIN) {
      page = doc.addPage([PAGE_WIDTH, PAGE_HEIGHT]);
      y = PAGE_HEIGHT - MARGIN;
    }
    page.drawText(text, { x: MARGIN, y, size, font, color: rgb(0, 0, 0) });
    y -= lineHeight;
  };

  for (const line of wrapText(toWinAnsi(input.title), bold, HEADING_SIZE, TEXT_WIDTH)) {
    draw(line, bold, HEADING_SIZE, HEADING_SIZE + 6);
  }
  if (input.subtitle) {
    draw(toWinAnsi(input.subtitle), regular, FONT_SIZE - 2, LINE_HEIGHT);
  }
  y -= LINE_HEIGHT;

  for (const raw of input.lines.flatMap((l) => l.split('\n'))) {
    const line = toWinAnsi(raw.trimEnd());
    if (!line) {
      y -= LINE_HEIGHT / 2;
      continue;
    }
    for (const wrapped of wrapText(line, regular, FONT_SIZE, TEXT_WIDTH)) {
      draw(wrapped, regular, FONT_SIZE, LINE_HEIGHT);
    }
  }

  return doc.save();
}
