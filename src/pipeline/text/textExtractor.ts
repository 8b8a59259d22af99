import { UnreadableDocument } from '../../errors.js';
import type { DecryptedDocument } from '../decrypt/passwordResolver.js';
import type { PositionedText } from '../decrypt/pdfOpener.js';

const LINE_TOLERANCE = 2;
const WORD_GAP = 1;
const COLUMN_GAP = 12;

/** Groups one page's text items into lines, top to bottom, left to right. */
export function itemsToLines(items: PositionedText[]): string[] {
  const visible = items.filter((item) => item.str.trim().length > 0);
  // Higher y is nearer the top of the page.
  const sorted = [...visible].sort((a, b) => {
    const yDiff = b.y - a.y;
    if (Math.abs(yDiff) > LINE_TOLERANCE) return yDiff;
    return a.x - b.x;
  });

  const rows: PositionedText[][] = [];
  for (const item of sorted) {
    const current = rows[rows.length - 1];
    if (current && Math.abs(current[0].y - item.y) <= LINE_TOLERANCE) {
      current.push(item);
    } else {
      rows.push([item]);
    }
  }

  return rows
    .map((row) => {
      row.sort((a, b) => a.x - b.x);
      let line = '';
      let end = Number.NEGATIVE_INFINITY;
      for (const item of row) {
        if (line) {
          const gap = item.x - end;
          line += gap > COLUMN_GAP ? '  ' : gap > WORD_GAP ? ' ' : '';
        }
        line += item.str.trim();
        end = item.x + item.width;
      }
      return line;
    })
    .filter(Boolean);
}

export class TextExtractor {
  async extract(document: DecryptedDocument): Promise<string[]> {
    const lines: string[] = [];
    for (let pageNumber = 1; pageNumber <= document.pdf.numPages; pageNumber += 1) {
      lines.push(...itemsToLines(await document.pdf.pageText(pageNumber)));
    }

    if (lines.length === 0) {
      throw new UnreadableDocument(document.filename);
    }
    return lines;
  }
}
