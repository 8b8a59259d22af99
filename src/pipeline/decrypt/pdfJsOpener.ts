import { getDocument, PasswordResponses } from 'pdfjs-dist/legacy/build/pdf.mjs';
import type { OpenedPdf, PdfOpener, PositionedText } from './pdfOpener.js';
import { IncorrectPassword, PasswordRequired } from './pdfOpener.js';

type PdfDocument = Awaited<ReturnType<typeof getDocument>['promise']>;

function passwordCode(error: unknown): number | null {
  if (error instanceof Error && error.name === 'PasswordException' && 'code' in error && typeof error.code === 'number') {
    return error.code;
  }
  return null;
}

class PdfJsDocument implements OpenedPdf {
  constructor(private readonly doc: PdfDocument) {}

  get numPages(): number {
    return this.doc.numPages;
  }

  async pageText(pageNumber: number): Promise<PositionedText[]> {
    const page = await this.doc.getPage(pageNumber);
    const content = await page.getTextContent();
    const items: PositionedText[] = [];
    for (const item of content.items) {
      if ('str' in item && 'transform' in item) {
        const transform: number[] = item.transform;
        items.push({ str: item.str, x: transform[4], y: transform[5], width: item.width });
      }
    }
    page.cleanup();
    return items;
  }

  async close(): Promise<void> {
    await this.doc.destroy();
  }
}

export class PdfJsOpener implements PdfOpener {
  async open(bytes: Uint8Array, password?: string): Promise<OpenedPdf> {
    try {
      const doc = await this.load(bytes, password);
      return new PdfJsDocument(doc);
    } catch (error) {
      const code = passwordCode(error);
      if (code === PasswordResponses.NEED_PASSWORD) {
        throw password === undefined ? new PasswordRequired() : new IncorrectPassword();
      }
      if (code === PasswordResponses.INCORRECT_PASSWORD) {
        throw new IncorrectPassword();
      }
      throw error;
    }
  }

  private load(bytes: Uint8Array, password?: string): Promise<PdfDocument> {
    // pdf.js transfers the buffer it is given, so it always gets its own copy.
    const task = getDocument({
      data: new Uint8Array(bytes),
      password,
      isEvalSupported: false,
      useSystemFonts: false,
      verbosity: 0,
    });
    return task.promise;
  }
}
