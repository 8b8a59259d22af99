import { logger } from '../../logger.js';
import { PasswordFailure, UnreadableDocument, describeError } from '../../errors.js';
import type { AttachmentRecord } from '../../types.js';
import type { CandidatePasswordSet } from './passwordCache.js';
import { IncorrectPassword, PasswordRequired, type OpenedPdf, type PdfOpener } from './pdfOpener.js';

export interface DecryptedDocument {
  filename: string;
  groupKey: string;
  pdf: OpenedPdf;
  /** Password that opened the file, null when it was not encrypted. */
  password: string | null;
}

export type ResolveResult =
  | { ok: true; document: DecryptedDocument; attempts: number }
  | { ok: false; failure: PasswordFailure };

export interface ResolvableDocument {
  filename: string;
  groupKey: string;
  bytes: Uint8Array;
}

export function toResolvable(attachment: AttachmentRecord): ResolvableDocument {
  return { filename: attachment.filename, groupKey: attachment.groupKey, bytes: attachment.rawBytes };
}

export class PasswordResolver {
  constructor(private readonly opener: PdfOpener) {}

  /**
   * Opens the document, trying candidates in order when it is encrypted. The
   * winning password is promoted to the front of `candidates`. Malformed files
   * raise UnreadableDocument.
   */
  async resolve(source: ResolvableDocument, candidates: CandidatePasswordSet): Promise<ResolveResult> {
    const plain = await this.tryOpen(source);
    if (plain) {
      return { ok: true, attempts: 0, document: { filename: source.filename, groupKey: source.groupKey, pdf: plain, password: null } };
    }

    // Snapshot: another unit may promote while this one is iterating.
    const ordered = [...candidates.passwords];
    let attempts = 0;
    for (const password of ordered) {
      attempts += 1;
      const pdf = await this.tryOpen(source, password);
      if (pdf) {
        candidates.promote(password);
        logger.debug({ file: source.filename, group: source.groupKey, attempts }, 'Password resolved');
        return { ok: true, attempts, document: { filename: source.filename, groupKey: source.groupKey, pdf, password } };
      }
    }

    logger.info({ file: source.filename, group: source.groupKey, attempts }, 'No candidate password matched');
    return { ok: false, failure: new PasswordFailure(source.filename, attempts) };
  }

  private async tryOpen(source: ResolvableDocument, password?: string): Promise<OpenedPdf | null> {
    try {
      return await this.opener.open(source.bytes.slice(), password);
    } catch (error) {
      if (error instanceof PasswordRequired || error instanceof IncorrectPassword) {
        return null;
      }
      throw new UnreadableDocument(source.filename, describeError(error));
    }
  }
}
