import { google, type gmail_v1 } from 'googleapis';
import { config, requireEnv } from '../../config.js';
import { logger } from '../../logger.js';
import type { AttachmentQuery, AttachmentRecord } from '../../types.js';
import type { MailCollaborator } from '../types.js';
import { classifyMessage, extractPasswordHint, isPdfName } from '../classify.js';

function decodeBase64Url(input: string): Buffer {
  const normalized = input.replace(/-/g, '+').replace(/_/g, '/');
  const padding = normalized.length % 4 === 0 ? '' : '='.repeat(4 - (normalized.length % 4));
  return Buffer.from(`${normalized}${padding}`, 'base64');
}

export function buildGmailQuery(keywords: readonly string[]): string {
  const terms = keywords.map((k) => `"${k.replace(/"/g, '')}"`).join(' OR ');
  return `${terms ? `(${terms}) ` : ''}has:attachment filename:pdf`;
}

interface PdfPart {
  attachmentId: string;
  filename: string;
}

function collectPdfParts(parts: gmail_v1.Schema$MessagePart[] | undefined, out: PdfPart[] = []): PdfPart[] {
  for (const part of parts ?? []) {
    const attachmentId = part.body?.attachmentId;
    if (attachmentId && part.filename && isPdfName(part.filename, part.mimeType ?? '')) {
      out.push({ attachmentId, filename: part.filename });
    }
    collectPdfParts(part.parts ?? undefined, out);
  }
  return out;
}

export class GmailConnector implements MailCollaborator {
  private readonly gmail = google.gmail({
    version: 'v1',
    auth: (() => {
      const client = new google.auth.OAuth2(
        requireEnv(config.gmailClientId, 'GMAIL_CLIENT_ID'),
        requireEnv(config.gmailClientSecret, 'GMAIL_CLIENT_SECRET'),
        config.gmailRedirectUri,
      );
      client.setCredentials({
        refresh_token: requireEnv(config.gmailRefreshToken, 'GMAIL_REFRESH_TOKEN'),
      });
      return client;
    })(),
  });

  async listAttachments(query: AttachmentQuery): Promise<AttachmentRecord[]> {
    const keywords = [...query.keywords, ...(query.contentKeywords ?? [])];
    const ids = await this.searchMessageIds(buildGmailQuery(keywords), query.max);
    const out: AttachmentRecord[] = [];

    for (const id of ids) {
      const message = await this.gmail.users.messages.get({ userId: 'me', id, format: 'full' });
      const payload = message.data.payload;
      const headers = payload?.headers ?? [];
      const header = (name: string): string =>
        headers.find((h) => h.name?.toLowerCase() === name)?.value ?? '';

      const pdfParts = collectPdfParts(payload?.parts ?? undefined);
      if (!pdfParts.length) {
        continue;
      }

      const groupKey = classifyMessage(
        { subject: header('subject'), from: header('from'), attachmentNames: pdfParts.map((p) => p.filename) },
        query.keywords,
      );
      const receivedTimestamp = Number(message.data.internalDate ?? Date.now());
      const passwordHint = extractPasswordHint(message.data.snippet);

      for (const part of pdfParts) {
        const attachment = await this.gmail.users.messages.attachments.get({
          userId: 'me',
          messageId: id,
          id: part.attachmentId,
        });
        const data = attachment.data.data;
        if (!data) {
          logger.warn({ id, file: part.filename }, 'Skipping Gmail attachment without payload');
          continue;
        }
        out.push({
          sourceMessageId: id,
          filename: part.filename,
          rawBytes: new Uint8Array(decodeBase64Url(data)),
          groupKey,
          receivedTimestamp,
          passwordHint,
        });
      }
    }

    logger.info({ messages: ids.length, attachments: out.length }, 'Gmail attachments listed');
    return out;
  }

  private async searchMessageIds(q: string, max: number): Promise<string[]> {
    const ids: string[] = [];
    let pageToken: string | undefined;

    do {
      const list = await this.gmail.users.messages.list({
        userId: 'me',
        q,
        maxResults: Math.min(100, max - ids.length),
        pageToken,
      });
      for (const msg of list.data.messages ?? []) {
        if (msg.id) {
          ids.push(msg.id);
        }
      }
      pageToken = list.data.nextPageToken ?? undefined;
    } while (pageToken && ids.length < max);

    return ids.slice(0, max);
  }
}
