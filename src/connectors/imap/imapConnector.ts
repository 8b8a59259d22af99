import { ImapFlow, type SearchObject } from 'imapflow';
import { simpleParser } from 'mailparser';
import { config, requireEnv } from '../../config.js';
import { logger } from '../../logger.js';
import type { AttachmentQuery, AttachmentRecord } from '../../types.js';
import type { MailCollaborator } from '../types.js';
import { classifyMessage, extractPasswordHint, isPdfName } from '../classify.js';

export interface ImapConfig {
  host: string;
  port: number;
  secure: boolean;
  auth: {
    user: string;
    pass: string;
  };
  mailbox?: string;
}

function toTimestamp(value: Date | string | undefined): number {
  if (!value) {
    return Date.now();
  }
  const parsed = value instanceof Date ? value : new Date(value);
  return Number.isNaN(parsed.getTime()) ? Date.now() : parsed.getTime();
}

/** One OR-search per keyword; IMAP has no single full-text OR across fields. */
function keywordSearch(keyword: string): SearchObject {
  return { or: [{ subject: keyword }, { from: keyword }, { body: keyword }] };
}

export class ImapConnector implements MailCollaborator {
  private readonly client: ImapFlow;
  private readonly mailbox: string;

  constructor(imapConfig?: ImapConfig) {
    const cfg: ImapConfig =
      imapConfig ?? {
        host: requireEnv(config.imapHost, 'IMAP_HOST'),
        port: config.imapPort,
        secure: config.imapSecure,
        auth: {
          user: requireEnv(config.imapUser, 'IMAP_USER'),
          pass: requireEnv(config.imapPassword, 'IMAP_PASSWORD'),
        },
        mailbox: config.imapMailbox,
      };

    this.client = new ImapFlow({
      host: cfg.host,
      port: cfg.port,
      secure: cfg.secure,
      auth: cfg.auth,
      logger: false,
    });
    this.mailbox = cfg.mailbox ?? 'INBOX';
  }

  async listAttachments(query: AttachmentQuery): Promise<AttachmentRecord[]> {
    await this.client.connect();
    try {
      const lock = await this.client.getMailboxLock(this.mailbox);
      try {
        return await this.collect(query);
      } finally {
        lock.release();
      }
    } finally {
      await this.client.logout();
    }
  }

  private async collect(query: AttachmentQuery): Promise<AttachmentRecord[]> {
    const uidSet = new Set<number>();
    for (const keyword of [...query.keywords, ...(query.contentKeywords ?? [])]) {
      const found = await this.client.search(keywordSearch(keyword), { uid: true });
      for (const uid of Array.isArray(found) ? found : []) {
        uidSet.add(uid);
      }
    }
    const selected = [...uidSet].sort((a, b) => a - b).slice(-query.max);
    if (!selected.length) {
      return [];
    }

    const out: AttachmentRecord[] = [];
    for await (const msg of this.client.fetch(selected, { uid: true, envelope: true, source: true, internalDate: true }, { uid: true })) {
      if (!msg.source) {
        continue;
      }
      const parsed = await simpleParser(msg.source);
      const pdfs = parsed.attachments.filter((a) => isPdfName(a.filename, a.contentType));
      if (!pdfs.length) {
        continue;
      }

      const messageId = msg.envelope?.messageId ?? parsed.messageId ?? `uid-${msg.uid}`;
      const groupKey = classifyMessage(
        {
          subject: parsed.subject ?? '',
          from: parsed.from?.text ?? '',
          attachmentNames: pdfs.map((a) => a.filename ?? ''),
        },
        query.keywords,
      );
      const passwordHint = extractPasswordHint(parsed.text);

      for (const pdf of pdfs) {
        out.push({
          sourceMessageId: messageId,
          filename: pdf.filename ?? 'attachment.pdf',
          rawBytes: new Uint8Array(pdf.content),
          groupKey,
          receivedTimestamp: toTimestamp(msg.internalDate ?? parsed.date),
          passwordHint,
        });
      }
    }

    logger.info({ messages: selected.length, attachments: out.length }, 'IMAP attachments listed');
    return out;
  }
}
