import crypto from 'node:crypto';
import type { AttachmentRecord, LedgerEntry } from '../../types.js';
import { KeyedMutex } from '../../utils/async.js';

export interface LedgerStore {
  hasLedgerEntry(fingerprint: string): boolean;
  getLedgerEntry(fingerprint: string): LedgerEntry | null;
  insertLedgerEntry(entry: LedgerEntry): boolean;
  listLedgerEntries(groupKey?: string): LedgerEntry[];
  tryClaim(fingerprint: string, owner: string, ttlMs: number): boolean;
  releaseClaim(fingerprint: string, owner: string): void;
}

/**
 * Identity of an attachment before decryption: message id, file name and byte
 * size. Content is deliberately not hashed.
 */
export function fingerprint(attachment: Pick<AttachmentRecord, 'sourceMessageId' | 'filename' | 'rawBytes'>): string {
  return crypto
    .createHash('sha256')
    .update(attachment.sourceMessageId)
    .update('\0')
    .update(attachment.filename)
    .update('\0')
    .update(String(attachment.rawBytes.byteLength))
    .digest('hex');
}

export type ClaimResult<T> = { claimed: true; value: T } | { claimed: false };

export class DeduplicationLedger {
  private readonly mutex = new KeyedMutex();

  constructor(
    private readonly store: LedgerStore,
    private readonly claimTtlMs: number = 10 * 60 * 1000,
  ) {}

  has(fp: string): boolean {
    return this.store.hasLedgerEntry(fp);
  }

  get(fp: string): LedgerEntry | null {
    return this.store.getLedgerEntry(fp);
  }

  /** Recording a fingerprint that is already present is a no-op. */
  record(entry: LedgerEntry): void {
    this.store.insertLedgerEntry(entry);
  }

  list(groupKey?: string): LedgerEntry[] {
    return this.store.listLedgerEntries(groupKey);
  }

  /**
   * Runs `fn` as the single writer for `fp`: serialized in-process and guarded
   * by a claim row across processes. Returns `claimed: false` when another
   * owner currently holds the fingerprint.
   */
  async withClaim<T>(fp: string, owner: string, fn: () => Promise<T>): Promise<ClaimResult<T>> {
    return this.mutex.run(fp, async () => {
      if (!this.store.tryClaim(fp, owner, this.claimTtlMs)) {
        return { claimed: false } as const;
      }
      try {
        return { claimed: true, value: await fn() } as const;
      } finally {
        this.store.releaseClaim(fp, owner);
      }
    });
  }
}
