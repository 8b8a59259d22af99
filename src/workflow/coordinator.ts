import crypto from 'node:crypto';
import path from 'node:path';
import { logger } from '../logger.js';
import {
  CollaboratorFatal,
  FolderNotFound,
  NameTaken,
  UnreadableDocument,
  describeError,
  isRecoverable,
} from '../errors.js';
import type {
  AttachmentRecord,
  BatchSummary,
  ItemOutcome,
  LedgerEntry,
  SessionItem,
  StoragePlan,
  TransactionRecord,
  WorkflowSession,
} from '../types.js';
import type { ReportCollaborator, StorageCollaborator } from '../connectors/types.js';
import { DeduplicationLedger, fingerprint } from '../pipeline/dedupe/ledger.js';
import type { PasswordCache } from '../pipeline/decrypt/passwordCache.js';
import { PasswordResolver, toResolvable, type ResolveResult } from '../pipeline/decrypt/passwordResolver.js';
import type { OrganizationPlanner } from '../pipeline/organize/planner.js';
import type { TransactionParser } from '../pipeline/parse/transactionParser.js';
import { ReportBook } from '../pipeline/report/reportCompiler.js';
import type { TextExtractor } from '../pipeline/text/textExtractor.js';
import { sumAmounts } from '../utils/amount.js';
import { retryTransient, runBounded, withTimeout } from '../utils/async.js';
import { confirmedPrefix, summarize, transition, type RunLog, type SessionStore } from './session.js';

const STORE_CONFIRMED: ReadonlySet<ItemOutcome> = new Set(['stored', 'skipped-duplicate']);
const EXTRACT_CONFIRMED: ReadonlySet<ItemOutcome> = new Set(['parsed', 'parsed-empty', 'unreadable']);

export interface CoordinatorDeps {
  ledger: DeduplicationLedger;
  passwords: PasswordCache;
  resolver: PasswordResolver;
  extractor: TextExtractor;
  parser: TransactionParser;
  planner: OrganizationPlanner;
  storage: StorageCollaborator;
  report: ReportCollaborator;
  sessions: SessionStore;
  runs?: RunLog;
}

export interface CoordinatorOptions {
  concurrency: number;
  maxAttempts: number;
  backoffMs: number;
  timeoutMs: number;
  /** Claim owner id; defaults to a random id per coordinator. */
  owner?: string;
}

/** Asked between the first and second storing pass for extra passwords of a group. */
export type HintProvider = (groupKey: string, items: readonly SessionItem[]) => Promise<string[]>;

export interface StoringOptions {
  hintProvider?: HintProvider;
}

export interface ExtractingOptions {
  groups?: readonly string[];
}

export interface PhaseResult {
  session: WorkflowSession;
  summary: BatchSummary;
}

interface ItemResult {
  outcome: ItemOutcome;
  detail?: string;
  destinationPath?: string;
  transactions?: number;
}

interface ExtractedDocument {
  entry: LedgerEntry;
  transactions: TransactionRecord[];
}

function sameBytes(a: Uint8Array, b: Uint8Array): boolean {
  return a.length === b.length && a.every((byte, index) => byte === b[index]);
}

function applyResult(item: SessionItem, result: ItemResult): void {
  item.outcome = result.outcome;
  item.detail = result.detail;
  if (result.destinationPath !== undefined) {
    item.destinationPath = result.destinationPath;
  }
  if (result.transactions !== undefined) {
    item.transactions = result.transactions;
  }
}

/** First error that escaped a unit; the phase ends FAILED once in-flight units settle. */
class PhaseAbort {
  constructor(readonly error: unknown) {}
}

export class WorkflowCoordinator {
  private cancelled = false;
  private readonly owner: string;

  constructor(
    private readonly deps: CoordinatorDeps,
    private readonly options: CoordinatorOptions,
  ) {
    this.owner = options.owner ?? crypto.randomUUID();
  }

  /** Cooperative: units already running finish, no new unit starts. */
  cancel(): void {
    this.cancelled = true;
  }

  async runStoring(
    input: WorkflowSession,
    attachments: readonly AttachmentRecord[],
    storingOptions: StoringOptions = {},
  ): Promise<PhaseResult> {
    this.cancelled = false;
    // A STORED session comes back only to retry its locked items.
    const reopening = input.phase === 'STORED';
    const session = structuredClone(transition(input, 'STORING'));
    delete session.error;

    const byId = new Map<string, AttachmentRecord>();
    for (const attachment of attachments) {
      byId.set(fingerprint(attachment), attachment);
    }
    if (!session.selectedAttachments.length) {
      session.selectedAttachments = [...byId.keys()];
    }

    const previous = new Map(session.items.map((item) => [item.id, item]));
    session.items = session.selectedAttachments.map((id): SessionItem => {
      const known = previous.get(id);
      const attachment = byId.get(id);
      if (known && (known.outcome === 'stored' || (reopening && known.outcome !== 'needs-password'))) {
        return known;
      }
      return {
        id,
        groupKey: attachment?.groupKey ?? known?.groupKey ?? '',
        filename: attachment?.filename ?? known?.filename ?? id,
        outcome: attachment ? 'pending' : 'failed',
        detail: attachment ? undefined : 'attachment no longer listed by the mail source',
      };
    });
    this.persist(session, STORE_CONFIRMED);

    logger.info({ session: session.id, items: session.items.length }, 'Storing phase started');

    const failure: { abort: PhaseAbort | null } = { abort: null };
    const work = (indices: number[]) =>
      runBounded(
        indices,
        this.options.concurrency,
        async (index) => {
          const item = session.items[index];
          const attachment = byId.get(item.id);
          if (!attachment) {
            return;
          }
          try {
            applyResult(item, await this.storeOne(item.id, attachment));
          } catch (error) {
            failure.abort ??= new PhaseAbort(error);
            applyResult(item, { outcome: 'failed', detail: describeError(error) });
          }
          this.persist(session, STORE_CONFIRMED);
        },
        () => this.cancelled,
      );

    try {
      await work(session.items.flatMap((item, index) => (item.outcome === 'pending' ? [index] : [])));

      if (!this.cancelled) {
        const retryIndices = await this.prepareSecondPass(session, storingOptions.hintProvider);
        if (retryIndices.length) {
          logger.info({ session: session.id, items: retryIndices.length }, 'Retrying items with additional password hints');
          await work(retryIndices);
        }
      }
    } catch (error) {
      failure.abort ??= new PhaseAbort(error);
    }

    return this.finishPhase(session, 'STORED', failure.abort, STORE_CONFIRMED);
  }

  async runExtracting(input: WorkflowSession, extractingOptions: ExtractingOptions = {}): Promise<PhaseResult> {
    this.cancelled = false;
    const session = structuredClone(transition(input, 'EXTRACTING'));
    delete session.error;

    const groups = extractingOptions.groups?.length ? new Set(extractingOptions.groups) : null;
    const entries = this.deps.ledger.list().filter((entry) => !groups || groups.has(entry.groupKey));
    const byId = new Map(entries.map((entry) => [entry.fingerprint, entry]));

    if (!session.selectedAttachments.length) {
      session.selectedAttachments = entries.map((entry) => entry.fingerprint);
    }
    session.items = session.selectedAttachments.flatMap((id): SessionItem[] => {
      const entry = byId.get(id) ?? this.deps.ledger.get(id);
      return entry
        ? [{ id, groupKey: entry.groupKey, filename: path.posix.basename(entry.destinationPath), outcome: 'pending' }]
        : [];
    });
    this.persist(session, EXTRACT_CONFIRMED);

    logger.info({ session: session.id, items: session.items.length }, 'Extracting phase started');

    const extracted: Array<ExtractedDocument | undefined> = [];
    const failure: { abort: PhaseAbort | null } = { abort: null };

    await runBounded(
      session.items,
      this.options.concurrency,
      async (item, index) => {
        const entry = byId.get(item.id) ?? this.deps.ledger.get(item.id);
        if (!entry) {
          return;
        }
        try {
          const result = await this.extractOne(entry);
          extracted[index] = result.document;
          applyResult(item, result.item);
        } catch (error) {
          failure.abort ??= new PhaseAbort(error);
          applyResult(item, { outcome: 'failed', detail: describeError(error) });
        }
        this.persist(session, EXTRACT_CONFIRMED);
      },
      () => this.cancelled,
    );

    if (!failure.abort && !this.cancelled) {
      const book = new ReportBook();
      for (const document of extracted) {
        if (document) {
          book.addBlock(document.entry.groupKey, path.posix.basename(document.entry.destinationPath), document.transactions);
        }
      }
      try {
        for (const layout of book.layouts()) {
          await this.callCollaborator(`appendSheet ${layout.groupKey}`, () =>
            this.deps.report.appendSheet(layout.groupKey, layout),
          );
        }
      } catch (error) {
        failure.abort = new PhaseAbort(error);
      }
    }

    return this.finishPhase(session, 'DONE', failure.abort, EXTRACT_CONFIRMED);
  }

  private async storeOne(id: string, attachment: AttachmentRecord): Promise<ItemResult> {
    const claim = await this.deps.ledger.withClaim(id, this.owner, async (): Promise<ItemResult> => {
      if (this.deps.ledger.has(id)) {
        return { outcome: 'skipped-duplicate', destinationPath: this.deps.ledger.get(id)?.destinationPath };
      }

      let resolved: ResolveResult;
      try {
        resolved = await this.deps.resolver.resolve(toResolvable(attachment), this.deps.passwords.forGroup(attachment.groupKey));
      } catch (error) {
        if (error instanceof UnreadableDocument) {
          return { outcome: 'failed', detail: error.message };
        }
        throw error;
      }
      if (!resolved.ok) {
        const hint = attachment.passwordHint ? `; hint: ${attachment.passwordHint}` : '';
        return { outcome: 'needs-password', detail: `${resolved.failure.attempts} passwords attempted${hint}` };
      }
      await resolved.document.pdf.close();

      let destinationPath: string;
      try {
        destinationPath = await this.storeBytes(attachment);
      } catch (error) {
        if (isRecoverable(error)) {
          return { outcome: 'failed', detail: describeError(error) };
        }
        throw error;
      }

      this.deps.ledger.record({
        fingerprint: id,
        groupKey: attachment.groupKey,
        destinationPath,
        processedTimestamp: new Date().toISOString(),
      });
      logger.info({ file: attachment.filename, group: attachment.groupKey, destinationPath }, 'Attachment stored');
      return { outcome: 'stored', destinationPath };
    });

    if (!claim.claimed) {
      const entry = this.deps.ledger.get(id);
      if (entry) {
        return { outcome: 'skipped-duplicate', destinationPath: entry.destinationPath };
      }
      // Left unconfirmed: if the other run fails, a later run still stores it.
      logger.warn({ file: attachment.filename, group: attachment.groupKey }, 'Attachment claimed by another run');
      return { outcome: 'failed', detail: 'claimed by another run' };
    }
    if (claim.value.outcome === 'failed' || claim.value.outcome === 'needs-password') {
      logger.warn({ file: attachment.filename, group: attachment.groupKey, outcome: claim.value.outcome, detail: claim.value.detail }, 'Attachment not stored');
    }
    return claim.value;
  }

  /**
   * Plans the destination once and keeps it across retries. A retry that finds
   * the name taken checks whether an earlier attempt of this unit landed there
   * (same bytes); only a file written by someone else moves it to a new name.
   */
  private async storeBytes(attachment: AttachmentRecord): Promise<string> {
    let plan = await this.deps.planner.plan(attachment);
    return retryTransient(
      async () => {
        try {
          return await this.putFile(attachment.rawBytes, plan);
        } catch (error) {
          if (!(error instanceof NameTaken)) {
            throw error;
          }
          const destination = path.posix.join(plan.folderPath, plan.fileName);
          const existing = await withTimeout(this.deps.storage.read(destination), this.options.timeoutMs, `read ${plan.fileName}`);
          if (sameBytes(existing, attachment.rawBytes)) {
            logger.info({ file: attachment.filename, destinationPath: destination }, 'Earlier store attempt landed; keeping it');
            return destination;
          }
          plan = await this.deps.planner.plan(attachment);
          throw error;
        }
      },
      {
        attempts: this.options.maxAttempts,
        baseMs: this.options.backoffMs,
        onRetry: (error, attempt) => logger.warn({ file: attachment.filename, attempt, err: error }, 'Storage call failed, retrying'),
      },
    );
  }

  private async putFile(bytes: Uint8Array, plan: StoragePlan): Promise<string> {
    const put = () => withTimeout(this.deps.storage.store(bytes, plan.folderPath, plan.fileName), this.options.timeoutMs, 'store');
    try {
      return await put();
    } catch (error) {
      if (!(error instanceof FolderNotFound)) {
        throw error;
      }
      await withTimeout(this.deps.storage.ensureFolder(plan.folderPath), this.options.timeoutMs, 'ensureFolder');
      return put();
    }
  }

  private async extractOne(entry: LedgerEntry): Promise<{ item: ItemResult; document?: ExtractedDocument }> {
    const filename = path.posix.basename(entry.destinationPath);
    let bytes: Uint8Array;
    try {
      bytes = await this.callCollaborator(`read ${filename}`, () => this.deps.storage.read(entry.destinationPath));
    } catch (error) {
      if (isRecoverable(error) || error instanceof FolderNotFound) {
        return { item: { outcome: 'failed', detail: describeError(error) } };
      }
      throw error;
    }

    let resolved: ResolveResult;
    try {
      resolved = await this.deps.resolver.resolve({ filename, groupKey: entry.groupKey, bytes }, this.deps.passwords.forGroup(entry.groupKey));
    } catch (error) {
      if (error instanceof UnreadableDocument) {
        return { item: { outcome: 'unreadable', detail: error.message } };
      }
      throw error;
    }
    if (!resolved.ok) {
      return { item: { outcome: 'needs-password', detail: `${resolved.failure.attempts} passwords attempted` } };
    }

    try {
      const lines = await this.deps.extractor.extract(resolved.document);
      const parsed = this.deps.parser.parse(lines);
      const count = parsed.transactions.length;
      logger.info(
        {
          file: filename,
          group: entry.groupKey,
          transactions: count,
          net: sumAmounts(parsed.transactions.map((t) => t.amount)),
          format: parsed.format,
        },
        'Document parsed',
      );
      return {
        item: {
          outcome: count > 0 ? 'parsed' : 'parsed-empty',
          transactions: count,
          detail: count > 0 ? undefined : 'no recognizable transaction lines; review manually',
        },
        document: { entry, transactions: parsed.transactions },
      };
    } catch (error) {
      if (error instanceof UnreadableDocument) {
        return { item: { outcome: 'unreadable', detail: error.message } };
      }
      throw error;
    } finally {
      await resolved.document.pdf.close();
    }
  }

  /**
   * Merges session hints and provider answers into the candidate sets of the
   * groups that still have locked items; returns the indices worth retrying.
   */
  private async prepareSecondPass(session: WorkflowSession, hintProvider?: HintProvider): Promise<number[]> {
    const locked = new Map<string, number[]>();
    session.items.forEach((item, index) => {
      if (item.outcome === 'needs-password') {
        locked.set(item.groupKey, [...(locked.get(item.groupKey) ?? []), index]);
      }
    });

    const retry: number[] = [];
    for (const [groupKey, indices] of locked) {
      const set = this.deps.passwords.forGroup(groupKey);
      const before = set.size;
      set.addHints(session.perGroupPasswordHints[groupKey] ?? []);
      if (hintProvider) {
        const extra = await hintProvider(groupKey, indices.map((i) => session.items[i]));
        set.addHints(extra);
        session.perGroupPasswordHints[groupKey] = [...(session.perGroupPasswordHints[groupKey] ?? []), ...extra];
      }
      if (set.size > before) {
        retry.push(...indices);
      }
    }
    for (const index of retry) {
      session.items[index].outcome = 'pending';
    }
    return retry.sort((a, b) => a - b);
  }

  private callCollaborator<T>(label: string, call: () => Promise<T>): Promise<T> {
    return retryTransient(() => withTimeout(call(), this.options.timeoutMs, label), {
      attempts: this.options.maxAttempts,
      baseMs: this.options.backoffMs,
      onRetry: (error, attempt) => logger.warn({ label, attempt, err: error }, 'Collaborator call failed, retrying'),
    });
  }

  private persist(session: WorkflowSession, confirmed: ReadonlySet<ItemOutcome>): void {
    session.progressCursor = confirmedPrefix(session.items, confirmed);
    this.deps.sessions.saveSession(session);
  }

  private finishPhase(
    session: WorkflowSession,
    completed: 'STORED' | 'DONE',
    abort: PhaseAbort | null,
    confirmed: ReadonlySet<ItemOutcome>,
  ): PhaseResult {
    session.progressCursor = confirmedPrefix(session.items, confirmed);

    if (abort) {
      const failed = transition(session, 'FAILED');
      failed.error = describeError(abort.error);
      this.deps.sessions.saveSession(failed);
      const summary = summarize(failed);
      this.deps.runs?.insertRun(summary);
      logger.error(
        { session: failed.id, progressCursor: failed.progressCursor, err: abort.error, fatal: abort.error instanceof CollaboratorFatal },
        'Phase failed',
      );
      return { session: failed, summary };
    }

    if (this.cancelled) {
      this.deps.sessions.saveSession(session);
      logger.warn({ session: session.id, progressCursor: session.progressCursor }, 'Phase cancelled; session kept for resume');
      return { session, summary: summarize(session) };
    }

    const done = transition(session, completed);
    if (completed === 'STORED' && done.items.some((item) => item.outcome === 'needs-password')) {
      this.deps.sessions.saveSession(done);
    } else {
      this.deps.sessions.deleteSession(done.id);
    }
    const summary = summarize(done);
    this.deps.runs?.insertRun(summary);
    logger.info({ session: done.id, phase: done.phase, counts: summary.counts }, 'Phase completed');
    return { session: done, summary };
  }
}
