export type MailProvider = 'gmail' | 'imap';

export const CONTENT_MATCHES_GROUP = 'Content_matches';

export interface AttachmentRecord {
  sourceMessageId: string;
  filename: string;
  rawBytes: Uint8Array;
  groupKey: string;
  /** Epoch milliseconds of the message's internal date. */
  receivedTimestamp: number;
  passwordHint?: string;
}

export interface AttachmentQuery {
  keywords: string[];
  contentKeywords?: string[];
  max: number;
}

export interface LedgerEntry {
  fingerprint: string;
  groupKey: string;
  destinationPath: string;
  processedTimestamp: string;
}

/** ISO calendar date, `YYYY-MM-DD`. */
export type CalendarDate = string;

export interface TransactionRecord {
  date: CalendarDate;
  description: string;
  /** Canonical signed decimal, e.g. `-4.50`. */
  amount: string;
  category?: string;
}

export interface SheetBlock {
  groupKey: string;
  sourceFilename: string;
  headerLabel: string;
  transactions: TransactionRecord[];
  separatorRowsBefore: number;
}

export type LayoutRow =
  | { kind: 'header'; cells: [string]; highlighted: true }
  | { kind: 'transaction'; cells: [string, string, string, string] }
  | { kind: 'blank'; cells: [] };

export interface TabularLayout {
  groupKey: string;
  columns: readonly ['date', 'description', 'amount', 'category'];
  rows: LayoutRow[];
}

export interface StoragePlan {
  folderPath: string;
  fileName: string;
}

export type WorkflowPhase = 'IDLE' | 'STORING' | 'STORED' | 'EXTRACTING' | 'DONE' | 'FAILED';

export type ItemOutcome =
  | 'pending'
  | 'stored'
  | 'skipped-duplicate'
  | 'needs-password'
  | 'failed'
  | 'parsed'
  | 'parsed-empty'
  | 'unreadable';

export interface SessionItem {
  id: string;
  groupKey: string;
  filename: string;
  outcome: ItemOutcome;
  detail?: string;
  destinationPath?: string;
  transactions?: number;
}

export interface WorkflowSession {
  id: string;
  phase: WorkflowPhase;
  selectedAttachments: string[];
  perGroupPasswordHints: Record<string, string[]>;
  /** Number of leading selected items confirmed done; a resumed run starts at this index. */
  progressCursor: number;
  items: SessionItem[];
  error?: string;
}

export interface BatchSummary {
  sessionId: string;
  phase: WorkflowPhase;
  counts: Record<ItemOutcome, number>;
  items: SessionItem[];
  progressCursor: number;
  error?: string;
}
