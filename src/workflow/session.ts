import crypto from 'node:crypto';
import type { BatchSummary, ItemOutcome, SessionItem, WorkflowPhase, WorkflowSession } from '../types.js';

const TRANSITIONS: Record<WorkflowPhase, readonly WorkflowPhase[]> = {
  IDLE: ['STORING'],
  STORING: ['STORING', 'STORED', 'FAILED'],
  STORED: ['STORING', 'EXTRACTING'],
  EXTRACTING: ['EXTRACTING', 'DONE', 'FAILED'],
  DONE: [],
  FAILED: ['STORING', 'EXTRACTING'],
};

export class IllegalTransition extends Error {
  constructor(from: WorkflowPhase, to: WorkflowPhase) {
    super(`Illegal workflow transition ${from} -> ${to}`);
    this.name = 'IllegalTransition';
  }
}

export interface SessionStore {
  saveSession(session: WorkflowSession): void;
  getSession(id: string): WorkflowSession | null;
  deleteSession(id: string): void;
}

export interface RunLog {
  insertRun(summary: BatchSummary): void;
}

export function canTransition(from: WorkflowPhase, to: WorkflowPhase): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transition(session: WorkflowSession, to: WorkflowPhase): WorkflowSession {
  if (!canTransition(session.phase, to)) {
    throw new IllegalTransition(session.phase, to);
  }
  return { ...session, phase: to };
}

export function createSession(phase: Extract<WorkflowPhase, 'IDLE' | 'STORED'> = 'IDLE'): WorkflowSession {
  return {
    id: crypto.randomUUID(),
    phase,
    selectedAttachments: [],
    perGroupPasswordHints: {},
    progressCursor: 0,
    items: [],
  };
}

/** Length of the leading run of items whose outcome is in `confirmed`. */
export function confirmedPrefix(items: readonly SessionItem[], confirmed: ReadonlySet<ItemOutcome>): number {
  let count = 0;
  while (count < items.length && confirmed.has(items[count].outcome)) {
    count += 1;
  }
  return count;
}

export function summarize(session: WorkflowSession): BatchSummary {
  const counts: Record<ItemOutcome, number> = {
    pending: 0,
    stored: 0,
    'skipped-duplicate': 0,
    'needs-password': 0,
    failed: 0,
    parsed: 0,
    'parsed-empty': 0,
    unreadable: 0,
  };
  for (const item of session.items) {
    counts[item.outcome] += 1;
  }
  return {
    sessionId: session.id,
    phase: session.phase,
    counts,
    items: session.items.map((item) => ({ ...item })),
    progressCursor: session.progressCursor,
    error: session.error,
  };
}
