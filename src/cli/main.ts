#!/usr/bin/env node
import path from 'node:path';
import readline from 'node:readline/promises';
import { Command } from 'commander';
import { config } from '../config.js';
import { logger } from '../logger.js';
import { AppDb } from '../storage/db.js';
import { GmailConnector } from '../connectors/gmail/gmailConnector.js';
import { ImapConnector } from '../connectors/imap/imapConnector.js';
import { LocalFolderStorage } from '../connectors/storage/localFolderStorage.js';
import { XlsxReportWriter } from '../connectors/report/xlsxReportWriter.js';
import type { MailCollaborator } from '../connectors/types.js';
import { PdfJsOpener } from '../pipeline/decrypt/pdfJsOpener.js';
import { createCategorizer, loadCategoryRules } from '../pipeline/parse/categorizer.js';
import type { ParserOptions } from '../pipeline/parse/transactionParser.js';
import type { DateOrder } from '../utils/dates.js';
import { retryTransient, withTimeout } from '../utils/async.js';
import { createSession } from '../workflow/session.js';
import { createHarvester } from '../workflow/factory.js';
import type { HintProvider, PhaseResult } from '../workflow/coordinator.js';
import type { BatchSummary, MailProvider } from '../types.js';

const program = new Command();
program
  .name('statement-harvester')
  .description('Store PDF statements from a mailbox once, then extract their transactions into a workbook')
  .version('0.1.0');

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/** `group=password` pairs into per-group hint lists. */
function parseGroupPasswords(pairs: string[]): Record<string, string[]> {
  const out: Record<string, string[]> = {};
  for (const pair of pairs) {
    const at = pair.indexOf('=');
    if (at <= 0) {
      throw new Error(`Expected group=password, received: ${pair}`);
    }
    const group = pair.slice(0, at);
    out[group] = [...(out[group] ?? []), pair.slice(at + 1)];
  }
  return out;
}

function mailFor(provider: MailProvider): MailCollaborator {
  return provider === 'imap' ? new ImapConnector() : new GmailConnector();
}

function openHarvester(db: AppDb, extra: { passwords?: string[]; parser?: ParserOptions; reportPath?: string } = {}) {
  const report = new XlsxReportWriter(extra.reportPath ?? config.reportPath);
  const harvester = createHarvester({
    db,
    storage: new LocalFolderStorage(config.storageRoot),
    report,
    opener: new PdfJsOpener(),
    storageFolder: config.storageFolder,
    defaultPasswords: [...config.passwords, ...(extra.passwords ?? [])],
    parser: extra.parser,
    claimTtlMs: config.ledgerClaimTtlSec * 1000,
    coordinator: {
      concurrency: config.concurrency,
      maxAttempts: config.maxAttempts,
      backoffMs: config.backoffMs,
      timeoutMs: config.collaboratorTimeoutMs,
    },
  });
  return { ...harvester, report };
}

function promptHints(): HintProvider {
  return async (groupKey, items) => {
    if (!process.stdin.isTTY) {
      return [];
    }
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      for (const item of items) {
        process.stdout.write(`  locked: ${item.filename}${item.detail ? ` (${item.detail})` : ''}\n`);
      }
      const answer = await rl.question(`Passwords for group "${groupKey}" (comma-separated, empty to skip): `);
      return answer
        .split(',')
        .map((s) => s.trim())
        .filter(Boolean);
    } finally {
      rl.close();
    }
  };
}

function printSummary(summary: BatchSummary): void {
  const rows = summary.items.map((item) => ({
    group: item.groupKey,
    file: item.filename,
    outcome: item.outcome,
    transactions: item.transactions ?? '',
    detail: item.detail ?? item.destinationPath ?? '',
  }));
  if (rows.length) {
    console.table(rows);
  }
  logger.info(
    { session: summary.sessionId, phase: summary.phase, counts: summary.counts, progressCursor: summary.progressCursor, error: summary.error },
    'Batch summary',
  );
  if (summary.phase === 'STORED' && summary.counts['needs-password'] > 0) {
    logger.warn(
      { session: summary.sessionId, locked: summary.counts['needs-password'] },
      'Locked attachments kept; rerun store with --session and --group-password to retry them',
    );
  }
}

function watchInterrupt(cancel: () => void): () => void {
  const onSignal = (signal: NodeJS.Signals): void => {
    logger.warn({ signal }, 'Stopping after in-flight items finish');
    cancel();
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);
  return () => {
    process.off('SIGINT', onSignal);
    process.off('SIGTERM', onSignal);
  };
}

function finish(result: PhaseResult): void {
  printSummary(result.summary);
  if (result.session.phase === 'FAILED') {
    process.exitCode = 1;
  }
}

program
  .command('store')
  .description('List PDF attachments matching the keywords and store each one once')
  .option('--keyword <keyword>', 'search keyword; one group per keyword (repeatable)', collect, [])
  .option('--content <keyword>', 'keyword matched anywhere in the message (repeatable)', collect, [])
  .option('--password <password>', 'candidate password for every group (repeatable)', collect, [])
  .option('--group-password <group=password>', 'extra password tried on the second pass for one group (repeatable)', collect, [])
  .option('--provider <provider>', 'gmail|imap', config.mailProvider)
  .option('--max <max>', 'max messages to list', String(config.mailFetchMax))
  .option('--session <id>', 'resume a persisted storing session')
  .option('--ask', 'prompt for passwords of groups that stay locked after the first pass')
  .action(
    async (opts: {
      keyword: string[];
      content: string[];
      password: string[];
      groupPassword: string[];
      provider: string;
      max: string;
      session?: string;
      ask?: boolean;
    }) => {
      const keywords = opts.keyword.length ? opts.keyword : config.keywords;
      if (!keywords.length && !opts.content.length) {
        throw new Error('At least one --keyword or --content is required (or HARVEST_KEYWORDS)');
      }
      const provider: MailProvider = opts.provider === 'imap' ? 'imap' : 'gmail';

      const db = new AppDb(config.dbPath);
      try {
        const { coordinator } = openHarvester(db, { passwords: opts.password });
        const resumed = opts.session ? db.getSession(opts.session) : null;
        if (opts.session && !resumed) {
          throw new Error(`No persisted session ${opts.session}`);
        }
        const session = resumed ?? createSession();
        const hints = parseGroupPasswords(opts.groupPassword);
        for (const [group, values] of Object.entries(hints)) {
          session.perGroupPasswordHints[group] = [...(session.perGroupPasswordHints[group] ?? []), ...values];
        }

        const mail = mailFor(provider);
        const attachments = await retryTransient(
          () =>
            withTimeout(
              mail.listAttachments({ keywords, contentKeywords: opts.content, max: Number(opts.max) }),
              config.collaboratorTimeoutMs,
              'listAttachments',
            ),
          { attempts: config.maxAttempts, baseMs: config.backoffMs },
        );
        logger.info({ attachments: attachments.length, session: session.id }, 'Attachments listed');

        const stopWatching = watchInterrupt(() => coordinator.cancel());
        try {
          finish(await coordinator.runStoring(session, attachments, { hintProvider: opts.ask ? promptHints() : undefined }));
        } finally {
          stopWatching();
        }
      } finally {
        db.close();
      }
    },
  );

program
  .command('extract')
  .description('Parse stored statements of the selected groups into an xlsx report')
  .option('--group <group>', 'group to extract (repeatable, default all)', collect, [])
  .option('--out <out>', 'output xlsx path', config.reportPath)
  .option('--date-order <order>', 'MDY|DMY for ambiguous numeric dates', 'MDY')
  .option('--amount <pick>', 'rightmost|leftmost amount token on a line', 'rightmost')
  .option('--categories [file]', 'categorise descriptions with a keyword table')
  .option('--session <id>', 'resume a persisted extracting session')
  .action(
    async (opts: { group: string[]; out: string; dateOrder: string; amount: string; categories?: string | boolean; session?: string }) => {
      const dateOrder: DateOrder = opts.dateOrder.toUpperCase() === 'DMY' ? 'DMY' : 'MDY';
      const pickAmount = opts.amount === 'leftmost' ? 'leftmost' : 'rightmost';
      const categorize = opts.categories
        ? createCategorizer(typeof opts.categories === 'string' ? loadCategoryRules(path.resolve(opts.categories)) : loadCategoryRules())
        : undefined;

      const db = new AppDb(config.dbPath);
      try {
        const { coordinator, report } = openHarvester(db, {
          parser: { dateOrder, pickAmount, categorize },
          reportPath: path.resolve(opts.out),
        });
        const resumed = opts.session ? db.getSession(opts.session) : null;
        if (opts.session && !resumed) {
          throw new Error(`No persisted session ${opts.session}`);
        }

        const stopWatching = watchInterrupt(() => coordinator.cancel());
        try {
          const result = await coordinator.runExtracting(resumed ?? createSession('STORED'), { groups: opts.group });
          if (result.session.phase === 'DONE') {
            const written = await report.flush();
            logger.info({ out: written, sheets: report.sheetNames }, 'Report written');
          }
          finish(result);
        } finally {
          stopWatching();
        }
      } finally {
        db.close();
      }
    },
  );

program
  .command('ledger:list')
  .description('Show stored attachments recorded in the ledger')
  .option('--group <group>', 'only this group')
  .action((opts: { group?: string }) => {
    const db = new AppDb(config.dbPath);
    try {
      const entries = db.listLedgerEntries(opts.group);
      console.table(entries.map((e) => ({ group: e.groupKey, path: e.destinationPath, at: e.processedTimestamp })));
      logger.info({ entries: entries.length }, 'Ledger listed');
    } finally {
      db.close();
    }
  });

program
  .command('session:show')
  .description('Show a persisted session and its run history')
  .requiredOption('--session <id>', 'session id')
  .action((opts: { session: string }) => {
    const db = new AppDb(config.dbPath);
    try {
      const session = db.getSession(opts.session);
      const runs = db.listRuns(opts.session);
      if (!session && !runs.length) {
        throw new Error(`Unknown session ${opts.session}`);
      }
      if (session) {
        console.log(JSON.stringify({ ...session, items: session.items.length }, null, 2));
        console.table(session.items.map((i) => ({ group: i.groupKey, file: i.filename, outcome: i.outcome, detail: i.detail ?? '' })));
      }
      for (const run of runs) {
        logger.info({ phase: run.phase, counts: run.counts, error: run.error, at: run.createdAt }, 'Run');
      }
    } finally {
      db.close();
    }
  });

program.parseAsync().catch((error) => {
  logger.error({ err: error }, 'CLI failed');
  process.exitCode = 1;
});
