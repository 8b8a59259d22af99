import type { ReportCollaborator, StorageCollaborator } from '../connectors/types.js';
import { DeduplicationLedger } from '../pipeline/dedupe/ledger.js';
import { PasswordCache } from '../pipeline/decrypt/passwordCache.js';
import { PasswordResolver } from '../pipeline/decrypt/passwordResolver.js';
import type { PdfOpener } from '../pipeline/decrypt/pdfOpener.js';
import { OrganizationPlanner } from '../pipeline/organize/planner.js';
import { TransactionParser, type ParserOptions } from '../pipeline/parse/transactionParser.js';
import { TextExtractor } from '../pipeline/text/textExtractor.js';
import type { AppDb } from '../storage/db.js';
import { WorkflowCoordinator, type CoordinatorOptions } from './coordinator.js';

export interface HarvesterSetup {
  db: AppDb;
  storage: StorageCollaborator;
  report: ReportCollaborator;
  opener: PdfOpener;
  storageFolder: string;
  defaultPasswords?: readonly string[];
  parser?: ParserOptions;
  claimTtlMs?: number;
  coordinator: CoordinatorOptions;
}

export interface Harvester {
  coordinator: WorkflowCoordinator;
  ledger: DeduplicationLedger;
  passwords: PasswordCache;
}

export function createHarvester(setup: HarvesterSetup): Harvester {
  const ledger = new DeduplicationLedger(setup.db, setup.claimTtlMs);
  const passwords = new PasswordCache(setup.db, setup.defaultPasswords ?? []);
  const coordinator = new WorkflowCoordinator(
    {
      ledger,
      passwords,
      resolver: new PasswordResolver(setup.opener),
      extractor: new TextExtractor(),
      parser: new TransactionParser(setup.parser),
      planner: new OrganizationPlanner(setup.storageFolder, setup.storage),
      storage: setup.storage,
      report: setup.report,
      sessions: setup.db,
      runs: setup.db,
    },
    setup.coordinator,
  );
  return { coordinator, ledger, passwords };
}
