import path from 'node:path';
import { FolderNotFound, NameTaken } from '../../src/errors.js';
import type { MailCollaborator, ReportCollaborator, StorageCollaborator } from '../../src/connectors/types.js';
import {
  IncorrectPassword,
  PasswordRequired,
  type OpenedPdf,
  type PdfOpener,
  type PositionedText,
} from '../../src/pipeline/decrypt/pdfOpener.js';
import type { AttachmentQuery, AttachmentRecord, TabularLayout } from '../../src/types.js';

const MAGIC = '%FAKE-PDF\n';

export interface FakePdfSpec {
  password?: string;
  /** One array of text lines per page. */
  pages: string[][];
}

function isFakePdfSpec(value: unknown): value is FakePdfSpec {
  return (
    typeof value === 'object' &&
    value !== null &&
    'pages' in value &&
    Array.isArray(value.pages) &&
    value.pages.every((page: unknown) => Array.isArray(page) && page.every((line: unknown) => typeof line === 'string')) &&
    (!('password' in value) || value.password === undefined || typeof value.password === 'string')
  );
}

export function fakePdf(spec: FakePdfSpec): Uint8Array {
  return new TextEncoder().encode(`${MAGIC}${JSON.stringify(spec)}`);
}

function pageItems(lines: string[]): PositionedText[] {
  return lines.map((str, index) => ({ str, x: 10, y: 800 - index * 14, width: str.length * 5 }));
}

/** Opens bytes made by `fakePdf`; anything else is a malformed file. */
export class ScriptedPdfOpener implements PdfOpener {
  readonly calls: Array<string | undefined> = [];
  closed = 0;

  async open(bytes: Uint8Array, password?: string): Promise<OpenedPdf> {
    this.calls.push(password);
    const text = new TextDecoder().decode(bytes);
    if (!text.startsWith(MAGIC)) {
      throw new Error('Invalid PDF structure.');
    }
    const spec: unknown = JSON.parse(text.slice(MAGIC.length));
    if (!isFakePdfSpec(spec)) {
      throw new Error('Invalid PDF structure.');
    }
    if (spec.password !== undefined) {
      if (password === undefined) {
        throw new PasswordRequired();
      }
      if (password !== spec.password) {
        throw new IncorrectPassword();
      }
    }
    return {
      numPages: spec.pages.length,
      pageText: async (pageNumber) => pageItems(spec.pages[pageNumber - 1] ?? []),
      close: async () => {
        this.closed += 1;
      },
    };
  }
}

export class InMemoryMail implements MailCollaborator {
  readonly queries: AttachmentQuery[] = [];

  constructor(private readonly attachments: AttachmentRecord[]) {}

  async listAttachments(query: AttachmentQuery): Promise<AttachmentRecord[]> {
    this.queries.push(query);
    return this.attachments;
  }
}

/** Folder-aware storage: writing into a folder nobody created raises FolderNotFound. */
export class InMemoryStorage implements StorageCollaborator {
  readonly files = new Map<string, Uint8Array>();
  readonly folders = new Set<string>();
  readonly storeCalls: string[] = [];
  failWhen: (folderPath: string, fileName: string) => Error | undefined = () => undefined;
  beforeWrite: (destinationPath: string) => Promise<void> = async () => {};
  afterStore: (destinationPath: string) => void = () => {};

  async store(bytes: Uint8Array, folderPath: string, fileName: string): Promise<string> {
    const destination = path.posix.join(folderPath, fileName);
    this.storeCalls.push(destination);
    if (!this.folders.has(folderPath)) {
      throw new FolderNotFound(folderPath);
    }
    const failure = this.failWhen(folderPath, fileName);
    if (failure) {
      throw failure;
    }
    await this.beforeWrite(destination);
    if (this.files.has(destination)) {
      throw new NameTaken(folderPath, fileName);
    }
    this.files.set(destination, bytes.slice());
    this.afterStore(destination);
    return destination;
  }

  async ensureFolder(folderPath: string): Promise<void> {
    this.folders.add(folderPath);
  }

  async exists(folderPath: string, fileName: string): Promise<boolean> {
    return this.files.has(path.posix.join(folderPath, fileName));
  }

  async read(destinationPath: string): Promise<Uint8Array> {
    const bytes = this.files.get(destinationPath);
    if (!bytes) {
      throw new FolderNotFound(path.posix.dirname(destinationPath));
    }
    return bytes.slice();
  }
}

export class RecordingReport implements ReportCollaborator {
  readonly sheets: Array<{ groupKey: string; layout: TabularLayout }> = [];

  async appendSheet(groupKey: string, layout: TabularLayout): Promise<void> {
    this.sheets.push({ groupKey, layout });
  }
}

export function makeAttachment(
  overrides: Partial<AttachmentRecord> & { pdf?: FakePdfSpec } = {},
): AttachmentRecord {
  const { pdf, ...rest } = overrides;
  return {
    sourceMessageId: 'msg-1',
    filename: 'statement.pdf',
    groupKey: 'bank',
    receivedTimestamp: Date.UTC(2024, 3, 5),
    rawBytes: fakePdf(pdf ?? { pages: [['04/01/2024  COFFEE SHOP  -4.50']] }),
    ...rest,
  };
}
