import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { CollaboratorFatal, FolderNotFound, NameTaken } from '../../src/errors.js';
import { LocalFolderStorage } from '../../src/connectors/storage/localFolderStorage.js';

describe('LocalFolderStorage', () => {
  let root: string;
  let storage: LocalFolderStorage;
  const bytes = new TextEncoder().encode('%PDF-1.4 test');

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-store-'));
    storage = new LocalFolderStorage(root);
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('signals a missing folder distinctly', async () => {
    await expect(storage.store(bytes, 'Statements/bank', 'a.pdf')).rejects.toBeInstanceOf(FolderNotFound);
  });

  it('stores, finds and reads back a file', async () => {
    await storage.ensureFolder('Statements/bank');
    const destination = await storage.store(bytes, 'Statements/bank', 'a.pdf');

    expect(destination).toBe('Statements/bank/a.pdf');
    expect(await storage.exists('Statements/bank', 'a.pdf')).toBe(true);
    expect(await storage.exists('Statements/bank', 'b.pdf')).toBe(false);
    expect(Buffer.from(await storage.read(destination)).toString()).toBe('%PDF-1.4 test');
    expect(fs.existsSync(path.join(root, 'Statements', 'bank', 'a.pdf'))).toBe(true);
  });

  it('never overwrites an existing file', async () => {
    await storage.ensureFolder('Statements/bank');
    await storage.store(bytes, 'Statements/bank', 'a.pdf');
    await expect(storage.store(new Uint8Array([1]), 'Statements/bank', 'a.pdf')).rejects.toBeInstanceOf(NameTaken);
    expect(fs.readFileSync(path.join(root, 'Statements', 'bank', 'a.pdf')).toString()).toBe('%PDF-1.4 test');
  });

  it('refuses paths outside the root', async () => {
    await expect(storage.store(bytes, '..', 'escape.pdf')).rejects.toBeInstanceOf(CollaboratorFatal);
  });
});
