import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { describe, expect, it } from 'vitest';
import { AppDb } from '../../src/storage/db.js';
import { LocalFolderStorage } from '../../src/connectors/storage/localFolderStorage.js';
import { XlsxReportWriter } from '../../src/connectors/report/xlsxReportWriter.js';
import { createCategorizer, loadCategoryRules } from '../../src/pipeline/parse/categorizer.js';
import { createHarvester } from '../../src/workflow/factory.js';
import { createSession } from '../../src/workflow/session.js';
import { InMemoryMail, ScriptedPdfOpener, makeAttachment } from '../helpers/fakes.js';

describe('smoke mail -> stored statements -> xlsx', () => {
  it('stores listed attachments on disk and reports their transactions', async () => {
    const tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-smoke-'));
    const db = new AppDb(path.join(tempDir, 'app.db'));
    const outPath = path.join(tempDir, 'transactions.xlsx');
    const report = new XlsxReportWriter(outPath);

    const mail = new InMemoryMail([
      makeAttachment({
        sourceMessageId: 'msg-1',
        filename: 'April statement.pdf',
        groupKey: 'hdfc',
        pdf: { password: 'test-secret', pages: [['04/01/2024  COFFEE SHOP  -4.50', '04/03/2024  SALARY ACME  2,500.00']] },
      }),
    ]);
    const { coordinator } = createHarvester({
      db,
      storage: new LocalFolderStorage(path.join(tempDir, 'store')),
      report,
      opener: new ScriptedPdfOpener(),
      storageFolder: 'Statements',
      defaultPasswords: ['test-secret'],
      parser: { categorize: createCategorizer(loadCategoryRules()) },
      coordinator: { concurrency: 2, maxAttempts: 2, backoffMs: 0, timeoutMs: 5000 },
    });

    const attachments = await mail.listAttachments({ keywords: ['hdfc'], max: 10 });
    const stored = await coordinator.runStoring(createSession(), attachments);
    expect(stored.session.phase).toBe('STORED');
    expect(fs.existsSync(path.join(tempDir, 'store', 'Statements', 'hdfc', '2024-04-05-April_statement.pdf'))).toBe(true);

    const extracted = await coordinator.runExtracting(createSession('STORED'));
    expect(extracted.session.phase).toBe('DONE');
    await report.flush();

    const workbook = new ExcelJS.Workbook();
    await workbook.xlsx.readFile(outPath);
    const sheet = workbook.getWorksheet('hdfc');
    expect(sheet?.getCell('A1').value).toBe('2024-04-05-April_statement.pdf');
    expect(sheet?.getCell('D2').value).toBe('Food & Drink');
    expect(sheet?.getCell('C3').value).toBe(2500);
    expect(sheet?.getCell('D3').value).toBe('Income');

    db.close();
    fs.rmSync(tempDir, { recursive: true, force: true });
  });
});
