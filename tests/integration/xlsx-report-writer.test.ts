import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import ExcelJS from 'exceljs';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { XlsxReportWriter, sheetNameFor } from '../../src/connectors/report/xlsxReportWriter.js';
import { ReportBook } from '../../src/pipeline/report/reportCompiler.js';

function bankLayout(files: string[]) {
  const book = new ReportBook();
  for (const file of files) {
    book.addBlock('bank', file, [{ date: '2024-04-01', description: 'COFFEE SHOP', amount: '-4.50', category: 'Food & Drink' }]);
  }
  return book.layouts()[0];
}

async function readSheet(file: string, name: string) {
  const workbook = new ExcelJS.Workbook();
  await workbook.xlsx.readFile(file);
  const sheet = workbook.getWorksheet(name);
  if (!sheet) {
    throw new Error(`missing sheet ${name}`);
  }
  return sheet;
}

describe('XlsxReportWriter', () => {
  let dir: string;
  let out: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'harvest-report-'));
    out = path.join(dir, 'nested', 'transactions.xlsx');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('writes highlighted headers and numeric amounts', async () => {
    const writer = new XlsxReportWriter(out);
    await writer.appendSheet('bank', bankLayout(['a.pdf', 'b.pdf']));
    await writer.flush();

    const sheet = await readSheet(out, 'bank');
    expect(sheet.getCell('A1').value).toBe('a.pdf');
    expect(sheet.getCell('A1').font?.bold).toBe(true);
    expect(sheet.getCell('A1').fill).toMatchObject({ type: 'pattern', pattern: 'solid', fgColor: { argb: 'FFD9EBD9' } });
    expect(sheet.getCell('A2').value).toBe('2024-04-01');
    expect(sheet.getCell('B2').value).toBe('COFFEE SHOP');
    expect(sheet.getCell('C2').value).toBe(-4.5);
    expect(sheet.getCell('C2').numFmt).toBe('0.00');
    expect(sheet.getCell('D2').value).toBe('Food & Drink');
    expect(sheet.getCell('A3').value).toBeNull();
    expect(sheet.getCell('A6').value).toBe('b.pdf');
  });

  it('appends below an existing report with the block gap', async () => {
    const first = new XlsxReportWriter(out);
    await first.appendSheet('bank', bankLayout(['a.pdf']));
    await first.flush();

    const second = new XlsxReportWriter(out);
    await second.appendSheet('bank', bankLayout(['c.pdf']));
    await second.flush();

    const sheet = await readSheet(out, 'bank');
    expect(sheet.getCell('A1').value).toBe('a.pdf');
    expect(sheet.getCell('A5').value).toBeNull();
    expect(sheet.getCell('A6').value).toBe('c.pdf');
    expect(sheet.getCell('C7').value).toBe(-4.5);
  });

  it('names sheets within Excel limits', () => {
    expect(sheetNameFor('a/b:c')).toBe('a_b_c');
    expect(sheetNameFor('x'.repeat(40))).toHaveLength(31);
    expect(sheetNameFor('  ')).toBe('Sheet');
  });
});
