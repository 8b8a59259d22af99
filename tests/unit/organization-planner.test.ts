import { describe, expect, it } from 'vitest';
import { OrganizationPlanner, baseFileName, groupFolder, sanitizeName } from '../../src/pipeline/organize/planner.js';
import { CONTENT_MATCHES_GROUP } from '../../src/types.js';
import { makeAttachment } from '../helpers/fakes.js';

function probe(existing: string[]) {
  const taken = new Set(existing);
  return { exists: async (folderPath: string, fileName: string) => taken.has(`${folderPath}/${fileName}`) };
}

describe('sanitizeName', () => {
  it('replaces reserved characters and whitespace', () => {
    expect(sanitizeName('e-Statement  April*2024')).toBe('e-Statement_April_2024');
    expect(sanitizeName('a<b>:c|d?')).toBe('a_b_c_d');
  });

  it('falls back when nothing is left', () => {
    expect(sanitizeName('???')).toBe('attachment');
  });
});

describe('file naming', () => {
  it('prefixes the received day and keeps a lower-case extension', () => {
    expect(baseFileName(makeAttachment({ filename: 'April Statement.PDF' }))).toBe('2024-04-05-April_Statement.pdf');
  });

  it('adds .pdf when the name has no extension', () => {
    expect(baseFileName(makeAttachment({ filename: 'statement' }))).toBe('2024-04-05-statement.pdf');
  });

  it('puts each group in its own folder', () => {
    expect(groupFolder('Statements', 'HDFC Bank')).toBe('Statements/HDFC_Bank');
    expect(groupFolder('Statements', CONTENT_MATCHES_GROUP)).toBe('Statements/Content_matches');
  });
});

describe('OrganizationPlanner', () => {
  it('plans the base name when it is free', async () => {
    const planner = new OrganizationPlanner('Statements', probe([]));
    expect(await planner.plan(makeAttachment({ filename: 'april.pdf' }))).toEqual({
      folderPath: 'Statements/bank',
      fileName: '2024-04-05-april.pdf',
    });
  });

  it('suffixes names taken in storage or earlier in the run', async () => {
    const planner = new OrganizationPlanner('Statements', probe(['Statements/bank/2024-04-05-april.pdf']));
    const attachment = makeAttachment({ filename: 'april.pdf' });

    expect((await planner.plan(attachment)).fileName).toBe('2024-04-05-april-1.pdf');
    expect((await planner.plan(attachment)).fileName).toBe('2024-04-05-april-2.pdf');
  });

  it('accepts an explicit group', async () => {
    const planner = new OrganizationPlanner('Statements', probe([]));
    const plan = await planner.plan(makeAttachment(), CONTENT_MATCHES_GROUP);
    expect(plan.folderPath).toBe('Statements/Content_matches');
  });
});
