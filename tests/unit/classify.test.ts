import { describe, expect, it } from 'vitest';
import { classifyMessage, extractPasswordHint, isPdfName } from '../../src/connectors/classify.js';
import { buildGmailQuery } from '../../src/connectors/gmail/gmailConnector.js';

describe('classifyMessage', () => {
  it('groups by the first keyword found in subject, sender or file name', () => {
    expect(
      classifyMessage({ subject: 'Your HDFC statement', from: 'alerts@bank.test', attachmentNames: [] }, ['amex', 'hdfc']),
    ).toBe('hdfc');
    expect(
      classifyMessage({ subject: 'Statement', from: 'x@y.test', attachmentNames: ['AMEX_0424.pdf'] }, ['amex', 'hdfc']),
    ).toBe('amex');
  });

  it('falls back to Content_matches for body-only hits', () => {
    expect(classifyMessage({ subject: 'Hello', from: 'x@y.test', attachmentNames: ['doc.pdf'] }, ['hdfc'])).toBe('Content_matches');
  });
});

describe('attachment helpers', () => {
  it('recognizes pdf by name or content type', () => {
    expect(isPdfName('a.PDF')).toBe(true);
    expect(isPdfName('blob', 'application/pdf')).toBe(true);
    expect(isPdfName('a.xlsx', 'application/vnd.ms-excel')).toBe(false);
    expect(isPdfName(undefined)).toBe(false);
  });

  it('pulls the password sentence out of the mail text', () => {
    expect(extractPasswordHint('Hi.\nThe password is your date of birth in DDMMYYYY format. Thanks')).toBe(
      'The password is your date of birth in DDMMYYYY format',
    );
    expect(extractPasswordHint('No hints here')).toBeUndefined();
  });

  it('builds a Gmail search for pdf attachments', () => {
    expect(buildGmailQuery(['hdfc', 'amex'])).toBe('("hdfc" OR "amex") has:attachment filename:pdf');
    expect(buildGmailQuery([])).toBe('has:attachment filename:pdf');
  });
});
