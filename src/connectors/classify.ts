import { CONTENT_MATCHES_GROUP } from '../types.js';

export interface MessageFacts {
  subject: string;
  from: string;
  attachmentNames: string[];
}

/**
 * Group for a message found by a search: the first keyword that appears in the
 * subject, sender or an attachment name, or Content_matches when the search
 * only matched the body.
 */
export function classifyMessage(facts: MessageFacts, keywords: readonly string[]): string {
  const haystacks = [facts.subject, facts.from, ...facts.attachmentNames].map((s) => s.toLowerCase());
  const hit = keywords.find((keyword) => haystacks.some((text) => text.includes(keyword.toLowerCase())));
  return hit ?? CONTENT_MATCHES_GROUP;
}

export function isPdfName(filename: string | null | undefined, contentType = ''): boolean {
  return Boolean(filename?.toLowerCase().endsWith('.pdf')) || contentType.toLowerCase().includes('pdf');
}

/** Sentence mentioning how the attachment password is formed, if the mail carries one. */
export function extractPasswordHint(text: string | null | undefined): string | undefined {
  if (!text) {
    return undefined;
  }
  const match = /[^.\n]*\bpassword\b[^.\n]*/i.exec(text);
  const hint = match?.[0].replace(/\s+/g, ' ').trim();
  return hint ? hint.slice(0, 200) : undefined;
}
