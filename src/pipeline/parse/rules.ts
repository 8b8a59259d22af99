import type { CalendarDate } from '../../types.js';
import { findAmountTokens, type AmountToken } from '../../utils/amount.js';
import { matchLeadingDate, type DateOrder } from '../../utils/dates.js';

export type AmountPicker = 'rightmost' | 'leftmost' | ((tokens: AmountToken[]) => AmountToken | undefined);

export interface RuleContext {
  line: string;
  next: string | undefined;
  dateOrder: DateOrder;
  pickAmount: AmountPicker;
}

export interface RuleMatch {
  date: CalendarDate;
  description: string;
  amount: string;
  /** The adjacent line was part of this record and must not be parsed again. */
  consumesNext: boolean;
}

/** A pure recognizer for one statement line layout. */
export interface LineRule {
  name: string;
  match(ctx: RuleContext): RuleMatch | null;
}

export function pickToken(tokens: AmountToken[], picker: AmountPicker): AmountToken | undefined {
  if (picker === 'rightmost') {
    return tokens[tokens.length - 1];
  }
  if (picker === 'leftmost') {
    return tokens[0];
  }
  return picker(tokens);
}

function cleanDescription(text: string): string {
  return text
    .replace(/\s+/g, ' ')
    .replace(/^[\s|:;,-]+|[\s|:;,-]+$/g, '')
    .trim();
}

/** Date at the start of the line, optionally followed by a second (value) date. */
function splitLeadingDates(line: string, order: DateOrder): { date: CalendarDate; rest: string } | null {
  const trimmed = line.trimStart();
  const first = matchLeadingDate(trimmed, order);
  if (!first) {
    return null;
  }
  let rest = trimmed.slice(first.length);
  const valueDate = matchLeadingDate(rest.trimStart(), order);
  if (valueDate && /^\s/.test(rest)) {
    rest = rest.trimStart().slice(valueDate.length);
  }
  if (rest && !/^\s/.test(rest)) {
    return null;
  }
  return { date: first.date, rest };
}

function isAmountOnly(line: string): AmountToken[] | null {
  const tokens = findAmountTokens(line);
  if (!tokens.length) {
    return null;
  }
  const leftover = tokens.reduce((text, token) => text.replace(token.raw, ' '), line);
  return leftover.trim() ? null : tokens;
}

/** `DATE [VALUE-DATE] DESCRIPTION ... AMOUNT [AMOUNT...]` on one line. */
export const sameLineRule: LineRule = {
  name: 'date-description-amount',
  match({ line, dateOrder, pickAmount }) {
    const dated = splitLeadingDates(line, dateOrder);
    if (!dated) {
      return null;
    }
    const tokens = findAmountTokens(dated.rest);
    const chosen = pickToken(tokens, pickAmount);
    if (!chosen || !tokens.length) {
      return null;
    }
    const description = cleanDescription(dated.rest.slice(0, tokens[0].index));
    if (!description) {
      return null;
    }
    return { date: dated.date, description, amount: chosen.value, consumesNext: false };
  },
};

/** `DATE DESCRIPTION` with the amount column wrapped onto the following line. */
export const nextLineAmountRule: LineRule = {
  name: 'date-description/next-line-amount',
  match({ line, next, dateOrder, pickAmount }) {
    if (next === undefined) {
      return null;
    }
    const dated = splitLeadingDates(line, dateOrder);
    if (!dated || findAmountTokens(dated.rest).length) {
      return null;
    }
    const description = cleanDescription(dated.rest);
    const tokens = isAmountOnly(next);
    const chosen = tokens ? pickToken(tokens, pickAmount) : undefined;
    if (!description || !chosen) {
      return null;
    }
    return { date: dated.date, description, amount: chosen.value, consumesNext: true };
  },
};

/** `DESCRIPTION DATE AMOUNT`, used by layouts that print the narrative first. */
export const trailingDateRule: LineRule = {
  name: 'description-date-amount',
  match({ line, dateOrder, pickAmount }) {
    const tokens = findAmountTokens(line);
    const chosen = pickToken(tokens, pickAmount);
    if (!chosen || !tokens.length) {
      return null;
    }
    const head = line.slice(0, tokens[0].index);
    const parts = head.trimEnd().split(/\s{2,}|\s(?=\d)/);
    for (let i = parts.length - 1; i > 0; i -= 1) {
      const candidate = parts.slice(i).join(' ').trim();
      const date = matchLeadingDate(candidate, dateOrder);
      if (date && date.length === candidate.length) {
        const description = cleanDescription(parts.slice(0, i).join(' '));
        return description ? { date: date.date, description, amount: chosen.value, consumesNext: false } : null;
      }
    }
    return null;
  },
};

export const DEFAULT_RULES: readonly LineRule[] = [sameLineRule, nextLineAmountRule, trailingDateRule];
