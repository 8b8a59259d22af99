import type { TransactionRecord } from '../../types.js';
import type { DateOrder } from '../../utils/dates.js';
import { DEFAULT_RULES, type AmountPicker, type LineRule } from './rules.js';

const SUMMARY_LABELS = [
  '(?:opening|closing|available|ledger|previous|new)\\s+balance',
  'balance\\s+(?:b\\/f|c\\/f|brought\\s+forward|carried\\s+forward|forward)',
  '(?:brought|carried)\\s+forward',
  '(?:sub\\s?)?total(?:\\s+(?:amount|due|debits?|credits?|payments?|purchases?))*',
  'page\\s+\\d+(?:\\s+of\\s+\\d+)?',
  'statement\\s+(?:date|period)',
  'minimum\\s+(?:payment|amount)\\s+due',
];

const LEADING_DATE = '\\d{1,4}[/.-]\\d{1,2}[/.-]\\d{1,4}\\s+';

// A label opens the line (after an optional date) and is followed only by
// figures or nothing, so merchants such as "TOTAL WINE" are not summaries.
const SUMMARY_LINE = new RegExp(`^\\s*(?:${LEADING_DATE})?(?:${SUMMARY_LABELS.join('|')})\\s*:?\\s*(?=$|[^\\sA-Za-z&])`, 'i');

/** Layout-specific overrides, chosen by `detect` against the document text. */
export interface StatementFormat {
  name: string;
  detect(lines: readonly string[]): boolean;
  rules?: readonly LineRule[];
  pickAmount?: AmountPicker;
  dateOrder?: DateOrder;
}

export interface ParserOptions {
  rules?: readonly LineRule[];
  pickAmount?: AmountPicker;
  dateOrder?: DateOrder;
  formats?: readonly StatementFormat[];
  categorize?: (description: string) => string | undefined;
}

export interface ParseResult {
  transactions: TransactionRecord[];
  format: string;
  skippedLines: number;
}

export function isNoiseLine(line: string): boolean {
  return !line.trim() || SUMMARY_LINE.test(line);
}

export class TransactionParser {
  private readonly rules: readonly LineRule[];
  private readonly pickAmount: AmountPicker;
  private readonly dateOrder: DateOrder;
  private readonly formats: readonly StatementFormat[];

  constructor(private readonly options: ParserOptions = {}) {
    this.rules = options.rules ?? DEFAULT_RULES;
    this.pickAmount = options.pickAmount ?? 'rightmost';
    this.dateOrder = options.dateOrder ?? 'MDY';
    this.formats = options.formats ?? [];
  }

  /** Never throws; unrecognized lines are counted in `skippedLines`. */
  parse(lines: readonly string[]): ParseResult {
    const format = this.formats.find((candidate) => candidate.detect(lines));
    const rules = format?.rules ?? this.rules;
    const pickAmount = format?.pickAmount ?? this.pickAmount;
    const dateOrder = format?.dateOrder ?? this.dateOrder;

    const transactions: TransactionRecord[] = [];
    let skippedLines = 0;

    for (let i = 0; i < lines.length; i += 1) {
      const line = lines[i];
      if (isNoiseLine(line)) {
        skippedLines += 1;
        continue;
      }

      const next = lines[i + 1];
      let matched = false;
      for (const rule of rules) {
        const hit = rule.match({ line, next, dateOrder, pickAmount });
        if (!hit) {
          continue;
        }
        const record: TransactionRecord = { date: hit.date, description: hit.description, amount: hit.amount };
        const category = this.options.categorize?.(hit.description);
        if (category) {
          record.category = category;
        }
        transactions.push(record);
        if (hit.consumesNext) {
          i += 1;
        }
        matched = true;
        break;
      }

      if (!matched) {
        skippedLines += 1;
      }
    }

    return { transactions, format: format?.name ?? 'default', skippedLines };
  }
}
