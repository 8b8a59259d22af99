const CURRENCY = '(?:[$€£¥₹]|Rs\\.?|INR|USD|EUR|GBP|SGD)';
const GROUP_SEPARATORS = ",.'\\u00A0\\u202F";
const NUMBER = `\\d{1,3}(?:[${GROUP_SEPARATORS}]\\d{3})*[.,]\\d{2}|\\d+[.,]\\d{2}`;

// 1: "(", 2: leading sign, 3: sign after currency, 4: number, 5: ")", 6: trailing "-" or Dr/Cr marker
const AMOUNT_SOURCE = `(?<![\\w.,/])(\\()?([-+−])?${CURRENCY}?\\s?([-−])?(${NUMBER})(?!\\d|[.,/]\\d)(\\))?(-(?!\\d)|\\s?(?:CR|DR|Cr|Dr)\\b)?`;

export interface AmountToken {
  raw: string;
  index: number;
  end: number;
  /** Canonical signed decimal. */
  value: string;
}

/**
 * Normalizes a digit run with locale separators to `1234.50` form. The last
 * `.` or `,` followed by one or two digits is the decimal mark; every other
 * separator groups thousands.
 */
export function normalizeNumericToken(token: string): string | null {
  const compact = token.replace(/[\s']/g, '');
  if (!/^[\d.,]+$/.test(compact) || !/\d/.test(compact)) {
    return null;
  }

  let integerPart = compact;
  let fraction = '';

  if (!/^\d{1,3}(?:\.\d{3})+$/.test(compact) && !/^\d{1,3}(?:,\d{3})+$/.test(compact)) {
    const decimalAt = Math.max(compact.lastIndexOf('.'), compact.lastIndexOf(','));
    if (decimalAt >= 0) {
      integerPart = compact.slice(0, decimalAt);
      fraction = compact.slice(decimalAt + 1);
      if (!/^\d+$/.test(fraction)) {
        return null;
      }
    }
  }

  const digits = integerPart.replace(/[.,]/g, '') || '0';
  if (!/^\d+$/.test(digits)) {
    return null;
  }
  const whole = digits.replace(/^0+(?=\d)/, '');
  return `${whole}.${fraction.padEnd(2, '0')}`;
}

function isZero(decimal: string): boolean {
  return /^0\.0+$/.test(decimal);
}

/** Parses one amount token as printed on a statement into a canonical signed decimal. */
export function parseAmount(raw: string): string | null {
  const match = new RegExp(`^\\s*${AMOUNT_SOURCE}\\s*$`).exec(raw);
  if (!match) {
    return null;
  }
  return toSignedDecimal(match);
}

function toSignedDecimal(match: RegExpExecArray): string | null {
  const [, open, leadSign, innerSign, number, close, suffix] = match;
  const magnitude = normalizeNumericToken(number ?? '');
  if (magnitude === null) {
    return null;
  }

  const marker = suffix?.trim().toUpperCase();
  const negative =
    Boolean(open && close) ||
    leadSign === '-' ||
    leadSign === '−' ||
    innerSign !== undefined ||
    marker === '-' ||
    marker === 'DR';

  return negative && !isZero(magnitude) ? `-${magnitude}` : magnitude;
}

/** All amount-like tokens on a line, left to right. */
export function findAmountTokens(line: string): AmountToken[] {
  const out: AmountToken[] = [];
  for (const match of line.matchAll(new RegExp(AMOUNT_SOURCE, 'g'))) {
    const value = toSignedDecimal(match);
    if (value === null || match.index === undefined) {
      continue;
    }
    out.push({ raw: match[0], index: match.index, end: match.index + match[0].length, value });
  }
  return out;
}

/** Renders a canonical decimal for the report: sign kept, two fraction digits minimum. */
export function formatAmount(decimal: string): string {
  const negative = decimal.startsWith('-');
  const [whole = '0', fraction = ''] = decimal.replace(/^[-+]/, '').split('.');
  const body = `${whole}.${fraction.padEnd(2, '0')}`;
  return negative ? `-${body}` : body;
}

/** Sums canonical decimals exactly, in hundredths. */
export function sumAmounts(values: readonly string[]): string {
  let total = 0n;
  let scale = 2;
  for (const value of values) {
    scale = Math.max(scale, value.split('.')[1]?.length ?? 0);
  }
  for (const value of values) {
    const negative = value.startsWith('-');
    const [whole = '0', fraction = ''] = value.replace(/^[-+]/, '').split('.');
    const units = BigInt(`${whole}${fraction.padEnd(scale, '0')}`);
    total += negative ? -units : units;
  }
  const sign = total < 0n ? '-' : '';
  const digits = (total < 0n ? -total : total).toString().padStart(scale + 1, '0');
  return `${sign}${digits.slice(0, -scale)}.${digits.slice(-scale)}`;
}
