import path from 'node:path';
import dotenv from 'dotenv';

dotenv.config();

const cwd = process.cwd();

function asNumber(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function asBool(value: string | undefined, fallback: boolean): boolean {
  if (value == null) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['0', 'false', 'no', 'off'].includes(normalized)) {
    return false;
  }
  return fallback;
}

function asList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

function asProvider(value: string | undefined): 'gmail' | 'imap' {
  return value?.trim().toLowerCase() === 'imap' ? 'imap' : 'gmail';
}

export const config = {
  dbPath: process.env.DB_PATH ?? path.join(cwd, 'var', 'app.db'),
  storageRoot: process.env.STORAGE_ROOT ?? path.join(cwd, 'var', 'store'),
  storageFolder: process.env.STORAGE_FOLDER ?? 'Statements',
  reportPath: process.env.REPORT_PATH ?? path.join(cwd, 'out', 'transactions.xlsx'),

  concurrency: asNumber(process.env.HARVEST_CONCURRENCY, 4),
  maxAttempts: asNumber(process.env.HARVEST_MAX_ATTEMPTS, 3),
  backoffMs: asNumber(process.env.HARVEST_BACKOFF_MS, 250),
  collaboratorTimeoutMs: asNumber(process.env.COLLABORATOR_TIMEOUT_MS, 30000),
  ledgerClaimTtlSec: asNumber(process.env.LEDGER_CLAIM_TTL_SEC, 600),

  passwords: asList(process.env.HARVEST_PASSWORDS),
  keywords: asList(process.env.HARVEST_KEYWORDS),
  mailProvider: asProvider(process.env.MAIL_PROVIDER),
  mailFetchMax: asNumber(process.env.MAIL_FETCH_MAX, 100),

  gmailClientId: process.env.GMAIL_CLIENT_ID ?? '',
  gmailClientSecret: process.env.GMAIL_CLIENT_SECRET ?? '',
  gmailRedirectUri: process.env.GMAIL_REDIRECT_URI ?? 'https://developers.google.com/oauthplayground',
  gmailRefreshToken: process.env.GMAIL_REFRESH_TOKEN ?? '',

  imapHost: process.env.IMAP_HOST ?? '',
  imapPort: asNumber(process.env.IMAP_PORT, 993),
  imapSecure: asBool(process.env.IMAP_SECURE, true),
  imapUser: process.env.IMAP_USER ?? '',
  imapPassword: process.env.IMAP_PASSWORD ?? '',
  imapMailbox: process.env.IMAP_MAILBOX ?? 'INBOX',

  logLevel: process.env.LOG_LEVEL ?? 'info',
};

export function requireEnv(value: string, name: string): string {
  if (!value) {
    throw new Error(`Missing required env var: ${name}`);
  }
  return value;
}
