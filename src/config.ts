/**
 * Run configuration. Priority: explicit overrides > environment variables > defaults.
 * Nothing here throws at import time; Google settings are checked by
 * {@link requireGoogleConfig} when a command actually needs them.
 */

import { resolve } from 'path';
import { DEFAULT_ACCOUNT_NAMES, DEFAULT_PARTIES, type Parties } from '@monthbook/types';

export type Env = Record<string, string | undefined>;

export const DEFAULT_TOKEN_FILE = 'google_token.json';
export const DEFAULT_DOWNLOAD_DIR = 'downloads';

export interface GoogleSettings {
  credentialsFile: string | undefined;
  tokenFile: string;
  budgetFolderId: string | undefined;
  /** Extra Gmail search terms appended to the statement query. */
  gmailQuery: string | undefined;
}

export interface AppConfig {
  accountNames: string[];
  pdfPasswords: string[];
  checkpointDir: string;
  downloadDir: string;
  parties: Parties;
  verbose: boolean;
  google: GoogleSettings;
}

export interface RequiredGoogleSettings {
  credentialsFile: string;
  tokenFile: string;
  budgetFolderId: string;
  gmailQuery: string | undefined;
}

export const envBool = (key: string, defaultVal: boolean, env: Env = process.env): boolean => {
  const val = env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

/** Comma list, trimmed, blanks removed. */
export function envList(value: string | undefined): string[] | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

export interface ConfigOverrides extends Partial<Omit<AppConfig, 'google' | 'parties'>> {
  google?: Partial<GoogleSettings>;
  parties?: Partial<Parties>;
}

export function loadConfig(overrides: ConfigOverrides = {}, env: Env = process.env): AppConfig {
  return {
    accountNames: overrides.accountNames ?? envList(env['MONTHBOOK_ACCOUNT_NAMES']) ?? [...DEFAULT_ACCOUNT_NAMES],
    pdfPasswords: overrides.pdfPasswords ?? envList(env['MONTHBOOK_PDF_PASSWORDS']) ?? [],
    checkpointDir: resolve(overrides.checkpointDir ?? nonEmpty(env['MONTHBOOK_CHECKPOINT_DIR']) ?? '.'),
    downloadDir: resolve(overrides.downloadDir ?? nonEmpty(env['MONTHBOOK_DOWNLOAD_DIR']) ?? DEFAULT_DOWNLOAD_DIR),
    parties: {
      primary: overrides.parties?.primary ?? nonEmpty(env['MONTHBOOK_PRIMARY_PARTY']) ?? DEFAULT_PARTIES.primary,
      secondary: overrides.parties?.secondary ?? nonEmpty(env['MONTHBOOK_SECONDARY_PARTY']) ?? DEFAULT_PARTIES.secondary,
    },
    verbose: overrides.verbose ?? envBool('MONTHBOOK_VERBOSE', false, env),
    google: {
      credentialsFile: overrides.google?.credentialsFile ?? nonEmpty(env['GOOGLE_OAUTH_CREDENTIALS_FILE']),
      tokenFile: overrides.google?.tokenFile ?? nonEmpty(env['GOOGLE_TOKEN_FILE']) ?? DEFAULT_TOKEN_FILE,
      budgetFolderId: overrides.google?.budgetFolderId ?? nonEmpty(env['GOOGLE_DRIVE_BUDGET_FOLDER_ID']),
      gmailQuery: overrides.google?.gmailQuery ?? nonEmpty(env['GMAIL_SEARCH_QUERY']),
    },
  };
}

export function requireGoogleConfig(config: AppConfig): RequiredGoogleSettings {
  const { credentialsFile, tokenFile, budgetFolderId, gmailQuery } = config.google;

  if (credentialsFile === undefined) {
    throw new Error(
      'Google OAuth client file is required. Set GOOGLE_OAUTH_CREDENTIALS_FILE to the downloaded client JSON.'
    );
  }

  if (budgetFolderId === undefined) {
    throw new Error(
      'Budget folder is required. Set GOOGLE_DRIVE_BUDGET_FOLDER_ID to the Drive folder that holds the yearly workbooks.'
    );
  }

  return { credentialsFile, tokenFile, budgetFolderId, gmailQuery };
}
