export const APP_VERSION = '0.4.0';

export const UNKNOWN_ACCOUNT = 'Unknown Account';

/** Source-account values that never get a ledger sheet of their own. */
export const UNASSIGNED_ACCOUNT_NAMES: readonly string[] = ['', 'Unknown', UNKNOWN_ACCOUNT];

export const DEFAULT_ACCOUNT_NAMES: readonly string[] = [
  'Canara Savings',
  'HDFC Savings',
  'ICIC Saphirro CC',
  'ICIC Amazon CC',
  'HDFC Regalia CC',
  'HDFC Swiggy CC',
  'Cash',
  'Achu',
];

export const DEFAULT_PARTIES = {
  primary: 'Appu',
  secondary: 'Achu',
} as const;

export interface Parties {
  /** Party A: owns unsplit spend. */
  primary: string;
  /** Party B: owns fully-assigned spend and has a ledger of its own. */
  secondary: string;
}

export const CHECKPOINT_FILES = {
  extraction: 'processed_transactions.json',
  categorized: 'categorized_transactions.json',
} as const;
