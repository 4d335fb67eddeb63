// ─── Configuration ──────────────────────────────────────────────────────────
export { loadConfig, requireGoogleConfig, envBool, envList } from './config.js';
export type { AppConfig, ConfigOverrides, GoogleSettings, RequiredGoogleSettings } from './config.js';

// ─── Google auth ────────────────────────────────────────────────────────────
export { createGoogleAuth, missingScopes, GOOGLE_SCOPES } from './google/auth.js';

// ─── Statement sources ──────────────────────────────────────────────────────
export { DirectoryStatementSource } from './sources/directory-source.js';
export type { DirectoryScan, StatementFile } from './sources/directory-source.js';
export { GmailStatementSource, buildGmailQuery, findPdfParts } from './sources/gmail-source.js';
export type { StatementSource } from './sources/types.js';

// ─── Pipeline ───────────────────────────────────────────────────────────────
export { filterByDateWindow, dateWindow, GRACE_DAYS } from './pipeline/date-window.js';
export type { DateWindow, DateWindowResult } from './pipeline/date-window.js';
export { runPipeline } from './pipeline/runner.js';
export type { PipelineDeps, PipelineOptions, PipelineReport, PipelineStatus, WriteSummary } from './pipeline/runner.js';
