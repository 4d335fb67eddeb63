/**
 * OAuth2 client from an installed-app client file and a stored token.
 * The consent flow itself is not run here: the token file must already exist.
 */

import { readFile } from 'fs/promises';
import { google, type Auth } from 'googleapis';
import { z } from 'zod';

export const GOOGLE_SCOPES = [
  'https://www.googleapis.com/auth/gmail.readonly',
  'https://www.googleapis.com/auth/spreadsheets',
  'https://www.googleapis.com/auth/drive',
] as const;

const OAuthClientSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uris: z.array(z.string()).default([]),
});

export const OAuthClientFileSchema = z
  .object({
    installed: OAuthClientSchema.optional(),
    web: OAuthClientSchema.optional(),
  })
  .transform((file, ctx) => {
    const client = file.installed ?? file.web;
    if (client === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'expected an "installed" or "web" client' });
      return z.NEVER;
    }
    return client;
  });

export const StoredTokenSchema = z.object({
  access_token: z.string().optional(),
  refresh_token: z.string().optional(),
  scope: z.string().optional(),
  token_type: z.string().optional(),
  expiry_date: z.number().optional(),
});
export type StoredToken = z.infer<typeof StoredTokenSchema>;

async function readJson(path: string, label: string): Promise<unknown> {
  let raw: string;
  try {
    raw = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Cannot read ${label} at ${path}: ${message}`);
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new Error(`${label} at ${path} is not valid JSON`);
  }
}

/** Scopes the token lacks; an empty list when the token carries no scope string. */
export function missingScopes(token: StoredToken): string[] {
  if (token.scope === undefined) return [];
  const granted = new Set(token.scope.split(/\s+/));
  return GOOGLE_SCOPES.filter((scope) => !granted.has(scope));
}

export interface GoogleAuthFiles {
  credentialsFile: string;
  tokenFile: string;
}

export async function createGoogleAuth(files: GoogleAuthFiles): Promise<Auth.OAuth2Client> {
  const clientFile = OAuthClientFileSchema.safeParse(await readJson(files.credentialsFile, 'OAuth client file'));
  if (!clientFile.success) {
    throw new Error(`OAuth client file ${files.credentialsFile} is invalid: ${clientFile.error.issues[0]?.message ?? 'unknown shape'}`);
  }

  const token = StoredTokenSchema.safeParse(await readJson(files.tokenFile, 'Google token file'));
  if (!token.success) {
    throw new Error(`Google token file ${files.tokenFile} is invalid: ${token.error.issues[0]?.message ?? 'unknown shape'}`);
  }
  if (token.data.refresh_token === undefined && token.data.access_token === undefined) {
    throw new Error(`Google token file ${files.tokenFile} holds neither an access_token nor a refresh_token`);
  }

  const missing = missingScopes(token.data);
  if (missing.length > 0) {
    throw new Error(`Google token is missing scopes: ${missing.join(', ')}. Re-authorize and save a new ${files.tokenFile}`);
  }

  const { client_id, client_secret, redirect_uris } = clientFile.data;
  const auth = new google.auth.OAuth2(client_id, client_secret, redirect_uris[0]);
  auth.setCredentials(token.data);
  return auth;
}
