/**
 * OAuth for the Sheets API (read-only scope).
 *
 * Credentials come from a `credentials.json` OAuth client file and a cached
 * `token.json`. When no token is cached, the user opens the consent URL and
 * pastes the code back; the resulting token is saved for later runs, and
 * refreshed tokens are written back as they arrive.
 */

import path from 'node:path';
import { createInterface } from 'node:readline/promises';
import { google, type Auth } from 'googleapis';
import {
  credentialsFileSchema,
  tokenFileSchema,
  type TokenFile,
} from '../schemas/sheets.js';
import { fileExists, readJsonFile, writeJsonFile } from '../utils/file-operations.js';
import { errorMessage, SheetsAuthError } from './errors.js';
import type { SourceOptions } from '../types/index.js';

export const SHEETS_READONLY_SCOPE =
  'https://www.googleapis.com/auth/spreadsheets.readonly';

/** Resolved locations of the OAuth files. */
export interface AuthConfig {
  credentialsPath: string;
  tokenPath: string;
}

/** Asks the user for the authorization code shown after consent. */
export type CodePrompt = (authUrl: string) => Promise<string>;

/**
 * Resolve OAuth file paths: flag, then environment, then the working
 * directory.
 */
export function resolveAuthConfig(options: SourceOptions = {}): AuthConfig {
  return {
    credentialsPath: path.resolve(
      options.credentials ??
        process.env.SHEETSCOPE_CREDENTIALS ??
        'credentials.json',
    ),
    tokenPath: path.resolve(
      options.token ?? process.env.SHEETSCOPE_TOKEN ?? 'token.json',
    ),
  };
}

/**
 * Build an authorized OAuth2 client.
 *
 * @throws SheetsAuthError when the credentials file is missing or invalid,
 *   or the authorization code is rejected.
 */
export async function authorize(
  config: AuthConfig,
  prompt: CodePrompt = promptForCode,
): Promise<Auth.OAuth2Client> {
  if (!(await fileExists(config.credentialsPath))) {
    throw new SheetsAuthError(
      `credentials.json not found at ${config.credentialsPath}\n` +
        'Download an OAuth client file from the Google Cloud console.',
    );
  }

  const credentials = await readJsonFile(
    config.credentialsPath,
    credentialsFileSchema,
  );
  const clientConfig = credentials?.installed ?? credentials?.web;
  if (!clientConfig) {
    throw new SheetsAuthError(
      `Invalid OAuth client file: ${config.credentialsPath}`,
    );
  }

  const client = new google.auth.OAuth2(
    clientConfig.client_id,
    clientConfig.client_secret,
    clientConfig.redirect_uris?.[0],
  );

  let token = await readJsonFile(config.tokenPath, tokenFileSchema);

  if (!token) {
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      scope: [SHEETS_READONLY_SCOPE],
    });
    const code = (await prompt(authUrl)).trim();
    try {
      const response = await client.getToken(code);
      token = response.tokens;
    } catch (error) {
      throw new SheetsAuthError(
        `Authorization failed: ${errorMessage(error)}`,
        { cause: error },
      );
    }
    await writeJsonFile(config.tokenPath, token);
  }

  client.setCredentials(token);
  persistRefreshedTokens(client, config.tokenPath, token);

  return client;
}

/**
 * Merge refreshed tokens into the cached file. The refresh token is only
 * sent once, so an existing one is kept when the refresh omits it.
 */
function persistRefreshedTokens(
  client: Auth.OAuth2Client,
  tokenPath: string,
  initial: TokenFile,
): void {
  let current = initial;
  client.on('tokens', (tokens) => {
    current = {
      ...current,
      ...tokens,
      refresh_token: tokens.refresh_token ?? current.refresh_token,
    };
    writeJsonFile(tokenPath, current).catch((error: unknown) => {
      console.error(`Could not save refreshed token: ${errorMessage(error)}`);
    });
  });
}

/** Print the consent URL and read the code from stdin. */
async function promptForCode(authUrl: string): Promise<string> {
  const rl = createInterface({ input: process.stdin, output: process.stderr });
  try {
    process.stderr.write(`\nAuthorize sheetscope by visiting:\n\n  ${authUrl}\n\n`);
    return await rl.question('Paste the authorization code here: ');
  } finally {
    rl.close();
  }
}
