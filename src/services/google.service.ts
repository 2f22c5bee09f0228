import { errorMessage } from '../utils/errors.js';
import { google } from 'googleapis';
import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { createInterface } from 'node:readline/promises';
import type { AppConfig, GoogleConfig } from '../lib/config.js';
import type { Logger } from '../lib/logger.js';
import type { Auth, calendar_v3 } from 'googleapis';

export const SCOPES = ['https://www.googleapis.com/auth/calendar'];

export type CodePrompt = (authUrl: string) => Promise<string>;

export const createOAuth2Client = (config: GoogleConfig): Auth.OAuth2Client =>
  new google.auth.OAuth2(config.clientId, config.clientSecret, config.redirectUri);

export const getAuthUrl = (client: Auth.OAuth2Client): string =>
  client.generateAuthUrl({
    access_type: 'offline',
    scope: SCOPES,
    prompt: 'consent',
  });

const optionalString = (value: unknown): string | undefined => (typeof value === 'string' ? value : undefined);

export const parseStoredCredentials = (raw: unknown): Auth.Credentials | null => {
  if (typeof raw !== 'object' || raw === null) {
    return null;
  }
  const record: Record<string, unknown> = { ...raw };
  const refreshToken = optionalString(record.refresh_token);
  if (!refreshToken) {
    return null;
  }

  return {
    refresh_token: refreshToken,
    access_token: optionalString(record.access_token),
    token_type: optionalString(record.token_type),
    scope: optionalString(record.scope),
    expiry_date: typeof record.expiry_date === 'number' ? record.expiry_date : undefined,
  };
};

export const loadStoredTokens = async (tokenPath: string): Promise<Auth.Credentials | null> => {
  let content: string;
  try {
    content = await readFile(tokenPath, 'utf8');
  } catch {
    // no token stored yet
    return null;
  }

  try {
    return parseStoredCredentials(JSON.parse(content));
  } catch {
    return null;
  }
};

export const saveTokens = async (tokenPath: string, tokens: Auth.Credentials): Promise<void> => {
  await mkdir(dirname(tokenPath), { recursive: true });
  await writeFile(tokenPath, JSON.stringify(tokens, null, 2), { encoding: 'utf8', mode: 0o600 });
};

// Accepts the bare code or the full redirect URL the browser ended up on
export const extractAuthCode = (input: string): string => {
  const trimmed = input.trim();
  try {
    const code = new URL(trimmed).searchParams.get('code');
    if (code) {
      return code;
    }
  } catch {
    // not a URL
  }
  return trimmed;
};

export const promptForCode: CodePrompt = async authUrl => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    console.log('Authorize this app by visiting this URL:\n');
    console.log(`  ${authUrl}\n`);
    let answer = '';
    while (!answer.trim()) {
      answer = await rl.question('Paste the authorization code (or the URL you were redirected to): ');
    }
    return answer;
  } finally {
    rl.close();
  }
};

/**
 * Returns an OAuth2 client with usable credentials. Stored tokens are reused; otherwise the
 * consent flow runs once and its tokens are saved. Refreshed tokens are written back.
 */
export const getAuthorizedClient = async (
  config: AppConfig,
  { logger, prompt = promptForCode }: { logger: Logger; prompt?: CodePrompt },
): Promise<Auth.OAuth2Client> => {
  const client = createOAuth2Client(config.google);

  let current = await loadStoredTokens(config.tokenPath);
  if (current) {
    logger.debug(`Using stored Google credentials from ${config.tokenPath}`);
  } else {
    const code = extractAuthCode(await prompt(getAuthUrl(client)));
    const { tokens } = await client.getToken(code);
    await saveTokens(config.tokenPath, tokens);
    logger.info(`Saved Google credentials to ${config.tokenPath}`);
    current = tokens;
  }
  client.setCredentials(current);

  client.on('tokens', tokens => {
    const merged: Auth.Credentials = {
      ...current,
      ...tokens,
      refresh_token: tokens.refresh_token || current?.refresh_token,
    };
    current = merged;
    saveTokens(config.tokenPath, merged).catch(error => {
      logger.warn(`Failed to store refreshed Google credentials: ${errorMessage(error)}`);
    });
  });

  return client;
};

export const getGoogleCalendarClient = (auth: Auth.OAuth2Client): calendar_v3.Calendar =>
  google.calendar({ version: 'v3', auth });
