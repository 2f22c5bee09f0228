import { ConfigError } from '../utils/errors.js';
import { homedir } from 'node:os';
import { join } from 'node:path';

export interface GoogleConfig {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
}

export interface AppConfig {
  google: GoogleConfig;
  tokenPath: string;
  calendar: string;
}

export const DEFAULT_REDIRECT_URI = 'http://localhost';
export const DEFAULT_TOKEN_PATH = join(homedir(), '.config', 'ics-gcal-importer', 'token.json');

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const clientId = env.GOOGLE_CLIENT_ID?.trim();
  const clientSecret = env.GOOGLE_CLIENT_SECRET?.trim();

  const missing = [!clientId && 'GOOGLE_CLIENT_ID', !clientSecret && 'GOOGLE_CLIENT_SECRET'].filter(
    (name): name is string => typeof name === 'string',
  );
  if (!clientId || !clientSecret) {
    throw new ConfigError(
      `Missing ${missing.join(' and ')}. Create an OAuth client (Desktop app) in the Google Cloud Console and set them in .env`,
    );
  }

  return {
    google: {
      clientId,
      clientSecret,
      redirectUri: env.GOOGLE_REDIRECT_URI?.trim() || DEFAULT_REDIRECT_URI,
    },
    tokenPath: env.ICS_IMPORT_TOKEN_PATH?.trim() || DEFAULT_TOKEN_PATH,
    calendar: env.ICS_IMPORT_CALENDAR?.trim() || 'primary',
  };
};
