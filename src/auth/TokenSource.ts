import { promises as fsp } from 'fs';
import { createInterface } from 'readline/promises';
import { google, type Auth } from 'googleapis';
import { createError } from '../errors';
import type { Logger } from '../logging';
import { InstalledCredentialsSchema, readJsonFile, StoredTokenSchema, writeJsonFile } from './schemas';

export const SDM_SCOPE = 'https://www.googleapis.com/auth/sdm.service';
const REDIRECT_URL = 'http://localhost:8080';

export type Prompt = (question: string) => Promise<string>;

export interface TokenSourceOptions {
  credentialsFile: string;
  tokenFile: string;
  prompt?: Prompt;
  logger?: Logger;
}

const messageOf = (err: unknown) => (err instanceof Error ? err.message : String(err));

const askOnTerminal: Prompt = async (question) => {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    return await rl.question(question);
  } finally {
    rl.close();
  }
};

/** Accepts either a bare authorization code or the full redirect URL carrying it. */
export function extractAuthCode(input: string) {
  const trimmed = input.trim();
  if (!trimmed.startsWith('http')) {
    if (!trimmed) {
      throw createError('CredentialsUnavailable', 'no authorization code entered', 'auth');
    }
    return trimmed;
  }
  let redirect: URL;
  try {
    redirect = new URL(trimmed);
  } catch (err) {
    throw createError('CredentialsUnavailable', `failed to parse redirect URL: ${trimmed}`, 'auth', err);
  }
  const code = redirect.searchParams.get('code');
  if (!code) {
    throw createError('CredentialsUnavailable', 'no authorization code found in redirect URL', 'auth');
  }
  return code;
}

/**
 * OAuth2 client for the device-management API. Tokens are cached in
 * `tokenFile`, refreshed tokens are written back, and a rejected refresh
 * token (`invalid_grant`) falls back to the interactive consent flow.
 */
export class TokenSource {
  private client: Auth.OAuth2Client | null = null;
  private options: TokenSourceOptions;
  private prompt: Prompt;

  constructor(options: TokenSourceOptions) {
    this.options = options;
    this.prompt = options.prompt ?? askOnTerminal;
  }

  async getClient(): Promise<Auth.OAuth2Client> {
    if (!this.client) {
      this.client = await this.initialize();
    }
    return this.client;
  }

  /** A valid bearer token, refreshing or re-authorizing as needed. */
  async getAccessToken(): Promise<string> {
    const client = await this.getClient();
    try {
      const { token } = await client.getAccessToken();
      if (!token) {
        throw createError('CredentialsUnavailable', 'token endpoint returned no access token', 'auth');
      }
      return token;
    } catch (err) {
      if (!messageOf(err).includes('invalid_grant')) {
        throw createError('CredentialsUnavailable', `failed to get token: ${messageOf(err)}`, 'auth', err);
      }
      this.log('Stored token was rejected, starting a new authorization');
      await fsp.rm(this.options.tokenFile, { force: true }).catch((rmErr: unknown) => {
        this.log('Failed to remove expired token file', messageOf(rmErr));
      });
      const tokens = await this.authorize(client);
      client.setCredentials(tokens);
      await this.persistAuthorized(tokens);
      if (!tokens.access_token) {
        throw createError('CredentialsUnavailable', 'authorization returned no access token', 'auth');
      }
      return tokens.access_token;
    }
  }

  private async initialize() {
    const { credentialsFile, tokenFile } = this.options;
    const credentials = await readJsonFile(credentialsFile, InstalledCredentialsSchema).catch((err: unknown) => {
      throw createError('CredentialsUnavailable', `failed to load credentials from ${credentialsFile}`, 'auth', err);
    });
    const client = new google.auth.OAuth2(
      credentials.installed.client_id,
      credentials.installed.client_secret,
      REDIRECT_URL,
    );
    client.on('tokens', (tokens) => {
      this.saveToken({ ...client.credentials, ...tokens }).catch((err: unknown) =>
        this.log('Failed to save refreshed token', messageOf(err)),
      );
    });

    const stored = await readJsonFile(tokenFile, StoredTokenSchema).catch((err: unknown) => {
      this.log(`No usable token in ${tokenFile}:`, messageOf(err));
      return null;
    });
    if (stored) {
      client.setCredentials(stored);
      return client;
    }

    const tokens = await this.authorize(client);
    client.setCredentials(tokens);
    await this.persistAuthorized(tokens);
    return client;
  }

  private async authorize(client: Auth.OAuth2Client): Promise<Auth.Credentials> {
    const authUrl = client.generateAuthUrl({
      access_type: 'offline',
      prompt: 'consent',
      scope: [SDM_SCOPE],
      state: 'state-token',
    });
    const input = await this.prompt(
      `Go to the following link in your browser:\n${authUrl}\nEnter the authorization code or redirect URL: `,
    );
    const code = extractAuthCode(input);
    try {
      const { tokens } = await client.getToken(code);
      return tokens;
    } catch (err) {
      throw createError('CredentialsUnavailable', `failed to exchange code for token: ${messageOf(err)}`, 'auth', err);
    }
  }

  private async persistAuthorized(tokens: Auth.Credentials) {
    await this.saveToken(tokens).catch((err: unknown) => {
      throw createError('CredentialsUnavailable', `failed to save token to ${this.options.tokenFile}`, 'auth', err);
    });
  }

  private async saveToken(tokens: Auth.Credentials) {
    await writeJsonFile(this.options.tokenFile, tokens);
    this.log('Saved token to', this.options.tokenFile);
  }

  private log(...args: unknown[]) {
    if (this.options.logger) {
      this.options.logger('[auth]', ...args);
    }
  }
}
