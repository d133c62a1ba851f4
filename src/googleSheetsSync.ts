import fs from 'fs/promises';
import path from 'path';
import { exec } from 'child_process';
import crypto from 'crypto';
import { promisify } from 'util';
import type { DestinationStoreClient, SheetValue } from './sheetSink.js';

const execAsync = promisify(exec);
const SHEETS_API = 'https://sheets.googleapis.com/v4/spreadsheets';
const TOKEN_URL = 'https://oauth2.googleapis.com/token';

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;
export type AccessTokenSource = () => Promise<string>;

export interface TokenSourceOptions {
  keyPath?: string;
  fetchImpl?: FetchLike;
}

interface ServiceAccountKey {
  client_email: string;
  private_key: string;
}

function isServiceAccountKey(value: unknown): value is ServiceAccountKey {
  return (
    typeof value === 'object' &&
    value !== null &&
    'client_email' in value &&
    'private_key' in value &&
    typeof value.client_email === 'string' &&
    typeof value.private_key === 'string'
  );
}

function base64UrlEncode(input: Buffer): string {
  return input
    .toString('base64')
    .replace(/\+/g, '-')
    .replace(/\//g, '_')
    .replace(/=+$/g, '');
}

export function defaultKeyPath(env: NodeJS.ProcessEnv = process.env): { path: string; explicit: boolean } {
  const configured = env.COLLECTOR_SERVICE_ACCOUNT_KEY || env.GOOGLE_APPLICATION_CREDENTIALS;
  return {
    path: configured || path.join(process.cwd(), 'data', 'service-account.json'),
    explicit: Boolean(configured)
  };
}

async function getServiceAccountToken(key: ServiceAccountKey, fetchImpl: FetchLike): Promise<string> {
  const header = base64UrlEncode(Buffer.from(JSON.stringify({ alg: 'RS256', typ: 'JWT' })));
  const now = Math.floor(Date.now() / 1000);
  const payload = base64UrlEncode(
    Buffer.from(
      JSON.stringify({
        iss: key.client_email,
        scope: 'https://www.googleapis.com/auth/spreadsheets',
        aud: TOKEN_URL,
        iat: now,
        exp: now + 3600
      })
    )
  );
  const signature = crypto
    .createSign('RSA-SHA256')
    .update(`${header}.${payload}`)
    .sign(key.private_key);
  const assertion = `${header}.${payload}.${base64UrlEncode(signature)}`;

  const response = await fetchImpl(TOKEN_URL, {
    method: 'POST',
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams({
      grant_type: 'urn:ietf:params:oauth:grant-type:jwt-bearer',
      assertion
    })
  });
  if (!response.ok) {
    const text = await response.text();
    throw new Error(`Google OAuth error (${response.status}): ${text}`);
  }
  const json: unknown = await response.json();
  const token = typeof json === 'object' && json !== null && 'access_token' in json ? json.access_token : undefined;
  if (typeof token !== 'string' || !token) {
    throw new Error('Google OAuth response did not include an access token');
  }
  return token;
}

/**
 * Service-account key when one is configured or present under data/,
 * otherwise the gcloud CLI's current login.
 */
export function createAccessTokenSource(options: TokenSourceOptions = {}): AccessTokenSource {
  const fetchImpl = options.fetchImpl ?? fetch;
  const { path: keyPath, explicit } = options.keyPath
    ? { path: options.keyPath, explicit: true }
    : defaultKeyPath();

  return async () => {
    try {
      const raw = await fs.readFile(keyPath, 'utf8');
      const key: unknown = JSON.parse(raw);
      if (!isServiceAccountKey(key)) {
        throw new Error(`Service account key ${keyPath} is missing client_email/private_key`);
      }
      return await getServiceAccountToken(key, fetchImpl);
    } catch (error) {
      if (explicit) {
        throw error;
      }
    }

    const { stdout } = await execAsync('gcloud auth print-access-token');
    const token = stdout.trim();
    if (!token) {
      throw new Error('gcloud returned an empty access token');
    }
    return token;
  };
}

function quoteTitle(title: string): string {
  return `'${title.replace(/'/g, "''")}'`;
}

function sheetTitles(metadata: unknown): string[] {
  if (typeof metadata !== 'object' || metadata === null || !('sheets' in metadata) || !Array.isArray(metadata.sheets)) {
    return [];
  }
  const titles: string[] = [];
  for (const sheet of metadata.sheets) {
    const properties: unknown =
      typeof sheet === 'object' && sheet !== null && 'properties' in sheet ? sheet.properties : undefined;
    if (typeof properties === 'object' && properties !== null && 'title' in properties && typeof properties.title === 'string') {
      titles.push(properties.title);
    }
  }
  return titles;
}

export interface GoogleSheetsClientOptions {
  spreadsheetId: string;
  tokenSource: AccessTokenSource;
  fetchImpl?: FetchLike;
}

/**
 * One tab of a spreadsheet, addressed by title, over the Sheets v4 REST API.
 */
export class GoogleSheetsClient implements DestinationStoreClient {
  private readonly fetchImpl: FetchLike;
  private token: string | null = null;
  private title: string | null = null;

  constructor(private readonly options: GoogleSheetsClientOptions) {
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async authenticate(): Promise<void> {
    this.token = await this.options.tokenSource();
  }

  async open(title: string): Promise<void> {
    const metadata = await this.fetchJson(`${SHEETS_API}/${this.options.spreadsheetId}?fields=sheets.properties.title`);
    if (!sheetTitles(metadata).includes(title)) {
      await this.fetchJson(`${SHEETS_API}/${this.options.spreadsheetId}:batchUpdate`, {
        method: 'POST',
        body: { requests: [{ addSheet: { properties: { title } } }] }
      });
    }
    this.title = title;
  }

  async clear(): Promise<void> {
    const range = encodeURIComponent(this.requireTitle());
    await this.fetchJson(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}:clear`, {
      method: 'POST',
      body: {}
    });
  }

  async bulkWrite(header: readonly string[], rows: readonly SheetValue[][]): Promise<void> {
    const range = encodeURIComponent(`${this.requireTitle()}!A1`);
    await this.fetchJson(`${SHEETS_API}/${this.options.spreadsheetId}/values/${range}?valueInputOption=RAW`, {
      method: 'PUT',
      body: { values: [[...header], ...rows] }
    });
  }

  private requireTitle(): string {
    if (this.title === null) {
      throw new Error('No sheet opened; call open() first');
    }
    return quoteTitle(this.title);
  }

  private async fetchJson(url: string, options: { method?: string; body?: unknown } = {}): Promise<unknown> {
    if (this.token === null) {
      throw new Error('Not authenticated; call authenticate() first');
    }
    const { method = 'GET', body } = options;
    const response = await this.fetchImpl(url, {
      method,
      headers: {
        Authorization: `Bearer ${this.token}`,
        'Content-Type': 'application/json'
      },
      body: body === undefined ? undefined : JSON.stringify(body)
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`Google Sheets API error (${response.status}): ${text}`);
    }
    if (response.status === 204) {
      return null;
    }
    return response.json();
  }
}
