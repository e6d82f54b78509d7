import * as fs from 'fs';
import { dirname } from 'path';
import type { Server } from 'http';
import express from 'express';
import { google, type Auth } from 'googleapis';
import { z } from 'zod';
import { errorMessage, type Logger } from '@horror-shorts/shared';

export const YOUTUBE_UPLOAD_SCOPE = 'https://www.googleapis.com/auth/youtube.upload';

/** Tokens are refreshed this long before their recorded expiry. */
const EXPIRY_MARGIN_MS = 60_000;

export class CredentialsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CredentialsError';
  }
}

const clientSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
});

const clientSecretSchema = z
  .object({
    installed: clientSectionSchema.optional(),
    web: clientSectionSchema.optional(),
  })
  .transform((v) => v.installed ?? v.web);

const tokenSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  scope: z.string().optional(),
});

export type StoredToken = z.infer<typeof tokenSchema>;

// ─── Authorization code receiver ───

/**
 * Waits for the OAuth redirect carrying `?code=`. `onListening` gets the
 * redirect URI once the receiver is ready, and is where the consent URL is shown.
 */
export type CodeReceiver = (onListening: (redirectUri: string) => void) => Promise<string>;

export interface LoopbackOptions {
  host?: string;
  /** 0 picks a free port. */
  port?: number;
  timeoutMs?: number;
}

/** One-shot express server on the loopback interface for the installed-app flow. */
export function loopbackCodeReceiver(options: LoopbackOptions = {}): CodeReceiver {
  const host = options.host ?? '127.0.0.1';
  const port = options.port ?? 0;
  const timeoutMs = options.timeoutMs ?? 5 * 60_000;

  return (onListening) =>
    new Promise<string>((resolve, reject) => {
      const app = express();
      let timer: NodeJS.Timeout | undefined;

      const finish = (err: Error | null, code = '') => {
        clearTimeout(timer);
        server.close();
        if (err) reject(err);
        else resolve(code);
      };

      app.get('/', (req, res) => {
        res.set('Connection', 'close');
        const { code, error } = req.query;
        if (typeof error === 'string') {
          res.status(400).send(`Authorization failed: ${error}`);
          finish(new CredentialsError(`Authorization was denied: ${error}`));
          return;
        }
        if (typeof code !== 'string' || code === '') {
          res.status(400).send('Missing authorization code');
          return;
        }
        res.send('Authorization complete. You can close this window.');
        finish(null, code);
      });

      const server: Server = app.listen(port, host, () => {
        const address = server.address();
        if (address === null || typeof address === 'string') {
          finish(new CredentialsError('Loopback server has no TCP address'));
          return;
        }
        timer = setTimeout(
          () => finish(new CredentialsError(`No authorization received within ${timeoutMs}ms`)),
          timeoutMs,
        );
        try {
          onListening(`http://${host}:${address.port}`);
        } catch (err) {
          finish(err instanceof Error ? err : new Error(String(err)));
        }
      });
      server.on('error', (err) => {
        clearTimeout(timer);
        reject(err);
      });
    });
}

// ─── Credential store ───

export interface CredentialStoreOptions {
  clientSecretFile: string;
  tokenFile: string;
  receiveCode?: CodeReceiver;
  now?: () => number;
}

/** Produces an authorized OAuth2 client, reusing and refreshing the cached token where possible. */
export class YouTubeCredentialStore {
  private receiveCode: CodeReceiver;
  private now: () => number;

  constructor(
    private options: CredentialStoreOptions,
    private logger: Logger,
  ) {
    this.receiveCode = options.receiveCode ?? loopbackCodeReceiver();
    this.now = options.now ?? Date.now;
  }

  async authorize(): Promise<Auth.OAuth2Client> {
    const secret = this.readClientSecret();
    const client = new google.auth.OAuth2(secret.client_id, secret.client_secret);
    const saved = this.readToken();

    if (saved?.access_token && saved.expiry_date && saved.expiry_date > this.now() + EXPIRY_MARGIN_MS) {
      client.setCredentials(saved);
      this.logger.debug({ tokenFile: this.options.tokenFile }, 'Using cached YouTube token');
      return client;
    }

    if (saved?.refresh_token) {
      client.setCredentials(saved);
      try {
        await client.getAccessToken();
        this.saveToken({ ...saved, ...client.credentials });
        this.logger.info('Refreshed YouTube token');
        return client;
      } catch (err) {
        this.logger.warn({ error: errorMessage(err) }, 'Token refresh failed, starting authorization');
      }
    }

    return this.authorizeInteractively(client);
  }

  private async authorizeInteractively(client: Auth.OAuth2Client): Promise<Auth.OAuth2Client> {
    let redirectUri = '';
    const code = await this.receiveCode((uri) => {
      redirectUri = uri;
      const url = client.generateAuthUrl({
        access_type: 'offline',
        prompt: 'consent',
        scope: [YOUTUBE_UPLOAD_SCOPE],
        redirect_uri: uri,
      });
      this.logger.info({ url }, 'Open this URL in a browser to authorize YouTube uploads');
    });

    const { tokens } = await client.getToken({ code, redirect_uri: redirectUri });
    client.setCredentials(tokens);
    this.saveToken(tokens);
    this.logger.info({ tokenFile: this.options.tokenFile }, 'YouTube authorization complete');
    return client;
  }

  private readClientSecret(): z.infer<typeof clientSectionSchema> {
    const path = this.options.clientSecretFile;
    if (!fs.existsSync(path)) {
      throw new CredentialsError(`Client secret file not found: ${path}`);
    }

    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(path, 'utf-8'));
    } catch (err) {
      throw new CredentialsError(`Client secret file is not valid JSON: ${errorMessage(err)}`);
    }

    const parsed = clientSecretSchema.safeParse(raw);
    if (!parsed.success || parsed.data === undefined) {
      throw new CredentialsError(`Client secret file has no "installed" or "web" client: ${path}`);
    }
    return parsed.data;
  }

  private readToken(): StoredToken | null {
    const path = this.options.tokenFile;
    if (!fs.existsSync(path)) return null;
    try {
      const parsed = tokenSchema.safeParse(JSON.parse(fs.readFileSync(path, 'utf-8')));
      if (parsed.success) return parsed.data;
      this.logger.warn({ tokenFile: path }, 'Ignoring malformed token file');
    } catch (err) {
      this.logger.warn({ tokenFile: path, error: errorMessage(err) }, 'Ignoring unreadable token file');
    }
    return null;
  }

  private saveToken(token: Auth.Credentials): void {
    fs.mkdirSync(dirname(this.options.tokenFile), { recursive: true });
    fs.writeFileSync(this.options.tokenFile, JSON.stringify(token, null, 2));
  }
}
