import type { AxiosInstance } from 'axios';
import type { Credential, Logger, Session } from '../../types';
import { AuthenticationFailedError, CloudRequestError } from './errors';
import { CREDENTIAL_DISCOVERY_URL, DEFAULT_BASE_URL, HttpOptions, LOGIN_PATH, createHttp, sendRequest } from './http';
import { RSC_OK, isRecord } from './Mappers';
import type { Authenticator, LoginResult } from './Provider';
import RateLimiter from './RateLimiter';

const DEFAULT_EXPIRES_IN_SECONDS = 3600;

export interface DaikinAuthenticatorOptions extends HttpOptions {
  rateLimiter: RateLimiter;
  logger?: Logger;
  debug?: boolean;
  now?: () => number;
}

interface ClientCredentials {
  clientId: string;
  clientSecret: string;
}

/**
 * Searches a nested JSON payload for a client_id/client_secret pair.
 * Key matching is case-insensitive and accepts the underscore-less spelling.
 */
export function extractClientCredentials(payload: unknown): ClientCredentials | null {
  const stack: unknown[] = [payload];
  while (stack.length) {
    const node = stack.pop();
    if (Array.isArray(node)) {
      stack.push(...node);
      continue;
    }
    if (!isRecord(node)) {
      continue;
    }

    const lowered = new Map(Object.entries(node).map(([key, value]) => [key.toLowerCase(), value]));
    const clientId = lowered.get('client_id') ?? lowered.get('clientid');
    const clientSecret = lowered.get('client_secret') ?? lowered.get('clientsecret');
    if (typeof clientId === 'string' && typeof clientSecret === 'string' && clientId && clientSecret) {
      return { clientId: clientId.trim(), clientSecret: clientSecret.trim() };
    }

    for (const value of lowered.values()) {
      if (typeof value === 'object' && value !== null) {
        stack.push(value);
      }
    }
  }
  return null;
}

export function extractClientCredentialsFromText(text: string): ClientCredentials | null {
  if (!text) {
    return null;
  }
  const idMatch = /client[_-]?id['"\s:=]+([A-Za-z0-9._-]{8,})/i.exec(text);
  const secretMatch = /client[_-]?secret['"\s:=]+([A-Za-z0-9._-]{16,})/i.exec(text);
  if (!idMatch || !secretMatch) {
    return null;
  }
  return { clientId: idMatch[1], clientSecret: secretMatch[1] };
}

const parseJson = (text: string): unknown => {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
};

export class DaikinAuthenticator implements Authenticator {
  private readonly http: AxiosInstance;
  private readonly baseUrl: string;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly now: () => number;

  constructor(options: DaikinAuthenticatorOptions) {
    this.http = createHttp(options);
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, '');
    this.rateLimiter = options.rateLimiter;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
    this.now = options.now ?? Date.now;
  }

  async login(credential: Credential): Promise<LoginResult> {
    const resolved = await this.resolveClientCredentials(credential);

    const response = await this.rateLimiter.schedule(
      () =>
        sendRequest(this.http, {
          url: LOGIN_PATH,
          method: 'POST',
          data: {
            client_secret: resolved.clientSecret,
            user_id: resolved.username,
            uuid: resolved.clientUuid,
            password: resolved.password,
            client_id: resolved.clientId,
            grant_type: 'password',
          },
        }),
      'command',
    );

    const { status, data } = response;
    if (status >= 500 || status === 429) {
      this.logError('Login endpoint unavailable (%d)', status);
      throw new CloudRequestError(`Login failed: HTTP ${status}`, status);
    }
    if (status !== 200 || !isRecord(data)) {
      this.logError('Login failed for %s: HTTP %d', resolved.username, status);
      throw new AuthenticationFailedError(`Login failed: HTTP ${status}`);
    }
    if (data.rsc !== RSC_OK) {
      this.logError('Login rejected for %s: rsc=%s', resolved.username, String(data.rsc));
      throw new AuthenticationFailedError(`Login rejected: rsc=${String(data.rsc)} error=${String(data.error ?? '')}`);
    }

    const accessToken = typeof data.access_token === 'string' && data.access_token ? data.access_token : undefined;
    const idToken = typeof data.id_token === 'string' && data.id_token ? data.id_token : undefined;
    const refreshToken = typeof data.refresh_token === 'string' && data.refresh_token ? data.refresh_token : undefined;
    if (!accessToken && !idToken) {
      throw new AuthenticationFailedError('Login succeeded but no token fields were returned');
    }

    const expiresIn = Number(data.expires_in) || DEFAULT_EXPIRES_IN_SECONDS;
    const issuedAt = this.now();
    const session: Session = {
      accessToken,
      idToken,
      refreshToken,
      issuedAt,
      expiresAt: issuedAt + expiresIn * 1000,
    };

    this.logDebug('Authenticated Daikin account %s', resolved.username);
    return {
      session,
      credential: credential.clientId && credential.clientSecret ? undefined : resolved,
    };
  }

  private async resolveClientCredentials(
    credential: Credential,
  ): Promise<Credential & ClientCredentials> {
    const { clientId, clientSecret } = credential;
    if (clientId && clientSecret) {
      return { ...credential, clientId, clientSecret };
    }

    const urls = [CREDENTIAL_DISCOVERY_URL, `${this.baseUrl}/common/login`];
    const payloads: Array<Record<string, string>> = [
      { user_id: credential.username, password: credential.password, uuid: credential.clientUuid },
      { username: credential.username, password: credential.password, uuid: credential.clientUuid },
      { user_id: credential.username, password: credential.password },
      { username: credential.username, password: credential.password },
    ];

    for (const url of urls) {
      for (const payload of payloads) {
        const response = await this.rateLimiter.schedule(
          () =>
            sendRequest<string>(this.http, {
              url,
              method: 'POST',
              data: payload,
              responseType: 'text',
              transformResponse: [(body: unknown) => body],
            }),
          'command',
        );

        const text = typeof response.data === 'string' ? response.data : '';
        const found = extractClientCredentials(parseJson(text)) ?? extractClientCredentialsFromText(text);
        if (found) {
          this.logDebug('Resolved app client credentials from %s', url);
          return { ...credential, ...found };
        }
      }
    }

    this.logError('Could not resolve app client credentials from any discovery endpoint');
    throw new AuthenticationFailedError('Could not resolve app client credentials from server');
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logger?.(this.formatLog(message), ...args);
    }
  }

  private logError(message: string, ...args: unknown[]): void {
    this.logger?.(this.formatLog(message), ...args);
  }

  private formatLog(message: string): string {
    return `[DaikinAuthenticator] ${message}`;
  }
}

export default DaikinAuthenticator;
