import { v4 as uuidv4 } from 'uuid';
import type { Credential, Session } from '../../types';
import { NotConfiguredError } from '../daikin/errors';
import type { TokenStore } from '../daikin/Provider';

export type CredentialInput = Omit<Credential, 'clientUuid'> & { clientUuid?: string };

export const newClientUuid = (): string => uuidv4().replace(/-/g, '').toUpperCase();

export class CredentialStore {
  constructor(private readonly store: TokenStore<Credential>) {}

  async get(): Promise<Credential> {
    const credential = await this.store.get();
    if (!credential) {
      throw new NotConfiguredError();
    }
    return credential;
  }

  async set(input: CredentialInput): Promise<Credential> {
    const credential: Credential = {
      ...input,
      username: input.username.trim(),
      clientUuid: input.clientUuid ?? newClientUuid(),
    };
    await this.store.set(credential);
    return credential;
  }

  async clear(): Promise<void> {
    await this.store.unset();
  }
}

export function isCredential(value: unknown): value is Credential {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const candidate = value as Partial<Credential>;
  return (
    typeof candidate.username === 'string' &&
    typeof candidate.password === 'string' &&
    typeof candidate.clientUuid === 'string' &&
    (candidate.clientId === undefined || typeof candidate.clientId === 'string') &&
    (candidate.clientSecret === undefined || typeof candidate.clientSecret === 'string')
  );
}

export function isSession(value: unknown): value is Session {
  if (!value || typeof value !== 'object') {
    return false;
  }
  const candidate = value as Partial<Session>;
  const hasToken = typeof candidate.accessToken === 'string' || typeof candidate.idToken === 'string';
  return hasToken && typeof candidate.expiresAt === 'number' && typeof candidate.issuedAt === 'number';
}

export default CredentialStore;
