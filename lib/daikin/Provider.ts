import type { Command, Credential, Device, Session, StatusSnapshot } from '../../types';

/** Typed surface of the vendor cloud used by the registry, synchronizer and dispatcher. */
export interface Provider {
  discoverDevices(): Promise<Device[]>;
  fetchStatus(deviceId: string): Promise<StatusSnapshot>;
  /**
   * Resolves to whether the cloud queued the command. Acceptance says nothing
   * about the unit having applied it.
   */
  submitCommand(deviceId: string, command: Command): Promise<boolean>;
}

export interface LoginResult {
  session: Session;
  /** Set when the login had to resolve app client credentials first. */
  credential?: Credential;
}

export interface Authenticator {
  login(credential: Credential): Promise<LoginResult>;
}

export interface TokenStore<T> {
  get(): Promise<T | null>;
  set(value: T): Promise<void>;
  unset(): Promise<void>;
}

export function createInMemoryTokenStore<T>(initial: T | null = null): TokenStore<T> {
  let value: T | null = initial;

  return {
    async get() {
      return value;
    },
    async set(next: T) {
      value = next;
    },
    async unset() {
      value = null;
    },
  } satisfies TokenStore<T>;
}
