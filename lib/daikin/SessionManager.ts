import type { Logger, Session } from '../../types';
import type CredentialStore from '../storage/CredentialStore';
import { AuthenticationFailedError, SessionUnstableError, errorMessage } from './errors';
import type { Authenticator, TokenStore } from './Provider';

/** What the cloud client needs from the session owner. */
export interface SessionSource {
  ensureSession(): Promise<Session>;
  /** Reports that the cloud rejected `rejected`, or the current session when omitted. */
  invalidate(rejected?: Session): Promise<void>;
  markHealthy(): void;
}

export interface SessionManagerOptions {
  authenticator: Authenticator;
  credentials: CredentialStore;
  sessionStore?: TokenStore<Session>;
  /** Milliseconds before the recorded expiry at which a session counts as expired. */
  safetyMarginMs?: number;
  maxInvalidations?: number;
  invalidationWindowMs?: number;
  now?: () => number;
  logger?: Logger;
  debug?: boolean;
}

/**
 * Owns the single live session of the configured account. Concurrent callers
 * share one login; unauthorized responses reported through `invalidate()` are
 * trusted over the recorded expiry.
 */
export class SessionManager implements SessionSource {
  private readonly authenticator: Authenticator;
  private readonly credentials: CredentialStore;
  private readonly sessionStore?: TokenStore<Session>;
  private readonly safetyMarginMs: number;
  private readonly maxInvalidations: number;
  private readonly invalidationWindowMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly debug: boolean;

  private session: Session | null = null;
  private sessionLoaded = false;
  private inflight?: Promise<Session>;
  // Bumped by reset() so logins started before it cannot commit.
  private generation = 0;
  private invalidations: number[] = [];
  private unstable = false;
  private authFailure?: AuthenticationFailedError;

  constructor(options: SessionManagerOptions) {
    this.authenticator = options.authenticator;
    this.credentials = options.credentials;
    this.sessionStore = options.sessionStore;
    this.safetyMarginMs = Math.max(0, options.safetyMarginMs ?? 60 * 1000);
    this.maxInvalidations = Math.max(1, options.maxInvalidations ?? 3);
    this.invalidationWindowMs = options.invalidationWindowMs ?? 60 * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  async ensureSession(): Promise<Session> {
    this.assertUsable();

    const cached = await this.getSession();
    if (cached && !this.isExpired(cached)) {
      return cached;
    }

    if (!this.inflight) {
      this.logDebug(cached ? 'Session expired, logging in again' : 'No session, logging in');
      const flight: Promise<Session> = this.login().finally(() => {
        if (this.inflight === flight) {
          this.inflight = undefined;
        }
      });
      this.inflight = flight;
    }
    return this.inflight;
  }

  async invalidate(rejected?: Session): Promise<void> {
    // Requests that were in flight with a revoked session each report it; only the first counts.
    if (rejected && (this.inflight || this.session !== rejected)) {
      this.logDebug('Ignoring rejection of a session that was already replaced');
      return;
    }

    const now = this.now();
    this.invalidations = this.invalidations.filter((at) => now - at < this.invalidationWindowMs);
    this.invalidations.push(now);

    this.session = null;
    this.sessionLoaded = true;
    await this.sessionStore?.unset();

    if (this.invalidations.length >= this.maxInvalidations && !this.unstable) {
      this.unstable = true;
      this.logError(
        'Session invalidated %d times within %dms, refusing further logins',
        this.invalidations.length,
        this.invalidationWindowMs,
      );
      return;
    }
    this.logDebug('Session invalidated (%d within window)', this.invalidations.length);
  }

  /** Called after an authorized request succeeds; ends a run of consecutive invalidations. */
  markHealthy(): void {
    this.invalidations = [];
  }

  /** Forgets the session and any terminal failure, e.g. after credentials were replaced. */
  async reset(): Promise<void> {
    this.generation += 1;
    this.inflight = undefined;
    this.invalidations = [];
    this.unstable = false;
    this.authFailure = undefined;
    this.session = null;
    this.sessionLoaded = true;
    await this.sessionStore?.unset();
  }

  isExpired(session: Session): boolean {
    return this.now() >= session.expiresAt - this.safetyMarginMs;
  }

  private assertUsable(): void {
    if (this.unstable) {
      throw new SessionUnstableError(
        `Session was rejected ${this.maxInvalidations} times in a row; check the account or the cloud protocol`,
      );
    }
    if (this.authFailure) {
      throw this.authFailure;
    }
  }

  private async login(): Promise<Session> {
    const generation = this.generation;
    const credential = await this.credentials.get();

    try {
      const result = await this.authenticator.login(credential);
      if (generation !== this.generation) {
        this.logDebug('Discarding login for %s that finished after a reset', credential.username);
        return this.ensureSession();
      }
      if (result.credential) {
        await this.credentials.set(result.credential);
        if (generation !== this.generation) {
          return this.ensureSession();
        }
      }
      await this.setSession(result.session);
      this.logDebug('Logged in as %s', credential.username);
      return result.session;
    } catch (error) {
      if (generation !== this.generation) {
        this.logDebug('Login for %s failed after a reset, retrying: %s', credential.username, errorMessage(error));
        return this.ensureSession();
      }
      if (error instanceof AuthenticationFailedError) {
        this.authFailure = error;
        this.logError('Login rejected for %s: %s', credential.username, error.message);
      } else {
        this.logError('Login failed: %s', errorMessage(error));
      }
      throw error;
    }
  }

  private async getSession(): Promise<Session | null> {
    if (!this.sessionLoaded) {
      const stored = (await this.sessionStore?.get()) ?? null;
      // A concurrent login may have committed while the store was read.
      if (!this.sessionLoaded) {
        this.session = stored;
        this.sessionLoaded = true;
      }
    }
    return this.session;
  }

  private async setSession(session: Session): Promise<void> {
    this.session = session;
    this.sessionLoaded = true;
    await this.sessionStore?.set(session);
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
    return `[SessionManager] ${message}`;
  }
}

export default SessionManager;
