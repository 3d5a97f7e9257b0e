import type { AxiosAdapter } from 'axios';
import * as path from 'path';
import type { Credential, Device, DeviceState, FanSpeed, HvacMode, Logger, Session, StateChange, SwingMode } from './types';
import { SmartAppConfig, loadConfig, readSettingsFile } from './config';
import CommandDispatcher from './commands/CommandDispatcher';
import DaikinAuthenticator from './lib/daikin/DaikinAuthenticator';
import DaikinCloudClient from './lib/daikin/DaikinCloudClient';
import { UnknownDeviceError, errorMessage } from './lib/daikin/errors';
import type { Authenticator, Provider, TokenStore } from './lib/daikin/Provider';
import RateLimiter from './lib/daikin/RateLimiter';
import SessionManager from './lib/daikin/SessionManager';
import CredentialStore, { CredentialInput, isCredential, isSession } from './lib/storage/CredentialStore';
import JsonFileStore from './lib/storage/JsonFileStore';
import PollScheduler from './polling/PollScheduler';
import StateSynchronizer, { CommandOutcome, ConfidenceChange, RediscoveryHint } from './polling/StateSynchronizer';
import DeviceRegistry from './registry/DeviceRegistry';

export interface SmartAppEvents {
  commandConfirmed: (outcome: CommandOutcome) => void;
  commandFailed: (outcome: CommandOutcome) => void;
  confidenceChanged: (change: ConfidenceChange) => void;
  rediscoveryNeeded: (hint: RediscoveryHint) => void;
  fatalError: (error: Error) => void;
}

export interface DaikinSmartAppOptions {
  config?: Partial<SmartAppConfig>;
  credentialStore?: TokenStore<Credential>;
  sessionStore?: TokenStore<Session>;
  /** Replaces the cloud client, e.g. with an in-process fake. */
  provider?: Provider;
  authenticator?: Authenticator;
  /** Passed to every axios instance. */
  adapter?: AxiosAdapter;
  scheduler?: PollScheduler;
  now?: () => number;
  logger?: Logger;
}

const defaultLogger: Logger = (message, ...args) => console.log(message, ...args);

/**
 * Owns one configured account: its stores, session, catalog and poll loop.
 * Built at integration setup and torn down with {@link unload}; the host
 * adapter talks only to this class.
 */
export default class DaikinSmartApp {
  readonly config: SmartAppConfig;
  private readonly logger: Logger;
  private readonly credentials: CredentialStore;
  private readonly sessions: SessionManager;
  private readonly provider: Provider;
  private readonly registry: DeviceRegistry;
  private readonly synchronizer: StateSynchronizer;
  private readonly dispatcher: CommandDispatcher;
  private initialized = false;
  private rediscovering?: Promise<Device[]>;

  static async fromSettingsFile(filePath: string, options: DaikinSmartAppOptions = {}): Promise<DaikinSmartApp> {
    const settings = await readSettingsFile(filePath);
    return new DaikinSmartApp({ ...options, config: { ...loadConfig(settings), ...options.config } });
  }

  constructor(options: DaikinSmartAppOptions = {}) {
    this.config = { ...loadConfig(), ...options.config };
    this.logger = options.logger ?? defaultLogger;
    const debug = this.config.debugLogging;
    const logger = this.logger;
    const now = options.now ?? Date.now;

    const rateLimiter = new RateLimiter({
      maxConcurrent: this.config.rateLimitConcurrency,
      minInterval: this.config.rateLimitIntervalMs,
      logger,
    });

    this.credentials = new CredentialStore(
      options.credentialStore ?? this.createFileStore<Credential>('credentials.json', isCredential),
    );

    this.sessions = new SessionManager({
      authenticator:
        options.authenticator ??
        new DaikinAuthenticator({
          baseUrl: this.config.baseUrl,
          timeout: this.config.requestTimeoutMs,
          adapter: options.adapter,
          rateLimiter,
          logger,
          debug,
          now,
        }),
      credentials: this.credentials,
      sessionStore: options.sessionStore ?? this.createFileStore<Session>('session.json', isSession),
      safetyMarginMs: this.config.sessionSafetyMarginMs,
      maxInvalidations: this.config.maxInvalidations,
      invalidationWindowMs: this.config.invalidationWindowMs,
      now,
      logger,
      debug,
    });

    this.provider =
      options.provider ??
      new DaikinCloudClient({
        baseUrl: this.config.baseUrl,
        timeout: this.config.requestTimeoutMs,
        adapter: options.adapter,
        sessions: this.sessions,
        rateLimiter,
        authMode: this.config.authMode,
        logger,
        debug,
      });

    this.registry = new DeviceRegistry({ logger, debug });
    this.synchronizer = new StateSynchronizer({
      provider: this.provider,
      registry: this.registry,
      scheduler: options.scheduler ?? new PollScheduler({ logger, jitter: 1000 }),
      pollIntervalMs: this.config.pollIntervalMs,
      confirmationTimeoutMs: this.config.confirmationTimeoutMs,
      staleAfterFailures: this.config.staleAfterFailures,
      maxBackoffMs: this.config.maxBackoffMs,
      now,
      logger,
      debug,
    });
    this.dispatcher = new CommandDispatcher({
      provider: this.provider,
      registry: this.registry,
      confirmationTimeoutMs: this.config.confirmationTimeoutMs,
      now,
      logger,
      debug,
    });
  }

  get isInitialized(): boolean {
    return this.initialized;
  }

  /** Logs in, discovers the account's units and starts polling them. */
  async init(): Promise<void> {
    if (this.initialized) {
      return;
    }

    await this.credentials.get();
    const devices = await this.provider.discoverDevices();
    await this.registry.replaceCatalog(devices);

    this.synchronizer.on('rediscoveryNeeded', this.handleRediscoveryHint);
    this.synchronizer.start();
    this.initialized = true;
    this.logger('[DaikinSmartApp] Initialized with %d units', devices.length);
  }

  /** Stops polling. Requests already sent are left to complete. */
  async unload(): Promise<void> {
    this.synchronizer.stop();
    this.synchronizer.removeAllListeners();
    this.registry.removeAllListeners();
    if (this.initialized) {
      this.initialized = false;
      this.logger('[DaikinSmartApp] Unloaded');
    }
  }

  async rediscover(): Promise<Device[]> {
    if (!this.rediscovering) {
      this.rediscovering = this.runDiscovery().finally(() => {
        this.rediscovering = undefined;
      });
    }
    return this.rediscovering;
  }

  /** Replaces the account credentials and forgets the current session and any login failure. */
  async setCredentials(input: CredentialInput): Promise<void> {
    // Resetting on both sides of the write keeps any login started with the old credential from committing.
    await this.sessions.reset();
    const credential = await this.credentials.set(input);
    await this.sessions.reset();
    this.logger('[DaikinSmartApp] Credentials updated for %s', credential.username);
  }

  async removeIntegration(): Promise<void> {
    await this.unload();
    await this.credentials.clear();
    await this.sessions.reset();
    await this.registry.replaceCatalog([]);
    this.dispatcher.prune();
    this.logger('[DaikinSmartApp] Integration removed, credentials cleared');
  }

  listDevices(): Device[] {
    return this.registry.listDevices();
  }

  getState(deviceId: string): DeviceState | undefined {
    return this.registry.getState(deviceId);
  }

  async setPower(deviceId: string, on: boolean): Promise<DeviceState> {
    return this.dispatch(deviceId, () => this.dispatcher.dispatch(deviceId, { power: on }));
  }

  async setMode(deviceId: string, mode: HvacMode): Promise<DeviceState> {
    return this.dispatch(deviceId, () => this.dispatcher.dispatch(deviceId, { mode }));
  }

  /** Leaves power as it is; the value is rounded to the nearest half degree. */
  async setTargetTemperature(deviceId: string, celsius: number): Promise<DeviceState> {
    return this.dispatch(deviceId, () => this.dispatcher.dispatch(deviceId, { targetTemperature: celsius }));
  }

  async setFanSpeed(deviceId: string, fanSpeed: FanSpeed): Promise<DeviceState> {
    return this.dispatch(deviceId, () => this.dispatcher.dispatch(deviceId, { fanSpeed }));
  }

  async setSwing(deviceId: string, swing: SwingMode): Promise<DeviceState> {
    return this.dispatch(deviceId, () => this.dispatcher.dispatch(deviceId, { swing }));
  }

  async refresh(deviceId: string): Promise<DeviceState | undefined> {
    if (!this.registry.has(deviceId)) {
      throw new UnknownDeviceError(deviceId);
    }
    return this.synchronizer.refresh(deviceId);
  }

  onStateChanged(listener: (change: StateChange) => void): () => void {
    return this.registry.onStateChanged(listener);
  }

  on<E extends keyof SmartAppEvents>(event: E, listener: SmartAppEvents[E]): () => void {
    this.synchronizer.on(event, listener);
    return () => {
      this.synchronizer.off(event, listener);
    };
  }

  private async dispatch(deviceId: string, send: () => Promise<DeviceState>): Promise<DeviceState> {
    try {
      return await send();
    } catch (error) {
      // The registry knew the unit but the cloud did not.
      if (error instanceof UnknownDeviceError && this.registry.has(deviceId)) {
        this.requestRediscovery(deviceId);
      }
      throw error;
    }
  }

  private async runDiscovery(): Promise<Device[]> {
    const devices = await this.provider.discoverDevices();
    await this.registry.replaceCatalog(devices);
    this.dispatcher.prune();
    if (this.initialized) {
      this.synchronizer.syncDevices();
    }
    this.logger('[DaikinSmartApp] Rediscovery found %d units', devices.length);
    return devices;
  }

  private readonly handleRediscoveryHint = (hint: RediscoveryHint): void => {
    this.requestRediscovery(hint.deviceId);
  };

  private requestRediscovery(deviceId: string): void {
    this.rediscover().catch((error: unknown) => {
      this.logger('[DaikinSmartApp] Rediscovery after %s vanished failed: %s', deviceId, errorMessage(error));
    });
  }

  private createFileStore<T>(fileName: string, validate: (value: unknown) => value is T): TokenStore<T> {
    return new JsonFileStore<T>({
      filePath: path.join(this.config.storagePath, fileName),
      validate,
      onError: (context, error) => {
        this.logger('[DaikinSmartApp] JsonFileStore("%s").%s failed: %s', fileName, context, errorMessage(error));
      },
    });
  }
}
