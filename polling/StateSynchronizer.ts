import { EventEmitter } from 'events';
import type { Command, Confidence, DeviceState, Logger, StatusSnapshot } from '../types';
import { UnknownDeviceError, errorMessage, isFatalError, toError } from '../lib/daikin/errors';
import { applyTargetReadings, isTargetSatisfied } from '../lib/daikin/Mappers';
import type { Provider } from '../lib/daikin/Provider';
import type DeviceRegistry from '../registry/DeviceRegistry';
import PollScheduler from './PollScheduler';

export interface CommandOutcome {
  deviceId: string;
  command: Command;
  /** How long the command was pending when it was resolved. */
  pendingForMs: number;
  snapshot: StatusSnapshot;
}

export interface ConfidenceChange {
  deviceId: string;
  confidence: Confidence;
  consecutiveFailures: number;
}

export interface RediscoveryHint {
  deviceId: string;
  error: UnknownDeviceError;
}

export interface StateSynchronizerOptions {
  provider: Provider;
  registry: DeviceRegistry;
  scheduler?: PollScheduler;
  pollIntervalMs?: number;
  confirmationTimeoutMs?: number;
  staleAfterFailures?: number;
  maxBackoffMs?: number;
  jitterMs?: number;
  now?: () => number;
  logger?: Logger;
  debug?: boolean;
}

type Reconciliation =
  | { kind: 'overwritten' }
  | { kind: 'confirmed'; command: Command; pendingForMs: number }
  | { kind: 'presumedFailed'; command: Command; pendingForMs: number }
  | { kind: 'awaiting' };

const TASK_PREFIX = 'poll:';

/**
 * Polls every catalogued unit on its own schedule and folds the results into
 * the registry. Pending commands are confirmed when a poll reports their
 * target, and presumed failed once the confirmation timeout has passed.
 *
 * Emits `commandConfirmed` / `commandFailed` ({@link CommandOutcome}),
 * `confidenceChanged` ({@link ConfidenceChange}), `rediscoveryNeeded`
 * ({@link RediscoveryHint}) and `fatalError` (Error).
 */
export class StateSynchronizer extends EventEmitter {
  private readonly provider: Provider;
  private readonly registry: DeviceRegistry;
  private readonly scheduler: PollScheduler;
  private readonly pollIntervalMs: number;
  private readonly confirmationTimeoutMs: number;
  private readonly staleAfterFailures: number;
  private readonly maxBackoffMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly failures = new Map<string, number>();
  private readonly taskIds = new Set<string>();
  private reportedFatal: string | null = null;

  constructor(options: StateSynchronizerOptions) {
    super();
    this.provider = options.provider;
    this.registry = options.registry;
    this.logger = options.logger;
    this.scheduler = options.scheduler ?? new PollScheduler({ logger: options.logger, jitter: options.jitterMs });
    this.pollIntervalMs = Math.max(1000, options.pollIntervalMs ?? 30 * 1000);
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? 90 * 1000;
    this.staleAfterFailures = Math.max(1, options.staleAfterFailures ?? 3);
    this.maxBackoffMs = Math.max(this.pollIntervalMs, options.maxBackoffMs ?? 10 * 60 * 1000);
    this.now = options.now ?? Date.now;
    this.debug = Boolean(options.debug);
  }

  start(): void {
    this.syncDevices();
    this.scheduler.start();
  }

  stop(): void {
    this.scheduler.stop();
  }

  /** Aligns poll tasks with the registry catalog. */
  syncDevices(): void {
    const known = new Set(this.registry.listDevices().map((device) => device.id));

    for (const id of Array.from(this.failures.keys())) {
      if (!known.has(id)) {
        this.failures.delete(id);
      }
    }

    for (const id of this.taskIds) {
      if (!known.has(id)) {
        this.scheduler.unregister(this.taskId(id));
        this.taskIds.delete(id);
        this.logDebug('Stopped polling %s', id);
      }
    }

    for (const id of known) {
      if (this.taskIds.has(id)) {
        continue;
      }
      this.scheduler.register({
        id: this.taskId(id),
        interval: this.pollIntervalMs,
        immediate: true,
        run: () => this.pollDevice(id),
      });
      this.taskIds.add(id);
      this.logDebug('Polling %s every %dms', id, this.pollIntervalMs);
    }
  }

  /**
   * Polls now. Goes through the device's poll task when there is one so the
   * explicit refresh never overlaps a scheduled poll.
   */
  async refresh(deviceId: string): Promise<DeviceState | undefined> {
    if (this.taskIds.has(deviceId)) {
      await this.scheduler.trigger(this.taskId(deviceId));
    } else {
      await this.pollDevice(deviceId);
    }
    return this.registry.getState(deviceId);
  }

  consecutiveFailures(deviceId: string): number {
    return this.failures.get(deviceId) ?? 0;
  }

  /**
   * Runs one poll iteration for a device. Resolves with the delay before the
   * device should be polled again; failures never reject.
   */
  async pollDevice(deviceId: string): Promise<number> {
    if (!this.registry.has(deviceId)) {
      return this.pollIntervalMs;
    }

    let snapshot: StatusSnapshot;
    try {
      snapshot = await this.provider.fetchStatus(deviceId);
    } catch (error) {
      return this.handleFailure(deviceId, error);
    }

    try {
      await this.reconcile(deviceId, snapshot);
    } catch (error) {
      if (error instanceof UnknownDeviceError) {
        // Removed from the catalog while the request was in flight.
        return this.pollIntervalMs;
      }
      throw error;
    }
    return this.pollIntervalMs;
  }

  private async reconcile(deviceId: string, snapshot: StatusSnapshot): Promise<void> {
    const now = this.now();
    let result: Reconciliation = { kind: 'overwritten' };
    let previousConfidence: Confidence = 'high';

    await this.registry.upsertState(deviceId, (current) => {
      previousConfidence = current.confidence;
      const fetched: DeviceState = {
        ...current,
        power: snapshot.power,
        mode: snapshot.mode,
        readings: snapshot.readings,
        confidence: 'high',
        lastConfirmedAt: now,
        pendingCommand: null,
        pendingSince: null,
      };

      const command = current.pendingCommand;
      if (!command) {
        result = { kind: 'overwritten' };
        return fetched;
      }

      const pendingForMs = now - (current.pendingSince ?? command.issuedAt);
      if (isTargetSatisfied(command.target, snapshot)) {
        result = { kind: 'confirmed', command, pendingForMs };
        return fetched;
      }
      if (pendingForMs > this.confirmationTimeoutMs) {
        result = { kind: 'presumedFailed', command, pendingForMs };
        return fetched;
      }

      // Keep the optimistic target until the command resolves.
      result = { kind: 'awaiting' };
      return { ...current, readings: applyTargetReadings(snapshot.readings, command.target), confidence: 'high' };
    });

    this.failures.delete(deviceId);
    this.reportedFatal = null;
    if (previousConfidence !== 'high') {
      this.emitConfidence(deviceId, 'high', 0);
    }
    this.emitReconciliation(deviceId, result, snapshot);
  }

  private emitReconciliation(deviceId: string, result: Reconciliation, snapshot: StatusSnapshot): void {
    switch (result.kind) {
      case 'confirmed':
        this.logDebug('Command %o confirmed for %s after %dms', result.command.target, deviceId, result.pendingForMs);
        this.emit('commandConfirmed', {
          deviceId,
          command: result.command,
          pendingForMs: result.pendingForMs,
          snapshot,
        } satisfies CommandOutcome);
        break;
      case 'presumedFailed':
        this.logError(
          'Command %o for %s unconfirmed after %dms, reverting to reported power=%s mode=%s',
          result.command.target,
          deviceId,
          result.pendingForMs,
          snapshot.power,
          snapshot.mode,
        );
        this.emit('commandFailed', {
          deviceId,
          command: result.command,
          pendingForMs: result.pendingForMs,
          snapshot,
        } satisfies CommandOutcome);
        break;
      case 'awaiting':
        this.logDebug('Command for %s still pending', deviceId);
        break;
      case 'overwritten':
        break;
    }
  }

  private async handleFailure(deviceId: string, error: unknown): Promise<number> {
    const failures = (this.failures.get(deviceId) ?? 0) + 1;
    this.failures.set(deviceId, failures);
    const backoff = Math.min(this.pollIntervalMs * Math.pow(2, failures), this.maxBackoffMs);

    if (isFatalError(error)) {
      const fatal = toError(error);
      if (this.reportedFatal !== fatal.name) {
        this.reportedFatal = fatal.name;
        this.logError('Polling halted by %s: %s', fatal.name, fatal.message);
        this.emit('fatalError', fatal);
      }
    } else if (error instanceof UnknownDeviceError) {
      this.logError('Cloud no longer knows %s, requesting rediscovery', deviceId);
      this.emit('rediscoveryNeeded', { deviceId, error } satisfies RediscoveryHint);
    } else {
      this.logError('Poll %d for %s failed, next in %dms: %s', failures, deviceId, backoff, errorMessage(error));
    }

    if (failures >= this.staleAfterFailures) {
      await this.markStale(deviceId, failures);
    }
    return backoff;
  }

  private async markStale(deviceId: string, failures: number): Promise<void> {
    let flipped = false;
    try {
      await this.registry.upsertState(deviceId, (current) => {
        flipped = current.confidence !== 'low';
        return { ...current, confidence: 'low' };
      });
    } catch (error) {
      if (error instanceof UnknownDeviceError) {
        return;
      }
      throw error;
    }

    if (flipped) {
      this.emitConfidence(deviceId, 'low', failures);
    }
  }

  private emitConfidence(deviceId: string, confidence: Confidence, consecutiveFailures: number): void {
    if (confidence === 'low') {
      this.logError('%s marked stale after %d failed polls', deviceId, consecutiveFailures);
    } else {
      this.logDebug('%s reachable again', deviceId);
    }
    this.emit('confidenceChanged', { deviceId, confidence, consecutiveFailures } satisfies ConfidenceChange);
  }

  private taskId(deviceId: string): string {
    return `${TASK_PREFIX}${deviceId}`;
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
    return `[StateSynchronizer] ${message}`;
  }
}

export default StateSynchronizer;
