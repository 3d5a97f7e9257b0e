import { Mutex } from 'async-mutex';
import { FAN_SPEEDS, HVAC_MODES, SWING_MODES } from '../types';
import type { Command, CommandTarget, Device, DeviceState, FanSpeed, HvacMode, Logger, SwingMode } from '../types';
import {
  CommandInFlightError,
  CommandSubmissionFailedError,
  UnknownDeviceError,
  UnsupportedOperationError,
  errorMessage,
  isFatalError,
} from '../lib/daikin/errors';
import { applyTargetReadings, isSettableTemperature } from '../lib/daikin/Mappers';
import type { Provider } from '../lib/daikin/Provider';
import type DeviceRegistry from '../registry/DeviceRegistry';

export interface CommandDispatcherOptions {
  provider: Provider;
  registry: DeviceRegistry;
  /** A pending command older than this no longer blocks a new one. */
  confirmationTimeoutMs?: number;
  now?: () => number;
  logger?: Logger;
  debug?: boolean;
}

const isHvacMode = (value: unknown): value is HvacMode =>
  typeof value === 'string' && HVAC_MODES.some((mode) => mode === value);

const isFanSpeed = (value: unknown): value is FanSpeed =>
  typeof value === 'string' && FAN_SPEEDS.some((speed) => speed === value);

const isSwingMode = (value: unknown): value is SwingMode =>
  typeof value === 'string' && SWING_MODES.some((swing) => swing === value);

/**
 * Sends unit changes, one at a time per device. A command that the
 * cloud accepts is written to the registry as pending so the new target shows
 * immediately; the synchronizer later confirms or reverts it.
 */
export class CommandDispatcher {
  private readonly provider: Provider;
  private readonly registry: DeviceRegistry;
  private readonly confirmationTimeoutMs: number;
  private readonly now: () => number;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly locks = new Map<string, Mutex>();
  private readonly failedSubmissions = new Map<string, number>();

  constructor(options: CommandDispatcherOptions) {
    this.provider = options.provider;
    this.registry = options.registry;
    this.confirmationTimeoutMs = options.confirmationTimeoutMs ?? 90 * 1000;
    this.now = options.now ?? Date.now;
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  async dispatch(deviceId: string, target: CommandTarget): Promise<DeviceState> {
    const device = this.registry.getDevice(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    const normalized = this.validate(device, target);

    // The check and the acquire run in the same tick.
    const lock = this.lockFor(deviceId);
    if (lock.isLocked()) {
      throw new CommandInFlightError(deviceId);
    }
    return lock.runExclusive(() => this.submit(deviceId, normalized));
  }

  /** Drops locks and counters of devices no longer in the catalog. */
  prune(): void {
    for (const id of Array.from(this.locks.keys())) {
      if (!this.registry.has(id)) {
        this.locks.delete(id);
        this.failedSubmissions.delete(id);
      }
    }
  }

  private validate(device: Device, target: CommandTarget): CommandTarget {
    const normalized: CommandTarget = {};

    if (target.power !== undefined) {
      if (typeof target.power !== 'boolean') {
        throw new UnsupportedOperationError(`Invalid power value for ${device.id}: ${String(target.power)}`);
      }
      if (!device.capabilities.power) {
        throw new UnsupportedOperationError(`${device.name} (${device.id}) does not support power control`);
      }
      normalized.power = target.power;
    }

    if (target.mode !== undefined) {
      // Capabilities are inferred from captured traffic, so the value is checked as well as the list.
      if (!isHvacMode(target.mode)) {
        throw new UnsupportedOperationError(`Unsupported mode for ${device.id}: ${String(target.mode)}`);
      }
      if (!device.capabilities.modes.includes(target.mode)) {
        throw new UnsupportedOperationError(`${device.name} (${device.id}) does not support ${target.mode} mode`);
      }
      normalized.mode = target.mode;
    }

    if (target.targetTemperature !== undefined) {
      const celsius: unknown = target.targetTemperature;
      if (typeof celsius !== 'number' || !isSettableTemperature(celsius)) {
        throw new UnsupportedOperationError(`Invalid target temperature for ${device.id}: ${String(celsius)}`);
      }
      // The unit takes half-degree steps.
      normalized.targetTemperature = Math.round(celsius * 2) / 2;
    }

    if (target.fanSpeed !== undefined) {
      if (!isFanSpeed(target.fanSpeed)) {
        throw new UnsupportedOperationError(`Unsupported fan speed for ${device.id}: ${String(target.fanSpeed)}`);
      }
      normalized.fanSpeed = target.fanSpeed;
    }

    if (target.swing !== undefined) {
      if (!isSwingMode(target.swing)) {
        throw new UnsupportedOperationError(`Unsupported swing mode for ${device.id}: ${String(target.swing)}`);
      }
      normalized.swing = target.swing;
    }

    if (Object.keys(normalized).length === 0) {
      throw new UnsupportedOperationError(`Command for ${device.id} changes nothing`);
    }
    return normalized;
  }

  private async submit(deviceId: string, target: CommandTarget): Promise<DeviceState> {
    const state = this.registry.getState(deviceId);
    if (!state) {
      throw new UnknownDeviceError(deviceId);
    }
    if (state.pendingCommand && !this.isExpired(state)) {
      throw new CommandInFlightError(deviceId);
    }
    if (state.pendingCommand) {
      this.logError(
        'Replacing unconfirmed command %o for %s pending since %d',
        state.pendingCommand.target,
        deviceId,
        state.pendingSince,
      );
    }

    const command: Command = {
      deviceId,
      target,
      issuedAt: this.now(),
      attemptCount: (this.failedSubmissions.get(deviceId) ?? 0) + 1,
    };

    let accepted: boolean;
    try {
      accepted = await this.provider.submitCommand(deviceId, command);
    } catch (error) {
      this.recordFailure(deviceId);
      if (isFatalError(error) || error instanceof UnknownDeviceError) {
        throw error;
      }
      this.logError('Submitting %o to %s failed: %s', target, deviceId, errorMessage(error));
      throw new CommandSubmissionFailedError(
        deviceId,
        `Command for ${deviceId} could not be submitted: ${errorMessage(error)}`,
        error,
      );
    }

    if (!accepted) {
      this.recordFailure(deviceId);
      throw new CommandSubmissionFailedError(deviceId, `Cloud rejected the command for ${deviceId}`);
    }

    this.failedSubmissions.delete(deviceId);
    const acceptedAt = this.now();
    this.logDebug('Command %o accepted for %s (attempt %d)', target, deviceId, command.attemptCount);

    return this.registry.upsertState(deviceId, (current) => ({
      ...current,
      power: target.power ?? current.power,
      mode: target.mode ?? current.mode,
      readings: applyTargetReadings(current.readings, target),
      pendingCommand: command,
      pendingSince: acceptedAt,
    }));
  }

  private isExpired(state: DeviceState): boolean {
    const since = state.pendingSince ?? state.pendingCommand?.issuedAt ?? 0;
    return this.now() - since > this.confirmationTimeoutMs;
  }

  private recordFailure(deviceId: string): void {
    this.failedSubmissions.set(deviceId, (this.failedSubmissions.get(deviceId) ?? 0) + 1);
  }

  private lockFor(deviceId: string): Mutex {
    let lock = this.locks.get(deviceId);
    if (!lock) {
      lock = new Mutex();
      this.locks.set(deviceId, lock);
    }
    return lock;
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
    return `[CommandDispatcher] ${message}`;
  }
}

export default CommandDispatcher;
