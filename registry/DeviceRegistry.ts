import { Mutex } from 'async-mutex';
import { EventEmitter } from 'events';
import { UnknownDeviceError, errorMessage } from '../lib/daikin/errors';
import type { Command, CommandTarget, Device, DeviceState, Logger, StateChange, UnitReadings } from '../types';

export type StateMutator = (current: DeviceState) => DeviceState;

interface RegistryEntry {
  device: Device;
  state: DeviceState;
}

export interface DeviceRegistryOptions {
  logger?: Logger;
  debug?: boolean;
}

export function createInitialState(deviceId: string): DeviceState {
  return {
    deviceId,
    power: false,
    mode: 'unknown',
    readings: {},
    confidence: 'low',
    lastConfirmedAt: null,
    pendingCommand: null,
    pendingSince: null,
  };
}

const freezeState = (state: DeviceState): DeviceState =>
  Object.freeze({
    ...state,
    readings: Object.freeze({ ...state.readings }),
    pendingCommand: state.pendingCommand
      ? Object.freeze({ ...state.pendingCommand, target: Object.freeze({ ...state.pendingCommand.target }) })
      : null,
  });

const freezeDevice = (device: Device): Device =>
  Object.freeze({
    ...device,
    capabilities: Object.freeze({ ...device.capabilities, modes: Object.freeze([...device.capabilities.modes]) }),
  });

const TARGET_KEYS: readonly (keyof CommandTarget)[] = ['power', 'mode', 'targetTemperature', 'fanSpeed', 'swing'];

const READING_KEYS: readonly (keyof UnitReadings)[] = [
  'targetTemperature',
  'roomTemperature',
  'roomHumidity',
  'fanSpeed',
  'swing',
  'sensorTemperature1',
  'sensorTemperature2',
];

function commandsEqual(a: Command | null, b: Command | null): boolean {
  if (!a || !b) {
    return a === b;
  }
  return (
    a.issuedAt === b.issuedAt &&
    a.attemptCount === b.attemptCount &&
    TARGET_KEYS.every((key) => a.target[key] === b.target[key])
  );
}

function statesEqual(a: DeviceState, b: DeviceState): boolean {
  return (
    a.power === b.power &&
    a.mode === b.mode &&
    a.confidence === b.confidence &&
    a.lastConfirmedAt === b.lastConfirmedAt &&
    commandsEqual(a.pendingCommand, b.pendingCommand) &&
    a.pendingSince === b.pendingSince &&
    READING_KEYS.every((key) => a.readings[key] === b.readings[key])
  );
}

/**
 * In-memory catalog of units and their best-known state. Every mutation runs
 * inside one mutex and replaces the state object wholesale, so readers only
 * ever see committed snapshots.
 */
export class DeviceRegistry extends EventEmitter {
  private readonly entries = new Map<string, RegistryEntry>();
  private readonly mutex = new Mutex();
  private readonly logger?: Logger;
  private readonly debug: boolean;

  constructor(options: DeviceRegistryOptions = {}) {
    super();
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  listDevices(): Device[] {
    return Array.from(this.entries.values(), (entry) => entry.device);
  }

  getDevice(deviceId: string): Device | undefined {
    return this.entries.get(deviceId)?.device;
  }

  getState(deviceId: string): DeviceState | undefined {
    return this.entries.get(deviceId)?.state;
  }

  has(deviceId: string): boolean {
    return this.entries.has(deviceId);
  }

  /**
   * Applies `mutator` to the current state atomically and commits its result.
   * Emits `stateChanged` when the committed state differs from the previous one.
   */
  async upsertState(deviceId: string, mutator: StateMutator): Promise<DeviceState> {
    return this.mutex.runExclusive(() => {
      const entry = this.entries.get(deviceId);
      if (!entry) {
        throw new UnknownDeviceError(deviceId);
      }

      const previous = entry.state;
      const next = freezeState({ ...mutator(previous), deviceId });
      if (statesEqual(previous, next)) {
        return previous;
      }

      entry.state = next;
      this.emitChange({ deviceId, previous, current: next });
      return next;
    });
  }

  /**
   * Replaces the catalog after discovery. State survives for ids that persist,
   * is dropped for ids that vanished and starts unknown for new ids. Devices are
   * stored as frozen copies.
   */
  async replaceCatalog(devices: Device[]): Promise<void> {
    await this.mutex.runExclusive(() => {
      const incoming = new Map(devices.map((device) => [device.id, device]));

      for (const id of Array.from(this.entries.keys())) {
        if (!incoming.has(id)) {
          this.entries.delete(id);
          this.logDebug('Removed device %s', id);
        }
      }

      for (const device of incoming.values()) {
        const existing = this.entries.get(device.id);
        if (existing) {
          existing.device = freezeDevice(device);
          continue;
        }
        this.entries.set(device.id, { device: freezeDevice(device), state: freezeState(createInitialState(device.id)) });
        this.logDebug('Added device %s (%s)', device.id, device.name);
      }
    });
  }

  onStateChanged(listener: (change: StateChange) => void): () => void {
    this.on('stateChanged', listener);
    return () => {
      this.off('stateChanged', listener);
    };
  }

  private emitChange(change: StateChange): void {
    try {
      this.emit('stateChanged', change);
    } catch (error) {
      this.logger?.('[DeviceRegistry] stateChanged listener for %s threw: %s', change.deviceId, errorMessage(error));
    }
  }

  private logDebug(message: string, ...args: unknown[]): void {
    if (this.debug) {
      this.logger?.(`[DeviceRegistry] ${message}`, ...args);
    }
  }
}

export default DeviceRegistry;
