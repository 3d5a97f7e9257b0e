import { describe, expect, it } from 'vitest';
import CommandDispatcher from '../commands/CommandDispatcher';
import {
  AuthenticationFailedError,
  CloudRequestError,
  CommandInFlightError,
  CommandSubmissionFailedError,
  UnknownDeviceError,
  UnsupportedOperationError,
} from '../lib/daikin/errors';
import StateSynchronizer from '../polling/StateSynchronizer';
import DeviceRegistry from '../registry/DeviceRegistry';
import type { CommandTarget } from '../types';
import { FakeProvider, makeDevice, makeSnapshot } from './helpers';

async function setup() {
  const clock = { now: 1000 };
  const provider = new FakeProvider();
  const registry = new DeviceRegistry();
  await registry.replaceCatalog([makeDevice('A'), makeDevice('B', [])]);
  const dispatcher = new CommandDispatcher({
    provider,
    registry,
    confirmationTimeoutMs: 90 * 1000,
    now: () => clock.now,
  });
  return { clock, provider, registry, dispatcher };
}

describe('CommandDispatcher', () => {
  it('records an accepted command as pending and shows its target', async () => {
    const { provider, registry, dispatcher } = await setup();

    const state = await dispatcher.dispatch('A', { mode: 'cool' });

    const command = { deviceId: 'A', target: { mode: 'cool' }, issuedAt: 1000, attemptCount: 1 };
    expect(provider.submitCommand).toHaveBeenCalledWith('A', command);
    expect(state).toMatchObject({ mode: 'cool', power: false, pendingCommand: command, pendingSince: 1000 });
    expect(registry.getState('A')).toBe(state);
  });

  it('allows only one command in flight per device', async () => {
    const { clock, provider, dispatcher } = await setup();
    let release: (accepted: boolean) => void = () => undefined;
    const gate = new Promise<boolean>((resolve) => {
      release = resolve;
    });
    provider.submitCommand.mockImplementation(async (deviceId) => (deviceId === 'A' ? gate : true));

    const first = dispatcher.dispatch('A', { power: true });
    await expect(dispatcher.dispatch('A', { power: false })).rejects.toBeInstanceOf(CommandInFlightError);
    await expect(dispatcher.dispatch('B', { power: true })).resolves.toMatchObject({ power: true });

    release(true);
    await expect(first).resolves.toMatchObject({ power: true });

    // Still unconfirmed and within the timeout.
    await expect(dispatcher.dispatch('A', { power: false })).rejects.toBeInstanceOf(CommandInFlightError);

    clock.now += 90 * 1000 + 1;
    await expect(dispatcher.dispatch('A', { power: false })).resolves.toMatchObject({ power: false });
    expect(provider.submitCommand).toHaveBeenCalledTimes(3);
  });

  it('refuses operations the unit does not support and leaves its state untouched', async () => {
    const { provider, registry, dispatcher } = await setup();
    const before = registry.getState('B');
    const unknownMode: CommandTarget = JSON.parse('{"mode":"heat"}');

    await expect(dispatcher.dispatch('B', { mode: 'dry' })).rejects.toBeInstanceOf(UnsupportedOperationError);
    await expect(dispatcher.dispatch('A', unknownMode)).rejects.toThrow('Unsupported mode for A: heat');
    await expect(dispatcher.dispatch('A', {})).rejects.toBeInstanceOf(UnsupportedOperationError);

    expect(registry.getState('B')).toBe(before);
    expect(provider.submitCommand).not.toHaveBeenCalled();
  });

  it('rounds temperatures to half degrees and shows temperature, fan and swing targets while pending', async () => {
    const { provider, dispatcher } = await setup();

    const state = await dispatcher.dispatch('A', { targetTemperature: 22.3, fanSpeed: 'Level 3', swing: 'off' });

    const target = { targetTemperature: 22.5, fanSpeed: 'Level 3', swing: 'off' };
    expect(provider.submitCommand).toHaveBeenCalledWith('A', { deviceId: 'A', target, issuedAt: 1000, attemptCount: 1 });
    expect(state.power).toBe(false);
    expect(state.readings).toEqual(target);
  });

  it('rejects temperatures, fan speeds and swing modes the unit cannot take', async () => {
    const { provider, dispatcher } = await setup();
    const textTemperature: CommandTarget = JSON.parse('{"targetTemperature":"22"}');
    const unknownFan: CommandTarget = JSON.parse('{"fanSpeed":"Turbo"}');
    const unknownSwing: CommandTarget = JSON.parse('{"swing":"diagonal"}');

    await expect(dispatcher.dispatch('A', { targetTemperature: -1 })).rejects.toThrow('Invalid target temperature for A: -1');
    await expect(dispatcher.dispatch('A', { targetTemperature: 200 })).rejects.toThrow('Invalid target temperature for A: 200');
    await expect(dispatcher.dispatch('A', textTemperature)).rejects.toThrow('Invalid target temperature for A: 22');
    await expect(dispatcher.dispatch('A', unknownFan)).rejects.toThrow('Unsupported fan speed for A: Turbo');
    await expect(dispatcher.dispatch('A', unknownSwing)).rejects.toThrow('Unsupported swing mode for A: diagonal');
    await expect(dispatcher.dispatch('A', {})).rejects.toThrow('Command for A changes nothing');

    expect(provider.submitCommand).not.toHaveBeenCalled();
  });

  it('rejects commands for devices outside the catalog', async () => {
    const { dispatcher } = await setup();
    await expect(dispatcher.dispatch('Z', { power: true })).rejects.toBeInstanceOf(UnknownDeviceError);
  });

  it('fails without a pending command when submission fails', async () => {
    const { provider, registry, dispatcher } = await setup();
    provider.submitCommand.mockRejectedValueOnce(new CloudRequestError('PUT /dsiot/multireq failed: socket hang up'));
    provider.submitCommand.mockResolvedValueOnce(false);

    const error = await dispatcher.dispatch('A', { power: true }).catch((reason: unknown) => reason);
    expect(error).toBeInstanceOf(CommandSubmissionFailedError);
    expect(error).toHaveProperty(
      'message',
      'Command for A could not be submitted: PUT /dsiot/multireq failed: socket hang up',
    );
    expect(registry.getState('A')?.pendingCommand).toBeNull();

    await expect(dispatcher.dispatch('A', { power: true })).rejects.toThrow('Cloud rejected the command for A');
    expect(registry.getState('A')?.pendingCommand).toBeNull();

    const state = await dispatcher.dispatch('A', { power: true });
    expect(state.pendingCommand?.attemptCount).toBe(3);
  });

  it('passes authentication failures through unchanged', async () => {
    const { provider, dispatcher } = await setup();
    const failure = new AuthenticationFailedError('Login rejected: rsc=4001 error=');
    provider.submitCommand.mockRejectedValueOnce(failure);

    await expect(dispatcher.dispatch('A', { power: true })).rejects.toBe(failure);
  });

  it('accepts a target that is already confirmed and leaves the state as it was', async () => {
    const { clock, provider, registry, dispatcher } = await setup();
    const synchronizer = new StateSynchronizer({ provider, registry, now: () => clock.now });
    provider.statuses.set('A', makeSnapshot('A', true, 'cool'));
    await synchronizer.pollDevice('A');
    const confirmed = registry.getState('A');

    await dispatcher.dispatch('A', { power: true });
    clock.now += 5000;
    await synchronizer.pollDevice('A');

    expect(registry.getState('A')).toEqual({ ...confirmed, lastConfirmedAt: clock.now });
  });
});
