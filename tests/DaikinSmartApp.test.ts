import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';
import { afterEach, describe, expect, it, vi } from 'vitest';
import DaikinSmartApp from '../app';
import {
  AuthenticationFailedError,
  DeviceUnreachableError,
  NotConfiguredError,
  UnknownDeviceError,
  UnsupportedOperationError,
} from '../lib/daikin/errors';
import { createInMemoryTokenStore } from '../lib/daikin/Provider';
import type { LoginResult } from '../lib/daikin/Provider';
import PollScheduler from '../polling/PollScheduler';
import type { ConfidenceChange } from '../polling/StateSynchronizer';
import type { Credential, Session } from '../types';
import { FakeProvider, StubHandler, TEST_CREDENTIAL, createAdapterStub, makeDevice, makeSession, makeSnapshot } from './helpers';

let app: DaikinSmartApp | undefined;

function createApp(credential: Credential | null = TEST_CREDENTIAL) {
  vi.useFakeTimers();
  const clock = { now: 1000 };
  const provider = new FakeProvider();
  provider.devices = [makeDevice('A'), makeDevice('B', [])];
  provider.statuses.set('A', makeSnapshot('A', false, 'fan'));
  provider.statuses.set('B', makeSnapshot('B', true, 'cool'));
  const credentialStore = createInMemoryTokenStore<Credential>(credential);

  app = new DaikinSmartApp({
    provider,
    credentialStore,
    sessionStore: createInMemoryTokenStore<Session>(),
    scheduler: new PollScheduler(),
    now: () => clock.now,
    logger: vi.fn(),
  });
  return { app, clock, provider, credentialStore };
}

const discoveryReply = {
  status: 200,
  data: {
    responses: [
      { fr: '/dsiot/edges?expand', rsc: 2000, pc: [{ ri: '1001' }] },
      { fr: '/dsiot/edges', rsc: 2000, pc: [{ ri: '1001' }] },
    ],
  },
};

function createCloudApp(handler: StubHandler, login?: (credential: Credential) => Promise<LoginResult>) {
  vi.useFakeTimers();
  const { adapter, requests } = createAdapterStub(handler);
  const credentialStore = createInMemoryTokenStore<Credential>(TEST_CREDENTIAL);
  const authenticator = login ? { login: vi.fn(login) } : undefined;

  app = new DaikinSmartApp({
    adapter,
    authenticator,
    credentialStore,
    sessionStore: createInMemoryTokenStore<Session>(),
    scheduler: new PollScheduler(),
    config: { rateLimitIntervalMs: 0 },
    now: () => 1000,
    logger: vi.fn(),
  });
  return { app, requests, credentialStore, authenticator };
}

describe('DaikinSmartApp', () => {
  afterEach(async () => {
    await app?.unload();
    app = undefined;
    vi.useRealTimers();
  });

  it('reports rejected credentials before listing any device', async () => {
    const { app, requests } = createCloudApp(() => ({ status: 200, data: { rsc: 4001 } }));

    const error = await app.init().catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(AuthenticationFailedError);
    expect(error).toHaveProperty('message', 'Login rejected: rsc=4001 error=');
    expect(app.listDevices()).toEqual([]);
    expect(app.isInitialized).toBe(false);
    expect(requests.map((request) => request.url)).toEqual(['https://proddit.ditdeneb.com/premise/dsiot/login']);
  });

  it('keeps refusing to log in until the credentials are replaced', async () => {
    const failure = new AuthenticationFailedError('Login rejected: rsc=4001 error=');
    let attempts = 0;
    const { app, credentialStore, authenticator } = createCloudApp(
      () => discoveryReply,
      async () => {
        attempts += 1;
        if (attempts === 1) {
          throw failure;
        }
        return { session: makeSession(1000) };
      },
    );

    await expect(app.init()).rejects.toBe(failure);
    await expect(app.init()).rejects.toBe(failure);
    expect(authenticator?.login).toHaveBeenCalledTimes(1);

    await app.setCredentials({ username: ' other@example.com ', password: 'test-secret-2' });
    await app.init();

    const stored = await credentialStore.get();
    expect(stored).toMatchObject({ username: 'other@example.com', password: 'test-secret-2' });
    expect(stored?.clientUuid).toMatch(/^[0-9A-F]{32}$/);
    expect(authenticator?.login).toHaveBeenCalledTimes(2);
    expect(authenticator?.login).toHaveBeenLastCalledWith(stored);
    expect(app.listDevices()).toEqual([
      { id: '1001', name: 'Daikin 1001', capabilities: { power: true, modes: ['cool', 'dry', 'fan'] } },
    ]);
  });

  it('requires credentials before starting', async () => {
    const { app, provider } = createApp(null);

    await expect(app.init()).rejects.toBeInstanceOf(NotConfiguredError);
    expect(provider.discoverDevices).not.toHaveBeenCalled();
    expect(app.isInitialized).toBe(false);
  });

  it('gates modes per unit and confirms an accepted change on the next poll', async () => {
    const { app, clock, provider } = createApp();
    const confirmed = vi.fn();
    app.on('commandConfirmed', confirmed);
    await app.init();

    expect(app.listDevices().map((device) => device.id)).toEqual(['A', 'B']);
    await expect(app.setMode('B', 'cool')).rejects.toBeInstanceOf(UnsupportedOperationError);

    const optimistic = await app.setMode('A', 'cool');
    expect(optimistic).toMatchObject({ mode: 'cool', pendingSince: 1000 });
    expect(optimistic.pendingCommand?.target).toEqual({ mode: 'cool' });

    provider.statuses.set('A', makeSnapshot('A', false, 'cool'));
    clock.now = 5000;
    const state = await app.refresh('A');

    expect(state).toMatchObject({
      mode: 'cool',
      pendingCommand: null,
      pendingSince: null,
      lastConfirmedAt: 5000,
      confidence: 'high',
    });
    expect(confirmed).toHaveBeenCalledTimes(1);
    expect(confirmed).toHaveBeenCalledWith(expect.objectContaining({ deviceId: 'A', pendingForMs: 4000 }));
  });

  it('shows a new target temperature, fan speed and swing at once and confirms them from the poll', async () => {
    const { app, clock, provider } = createApp();
    const confirmed = vi.fn();
    app.on('commandConfirmed', confirmed);
    await app.init();

    const optimistic = await app.setTargetTemperature('A', 19.8);
    expect(optimistic).toMatchObject({ power: false, readings: { targetTemperature: 20 }, pendingSince: 1000 });
    expect(provider.submitCommand).toHaveBeenLastCalledWith(
      'A',
      expect.objectContaining({ target: { targetTemperature: 20 } }),
    );

    provider.statuses.set('A', makeSnapshot('A', false, 'fan', { targetTemperature: 20 }));
    clock.now = 3000;
    await expect(app.refresh('A')).resolves.toMatchObject({ pendingCommand: null, lastConfirmedAt: 3000 });
    expect(confirmed).toHaveBeenCalledTimes(1);

    await expect(app.setFanSpeed('A', 'Level 4')).resolves.toMatchObject({
      readings: { targetTemperature: 20, fanSpeed: 'Level 4' },
    });
    provider.statuses.set('A', makeSnapshot('A', false, 'fan', { targetTemperature: 20, fanSpeed: 'Level 4' }));
    await app.refresh('A');

    await expect(app.setSwing('A', 'vertical')).resolves.toMatchObject({ readings: { swing: 'vertical' } });
    expect(provider.submitCommand).toHaveBeenCalledTimes(3);
  });

  it('marks a unit stale after repeated failures without touching the others', async () => {
    const { app, provider } = createApp();
    const changes: ConfidenceChange[] = [];
    app.on('confidenceChanged', (change) => changes.push(change));
    await app.init();
    await app.refresh('A');
    const stateB = await app.refresh('B');

    provider.statusErrors.set('A', new DeviceUnreachableError('A', 'timeout'));
    await app.refresh('A');
    await app.refresh('A');
    await app.refresh('A');

    expect(app.getState('A')?.confidence).toBe('low');
    expect(app.getState('B')).toBe(stateB);
    expect(changes.filter((change) => change.confidence === 'low')).toEqual([
      { deviceId: 'A', confidence: 'low', consecutiveFailures: 3 },
    ]);
  });

  it('notifies state listeners until they unsubscribe', async () => {
    const { app, provider } = createApp();
    await app.init();
    const listener = vi.fn();
    const unsubscribe = app.onStateChanged(listener);

    await app.refresh('A');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(listener).toHaveBeenCalledWith(
      expect.objectContaining({ deviceId: 'A', current: expect.objectContaining({ mode: 'fan' }) }),
    );

    unsubscribe();
    provider.statuses.set('A', makeSnapshot('A', true, 'dry'));
    await app.refresh('A');
    expect(listener).toHaveBeenCalledTimes(1);
    expect(app.getState('A')).toMatchObject({ power: true, mode: 'dry' });
  });

  it('rediscovers when the cloud no longer knows a unit during a command', async () => {
    const { app, provider } = createApp();
    await app.init();
    provider.submitCommand.mockRejectedValueOnce(new UnknownDeviceError('A'));
    provider.devices = [makeDevice('B', [])];

    await expect(app.setPower('A', true)).rejects.toBeInstanceOf(UnknownDeviceError);
    expect(provider.discoverDevices).toHaveBeenCalledTimes(2);

    await app.rediscover();
    expect(app.listDevices().map((device) => device.id)).toEqual(['B']);
    expect(app.getState('A')).toBeUndefined();
    await expect(app.refresh('A')).rejects.toBeInstanceOf(UnknownDeviceError);
  });

  it('rediscovers when a poll finds a unit gone', async () => {
    const { app, provider } = createApp();
    await app.init();
    provider.statusErrors.set('A', new UnknownDeviceError('A'));

    await app.refresh('A');

    expect(provider.discoverDevices).toHaveBeenCalledTimes(2);
  });

  it('builds its configuration from a settings file with explicit overrides on top', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'smartapp-app-'));
    try {
      const file = path.join(dir, 'settings.json');
      await fs.writeFile(file, JSON.stringify({ pollIntervalSeconds: 45, storagePath: dir, debugLogging: false }));

      app = await DaikinSmartApp.fromSettingsFile(file, {
        config: { debugLogging: true },
        credentialStore: createInMemoryTokenStore<Credential>(TEST_CREDENTIAL),
        sessionStore: createInMemoryTokenStore<Session>(),
        logger: vi.fn(),
      });

      expect(app.config).toMatchObject({ pollIntervalMs: 45 * 1000, storagePath: dir, debugLogging: true });
      expect(app.config.confirmationTimeoutMs).toBe(90 * 1000);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });

  it('clears credentials and the catalog when the integration is removed', async () => {
    const { app, credentialStore } = createApp();
    await app.init();

    await app.removeIntegration();

    expect(app.isInitialized).toBe(false);
    expect(app.listDevices()).toEqual([]);
    await expect(credentialStore.get()).resolves.toBeNull();
    await expect(app.init()).rejects.toBeInstanceOf(NotConfiguredError);
  });
});
