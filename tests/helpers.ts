import type { AxiosAdapter, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { vi } from 'vitest';
import type { Command, Credential, Device, HvacMode, ReportedMode, Session, StatusSnapshot, UnitReadings } from '../types';
import type { Provider } from '../lib/daikin/Provider';

export const TEST_CREDENTIAL: Credential = {
  username: 'user@example.com',
  password: 'test-secret',
  clientUuid: 'TESTCLIENTUUID',
  clientId: 'test-client-id',
  clientSecret: 'test-client-secret',
};

export function makeSession(issuedAt: number, lifetimeMs = 3600 * 1000): Session {
  return {
    accessToken: 'test-access-token',
    idToken: 'test-id-token',
    refreshToken: 'test-refresh-token',
    issuedAt,
    expiresAt: issuedAt + lifetimeMs,
  };
}

export function makeDevice(id: string, modes: HvacMode[] = ['cool', 'dry', 'fan'], power = true): Device {
  return { id, name: `Unit ${id}`, capabilities: { power, modes } };
}

export function makeSnapshot(
  deviceId: string,
  power: boolean,
  mode: ReportedMode,
  readings: UnitReadings = {},
): StatusSnapshot {
  return { deviceId, power, mode, readings, raw: {} };
}

/** In-process provider whose answers are set per device by the test. */
export class FakeProvider implements Provider {
  devices: Device[] = [];
  readonly statuses = new Map<string, StatusSnapshot>();
  readonly statusErrors = new Map<string, Error>();

  discoverDevices = vi.fn(async (): Promise<Device[]> => this.devices);

  fetchStatus = vi.fn(async (deviceId: string): Promise<StatusSnapshot> => {
    const error = this.statusErrors.get(deviceId);
    if (error) {
      throw error;
    }
    const snapshot = this.statuses.get(deviceId);
    if (!snapshot) {
      throw new Error(`No status stubbed for ${deviceId}`);
    }
    return snapshot;
  });

  submitCommand = vi.fn(async (_deviceId: string, _command: Command): Promise<boolean> => true);
}

export interface StubRequest {
  method: string;
  url: string;
  authorization?: string;
  body: unknown;
}

export interface StubReply {
  status: number;
  data?: unknown;
}

export type StubHandler = (request: StubRequest) => StubReply | Promise<StubReply>;

/**
 * axios adapter that answers from `handler` instead of the network and records
 * every request it sees.
 */
export function createAdapterStub(handler: StubHandler): { adapter: AxiosAdapter; requests: StubRequest[] } {
  const requests: StubRequest[] = [];

  const adapter: AxiosAdapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const authorization = config.headers.get('Authorization');
    const request: StubRequest = {
      method: String(config.method ?? 'get').toUpperCase(),
      url: config.url?.startsWith('http') ? config.url : `${config.baseURL ?? ''}${config.url ?? ''}`,
      authorization: typeof authorization === 'string' ? authorization : undefined,
      body: typeof config.data === 'string' ? JSON.parse(config.data) : config.data,
    };
    requests.push(request);

    const reply = await handler(request);
    const data =
      config.responseType === 'text' && typeof reply.data !== 'string' ? JSON.stringify(reply.data ?? '') : reply.data;
    return { data, status: reply.status, statusText: String(reply.status), headers: {}, config };
  };

  return { adapter, requests };
}

/** Builds a dgc_status payload from `group → { param: value }`. */
export function statusTree(groups: Record<string, Record<string, string>>): Record<string, unknown> {
  return {
    pn: 'dgc_status',
    pch: [
      {
        pn: 'e_1002',
        pch: Object.entries(groups).map(([group, params]) => ({
          pn: group,
          pch: Object.entries(params).map(([pn, pv]) => ({ pn, pv })),
        })),
      },
    ],
  };
}
