import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import type { AuthMode, Command, Device, Logger, Session, StatusSnapshot } from '../../types';
import {
  AuthenticationFailedError,
  CloudRequestError,
  DeviceUnreachableError,
  DiscoveryFailedError,
  UnknownDeviceError,
  errorMessage,
  isFatalError,
} from './errors';
import { HttpOptions, MULTIREQ_PATH, createHttp, delay, sendRequest } from './http';
import {
  MultiRequestBody,
  RSC_ACCEPTED,
  RSC_NOT_FOUND,
  RSC_OK,
  buildDiscoveryRequests,
  buildStatusRequest,
  createWritePayload,
  findStatusResponse,
  flattenStatus,
  isRecord,
  mapDevicesFromResponse,
  mapStatusSnapshot,
  readResponses,
} from './Mappers';
import type { Provider } from './Provider';
import RateLimiter, { RequestPriority } from './RateLimiter';
import type { SessionSource } from './SessionManager';

const MAX_RATE_LIMIT_RETRIES = 3;

export interface DaikinCloudClientOptions extends HttpOptions {
  sessions: SessionSource;
  rateLimiter: RateLimiter;
  /** Token kind tried first; the client switches to whichever the cloud accepts. */
  authMode?: AuthMode;
  logger?: Logger;
  debug?: boolean;
}

export class DaikinCloudClient implements Provider {
  private readonly http: AxiosInstance;
  private readonly sessions: SessionSource;
  private readonly rateLimiter: RateLimiter;
  private readonly logger?: Logger;
  private readonly debug: boolean;
  private readonly rawStatusCache = new Map<string, Record<string, string>>();
  private authMode: AuthMode;

  constructor(options: DaikinCloudClientOptions) {
    this.http = createHttp(options);
    this.sessions = options.sessions;
    this.rateLimiter = options.rateLimiter;
    this.authMode = options.authMode ?? 'id_token';
    this.logger = options.logger;
    this.debug = Boolean(options.debug);
  }

  get preferredAuthMode(): AuthMode {
    return this.authMode;
  }

  async discoverDevices(): Promise<Device[]> {
    let data: Record<string, unknown>;
    try {
      data = await this.multireq('POST', { requests: buildDiscoveryRequests() }, 'poll');
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      throw new DiscoveryFailedError(`Device discovery failed: ${errorMessage(error)}`, error);
    }

    let devices: Device[];
    try {
      devices = mapDevicesFromResponse(data);
    } catch (error) {
      throw new DiscoveryFailedError(`Malformed discovery response: ${errorMessage(error)}`, error);
    }

    const known = new Set(devices.map((device) => device.id));
    for (const id of this.rawStatusCache.keys()) {
      if (!known.has(id)) {
        this.rawStatusCache.delete(id);
      }
    }

    this.logDebug('Discovery found %d units', devices.length);
    return devices;
  }

  async fetchStatus(deviceId: string): Promise<StatusSnapshot> {
    let data: Record<string, unknown>;
    try {
      data = await this.multireq('POST', { requests: [buildStatusRequest(deviceId)] }, 'poll');
    } catch (error) {
      if (isFatalError(error)) {
        throw error;
      }
      throw new DeviceUnreachableError(deviceId, `Status fetch for ${deviceId} failed: ${errorMessage(error)}`, error);
    }

    let raw: Record<string, string> | null = null;
    try {
      const entry = findStatusResponse(deviceId, data);
      if (entry?.rsc === RSC_NOT_FOUND) {
        throw new UnknownDeviceError(deviceId);
      }
      raw = entry ? flattenStatus(entry.pc) : null;
    } catch (error) {
      if (error instanceof UnknownDeviceError) {
        throw error;
      }
      throw new DeviceUnreachableError(deviceId, `Malformed status response for ${deviceId}`, error);
    }

    if (!raw) {
      throw new DeviceUnreachableError(deviceId, `Status response for ${deviceId} carries no status tree`);
    }

    this.rawStatusCache.set(deviceId, raw);
    return mapStatusSnapshot(deviceId, raw);
  }

  async submitCommand(deviceId: string, command: Command): Promise<boolean> {
    // Writes carry the whole unit state, so they need a reported status to build on.
    let raw = this.rawStatusCache.get(deviceId);
    if (!raw) {
      this.logDebug('No status cached for %s, fetching before the write', deviceId);
      raw = (await this.fetchStatus(deviceId)).raw;
    }
    const payload = createWritePayload(deviceId, command.target, raw);
    const data = await this.multireq('PUT', payload, 'command');

    let rsc: number | undefined;
    try {
      rsc = readResponses(data)[0]?.rsc;
    } catch (error) {
      throw new CloudRequestError(`Malformed command response for ${deviceId}`, undefined, error);
    }

    if (rsc === RSC_NOT_FOUND) {
      throw new UnknownDeviceError(deviceId);
    }

    const accepted = rsc === undefined || rsc === RSC_OK || rsc === RSC_ACCEPTED;
    if (accepted) {
      this.logDebug('Command %o accepted for %s', command.target, deviceId);
    } else {
      this.logError('Command %o rejected for %s: rsc=%d', command.target, deviceId, rsc);
    }
    return accepted;
  }

  /**
   * Sends a multireq with the session's bearer token. Both token kinds are tried;
   * if both are rejected the session is invalidated and the request retried once.
   */
  private async multireq(
    method: 'POST' | 'PUT',
    body: MultiRequestBody,
    priority: RequestPriority,
  ): Promise<Record<string, unknown>> {
    for (let attempt = 0; attempt < 2; attempt += 1) {
      const session = await this.sessions.ensureSession();

      for (const [mode, token] of this.tokenCandidates(session)) {
        const response = await this.send(
          {
            url: MULTIREQ_PATH,
            method,
            data: body,
            headers: { Authorization: `Bearer ${token}` },
          },
          priority,
        );

        if (response.status === 401) {
          this.logDebug('%s multireq unauthorized with %s', method, mode);
          continue;
        }
        if (response.status !== 200 || !isRecord(response.data)) {
          throw new CloudRequestError(`${method} ${MULTIREQ_PATH} failed: HTTP ${response.status}`, response.status);
        }

        if (mode !== this.authMode) {
          this.logDebug('Switching to %s authorization', mode);
          this.authMode = mode;
        }
        this.sessions.markHealthy();
        return response.data;
      }

      if (attempt === 0) {
        this.logDebug('%s multireq unauthorized, invalidating session', method);
        await this.sessions.invalidate(session);
      }
    }

    throw new AuthenticationFailedError('Cloud rejected the session again after a fresh login');
  }

  private tokenCandidates(session: Session): Array<[AuthMode, string]> {
    const candidates: Array<[AuthMode, string]> = [];
    if (session.idToken) {
      candidates.push(['id_token', session.idToken]);
    }
    if (session.accessToken) {
      candidates.push(['access_token', session.accessToken]);
    }
    return candidates.sort(([a], [b]) => Number(b === this.authMode) - Number(a === this.authMode));
  }

  private async send(
    config: AxiosRequestConfig,
    priority: RequestPriority,
    attempt = 0,
  ): Promise<AxiosResponse<unknown>> {
    const response = await this.rateLimiter.schedule(() => sendRequest(this.http, config), priority);
    const method = String(config.method ?? 'GET').toUpperCase();
    const url = String(config.url ?? 'unknown');

    // 429 means the request was not processed, so resending cannot duplicate a command.
    if (response.status === 429 && attempt < MAX_RATE_LIMIT_RETRIES) {
      const backoff = Math.min(1000 * Math.pow(2, attempt), 15000);
      this.logDebug('Request %s %s rate limited, retrying in %dms', method, url, backoff);
      await delay(backoff);
      return this.send(config, priority, attempt + 1);
    }

    if (response.status >= 400 && response.status !== 401) {
      this.logError('Request %s %s failed (%d)', method, url, response.status);
    }
    return response;
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
    return `[DaikinCloudClient] ${message}`;
  }
}

export default DaikinCloudClient;
