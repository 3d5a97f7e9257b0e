import axios, { AxiosAdapter, AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { CloudRequestError, errorMessage } from './errors';

export const DEFAULT_BASE_URL = 'https://proddit.ditdeneb.com';
export const CREDENTIAL_DISCOVERY_URL = 'https://scr.dspsph.com/common/login';
export const LOGIN_PATH = '/premise/dsiot/login';
export const MULTIREQ_PATH = '/dsiot/multireq';

const MOBILE_USER_AGENT = 'DaikinMobileController/2.0.0 CFNetwork/3860.100.1 Darwin/25.0.0';

export interface HttpOptions {
  baseUrl?: string;
  /** Milliseconds */
  timeout?: number;
  /** Replaces the network transport, e.g. with an in-process stand-in. */
  adapter?: AxiosAdapter;
}

export function createHttp(options: HttpOptions = {}): AxiosInstance {
  return axios.create({
    baseURL: options.baseUrl ?? DEFAULT_BASE_URL,
    timeout: options.timeout ?? 20000,
    headers: {
      'Accept': '*/*',
      'Content-Type': 'application/json',
      'User-Agent': MOBILE_USER_AGENT,
    },
    // Status handling is per endpoint; only transport failures throw.
    validateStatus: () => true,
    adapter: options.adapter,
  });
}

export async function sendRequest<T = unknown>(
  http: AxiosInstance,
  config: AxiosRequestConfig,
): Promise<AxiosResponse<T>> {
  try {
    return await http.request<T>(config);
  } catch (error) {
    const method = String(config.method ?? 'GET').toUpperCase();
    const url = String(config.url ?? 'unknown');
    throw new CloudRequestError(`${method} ${url} failed: ${errorMessage(error)}`, undefined, error);
  }
}

export const delay = async (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
