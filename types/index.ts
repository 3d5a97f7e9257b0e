export type HvacMode = 'cool' | 'dry' | 'fan';
export type ReportedMode = HvacMode | 'unknown';
export type Confidence = 'high' | 'low';
export type AuthMode = 'id_token' | 'access_token';

export const HVAC_MODES: readonly HvacMode[] = ['cool', 'dry', 'fan'];

export type FanSpeed =
  | 'Auto'
  | 'Indoor Unit Quiet'
  | 'Level 1'
  | 'Level 2'
  | 'Level 3'
  | 'Level 4'
  | 'Level 5';

export const FAN_SPEEDS: readonly FanSpeed[] = [
  'Auto',
  'Indoor Unit Quiet',
  'Level 1',
  'Level 2',
  'Level 3',
  'Level 4',
  'Level 5',
];

/** Louvre movement: `horizontal` swings left-right only, `vertical` up-down only. */
export type SwingMode = 'both' | 'horizontal' | 'vertical' | 'off';

export const SWING_MODES: readonly SwingMode[] = ['both', 'horizontal', 'vertical', 'off'];

export interface Credential {
  username: string;
  password: string;
  /** Per-installation identifier sent with every login. */
  clientUuid: string;
  clientId?: string;
  clientSecret?: string;
}

export interface Session {
  accessToken?: string;
  idToken?: string;
  refreshToken?: string;
  /** Epoch millis */
  expiresAt: number;
  /** Epoch millis */
  issuedAt: number;
}

export interface DeviceCapabilities {
  power: boolean;
  modes: readonly HvacMode[];
}

export interface Device {
  id: string;
  name: string;
  mac?: string;
  capabilities: DeviceCapabilities;
}

export interface UnitReadings {
  targetTemperature?: number;
  roomTemperature?: number;
  roomHumidity?: number;
  fanSpeed?: FanSpeed;
  swing?: SwingMode;
  /** Auxiliary unit sensors, in °C. */
  sensorTemperature1?: number;
  sensorTemperature2?: number;
}

export interface CommandTarget {
  power?: boolean;
  mode?: HvacMode;
  /** °C in half-degree steps. */
  targetTemperature?: number;
  fanSpeed?: FanSpeed;
  swing?: SwingMode;
}

export interface Command {
  deviceId: string;
  target: CommandTarget;
  /** Epoch millis */
  issuedAt: number;
  attemptCount: number;
}

export interface StatusSnapshot {
  deviceId: string;
  power: boolean;
  mode: ReportedMode;
  readings: UnitReadings;
  /** Flattened `group.param` values as reported by the cloud. */
  raw: Record<string, string>;
}

export interface DeviceState {
  deviceId: string;
  power: boolean;
  mode: ReportedMode;
  readings: UnitReadings;
  confidence: Confidence;
  lastConfirmedAt: number | null;
  pendingCommand: Command | null;
  pendingSince: number | null;
}

export interface StateChange {
  deviceId: string;
  previous: DeviceState;
  current: DeviceState;
}

export type Logger = (message: string, ...args: unknown[]) => void;
