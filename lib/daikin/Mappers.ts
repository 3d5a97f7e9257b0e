import {
  CommandTarget,
  Device,
  DeviceCapabilities,
  FAN_SPEEDS,
  FanSpeed,
  HVAC_MODES,
  HvacMode,
  ReportedMode,
  SWING_MODES,
  StatusSnapshot,
  SwingMode,
  UnitReadings,
} from '../../types';

export interface DsiotParam {
  pn: string;
  pv?: string;
  pch?: DsiotParam[];
}

export interface MultiRequest {
  op: number;
  to: string;
  pc?: DsiotParam;
}

export interface MultiRequestBody {
  requests: MultiRequest[];
}

export interface MultiResponseEntry {
  fr: string;
  rsc?: number;
  pc?: unknown;
}

export const OP_READ = 2;
export const OP_WRITE = 3;

export const RSC_OK = 2000;
export const RSC_ACCEPTED = 2004;
export const RSC_NOT_FOUND = 4004;

export const POWER_ON = '01';
export const POWER_OFF = '00';
const DEFAULT_FAN_CODE = '02';

const MODE_CODES: Record<HvacMode, string> = {
  cool: '0200',
  dry: '0500',
  fan: '0000',
};

const MODE_BY_CODE = new Map<string, HvacMode>(HVAC_MODES.map((mode): [string, HvacMode] => [MODE_CODES[mode], mode]));

// Each mode writes its own e_3001 parameters; the values are fixed-width captured defaults.
const MODE_TEMPLATES: Record<string, Record<string, string>> = {
  [MODE_CODES.cool]: {
    p_02: '32',
    p_05: '0F0000',
    p_06: '0F0000',
    p_09: '0700',
    p_0C: '00',
  },
  [MODE_CODES.dry]: {
    p_22: '020000',
    p_23: '0F0000',
    p_27: '0A00',
    p_31: '00',
  },
  [MODE_CODES.fan]: {
    p_24: '020000',
    p_25: '050000',
    p_28: '0A00',
  },
};

// The presence of these e_3001 parameters in the expanded tree marks a supported mode.
const MODE_MARKERS: Record<HvacMode, string> = {
  cool: 'p_02',
  dry: 'p_22',
  fan: 'p_24',
};

const FAN_SPEED_CODES: Record<FanSpeed, string> = {
  Auto: '0A00',
  'Indoor Unit Quiet': '0B00',
  'Level 1': '0300',
  'Level 2': '0400',
  'Level 3': '0500',
  'Level 4': '0600',
  'Level 5': '0700',
};

const FAN_SPEED_BY_CODE = new Map<string, FanSpeed>(
  FAN_SPEEDS.map((speed): [string, FanSpeed] => [FAN_SPEED_CODES[speed], speed]),
);

const FAN_SPEED_KEYS: Record<HvacMode, string> = {
  cool: 'p_09',
  dry: 'p_27',
  fan: 'p_28',
};

// e_3001 p_05 is the left-right louvre, p_06 up-down.
const SWING_CODES: Record<SwingMode, { p_05: string; p_06: string }> = {
  both: { p_05: '0F0000', p_06: '0F0000' },
  horizontal: { p_05: '000000', p_06: '0F0000' },
  vertical: { p_05: '0F0000', p_06: '000000' },
  off: { p_05: '000000', p_06: '000000' },
};

const MAX_HALF_DEGREES = 0xff;

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const childrenOf = (node: Record<string, unknown>): Record<string, unknown>[] =>
  Array.isArray(node.pch) ? node.pch.filter(isRecord) : [];

const childByName = (node: Record<string, unknown>, pn: string): Record<string, unknown> | undefined =>
  childrenOf(node).find((child) => child.pn === pn);

function childrenToMap(node: Record<string, unknown>): Record<string, string> {
  const out: Record<string, string> = {};
  for (const child of childrenOf(node)) {
    if (typeof child.pn !== 'string' || !child.pn || !('pv' in child)) {
      continue;
    }
    out[child.pn] = String(child.pv);
  }
  return out;
}

function findNode(root: Record<string, unknown>, pn: string): Record<string, unknown> | undefined {
  const queue = [...childrenOf(root)];
  while (queue.length) {
    const node = queue.shift();
    if (!node) {
      break;
    }
    if (node.pn === pn) {
      return node;
    }
    queue.push(...childrenOf(node));
  }
  return undefined;
}

export function decodeHexInt(value: string | undefined): number | undefined {
  if (!value || !/^[0-9a-fA-F]+$/.test(value)) {
    return undefined;
  }
  return parseInt(value, 16);
}

export function decodeHexSignedByte(value: string | undefined): number | undefined {
  const n = decodeHexInt(value);
  if (n === undefined) {
    return undefined;
  }
  return n >= 0x80 ? n - 0x100 : n;
}

export function decodeHexHalfDegree(value: string | undefined): number | undefined {
  const n = decodeHexInt(value);
  if (n === undefined) {
    return undefined;
  }
  return Math.round((n / 2) * 10) / 10;
}

/** Little-endian signed 16-bit value in half degrees, as the auxiliary sensors report it. */
export function decodeHexLeInt16HalfDegree(value: string | undefined): number | undefined {
  if (!value || !/^[0-9a-fA-F]{4}$/.test(value)) {
    return undefined;
  }
  const n = Buffer.from(value, 'hex').readInt16LE(0);
  return Math.round((n / 2) * 10) / 10;
}

export const isSettableTemperature = (celsius: number): boolean =>
  Number.isFinite(celsius) && celsius >= 0 && Math.round(celsius * 2) <= MAX_HALF_DEGREES;

export function encodeHalfDegree(celsius: number): string {
  return Math.round(celsius * 2)
    .toString(16)
    .toUpperCase()
    .padStart(2, '0');
}

/** Upper-cased fixed-width prefix of a hex payload fragment. */
export function normalizeHexCode(value: string | undefined, width = 4): string | undefined {
  if (!value || value.length < width) {
    return undefined;
  }
  return value.toUpperCase().slice(0, width);
}

export function mapMode(code: string | undefined): ReportedMode {
  const normalized = normalizeHexCode(code);
  return (normalized && MODE_BY_CODE.get(normalized)) || 'unknown';
}

export function extractFanSpeed(raw: Record<string, string>, mode: ReportedMode): FanSpeed | undefined {
  const preferred = mode === 'unknown' ? undefined : FAN_SPEED_KEYS[mode];
  const keys = [
    ...(preferred ? [preferred] : []),
    ...Object.values(FAN_SPEED_KEYS).filter((key) => key !== preferred),
  ];

  for (const key of keys) {
    const code = normalizeHexCode(raw[`e_3001.${key}`]);
    const speed = code ? FAN_SPEED_BY_CODE.get(code) : undefined;
    if (speed) {
      return speed;
    }
  }
  return undefined;
}

export function mapSwing(raw: Record<string, string>): SwingMode | undefined {
  const leftRight = normalizeHexCode(raw['e_3001.p_05'], 6);
  const upDown = normalizeHexCode(raw['e_3001.p_06'], 6);
  return SWING_MODES.find((mode) => SWING_CODES[mode].p_05 === leftRight && SWING_CODES[mode].p_06 === upDown);
}

interface EdgeAccumulator {
  id: string;
  name: string;
  mac: string;
  modes?: HvacMode[];
}

function mapCapabilities(edge: Record<string, unknown>): HvacMode[] | undefined {
  const group = findNode(edge, 'e_3001');
  if (!group) {
    return undefined;
  }
  const params = new Set(childrenOf(group).map((child) => child.pn));
  return HVAC_MODES.filter((mode) => params.has(MODE_MARKERS[mode]));
}

function mergeEdge(units: Map<string, EdgeAccumulator>, edge: Record<string, unknown>, edgeId: string): void {
  let name = '';
  let mac = '';
  for (const node of childrenOf(edge)) {
    if (node.pn === 'adp_d') {
      const child = childByName(node, 'name');
      name = child?.pv ? String(child.pv) : name;
    } else if (node.pn === 'adp_i') {
      const child = childByName(node, 'mac');
      mac = child?.pv ? String(child.pv) : mac;
    }
  }
  const modes = mapCapabilities(edge);

  const existing = units.get(edgeId);
  if (existing) {
    existing.name = name || existing.name;
    existing.mac = mac || existing.mac;
    existing.modes = modes ?? existing.modes;
    return;
  }

  units.set(edgeId, {
    id: edgeId,
    name: name || `Daikin ${edgeId}`,
    mac,
    modes,
  });
}

export function readResponses(raw: unknown): MultiResponseEntry[] {
  if (!isRecord(raw) || !Array.isArray(raw.responses)) {
    throw new Error('multireq response carries no responses array');
  }
  return raw.responses.filter(isRecord).map((entry) => ({
    fr: String(entry.fr ?? ''),
    rsc: typeof entry.rsc === 'number' ? entry.rsc : undefined,
    pc: entry.pc,
  }));
}

export function buildDiscoveryRequests(): MultiRequest[] {
  return [
    { to: '/dsiot/edges?expand', op: OP_READ },
    { to: '/dsiot/edges', op: OP_READ },
  ];
}

export function mapDevicesFromResponse(raw: unknown): Device[] {
  const units = new Map<string, EdgeAccumulator>();

  for (const response of readResponses(raw)) {
    const { fr, pc } = response;
    if (fr === '/dsiot/edges' || fr === '/dsiot/edges?expand') {
      const edges = Array.isArray(pc) ? pc.filter(isRecord) : isRecord(pc) ? [pc] : [];
      for (const edge of edges) {
        const edgeId = String(edge.ri ?? '').trim();
        if (edgeId) {
          mergeEdge(units, edge, edgeId);
        }
      }
      continue;
    }

    // Some accounts answer with per-edge fragments instead of a list.
    if (fr.startsWith('/dsiot/edges/')) {
      const edgeId = fr.split('/')[3];
      if (edgeId && /^\d+$/.test(edgeId) && isRecord(pc)) {
        mergeEdge(units, { pch: [pc] }, edgeId);
      }
    }
  }

  return Array.from(units.values()).map((unit) => {
    const capabilities: DeviceCapabilities = {
      power: true,
      modes: unit.modes ?? [...HVAC_MODES],
    };
    return {
      id: unit.id,
      name: unit.name,
      mac: unit.mac || undefined,
      capabilities,
    };
  });
}

export const statusPath = (deviceId: string): string => `/dsiot/edges/${deviceId}/adr_0100.dgc_status`;

export function buildStatusRequest(deviceId: string): MultiRequest {
  return { op: OP_READ, to: `${statusPath(deviceId)}?filter=pv` };
}

export function findStatusResponse(deviceId: string, raw: unknown): MultiResponseEntry | undefined {
  return readResponses(raw).find((entry) => entry.fr.startsWith(statusPath(deviceId)));
}

/**
 * Flattens the `e_1002` status groups into `group.param` keys.
 * Returns null when the payload has no status tree.
 */
export function flattenStatus(pc: unknown): Record<string, string> | null {
  if (!isRecord(pc)) {
    return null;
  }
  const root = childByName(pc, 'e_1002');
  if (!root) {
    return null;
  }

  const merged: Record<string, string> = {};
  for (const group of childrenOf(root)) {
    if (typeof group.pn !== 'string' || !group.pn) {
      continue;
    }
    for (const [key, value] of Object.entries(childrenToMap(group))) {
      merged[`${group.pn}.${key}`] = value;
    }
  }
  return merged;
}

export function mapReadings(raw: Record<string, string>, mode: ReportedMode): UnitReadings {
  return {
    targetTemperature: decodeHexHalfDegree(raw['e_3001.p_02']),
    roomTemperature: decodeHexSignedByte(raw['e_A00B.p_01']),
    roomHumidity: decodeHexInt(raw['e_A00B.p_02']),
    fanSpeed: extractFanSpeed(raw, mode),
    swing: mapSwing(raw),
    sensorTemperature1: decodeHexLeInt16HalfDegree(raw['e_A00B.p_05']),
    sensorTemperature2: decodeHexLeInt16HalfDegree(raw['e_A00B.p_06']),
  };
}

export function mapStatusSnapshot(deviceId: string, raw: Record<string, string>): StatusSnapshot {
  const mode = mapMode(raw['e_3001.p_01']);
  return {
    deviceId,
    power: raw['e_A002.p_01'] === POWER_ON,
    mode,
    readings: mapReadings(raw, mode),
    raw,
  };
}

/** e_3001 values the target sets explicitly, keyed by parameter. */
function buildParamOverrides(target: CommandTarget, modeCode: string): Record<string, string> {
  const overrides: Record<string, string> = {};
  if (target.targetTemperature !== undefined) {
    overrides.p_02 = encodeHalfDegree(target.targetTemperature);
  }
  if (target.swing) {
    Object.assign(overrides, SWING_CODES[target.swing]);
  }
  if (target.fanSpeed) {
    const mode = mapMode(modeCode);
    // Without a known mode every mode's fan parameter is written.
    const keys = mode === 'unknown' ? Object.values(FAN_SPEED_KEYS) : [FAN_SPEED_KEYS[mode]];
    for (const key of keys) {
      overrides[key] = FAN_SPEED_CODES[target.fanSpeed];
    }
  }
  return overrides;
}

function buildModePatch(modeCode: string, raw: Record<string, string>, overrides: Record<string, string>): DsiotParam[] {
  const patch: DsiotParam[] = [{ pn: 'p_01', pv: modeCode }];
  const template = MODE_TEMPLATES[modeCode] ?? {};

  for (const [key, fallback] of Object.entries(template)) {
    const value = overrides[key] ?? raw[`e_3001.${key}`];
    // Captured writes use fixed-width fragments.
    patch.push({ pn: key, pv: value && value.length === fallback.length ? value : fallback });
  }
  for (const [key, value] of Object.entries(overrides)) {
    if (!(key in template)) {
      patch.push({ pn: key, pv: value });
    }
  }
  return patch;
}

/**
 * Builds the full write request over the unit's last fetched raw status. Fields
 * the target leaves out keep their reported values, since the endpoint expects
 * power, mode and fan together.
 */
export function createWritePayload(
  deviceId: string,
  target: CommandTarget,
  raw: Record<string, string>,
): MultiRequestBody {
  const modeCode = target.mode ? MODE_CODES[target.mode] : raw['e_3001.p_01'] ?? MODE_CODES.cool;
  const powerOn = target.power ?? raw['e_A002.p_01'] === POWER_ON;
  const fanCode = raw['e_3003.p_2D'] ?? DEFAULT_FAN_CODE;

  return {
    requests: [
      {
        op: OP_WRITE,
        to: statusPath(deviceId),
        pc: {
          pn: 'dgc_status',
          pch: [
            {
              pn: 'e_1002',
              pch: [
                { pn: 'e_3001', pch: buildModePatch(modeCode, raw, buildParamOverrides(target, modeCode)) },
                { pn: 'e_3003', pch: [{ pn: 'p_2D', pv: fanCode }] },
                { pn: 'e_A002', pch: [{ pn: 'p_01', pv: powerOn ? POWER_ON : POWER_OFF }] },
              ],
            },
          ],
        },
      },
    ],
  };
}

export function isTargetSatisfied(
  target: CommandTarget,
  snapshot: Pick<StatusSnapshot, 'power' | 'mode' | 'readings'>,
): boolean {
  if (target.power !== undefined && snapshot.power !== target.power) {
    return false;
  }
  if (target.mode !== undefined && snapshot.mode !== target.mode) {
    return false;
  }
  if (target.targetTemperature !== undefined && snapshot.readings.targetTemperature !== target.targetTemperature) {
    return false;
  }
  if (target.fanSpeed !== undefined && snapshot.readings.fanSpeed !== target.fanSpeed) {
    return false;
  }
  if (target.swing !== undefined && snapshot.readings.swing !== target.swing) {
    return false;
  }
  return true;
}

/** Readings with the values a pending target sets laid over them. */
export function applyTargetReadings(readings: UnitReadings, target: CommandTarget): UnitReadings {
  return {
    ...readings,
    ...(target.targetTemperature !== undefined ? { targetTemperature: target.targetTemperature } : {}),
    ...(target.fanSpeed ? { fanSpeed: target.fanSpeed } : {}),
    ...(target.swing ? { swing: target.swing } : {}),
  };
}
