import { AcMode, DatagramKind, FanSpeed, StatusFrame } from '@/types';
import { DecodeError, EncodeError } from '@/types/errors';

export const UDP_SEND_PORT = 20910;
export const UDP_RECV_PORT = 20911;

export const STATUS_FRAME_LENGTH = 29;

/** Datagrams above this size never come from a unit and are rejected at the socket. */
export const MAX_DATAGRAM_SIZE = 100;

export const MODE_CODES: Readonly<Record<AcMode, number>> = {
  off: 0,
  cool: 1,
  heat: 2,
  dry: 3,
  fan_only: 4,
  auto: 254,
};

export const FAN_CODES: Readonly<Record<FanSpeed, number>> = {
  low: 1,
  medium: 2,
  high: 3,
};

// Opaque templates captured from the vendor app.
const COMMAND_TEMPLATE = Buffer.from('00000000000000ffffffffffff' + 'f60001610402000080', 'hex');
const STATUS_REQUEST = Buffer.from('00000000000000accf23aa3190590001e4', 'hex');

const COMMAND_MAC_OFFSET = 7;
const COMMAND_MODE_OFFSET = 17;
const COMMAND_FAN_OFFSET = 18;

const STATUS_MAC_OFFSET = 1;
const STATUS_MODE_OFFSET = 18;
const STATUS_FAN_OFFSET = 19;
const STATUS_AMBIENT_OFFSET = 21;
const STATUS_SETPOINT_OFFSET = 23;

const MAC_LENGTH = 6;

const OTHER_DATAGRAM_KINDS: ReadonlyMap<number, DatagramKind> = new Map<number, DatagramKind>([
  [22, 'ack'],
  [46, 'control-response'],
  [47, 'control-response'],
  [108, 'discovery'],
]);

export const AC_MODES: readonly AcMode[] = ['off', 'cool', 'heat', 'dry', 'fan_only', 'auto'];
export const FAN_SPEEDS: readonly FanSpeed[] = ['low', 'medium', 'high'];

const modeByCode = new Map<number, AcMode>(AC_MODES.map(mode => [MODE_CODES[mode], mode]));
const fanByCode = new Map<number, FanSpeed>(FAN_SPEEDS.map(fan => [FAN_CODES[fan], fan]));

export function isAcMode(value: unknown): value is AcMode {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(MODE_CODES, value);
}

export function isFanSpeed(value: unknown): value is FanSpeed {
  return typeof value === 'string' && Object.prototype.hasOwnProperty.call(FAN_CODES, value);
}

/**
 * Parses an untrusted mode name (HTTP body, config). Throws EncodeError.
 */
export function parseMode(value: unknown): AcMode {
  if (!isAcMode(value)) {
    throw new EncodeError(`Unsupported mode: ${String(value)}`);
  }
  return value;
}

export function parseFanSpeed(value: unknown): FanSpeed {
  if (!isFanSpeed(value)) {
    throw new EncodeError(`Unsupported fan speed: ${String(value)}`);
  }
  return value;
}

/**
 * Builds the control frame that sets mode and fan speed.
 *
 * @param deviceMac - 6-byte hardware address learnt from the unit's broadcasts.
 *   Without it the template's broadcast address is kept.
 */
export function encodeCommand(mode: AcMode, fanSpeed: FanSpeed, deviceMac?: Buffer): Buffer {
  const modeCode = MODE_CODES[parseMode(mode)];
  const fanCode = FAN_CODES[parseFanSpeed(fanSpeed)];

  if (deviceMac !== undefined && deviceMac.length !== MAC_LENGTH) {
    throw new EncodeError(`Device MAC must be ${MAC_LENGTH} bytes, got ${deviceMac.length}`);
  }

  const frame = Buffer.from(COMMAND_TEMPLATE);
  if (deviceMac) {
    deviceMac.copy(frame, COMMAND_MAC_OFFSET);
  }
  frame[COMMAND_MODE_OFFSET] = modeCode;
  frame[COMMAND_FAN_OFFSET] = fanCode;
  return frame;
}

export function encodeStatusRequest(): Buffer {
  return Buffer.from(STATUS_REQUEST);
}

export type DecodeResult =
  | { ok: true; frame: StatusFrame }
  | { ok: false; error: DecodeError };

/**
 * Decodes a status broadcast. Unknown mode or fan codes are reported as
 * 'unknown' with the raw code kept; only the frame length can fail.
 */
export function decodeBroadcast(bytes: Buffer): DecodeResult {
  if (bytes.length < STATUS_FRAME_LENGTH) {
    return { ok: false, error: new DecodeError('TooShort', bytes.length, STATUS_FRAME_LENGTH) };
  }
  if (bytes.length > STATUS_FRAME_LENGTH) {
    return { ok: false, error: new DecodeError('TooLong', bytes.length, STATUS_FRAME_LENGTH) };
  }

  const modeCode = bytes[STATUS_MODE_OFFSET];
  const fanCode = bytes[STATUS_FAN_OFFSET];

  return {
    ok: true,
    frame: {
      macAddress: bytes.subarray(STATUS_MAC_OFFSET, STATUS_MAC_OFFSET + MAC_LENGTH).toString('hex'),
      mode: modeByCode.get(modeCode) ?? 'unknown',
      modeCode,
      fanSpeed: fanByCode.get(fanCode) ?? 'unknown',
      fanCode,
      ambientTemperatureCentidegrees: bytes.readUInt16LE(STATUS_AMBIENT_OFFSET),
      setpointTemperatureCentidegrees: bytes.readUInt16LE(STATUS_SETPOINT_OFFSET),
    },
  };
}

/**
 * Names the datagram by its length. Units also emit acks, control responses and
 * discovery replies on the broadcast port.
 */
export function classifyDatagram(bytes: Buffer): DatagramKind {
  if (bytes.length === STATUS_FRAME_LENGTH) {
    return 'status';
  }
  return OTHER_DATAGRAM_KINDS.get(bytes.length) ?? 'unknown';
}

export function macToBuffer(macAddress: string): Buffer {
  return Buffer.from(macAddress, 'hex');
}

export function centidegreesToCelsius(centidegrees: number): number {
  return centidegrees / 100;
}
