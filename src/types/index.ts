export type AcMode = 'off' | 'cool' | 'heat' | 'dry' | 'fan_only' | 'auto';

export type FanSpeed = 'low' | 'medium' | 'high';

/**
 * Cached state of one unit, as last reported by its own broadcast.
 * Temperatures stay in centidegrees (value × 0.01 = °C).
 */
export interface DeviceState {
  mode: AcMode | 'unknown';
  modeCode: number;
  fanSpeed: FanSpeed | 'unknown';
  fanCode: number;
  ambientTemperatureCentidegrees: number;
  setpointTemperatureCentidegrees: number;
  lastUpdated: number;
}

export interface DeviceRegistration {
  deviceId: string;
  host: string;
  name?: string;
}

export interface PendingCommand {
  mode: AcMode;
  fanSpeed: FanSpeed;
  issuedAt: number;
  attempts: number;
}

/**
 * Read-only view handed to consumers. `state` is null until the first valid
 * broadcast arrives.
 */
export interface DeviceSnapshot {
  deviceId: string;
  name: string;
  host: string;
  macAddress: string | null;
  available: boolean;
  state: Readonly<DeviceState> | null;
  pendingCommand: Readonly<PendingCommand> | null;
}

/**
 * Fields decoded from a 29-byte status broadcast.
 */
export interface StatusFrame {
  macAddress: string;
  mode: AcMode | 'unknown';
  modeCode: number;
  fanSpeed: FanSpeed | 'unknown';
  fanCode: number;
  ambientTemperatureCentidegrees: number;
  setpointTemperatureCentidegrees: number;
}

export type DatagramKind = 'status' | 'ack' | 'control-response' | 'discovery' | 'unknown';

export interface Datagram {
  address: string;
  port: number;
  payload: Buffer;
  receivedAt: number;
}

export interface CommandRequest {
  mode?: AcMode;
  fanSpeed?: FanSpeed;
  temperature?: number;
}

export type CommandResult =
  | { status: 'accepted'; deviceId: string; mode: AcMode; fanSpeed: FanSpeed }
  | { status: 'unsupported'; deviceId: string; reason: string }
  | { status: 'transport-error'; deviceId: string; reason: string; code?: string };

export type DeviceListener = (snapshot: DeviceSnapshot) => void;
