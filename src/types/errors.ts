/**
 * Base class for every error the bridge raises on purpose.
 */
export class BridgeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** A mode or fan speed outside the protocol's tables. Raised before any I/O. */
export class EncodeError extends BridgeError {}

export type DecodeErrorKind = 'TooShort' | 'TooLong';

export class DecodeError extends BridgeError {
  readonly kind: DecodeErrorKind;
  readonly length: number;

  constructor(kind: DecodeErrorKind, length: number, expected: number) {
    super(`Status frame ${kind === 'TooShort' ? 'too short' : 'too long'}: ${length} bytes, expected ${expected}`);
    this.kind = kind;
    this.length = length;
  }
}

export class TransportError extends BridgeError {
  readonly code?: string;

  constructor(message: string, code?: string) {
    super(message);
    this.code = code;
  }
}

export class UnsupportedOperationError extends BridgeError {}

export class ValidationError extends BridgeError {}

export class UnknownDeviceError extends BridgeError {
  readonly deviceId: string;

  constructor(deviceId: string) {
    super(`Unknown device: ${deviceId}`);
    this.deviceId = deviceId;
  }
}
