import { DeviceRegistration, DeviceSnapshot, DeviceState, PendingCommand, StatusFrame } from '@/types';
import { ValidationError } from '@/types/errors';
import { validateDeviceHost } from '@/utils/deviceUtils';
import { TokenBucket } from '@/utils/tokenBucket';
import { logger } from '@/utils/logger';

/**
 * One registered unit and its cached state. The state object is frozen and
 * only ever replaced as a whole, so a reader holding a reference never sees a
 * half-applied broadcast.
 */
export class RegisteredDevice {
  private currentRegistration: Readonly<DeviceRegistration>;
  readonly limiter: TokenBucket;
  private currentState: Readonly<DeviceState> | null = null;
  private pending: Readonly<PendingCommand> | null = null;
  private mac: string | null = null;
  private removed = false;
  private reportedAvailable = false;

  constructor(registration: DeviceRegistration, limiter: TokenBucket) {
    this.currentRegistration = Object.freeze({ ...registration });
    this.limiter = limiter;
  }

  get registration(): Readonly<DeviceRegistration> {
    return this.currentRegistration;
  }

  get deviceId(): string {
    return this.currentRegistration.deviceId;
  }

  get host(): string {
    return this.currentRegistration.host;
  }

  get state(): Readonly<DeviceState> | null {
    return this.currentState;
  }

  get pendingCommand(): Readonly<PendingCommand> | null {
    return this.pending;
  }

  get macAddress(): string | null {
    return this.mac;
  }

  get isRemoved(): boolean {
    return this.removed;
  }

  /**
   * Replaces the cached state with a decoded frame. Returns false when the
   * device has been unregistered in the meantime.
   */
  applyFrame(frame: StatusFrame, receivedAt: number): boolean {
    if (this.removed) return false;

    this.mac = frame.macAddress;
    this.currentState = Object.freeze({
      mode: frame.mode,
      modeCode: frame.modeCode,
      fanSpeed: frame.fanSpeed,
      fanCode: frame.fanCode,
      ambientTemperatureCentidegrees: frame.ambientTemperatureCentidegrees,
      setpointTemperatureCentidegrees: frame.setpointTemperatureCentidegrees,
      lastUpdated: receivedAt,
    });

    if (this.pending && this.pending.mode === frame.mode &&
        (frame.mode === 'off' || this.pending.fanSpeed === frame.fanSpeed)) {
      this.pending = null;
    }
    return true;
  }

  setPendingCommand(command: PendingCommand | null): void {
    if (this.removed) return;
    this.pending = command ? Object.freeze({ ...command }) : null;
  }

  isAvailable(now: number, stalenessMs: number): boolean {
    return this.currentState !== null && now - this.currentState.lastUpdated < stalenessMs;
  }

  /**
   * Records the availability last announced to subscribers and reports
   * whether it changed.
   */
  updateReportedAvailability(available: boolean): boolean {
    const changed = this.reportedAvailable !== available;
    this.reportedAvailable = available;
    return changed;
  }

  snapshot(now: number, stalenessMs: number): DeviceSnapshot {
    return {
      deviceId: this.currentRegistration.deviceId,
      name: this.currentRegistration.name ?? this.currentRegistration.deviceId,
      host: this.currentRegistration.host,
      macAddress: this.mac,
      available: this.isAvailable(now, stalenessMs),
      state: this.currentState,
      pendingCommand: this.pending,
    };
  }

  /**
   * Swaps in new registration details for the same id and host. Cached state
   * and the learnt hardware address are kept.
   */
  replaceRegistration(registration: DeviceRegistration): void {
    if (registration.deviceId !== this.deviceId || registration.host !== this.host) {
      throw new ValidationError(`Registration for ${registration.deviceId}@${registration.host} does not match ${this.deviceId}@${this.host}`);
    }
    this.currentRegistration = Object.freeze({ ...registration });
  }

  markRemoved(): void {
    this.removed = true;
    this.currentState = null;
    this.pending = null;
  }
}

export interface DeviceRegistryOptions {
  /** Broadcasts processed per second and device (default: 10) */
  broadcastRateLimit?: number;
}

/**
 * Maps unit IP addresses to their registered devices. The protocol carries no
 * device identifier that a unit can be configured by, so the source IP is the
 * correlation key.
 */
export class DeviceRegistry {
  private readonly log = logger.child({ component: 'DeviceRegistry' });
  private readonly byHost = new Map<string, RegisteredDevice>();
  private readonly byId = new Map<string, RegisteredDevice>();
  private readonly broadcastRateLimit: number;

  constructor(options: DeviceRegistryOptions = {}) {
    this.broadcastRateLimit = options.broadcastRateLimit ?? 10;
  }

  /**
   * Registers a unit. Registering the same id at the same host again updates
   * the entry in place (its name may change) and keeps its state.
   *
   * @throws ValidationError on an invalid host, or a host owned by another device
   */
  register(registration: DeviceRegistration): RegisteredDevice {
    validateDeviceHost(registration.host);
    if (!registration.deviceId.trim()) {
      throw new ValidationError('Device id must not be empty');
    }

    const existing = this.byId.get(registration.deviceId);
    if (existing && existing.host === registration.host) {
      if (existing.registration.name !== registration.name) {
        existing.replaceRegistration(registration);
        this.log.info({ deviceId: existing.deviceId, name: registration.name }, 'Device registration updated');
      }
      return existing;
    }

    const owner = this.byHost.get(registration.host);
    if (owner && owner.deviceId !== registration.deviceId) {
      throw new ValidationError(`Host ${registration.host} is already registered to device ${owner.deviceId}`);
    }

    if (existing) {
      this.log.info({ deviceId: registration.deviceId, from: existing.host, to: registration.host }, 'Device host changed, replacing entry');
      this.unregister(registration.deviceId);
    }

    const device = new RegisteredDevice(registration, new TokenBucket(this.broadcastRateLimit));
    this.byId.set(device.deviceId, device);
    this.byHost.set(device.host, device);
    this.log.info({ deviceId: device.deviceId, host: device.host }, 'Device registered');
    return device;
  }

  /**
   * Looks up the device that owns a datagram's source address.
   */
  resolve(sourceAddress: string): RegisteredDevice | undefined {
    return this.byHost.get(sourceAddress);
  }

  get(deviceId: string): RegisteredDevice | undefined {
    return this.byId.get(deviceId);
  }

  /**
   * Removes a device and its cached state. Holders of the old entry see
   * `isRemoved` and stop updating it.
   */
  unregister(deviceId: string): boolean {
    const device = this.byId.get(deviceId);
    if (!device) return false;

    this.byId.delete(deviceId);
    this.byHost.delete(device.host);
    device.markRemoved();
    this.log.info({ deviceId, host: device.host }, 'Device unregistered');
    return true;
  }

  list(): RegisteredDevice[] {
    return Array.from(this.byId.values());
  }

  get size(): number {
    return this.byId.size;
  }
}
