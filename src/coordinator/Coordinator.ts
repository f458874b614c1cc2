import * as cron from 'node-cron';
import { EventEmitter } from 'events';
import {
  AcMode,
  CommandRequest,
  CommandResult,
  Datagram,
  DeviceListener,
  DeviceRegistration,
  DeviceSnapshot,
  FanSpeed,
} from '@/types';
import { TransportError, UnknownDeviceError, UnsupportedOperationError } from '@/types/errors';
import {
  UDP_RECV_PORT,
  UDP_SEND_PORT,
  centidegreesToCelsius,
  classifyDatagram,
  decodeBroadcast,
  encodeCommand,
  encodeStatusRequest,
  macToBuffer,
} from '@/protocol/PacketCodec';
import { DeviceRegistry, RegisteredDevice } from '@/registry/DeviceRegistry';
import { logger } from '@/utils/logger';
import { withRetry } from '@/utils/retry';
import { convertSecondsToInterval } from '@/utils/cronInterval';

/**
 * What the coordinator needs from the network. `UdpTransport` is the
 * production implementation.
 */
export interface DatagramTransport {
  send(payload: Buffer, host: string, port?: number): Promise<void>;
  listen(port?: number): Promise<AsyncIterable<Datagram>>;
  close(): Promise<void>;
  isListening(): boolean;
}

export interface CoordinatorOptions {
  /** Seconds between status requests (default: 10) */
  pollIntervalSeconds?: number;
  /** Seconds without a broadcast before a device is unavailable (default: 30) */
  stalenessSeconds?: number;
  sendPort?: number;
  listenPort?: number;
  /** Delay before the follow-up status request after a command, 0 disables (default: 500) */
  commandEchoDelayMs?: number;
  /** Poll ticks that re-send an unconfirmed command before giving up (default: 3) */
  maxReassertAttempts?: number;
  /** Retries of a command send on transient socket errors (default: 2) */
  sendRetries?: number;
  now?: () => number;
}

const DEFAULT_MODE: AcMode = 'off';
const DEFAULT_FAN: FanSpeed = 'low';

/**
 * Keeps the cached state of every registered unit current.
 *
 * Two long-lived duties share the transport: a cron-driven poll that asks each
 * unit to broadcast its status, and a listen loop that drains the broadcast
 * socket and replaces the matching device's state. Consumers read snapshots
 * synchronously or subscribe to changes.
 *
 * Commands are fire-and-forget. They never touch the cached state; the unit's
 * next broadcast does.
 */
export class Coordinator {
  private readonly log = logger.child({ component: 'Coordinator' });
  private readonly transport: DatagramTransport;
  private readonly registry: DeviceRegistry;
  private readonly emitter = new EventEmitter();
  private readonly pollInterval: string;
  private readonly stalenessMs: number;
  private readonly sendPort: number;
  private readonly listenPort: number;
  private readonly commandEchoDelayMs: number;
  private readonly maxReassertAttempts: number;
  private readonly sendRetries: number;
  private readonly now: () => number;
  private readonly echoTimers = new Set<NodeJS.Timeout>();
  private pollTask: cron.ScheduledTask | null = null;
  private listenTask: Promise<void> | null = null;
  private running = false;

  constructor(transport: DatagramTransport, registry: DeviceRegistry, options: CoordinatorOptions = {}) {
    this.transport = transport;
    this.registry = registry;
    this.pollInterval = convertSecondsToInterval(options.pollIntervalSeconds ?? 10);
    this.stalenessMs = (options.stalenessSeconds ?? 30) * 1000;
    this.sendPort = options.sendPort ?? UDP_SEND_PORT;
    this.listenPort = options.listenPort ?? UDP_RECV_PORT;
    this.commandEchoDelayMs = options.commandEchoDelayMs ?? 500;
    this.maxReassertAttempts = options.maxReassertAttempts ?? 3;
    this.sendRetries = options.sendRetries ?? 2;
    this.now = options.now ?? Date.now;
    this.emitter.setMaxListeners(0);
  }

  /**
   * Binds the broadcast listener, then starts polling. A bind failure is
   * fatal and rejects.
   */
  async start(): Promise<void> {
    if (this.running) return;

    const stream = await withRetry(
      () => this.transport.listen(this.listenPort),
      { maxRetries: 3, initialDelayMs: 500, operationName: 'bind broadcast listener' }
    );

    this.running = true;
    this.listenTask = this.runListenLoop(stream);
    this.startPolling();

    this.log.info({ devices: this.registry.size, interval: this.pollInterval }, 'Coordinator started');
    await this.pollDevices();
  }

  async stop(): Promise<void> {
    this.running = false;

    if (this.pollTask) {
      this.pollTask.stop();
      this.pollTask = null;
    }

    for (const timer of this.echoTimers) {
      clearTimeout(timer);
    }
    this.echoTimers.clear();

    await this.transport.close();

    if (this.listenTask) {
      await this.listenTask;
      this.listenTask = null;
    }

    for (const device of this.registry.list()) {
      this.emitter.emit(this.endEventName(device.deviceId));
    }
    this.emitter.removeAllListeners();
    this.log.info('Coordinator stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  isListening(): boolean {
    return this.transport.isListening();
  }

  private startPolling(): void {
    if (this.pollTask) {
      this.pollTask.stop();
    }

    this.pollTask = cron.schedule(this.pollInterval, async () => {
      await this.pollDevices();
    }, {
      scheduled: true,
      timezone: 'UTC'
    });
  }

  private async pollDevices(): Promise<void> {
    this.checkAvailability();

    const devices = this.registry.list();
    if (devices.length === 0) {
      this.log.debug('Poll skipped: no devices registered');
      return;
    }

    this.log.debug({ devices: devices.length }, 'Polling devices');
    await Promise.allSettled(devices.map(device => this.pollDevice(device)));
  }

  private async pollDevice(device: RegisteredDevice): Promise<void> {
    const pending = device.pendingCommand;

    try {
      if (pending && pending.attempts < this.maxReassertAttempts) {
        await this.transport.send(this.encodeFor(device, pending.mode, pending.fanSpeed), device.host, this.sendPort);
        device.setPendingCommand({ ...pending, attempts: pending.attempts + 1 });
        this.log.info({ deviceId: device.deviceId, mode: pending.mode, fanSpeed: pending.fanSpeed, attempt: pending.attempts + 1 },
          'Command not yet confirmed, re-sent');
        return;
      }

      if (pending) {
        this.log.warn({ deviceId: device.deviceId, mode: pending.mode, fanSpeed: pending.fanSpeed, attempts: pending.attempts },
          'Command never confirmed by a broadcast, giving up');
        device.setPendingCommand(null);
      }

      await this.transport.send(encodeStatusRequest(), device.host, this.sendPort);
    } catch (error) {
      this.log.warn({ err: error, deviceId: device.deviceId, host: device.host }, 'Poll send failed');
    }
  }

  /**
   * Announces devices whose broadcasts went stale since the last check.
   */
  private checkAvailability(): void {
    const now = this.now();

    for (const device of this.registry.list()) {
      const available = device.isAvailable(now, this.stalenessMs);
      if (device.updateReportedAvailability(available) && !available) {
        this.log.warn({ deviceId: device.deviceId, host: device.host, stalenessMs: this.stalenessMs },
          'No broadcast within staleness window, device unavailable');
        this.notify(device);
      }
    }
  }

  private async runListenLoop(stream: AsyncIterable<Datagram>): Promise<void> {
    this.log.info({ port: this.listenPort }, 'Broadcast listener started');

    try {
      for await (const datagram of stream) {
        try {
          this.handleDatagram(datagram);
        } catch (error) {
          this.log.error({ err: error, from: datagram.address }, 'Error handling datagram');
        }
      }
    } catch (error) {
      this.log.error({ err: error }, 'Broadcast listener failed');
    }

    this.log.info('Broadcast listener stopped');
  }

  private handleDatagram(datagram: Datagram): void {
    const device = this.registry.resolve(datagram.address);
    if (!device) {
      this.log.debug({ from: datagram.address, bytes: datagram.payload.length }, 'Ignoring datagram from unregistered source');
      return;
    }

    if (!device.limiter.consume()) {
      this.log.warn({ deviceId: device.deviceId, from: datagram.address }, 'Broadcast rate limit exceeded');
      return;
    }

    const kind = classifyDatagram(datagram.payload);
    if (kind !== 'status' && kind !== 'unknown') {
      this.log.debug({ deviceId: device.deviceId, kind, bytes: datagram.payload.length }, 'Ignoring non-status datagram');
      return;
    }

    const result = decodeBroadcast(datagram.payload);
    if (!result.ok) {
      this.log.warn({ deviceId: device.deviceId, kind: result.error.kind, bytes: result.error.length },
        'Discarding malformed status frame');
      return;
    }

    const { frame } = result;
    if (device.macAddress && device.macAddress !== frame.macAddress) {
      this.log.warn({ deviceId: device.deviceId, expected: device.macAddress, got: frame.macAddress },
        'Hardware address mismatch, possible spoofing');
      return;
    }

    if (!device.applyFrame(frame, this.now())) {
      return;
    }
    device.updateReportedAvailability(true);

    this.log.debug({
      deviceId: device.deviceId,
      mode: frame.mode,
      fanSpeed: frame.fanSpeed,
      ambient: centidegreesToCelsius(frame.ambientTemperatureCentidegrees),
      setpoint: centidegreesToCelsius(frame.setpointTemperatureCentidegrees),
    }, 'Status broadcast applied');

    this.notify(device);
  }

  private notify(device: RegisteredDevice): void {
    this.emitter.emit(this.eventName(device.deviceId), device.snapshot(this.now(), this.stalenessMs));
  }

  private eventName(deviceId: string): string {
    return `state:${deviceId}`;
  }

  private endEventName(deviceId: string): string {
    return `end:${deviceId}`;
  }

  register(registration: DeviceRegistration): DeviceSnapshot {
    const device = this.registry.register(registration);

    if (this.running) {
      this.requestStatus(device).catch(error => {
        this.log.warn({ err: error, deviceId: device.deviceId }, 'Initial status request failed');
      });
    }

    return device.snapshot(this.now(), this.stalenessMs);
  }

  unregister(deviceId: string): boolean {
    const removed = this.registry.unregister(deviceId);
    if (removed) {
      this.emitter.emit(this.endEventName(deviceId));
      this.emitter.removeAllListeners(this.eventName(deviceId));
      this.emitter.removeAllListeners(this.endEventName(deviceId));
    }
    return removed;
  }

  getState(deviceId: string): DeviceSnapshot | undefined {
    return this.registry.get(deviceId)?.snapshot(this.now(), this.stalenessMs);
  }

  getStates(): DeviceSnapshot[] {
    const now = this.now();
    return this.registry.list().map(device => device.snapshot(now, this.stalenessMs));
  }

  /**
   * Calls `listener` with a fresh snapshot on every state change and every
   * availability transition of the device. `onEnd` runs once when the device
   * is unregistered or the coordinator stops; no updates follow it.
   * Returns the unsubscribe function.
   *
   * @throws UnknownDeviceError
   */
  subscribe(deviceId: string, listener: DeviceListener, onEnd?: () => void): () => void {
    this.requireDevice(deviceId);

    const event = this.eventName(deviceId);
    const endEvent = this.endEventName(deviceId);
    const guarded = (snapshot: DeviceSnapshot) => {
      try {
        listener(snapshot);
      } catch (error) {
        this.log.error({ err: error, deviceId }, 'Subscriber threw');
      }
    };
    const ended = () => {
      this.emitter.removeListener(event, guarded);
      try {
        onEnd?.();
      } catch (error) {
        this.log.error({ err: error, deviceId }, 'Subscriber end handler threw');
      }
    };

    this.emitter.on(event, guarded);
    this.emitter.once(endEvent, ended);
    return () => {
      this.emitter.removeListener(event, guarded);
      this.emitter.removeListener(endEvent, ended);
    };
  }

  async setMode(deviceId: string, mode: AcMode): Promise<void> {
    await this.sendCommand(deviceId, mode, undefined);
  }

  async setFanSpeed(deviceId: string, fanSpeed: FanSpeed): Promise<void> {
    await this.sendCommand(deviceId, undefined, fanSpeed);
  }

  async turnOn(deviceId: string): Promise<void> {
    await this.sendCommand(deviceId, 'cool', undefined);
  }

  async turnOff(deviceId: string): Promise<void> {
    await this.sendCommand(deviceId, 'off', undefined);
  }

  /**
   * The protocol has no setpoint write. Always rejects.
   */
  async setTemperature(deviceId: string, temperature: number): Promise<never> {
    throw new UnsupportedOperationError(
      `Setting the target temperature (${temperature}°C on ${deviceId}) is not supported by the BGH UDP protocol`
    );
  }

  /**
   * Host-facing command entry point. Transport failures and setpoint writes
   * come back as results; invalid modes and unknown devices throw.
   */
  async issueCommand(deviceId: string, request: CommandRequest): Promise<CommandResult> {
    if (request.temperature !== undefined) {
      return { status: 'unsupported', deviceId, reason: 'Setting the target temperature is not supported' };
    }

    try {
      const sent = await this.sendCommand(deviceId, request.mode, request.fanSpeed);
      return { status: 'accepted', deviceId, ...sent };
    } catch (error) {
      if (error instanceof TransportError) {
        return { status: 'transport-error', deviceId, reason: error.message, code: error.code };
      }
      throw error;
    }
  }

  private async sendCommand(
    deviceId: string,
    mode: AcMode | undefined,
    fanSpeed: FanSpeed | undefined
  ): Promise<{ mode: AcMode; fanSpeed: FanSpeed }> {
    const device = this.requireDevice(deviceId);
    const resolvedMode = mode ?? this.currentMode(device);
    const resolvedFan = fanSpeed ?? this.currentFan(device);
    const frame = this.encodeFor(device, resolvedMode, resolvedFan);

    this.log.info({ deviceId, mode: resolvedMode, fanSpeed: resolvedFan }, 'Sending command');

    await withRetry(
      () => this.transport.send(frame, device.host, this.sendPort),
      { maxRetries: this.sendRetries, operationName: `send command to ${deviceId}` }
    );

    device.setPendingCommand({ mode: resolvedMode, fanSpeed: resolvedFan, issuedAt: this.now(), attempts: 1 });
    this.scheduleEcho(device);
    return { mode: resolvedMode, fanSpeed: resolvedFan };
  }

  private currentMode(device: RegisteredDevice): AcMode {
    const reported = device.state?.mode;
    return device.pendingCommand?.mode ?? (reported && reported !== 'unknown' ? reported : DEFAULT_MODE);
  }

  private currentFan(device: RegisteredDevice): FanSpeed {
    const reported = device.state?.fanSpeed;
    return device.pendingCommand?.fanSpeed ?? (reported && reported !== 'unknown' ? reported : DEFAULT_FAN);
  }

  private encodeFor(device: RegisteredDevice, mode: AcMode, fanSpeed: FanSpeed): Buffer {
    return encodeCommand(mode, fanSpeed, device.macAddress ? macToBuffer(device.macAddress) : undefined);
  }

  /**
   * Units broadcast after applying a command, but not always; ask once more.
   */
  private scheduleEcho(device: RegisteredDevice): void {
    if (this.commandEchoDelayMs <= 0 || !this.running) return;

    const timer = setTimeout(() => {
      this.echoTimers.delete(timer);
      if (device.isRemoved || !this.running) return;
      this.requestStatus(device).catch(error => {
        this.log.warn({ err: error, deviceId: device.deviceId }, 'Follow-up status request failed');
      });
    }, this.commandEchoDelayMs);

    this.echoTimers.add(timer);
  }

  private async requestStatus(device: RegisteredDevice): Promise<void> {
    await this.transport.send(encodeStatusRequest(), device.host, this.sendPort);
    this.log.debug({ deviceId: device.deviceId }, 'Status request sent');
  }

  private requireDevice(deviceId: string): RegisteredDevice {
    const device = this.registry.get(deviceId);
    if (!device) {
      throw new UnknownDeviceError(deviceId);
    }
    return device;
  }

  getStalenessMs(): number {
    return this.stalenessMs;
  }
}
