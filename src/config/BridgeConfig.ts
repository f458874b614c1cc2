import { promises as fs } from 'fs';
import { Logger } from 'pino';
import { z } from 'zod';
import { DeviceRegistration } from '@/types';
import { isValidDeviceHost } from '@/utils/deviceUtils';
import { isFixedCronInterval } from '@/utils/cronInterval';

/**
 * Bridge configuration structure
 */
export interface BridgeConfig {
  network: {
    sendPort: number;
    listenPort: number;
    bindAddress: string;
    sendRetries: number;
  };
  polling: {
    intervalSeconds: number;
    stalenessSeconds: number;
    commandEchoDelayMs: number;
    maxReassertAttempts: number;
  };
  limits: {
    broadcastsPerSecond: number;
  };
  web: {
    enabled: boolean;
    port: number;
  };
  devices: DeviceRegistration[];
}

/**
 * Default configuration
 */
const DEFAULT_CONFIG: BridgeConfig = {
  network: {
    sendPort: 20910,
    listenPort: 20911,
    bindAddress: '0.0.0.0',
    sendRetries: 2,
  },
  polling: {
    intervalSeconds: 10,
    stalenessSeconds: 30, // 3 missed polls
    commandEchoDelayMs: 500,
    maxReassertAttempts: 3,
  },
  limits: {
    broadcastsPerSecond: 10,
  },
  web: {
    enabled: true,
    port: 3000,
  },
  devices: [],
};

/**
 * Shape accepted from the JSON config file. Every section is optional and
 * merged over the defaults.
 */
const FileConfigSchema = z.object({
  network: z.object({
    sendPort: z.number().int(),
    listenPort: z.number().int(),
    bindAddress: z.string(),
    sendRetries: z.number().int(),
  }).partial().optional(),
  polling: z.object({
    intervalSeconds: z.number().int(),
    stalenessSeconds: z.number(),
    commandEchoDelayMs: z.number().int(),
    maxReassertAttempts: z.number().int(),
  }).partial().optional(),
  limits: z.object({
    broadcastsPerSecond: z.number(),
  }).partial().optional(),
  web: z.object({
    enabled: z.boolean(),
    port: z.number().int(),
  }).partial().optional(),
  devices: z.array(z.object({
    id: z.string(),
    host: z.string(),
    name: z.string().optional(),
  })).optional(),
});

export type FileConfig = z.infer<typeof FileConfigSchema>;

const isPort = (value: number): boolean => Number.isInteger(value) && value > 0 && value <= 65535;

/**
 * Parses `BGH_DEVICES`, a comma separated list of `id=host` or
 * `id=host=Display Name` entries.
 */
export function parseDeviceList(value: string): DeviceRegistration[] {
  return value
    .split(',')
    .map(entry => entry.trim())
    .filter(Boolean)
    .map(entry => {
      const [deviceId = '', host = '', ...nameParts] = entry.split('=').map(part => part.trim());
      const name = nameParts.join('=');
      return name ? { deviceId, host, name } : { deviceId, host };
    });
}

/**
 * Configuration loader
 */
export class ConfigLoader {
  private readonly logger: Logger;
  private config: BridgeConfig;

  constructor(logger: Logger) {
    this.logger = logger.child({ component: 'ConfigLoader' });
    this.config = structuredClone(DEFAULT_CONFIG);
  }

  /**
   * Load configuration from file and environment variables
   */
  async load(configPath?: string): Promise<BridgeConfig> {
    if (configPath) {
      await this.loadFromFile(configPath);
    }

    this.loadFromEnv();
    this.validate();

    return this.config;
  }

  /**
   * Load configuration from JSON file
   */
  private async loadFromFile(configPath: string): Promise<void> {
    let data: string;
    try {
      data = await fs.readFile(configPath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        this.logger.warn({ configPath }, 'Config file not found, using defaults');
        return;
      }
      throw error;
    }

    let raw: unknown;
    try {
      raw = JSON.parse(data);
    } catch (error) {
      this.logger.error({ err: error, configPath }, 'Invalid JSON in config file');
      throw new Error(`Invalid JSON in config file: ${configPath}`);
    }

    const result = FileConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      this.logger.error({ issues, configPath }, 'Config file does not match the expected shape');
      throw new Error(`Invalid config file ${configPath}:\n${issues.join('\n')}`);
    }

    this.config = this.mergeConfig(result.data);
    this.logger.info({ configPath }, 'Configuration loaded from file');
  }

  /**
   * Load/override configuration from environment variables
   */
  private loadFromEnv(): void {
    const env = process.env;

    // Network
    if (env.UDP_SEND_PORT) {
      this.config.network.sendPort = parseInt(env.UDP_SEND_PORT, 10);
    }
    if (env.UDP_LISTEN_PORT) {
      this.config.network.listenPort = parseInt(env.UDP_LISTEN_PORT, 10);
    }
    if (env.UDP_BIND_ADDRESS) {
      this.config.network.bindAddress = env.UDP_BIND_ADDRESS;
    }

    // Polling
    if (env.POLL_INTERVAL) {
      this.config.polling.intervalSeconds = parseInt(env.POLL_INTERVAL, 10);
    }
    if (env.STALENESS_SECONDS) {
      this.config.polling.stalenessSeconds = parseInt(env.STALENESS_SECONDS, 10);
    }
    if (env.BROADCAST_RATE_LIMIT) {
      this.config.limits.broadcastsPerSecond = Number(env.BROADCAST_RATE_LIMIT);
    }

    // Web server
    if (env.WEB_PORT) {
      this.config.web.port = parseInt(env.WEB_PORT, 10);
    }
    if (env.WEB_ENABLED) {
      this.config.web.enabled = /^true$/i.test(env.WEB_ENABLED);
    }

    // Devices
    if (env.BGH_DEVICES) {
      this.config.devices = parseDeviceList(env.BGH_DEVICES);
    }

    this.logger.debug('Configuration overrides applied from environment variables');
  }

  /**
   * Validate configuration, reporting every problem at once
   */
  private validate(): void {
    const errors: string[] = [];
    const { network, polling, limits, web, devices } = this.config;

    if (!isPort(network.sendPort)) {
      errors.push(`network.sendPort must be a port number, got ${network.sendPort}`);
    }
    if (!isPort(network.listenPort)) {
      errors.push(`network.listenPort must be a port number, got ${network.listenPort}`);
    }
    if (!Number.isInteger(network.sendRetries) || network.sendRetries < 0) {
      errors.push('network.sendRetries must be a non-negative integer');
    }
    if (!Number.isInteger(polling.intervalSeconds) || polling.intervalSeconds < 1) {
      errors.push('polling.intervalSeconds must be a positive integer');
    } else if (!isFixedCronInterval(polling.intervalSeconds)) {
      errors.push('polling.intervalSeconds must divide a minute, or be whole minutes dividing an hour');
    }
    if (!(polling.stalenessSeconds > polling.intervalSeconds)) {
      errors.push('polling.stalenessSeconds must be greater than polling.intervalSeconds');
    }
    if (!Number.isInteger(polling.maxReassertAttempts) || polling.maxReassertAttempts < 1) {
      errors.push('polling.maxReassertAttempts must be a positive integer');
    }
    if (!(limits.broadcastsPerSecond > 0)) {
      errors.push('limits.broadcastsPerSecond must be positive');
    }
    if (web.enabled && !isPort(web.port)) {
      errors.push(`web.port must be a port number, got ${web.port}`);
    }

    const ids = new Set<string>();
    const hosts = new Set<string>();
    devices.forEach((device, index) => {
      if (!device.deviceId) {
        errors.push(`devices[${index}] is missing an id`);
      } else if (ids.has(device.deviceId)) {
        errors.push(`devices[${index}] duplicates id ${device.deviceId}`);
      }
      if (!isValidDeviceHost(device.host)) {
        errors.push(`devices[${index}] has an invalid host: ${device.host}`);
      } else if (hosts.has(device.host)) {
        errors.push(`devices[${index}] duplicates host ${device.host}`);
      }
      ids.add(device.deviceId);
      hosts.add(device.host);
    });

    if (errors.length > 0) {
      this.logger.error({ errors }, 'Configuration validation failed');
      throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
    }
  }

  private mergeConfig(file: FileConfig): BridgeConfig {
    const base = this.config;
    return {
      network: { ...base.network, ...file.network },
      polling: { ...base.polling, ...file.polling },
      limits: { ...base.limits, ...file.limits },
      web: { ...base.web, ...file.web },
      devices: file.devices
        ? file.devices.map(({ id, host, name }) => (name ? { deviceId: id, host, name } : { deviceId: id, host }))
        : base.devices,
    };
  }

  /**
   * Get current configuration
   */
  getConfig(): BridgeConfig {
    return this.config;
  }
}
