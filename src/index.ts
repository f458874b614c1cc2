#!/usr/bin/env node
import dotenv from 'dotenv';
import { Coordinator } from '@/coordinator/Coordinator';
import { DeviceRegistry } from '@/registry/DeviceRegistry';
import { UdpTransport } from '@/transport/UdpTransport';
import { WebServer } from '@/web/server';
import { logger } from '@/utils/logger';
import { ConfigLoader } from '@/config/BridgeConfig';
import { shutdown } from '@/shutdown';

dotenv.config();

async function startup(): Promise<void> {
  logger.info('🚀 Starting BGH UDP bridge...');

  try {
    logger.info('📋 Loading configuration...');
    const configLoader = new ConfigLoader(logger);
    const configPath = process.env.CONFIG_PATH || './config.json';
    const config = await configLoader.load(configPath);

    logger.info({
      devices: config.devices.length,
      listenPort: config.network.listenPort,
      sendPort: config.network.sendPort,
      pollInterval: config.polling.intervalSeconds,
      staleness: config.polling.stalenessSeconds,
    }, 'Configuration loaded');

    const transport = new UdpTransport({ bindAddress: config.network.bindAddress });
    const registry = new DeviceRegistry({ broadcastRateLimit: config.limits.broadcastsPerSecond });
    const coordinator = new Coordinator(transport, registry, {
      pollIntervalSeconds: config.polling.intervalSeconds,
      stalenessSeconds: config.polling.stalenessSeconds,
      commandEchoDelayMs: config.polling.commandEchoDelayMs,
      maxReassertAttempts: config.polling.maxReassertAttempts,
      sendPort: config.network.sendPort,
      listenPort: config.network.listenPort,
      sendRetries: config.network.sendRetries,
    });

    for (const device of config.devices) {
      coordinator.register(device);
    }

    logger.info('📡 Starting broadcast listener and polling...');
    await coordinator.start();

    let webServer: WebServer | null = null;
    if (config.web.enabled) {
      webServer = new WebServer(config.web.port);
      webServer.setupRoutes(coordinator);
      await webServer.start();
    }

    logger.info({ devices: config.devices.map(device => `${device.deviceId}@${device.host}`) }, '✅ BGH UDP bridge is running');

    const gracefulShutdown = async (signal: string) => {
      logger.info({ signal }, '🛑 Received signal, shutting down gracefully...');

      try {
        const clean = await shutdown(coordinator, webServer);

        logger.info({ clean }, '✅ Graceful shutdown complete');
        process.exit(clean ? 0 : 1);
      } catch (error) {
        logger.error({ err: error }, '❌ Error during shutdown');
        process.exit(1);
      }
    };

    process.on('SIGINT', () => void gracefulShutdown('SIGINT'));
    process.on('SIGTERM', () => void gracefulShutdown('SIGTERM'));

  } catch (error) {
    logger.error({ err: error }, '❌ Failed to start BGH UDP bridge');
    process.exit(1);
  }
}

if (require.main === module) {
  startup().catch((error) => {
    logger.error({ err: error }, '❌ Startup error');
    process.exit(1);
  });
}
