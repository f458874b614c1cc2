import express, { NextFunction, Request, Response } from 'express';
import cors from 'cors';
import { Server } from 'http';
import { Coordinator } from '@/coordinator/Coordinator';
import { createDevicesRoutes } from './routes/devices';
import { logger } from '@/utils/logger';

/**
 * Builds the health payload: listener state and a per-device availability
 * summary.
 */
export function buildHealth(coordinator: Coordinator) {
  const devices = coordinator.getStates();
  const available = devices.filter(device => device.available).length;

  return {
    status: coordinator.isRunning() ? 'ok' : 'stopped',
    timestamp: new Date().toISOString(),
    listener: coordinator.isListening(),
    stalenessSeconds: coordinator.getStalenessMs() / 1000,
    devices: {
      total: devices.length,
      available,
      unavailable: devices.length - available,
    },
  };
}

export class WebServer {
  private app: express.Application;
  private server: Server | null = null;
  private readonly port: number;

  constructor(port: number = 3000) {
    this.port = port;
    this.app = express();
    this.setupMiddleware();
  }

  private setupMiddleware(): void {
    this.app.use(cors());
    this.app.use(express.json());

    this.app.use((req, res, next) => {
      logger.debug({ method: req.method, path: req.path }, 'HTTP request');
      next();
    });
  }

  setupRoutes(coordinator: Coordinator): void {
    this.app.use('/api/devices', createDevicesRoutes(coordinator));

    this.app.get('/api/health', (req, res) => {
      res.json(buildHealth(coordinator));
    });

    this.app.use((req: Request, res: Response) => {
      res.status(404).json({ error: 'Not found' });
    });

    this.app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
      logger.error({ err }, 'Express error');
      if (res.headersSent) {
        next(err);
        return;
      }
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(this.port, '0.0.0.0', () => {
        logger.info({ port: this.port, url: `http://0.0.0.0:${this.port}` }, 'Web server started');
        resolve();
      });

      server.on('error', (error) => {
        logger.error({ err: error }, 'Web server error');
        reject(error);
      });

      this.server = server;
    });
  }

  async stop(): Promise<void> {
    const server = this.server;
    if (server) {
      this.server = null;
      return new Promise((resolve) => {
        // Event streams never finish on their own
        server.closeAllConnections();
        server.close(() => {
          logger.info('Web server stopped');
          resolve();
        });
      });
    }
  }

  getApp(): express.Application {
    return this.app;
  }
}
