import { Router, Request, Response } from 'express';
import { z } from 'zod';
import { Coordinator } from '@/coordinator/Coordinator';
import { AcMode, DeviceSnapshot, FanSpeed } from '@/types';
import { EncodeError, TransportError, UnknownDeviceError, UnsupportedOperationError, ValidationError } from '@/types/errors';
import { AC_MODES, FAN_SPEEDS, centidegreesToCelsius, isAcMode, isFanSpeed } from '@/protocol/PacketCodec';
import { formatMacAddress } from '@/utils/deviceUtils';
import { logger } from '@/utils/logger';

const RegisterSchema = z.object({
  id: z.string().min(1),
  host: z.string().min(1),
  name: z.string().optional(),
});

const CommandSchema = z.object({
  mode: z.custom<AcMode>(isAcMode, { message: 'Unsupported mode' }).optional(),
  fanSpeed: z.custom<FanSpeed>(isFanSpeed, { message: 'Unsupported fan speed' }).optional(),
}).refine(body => body.mode !== undefined || body.fanSpeed !== undefined, {
  message: 'mode or fanSpeed is required',
});

const PowerSchema = z.object({
  on: z.boolean(),
});

const describeIssues = (error: z.ZodError): string =>
  error.issues.map(issue => (issue.path.length ? `${issue.path.join('.')}: ${issue.message}` : issue.message)).join('; ');

/**
 * JSON shape of a device. Temperatures are converted to °C here and only here.
 */
export function serializeSnapshot(snapshot: DeviceSnapshot) {
  const { state, pendingCommand } = snapshot;
  return {
    id: snapshot.deviceId,
    name: snapshot.name,
    host: snapshot.host,
    macAddress: snapshot.macAddress ? formatMacAddress(snapshot.macAddress) : null,
    available: snapshot.available,
    state: state ? {
      mode: state.mode,
      modeCode: state.modeCode,
      fanSpeed: state.fanSpeed,
      fanCode: state.fanCode,
      isOn: state.mode !== 'off',
      currentTemperature: centidegreesToCelsius(state.ambientTemperatureCentidegrees),
      targetTemperature: centidegreesToCelsius(state.setpointTemperatureCentidegrees),
      lastUpdated: new Date(state.lastUpdated).toISOString(),
    } : null,
    pendingCommand: pendingCommand ? {
      mode: pendingCommand.mode,
      fanSpeed: pendingCommand.fanSpeed,
      attempts: pendingCommand.attempts,
      issuedAt: new Date(pendingCommand.issuedAt).toISOString(),
    } : null,
  };
}

/**
 * Route handlers, kept separate from the router so they can be driven
 * directly.
 */
export function createDeviceHandlers(coordinator: Coordinator) {
  const list = (req: Request, res: Response) => {
    res.json(coordinator.getStates().map(serializeSnapshot));
  };

  const get = (req: Request, res: Response) => {
    const snapshot = coordinator.getState(req.params.deviceId);
    if (!snapshot) {
      res.status(404).json({ error: `Unknown device: ${req.params.deviceId}` });
      return;
    }
    res.json(serializeSnapshot(snapshot));
  };

  const register = (req: Request, res: Response) => {
    const parsed = RegisterSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      const { id, host, name } = parsed.data;
      const snapshot = coordinator.register(name ? { deviceId: id, host, name } : { deviceId: id, host });
      res.status(201).json(serializeSnapshot(snapshot));
    } catch (error) {
      if (error instanceof ValidationError) {
        res.status(400).json({ error: error.message });
        return;
      }
      logger.error({ err: error }, 'Error registering device');
      res.status(500).json({ error: 'Failed to register device' });
    }
  };

  const unregister = (req: Request, res: Response) => {
    if (!coordinator.unregister(req.params.deviceId)) {
      res.status(404).json({ error: `Unknown device: ${req.params.deviceId}` });
      return;
    }
    res.status(204).end();
  };

  const command = async (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const parsed = CommandSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: describeIssues(parsed.error),
        modes: AC_MODES,
        fanSpeeds: FAN_SPEEDS,
      });
      return;
    }

    try {
      const result = await coordinator.issueCommand(deviceId, parsed.data);
      if (result.status === 'accepted') {
        res.status(202).json(result);
      } else if (result.status === 'unsupported') {
        res.status(501).json(result);
      } else {
        res.status(502).json(result);
      }
    } catch (error) {
      respondWithError(res, error, deviceId);
    }
  };

  const power = async (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const parsed = PowerSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: describeIssues(parsed.error) });
      return;
    }

    try {
      if (parsed.data.on) {
        await coordinator.turnOn(deviceId);
      } else {
        await coordinator.turnOff(deviceId);
      }
      res.status(202).json({ status: 'accepted', deviceId, on: parsed.data.on });
    } catch (error) {
      respondWithError(res, error, deviceId);
    }
  };

  const setTemperature = async (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const temperature = Number(req.body?.temperature);

    try {
      await coordinator.setTemperature(deviceId, temperature);
    } catch (error) {
      respondWithError(res, error, deviceId);
    }
  };

  const events = (req: Request, res: Response) => {
    const { deviceId } = req.params;
    const snapshot = coordinator.getState(deviceId);
    if (!snapshot) {
      res.status(404).json({ error: `Unknown device: ${deviceId}` });
      return;
    }

    res.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
    });

    const send = (next: DeviceSnapshot) => {
      res.write(`event: state\ndata: ${JSON.stringify(serializeSnapshot(next))}\n\n`);
    };

    send(snapshot);
    const unsubscribe = coordinator.subscribe(deviceId, send, () => {
      logger.debug({ deviceId }, 'State stream ended by the bridge');
      res.end();
    });
    logger.debug({ deviceId }, 'State subscriber connected');

    req.on('close', () => {
      unsubscribe();
      logger.debug({ deviceId }, 'State subscriber disconnected');
    });
  };

  return { list, get, register, unregister, command, power, setTemperature, events };
}

function respondWithError(res: Response, error: unknown, deviceId: string): void {
  if (error instanceof UnknownDeviceError) {
    res.status(404).json({ error: error.message });
  } else if (error instanceof EncodeError || error instanceof ValidationError) {
    res.status(400).json({ error: error.message });
  } else if (error instanceof UnsupportedOperationError) {
    res.status(501).json({ error: error.message });
  } else if (error instanceof TransportError) {
    res.status(502).json({ error: error.message, code: error.code });
  } else {
    logger.error({ err: error, deviceId }, 'Error handling device request');
    res.status(500).json({ error: 'Internal server error' });
  }
}

export function createDevicesRoutes(coordinator: Coordinator): Router {
  const router = Router();
  const handlers = createDeviceHandlers(coordinator);

  router.get('/', handlers.list);
  router.post('/', handlers.register);
  router.get('/:deviceId', handlers.get);
  router.delete('/:deviceId', handlers.unregister);
  router.post('/:deviceId/command', handlers.command);
  router.post('/:deviceId/power', handlers.power);
  router.put('/:deviceId/temperature', handlers.setTemperature);
  router.get('/:deviceId/events', handlers.events);

  return router;
}
