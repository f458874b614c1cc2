/**
 * Device route handlers, driven directly against a coordinator whose
 * transport records sends instead of touching the network.
 */

import { Request, Response } from 'express';
import { createDeviceHandlers, serializeSnapshot } from './devices';
import { Coordinator } from '@/coordinator/Coordinator';
import { DeviceRegistry } from '@/registry/DeviceRegistry';
import { TransportError } from '@/types/errors';
import { buildStatusFrame } from '@/testing/frames';
import { StubTransport, flush } from '@/testing/stubTransport';

jest.mock('node-cron', () => ({
  schedule: jest.fn(() => ({
    stop: jest.fn(),
  })),
}));

const HOST = '192.168.1.50';
const NOW = Date.UTC(2024, 6, 1, 12, 0, 0);

describe('Device Routes', () => {
  let transport: StubTransport;
  let coordinator: Coordinator;
  let handlers: ReturnType<typeof createDeviceHandlers>;

  // Helper to create mock request/response
  const createMockReqRes = (params: Record<string, string> = {}, body: unknown = {}) => {
    const on = jest.fn();
    const req = {
      params,
      body,
      on,
    } as unknown as Request;

    const res = {
      status: jest.fn().mockReturnThis(),
      json: jest.fn().mockReturnThis(),
      end: jest.fn().mockReturnThis(),
      writeHead: jest.fn().mockReturnThis(),
      write: jest.fn().mockReturnValue(true),
    };

    return { req, res, response: res as unknown as Response, on };
  };

  const broadcastCoolLow = async () => {
    transport.stream.push({
      address: HOST,
      port: 20910,
      payload: buildStatusFrame({ modeCode: 1, fanCode: 1, ambientCentidegrees: 2313, setpointCentidegrees: 1808 }),
      receivedAt: NOW,
    });
    await flush();
  };

  const livingJson = {
    id: 'living',
    name: 'Living room',
    host: HOST,
    macAddress: 'ac:cf:23:aa:31:90',
    available: true,
    state: {
      mode: 'cool',
      modeCode: 1,
      fanSpeed: 'low',
      fanCode: 1,
      isOn: true,
      currentTemperature: 23.13,
      targetTemperature: 18.08,
      lastUpdated: '2024-07-01T12:00:00.000Z',
    },
    pendingCommand: null,
  };

  beforeEach(async () => {
    jest.clearAllMocks();
    transport = new StubTransport();
    coordinator = new Coordinator(transport, new DeviceRegistry(), { commandEchoDelayMs: 0, now: () => NOW });
    coordinator.register({ deviceId: 'living', host: HOST, name: 'Living room' });
    await coordinator.start();
    handlers = createDeviceHandlers(coordinator);
  });

  afterEach(async () => {
    await coordinator.stop();
  });

  describe('GET /api/devices', () => {
    it('lists every device with temperatures in °C', async () => {
      await broadcastCoolLow();
      const { req, res, response } = createMockReqRes();

      handlers.list(req, response);

      expect(res.json).toHaveBeenCalledWith([livingJson]);
    });
  });

  describe('GET /api/devices/:deviceId', () => {
    it('returns one device', async () => {
      await broadcastCoolLow();
      const { req, res, response } = createMockReqRes({ deviceId: 'living' });

      handlers.get(req, response);

      expect(res.json).toHaveBeenCalledWith(livingJson);
    });

    it('returns null state before the first broadcast', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' });

      handlers.get(req, response);

      expect(res.json).toHaveBeenCalledWith({
        id: 'living',
        name: 'Living room',
        host: HOST,
        macAddress: null,
        available: false,
        state: null,
        pendingCommand: null,
      });
    });

    it('returns 404 for an unknown device', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'ghost' });

      handlers.get(req, response);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: 'Unknown device: ghost' });
    });
  });

  describe('POST /api/devices', () => {
    it('registers a device', () => {
      const { req, res, response } = createMockReqRes({}, { id: 'bedroom', host: '192.168.1.51' });

      handlers.register(req, response);

      expect(res.status).toHaveBeenCalledWith(201);
      expect(res.json).toHaveBeenCalledWith({
        id: 'bedroom',
        name: 'bedroom',
        host: '192.168.1.51',
        macAddress: null,
        available: false,
        state: null,
        pendingCommand: null,
      });
      expect(coordinator.getState('bedroom')).toBeDefined();
    });

    it('rejects a body without a host', () => {
      const { req, res, response } = createMockReqRes({}, { id: 'bedroom' });

      handlers.register(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'host: Required' });
    });

    it('rejects an invalid host', () => {
      const { req, res, response } = createMockReqRes({}, { id: 'bedroom', host: '127.0.0.1' });

      handlers.register(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'IP address 127.0.0.1 is loopback (127.x.x.x)' });
    });

    it('rejects a host that belongs to another device', () => {
      const { req, res, response } = createMockReqRes({}, { id: 'bedroom', host: HOST });

      handlers.register(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'Host 192.168.1.50 is already registered to device living' });
    });
  });

  describe('DELETE /api/devices/:deviceId', () => {
    it('removes the device', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' });

      handlers.unregister(req, response);

      expect(res.status).toHaveBeenCalledWith(204);
      expect(res.end).toHaveBeenCalled();
      expect(coordinator.getState('living')).toBeUndefined();
    });

    it('returns 404 for an unknown device', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'ghost' });

      handlers.unregister(req, response);

      expect(res.status).toHaveBeenCalledWith(404);
    });
  });

  describe('POST /api/devices/:deviceId/command', () => {
    it('sends the command and answers 202', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { mode: 'heat' });

      await handlers.command(req, response);

      expect(res.status).toHaveBeenCalledWith(202);
      expect(res.json).toHaveBeenCalledWith({ status: 'accepted', deviceId: 'living', mode: 'heat', fanSpeed: 'low' });
      expect(transport.lastSentHex()).toBe('00000000000000ffffffffffff' + 'f6000161' + '0201' + '000080');
    });

    it('lists the valid values when the mode is unknown', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { mode: 'turbo' });

      await handlers.command(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({
        error: 'mode: Unsupported mode',
        modes: ['off', 'cool', 'heat', 'dry', 'fan_only', 'auto'],
        fanSpeeds: ['low', 'medium', 'high'],
      });
      expect(transport.send).toHaveBeenCalledTimes(1); // start-up poll only
    });

    it('requires a mode or a fan speed', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, {});

      await handlers.command(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith(expect.objectContaining({ error: 'mode or fanSpeed is required' }));
    });

    it('returns 404 for an unknown device', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'ghost' }, { fanSpeed: 'high' });

      await handlers.command(req, response);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.json).toHaveBeenCalledWith({ error: 'Unknown device: ghost' });
    });

    it('returns 502 when the datagram cannot be sent', async () => {
      transport.send.mockRejectedValueOnce(new TransportError('Failed to send 22 bytes to 192.168.1.50:20910: permission denied', 'EACCES'));
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { fanSpeed: 'high' });

      await handlers.command(req, response);

      expect(res.status).toHaveBeenCalledWith(502);
      expect(res.json).toHaveBeenCalledWith({
        status: 'transport-error',
        deviceId: 'living',
        reason: 'Failed to send 22 bytes to 192.168.1.50:20910: permission denied',
        code: 'EACCES',
      });
    });
  });

  describe('POST /api/devices/:deviceId/power', () => {
    it('turns the unit on in cool mode', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { on: true });

      await handlers.power(req, response);

      expect(res.status).toHaveBeenCalledWith(202);
      expect(res.json).toHaveBeenCalledWith({ status: 'accepted', deviceId: 'living', on: true });
      expect(transport.lastSentHex()).toBe('00000000000000ffffffffffff' + 'f6000161' + '0101' + '000080');
    });

    it('turns the unit off', async () => {
      const { req, response } = createMockReqRes({ deviceId: 'living' }, { on: false });

      await handlers.power(req, response);

      expect(transport.lastSentHex()).toBe('00000000000000ffffffffffff' + 'f6000161' + '0001' + '000080');
    });

    it('requires a boolean', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { on: 'yes' });

      await handlers.power(req, response);

      expect(res.status).toHaveBeenCalledWith(400);
      expect(res.json).toHaveBeenCalledWith({ error: 'on: Expected boolean, received string' });
    });
  });

  describe('PUT /api/devices/:deviceId/temperature', () => {
    it('answers 501', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' }, { temperature: 24 });

      await handlers.setTemperature(req, response);

      expect(res.status).toHaveBeenCalledWith(501);
      expect(res.json).toHaveBeenCalledWith({
        error: 'Setting the target temperature (24°C on living) is not supported by the BGH UDP protocol',
      });
      expect(transport.send).toHaveBeenCalledTimes(1);
    });
  });

  describe('GET /api/devices/:deviceId/events', () => {
    it('streams the current state and every change until the client leaves', async () => {
      const { req, res, response, on } = createMockReqRes({ deviceId: 'living' });

      handlers.events(req, response);
      await broadcastCoolLow();

      expect(res.writeHead).toHaveBeenCalledWith(200, {
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
      });
      expect(res.write).toHaveBeenCalledTimes(2);
      expect(res.write).toHaveBeenLastCalledWith(`event: state\ndata: ${JSON.stringify(livingJson)}\n\n`);

      expect(on).toHaveBeenCalledWith('close', expect.any(Function));
      const onClose: () => void = on.mock.calls[0][1];
      onClose();
      await broadcastCoolLow();

      expect(res.write).toHaveBeenCalledTimes(2);
    });

    it('ends the stream when the device is unregistered', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' });
      handlers.events(req, response);

      coordinator.unregister('living');

      expect(res.end).toHaveBeenCalledTimes(1);
    });

    it('ends the stream when the bridge stops', async () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'living' });
      handlers.events(req, response);

      await coordinator.stop();

      expect(res.end).toHaveBeenCalledTimes(1);
    });

    it('returns 404 for an unknown device', () => {
      const { req, res, response } = createMockReqRes({ deviceId: 'ghost' });

      handlers.events(req, response);

      expect(res.status).toHaveBeenCalledWith(404);
      expect(res.writeHead).not.toHaveBeenCalled();
    });
  });

  describe('serializeSnapshot', () => {
    it('reports an off unit as not on', () => {
      const json = serializeSnapshot({
        deviceId: 'living',
        name: 'Living room',
        host: HOST,
        macAddress: null,
        available: true,
        state: {
          mode: 'off',
          modeCode: 0,
          fanSpeed: 'medium',
          fanCode: 2,
          ambientTemperatureCentidegrees: 2000,
          setpointTemperatureCentidegrees: 2450,
          lastUpdated: NOW,
        },
        pendingCommand: { mode: 'cool', fanSpeed: 'high', issuedAt: NOW, attempts: 2 },
      });

      expect(json.state).toEqual({
        mode: 'off',
        modeCode: 0,
        fanSpeed: 'medium',
        fanCode: 2,
        isOn: false,
        currentTemperature: 20,
        targetTemperature: 24.5,
        lastUpdated: '2024-07-01T12:00:00.000Z',
      });
      expect(json.pendingCommand).toEqual({ mode: 'cool', fanSpeed: 'high', attempts: 2, issuedAt: '2024-07-01T12:00:00.000Z' });
    });
  });
});
