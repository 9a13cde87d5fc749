import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { WebSocketServer, type WebSocket } from 'ws';
import { createSilentLogger, type ConnectionConfig } from '@broker-daemon/shared';
import { WsGatewayConnection } from './ws-gateway-connection.js';
import { HelloFrameSchema } from './protocol.js';

type GatewayBehaviour = 'welcome' | 'refuse' | 'silent';

describe('WsGatewayConnection', () => {
  let server: WebSocketServer;
  let sockets: WebSocket[];
  let hellos: unknown[];
  let behaviour: GatewayBehaviour;
  let options: ConnectionConfig;
  let connection: WsGatewayConnection;

  beforeEach(async () => {
    sockets = [];
    hellos = [];
    behaviour = 'welcome';

    server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
    server.on('connection', (socket) => {
      sockets.push(socket);
      socket.on('message', (data) => {
        const frame: unknown = JSON.parse(data.toString());
        if (!HelloFrameSchema.safeParse(frame).success) return;
        hellos.push(frame);
        if (behaviour === 'welcome') {
          socket.send(JSON.stringify({ type: 'welcome', serverVersion: 'test' }));
        } else if (behaviour === 'refuse') {
          socket.send(JSON.stringify({ type: 'error', message: 'client id in use' }));
        }
      });
    });
    await new Promise<void>((resolve) => server.once('listening', () => resolve()));

    const address = server.address();
    if (typeof address === 'string') throw new Error('expected a TCP address');

    options = {
      host: '127.0.0.1',
      port: address.port,
      clientId: 7,
      timeout: 1,
      readonly: true,
      account: 'DU123',
    };
    connection = new WsGatewayConnection({ logger: createSilentLogger() });
  });

  afterEach(async () => {
    await connection.disconnect();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  /** Wait until the client has seen everything sent so far */
  const settle = () => new Promise((resolve) => setTimeout(resolve, 50));

  describe('Connection', () => {
    it('should complete the handshake with the client identity', async () => {
      await connection.connect(options);

      expect(connection.isConnected()).toBe(true);
      expect(hellos).toEqual([{ type: 'hello', clientId: 7, readonly: true, account: 'DU123' }]);
    });

    it('should fire connectedEvent once the gateway welcomes the client', async () => {
      const listener = vi.fn();
      connection.getEvent('connectedEvent')?.connect(listener);

      await connection.connect(options);

      expect(listener).toHaveBeenCalledTimes(1);
    });

    it('should reject when the gateway refuses the client', async () => {
      behaviour = 'refuse';

      await expect(connection.connect(options)).rejects.toThrow('Gateway refused connection: client id in use');
      expect(connection.isConnected()).toBe(false);
    });

    it('should reject when no welcome arrives in time', async () => {
      behaviour = 'silent';

      await expect(connection.connect({ ...options, timeout: 0.1 })).rejects.toThrow(
        `Timed out after 0.1s waiting for gateway at ws://127.0.0.1:${options.port}`
      );
    });

    it('should reject when nothing listens on the port', async () => {
      const closed = { ...options };
      await new Promise<void>((resolve) => server.close(() => resolve()));
      server = new WebSocketServer({ noServer: true });

      await expect(connection.connect(closed)).rejects.toThrow();
      expect(connection.isConnected()).toBe(false);
    });
  });

  describe('Events', () => {
    it('should expose the default events by name', () => {
      expect(connection.getEvent('barUpdateEvent')?.name).toBe('barUpdateEvent');
      expect(connection.getEvent('noSuchEvent')).toBeUndefined();
    });

    it('should expose only configured events', () => {
      const custom = new WsGatewayConnection({ logger: createSilentLogger(), eventNames: ['tickEvent'] });

      expect(custom.eventNames()).toEqual(['tickEvent']);
      expect(custom.getEvent('barUpdateEvent')).toBeUndefined();
    });

    it('should emit event frames with their arguments', async () => {
      const listener = vi.fn();
      connection.getEvent('orderStatusEvent')?.connect(listener);
      await connection.connect(options);

      sockets[0]?.send(JSON.stringify({ type: 'event', event: 'orderStatusEvent', args: [{ orderId: 1 }, 'Filled'] }));
      await settle();

      expect(listener).toHaveBeenCalledWith({ orderId: 1 }, 'Filled');
    });

    it('should drop frames for unknown events and malformed frames', async () => {
      const listener = vi.fn();
      connection.getEvent('errorEvent')?.connect(listener);
      await connection.connect(options);

      sockets[0]?.send(JSON.stringify({ type: 'event', event: 'noSuchEvent', args: [] }));
      sockets[0]?.send('not json');
      await settle();

      expect(connection.isConnected()).toBe(true);
      expect(listener).not.toHaveBeenCalled();
    });

    it('should route gateway errors to errorEvent', async () => {
      const listener = vi.fn();
      connection.getEvent('errorEvent')?.connect(listener);
      await connection.connect(options);

      sockets[0]?.send(JSON.stringify({ type: 'error', code: '1100', message: 'connectivity lost' }));
      await settle();

      expect(listener).toHaveBeenCalledWith('1100', 'connectivity lost');
    });
  });

  describe('Run loop', () => {
    it('should refuse to run when not connected', async () => {
      await expect(connection.run()).rejects.toThrow('Not connected');
    });

    it('should return from run when the gateway closes the session', async () => {
      const disconnected = vi.fn();
      connection.getEvent('disconnectedEvent')?.connect(disconnected);
      await connection.connect(options);

      const running = connection.run();
      sockets[0]?.close();
      await running;

      expect(connection.isConnected()).toBe(false);
      expect(disconnected).toHaveBeenCalledTimes(1);
    });

    it('should return from run after disconnect', async () => {
      await connection.connect(options);

      const running = connection.run();
      await connection.disconnect();
      await running;

      expect(connection.isConnected()).toBe(false);
    });
  });
});
