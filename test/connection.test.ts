import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { DeviceConnection, ReconnectBackoff } from '../src/connection.js';
import { ConnectionError } from '../src/errors.js';
import { buildDiscoveryRequest } from '../src/protocol.js';
import type { ConnectionState } from '../src/types.js';
import { FakeDevice, closedPort, frame } from './helpers/fakeDevice.js';
import { TestLogger } from './helpers/logger.js';

const ROOM = { power: 3, operation: 2, setpoint: 43, ambient: 122, humidity: 115 };

describe('DeviceConnection', () => {
  let device: FakeDevice;
  let connection: DeviceConnection;
  let states: ConnectionState[];

  beforeEach(async () => {
    device = new FakeDevice({ 0: ROOM });
    await device.listen();
    connection = new DeviceConnection({ host: '127.0.0.1', port: device.port }, new TestLogger(), {
      connectTimeout: 500,
      readTimeout: 200,
    });
    states = [];
    connection.setOnStateChange((state) => states.push(state));
  });

  afterEach(async () => {
    connection.close();
    await device.close();
  });

  it('connects and reports state changes', async () => {
    await connection.connect();
    assert.equal(connection.isConnected(), true);
    assert.deepEqual(states, ['connecting', 'connected']);
  });

  it('sends frames and receives the echo', async () => {
    await connection.connect();
    await connection.send(buildDiscoveryRequest());

    const chunks: Buffer[] = [];
    let total = 0;
    while (total < 14) {
      const chunk = await connection.receive();
      chunks.push(chunk);
      total += chunk.length;
    }
    assert.deepEqual(Buffer.concat(chunks), Buffer.concat([buildDiscoveryRequest(), frame('answer', 0x32, 0x00)]));
  });

  it('returns null from tryReceive when the device stays quiet', async () => {
    await connection.connect();
    assert.equal(await connection.tryReceive(30), null);
    assert.equal(connection.isConnected(), true);
  });

  it('fails the connection when receive times out', async () => {
    await connection.connect();
    await assert.rejects(connection.receive(30), (err: unknown) => {
      assert.ok(err instanceof ConnectionError);
      assert.equal(err.kind, 'timeout');
      return true;
    });
    assert.equal(connection.getState(), 'failed');
    assert.equal(connection.isConnected(), false);
  });

  it('fails when the device closes the socket', async () => {
    await connection.connect();
    const pending = connection.receive(1000);
    device.dropConnections();
    await assert.rejects(pending, ConnectionError);
    assert.equal(connection.getState(), 'failed');
  });

  it('refuses to send while disconnected', async () => {
    await assert.rejects(connection.send(buildDiscoveryRequest()), ConnectionError);
  });

  it('moves to disconnected on close', async () => {
    await connection.connect();
    connection.close();
    assert.equal(connection.getState(), 'disconnected');
    assert.deepEqual(states, ['connecting', 'connected', 'disconnected']);
  });

  it('reports an unreachable device', async () => {
    const port = await closedPort();
    const unreachable = new DeviceConnection({ host: '127.0.0.1', port }, new TestLogger(), { connectTimeout: 500 });
    await assert.rejects(unreachable.connect(), (err: unknown) => {
      assert.ok(err instanceof ConnectionError);
      assert.equal(err.kind, 'unreachable');
      return true;
    });
    assert.equal(unreachable.getState(), 'failed');
  });
});

describe('ReconnectBackoff', () => {
  it('doubles the delay up to the cap', () => {
    const backoff = new ReconnectBackoff(1000, 60_000);
    const delays = Array.from({ length: 8 }, () => backoff.next());
    assert.deepEqual(delays, [1000, 2000, 4000, 8000, 16_000, 32_000, 60_000, 60_000]);
  });

  it('keeps the delay after a short-lived connection', () => {
    const backoff = new ReconnectBackoff(1000, 60_000, 10_000);
    backoff.next();
    backoff.next();
    backoff.connectionLost(5000);
    assert.equal(backoff.current, 4000);
  });

  it('resets after a stable connection', () => {
    const backoff = new ReconnectBackoff(1000, 60_000, 10_000);
    backoff.next();
    backoff.next();
    backoff.connectionLost(10_000);
    assert.equal(backoff.current, 1000);
  });
});
