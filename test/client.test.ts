import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert/strict';
import { TermowifiClient, resolveClientConfig } from '../src/client.js';
import type { TermowifiClientOptions } from '../src/client.js';
import { ReconnectBackoff } from '../src/connection.js';
import type { BridgeEvent, ConnectionState, RoomState, SubmitResult } from '../src/types.js';
import { FakeDevice, closedPort } from './helpers/fakeDevice.js';
import { TestLogger } from './helpers/logger.js';

// Room 0: powered on, heating, setpoint 21.5, ambient 20.0, humidity 45%.
const HEATING_ROOM = { power: 3, operation: 2, setpoint: 43, ambient: 122, humidity: 115 };

const FAST: TermowifiClientOptions = {
  pollInterval: 200,
  connectTimeout: 500,
  readTimeout: 300,
  settleTime: 20,
};

function waitForEvent(
  client: TermowifiClient,
  predicate: (event: BridgeEvent) => boolean,
  timeoutMs = 3000,
): Promise<BridgeEvent> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      unsubscribe();
      reject(new Error('Timed out waiting for event'));
    }, timeoutMs);
    const unsubscribe = client.onUpdate((event) => {
      if (predicate(event)) {
        clearTimeout(timer);
        unsubscribe();
        resolve(event);
      }
    });
  });
}

function reasonOf(result: SubmitResult) {
  return result.accepted ? undefined : result.reason;
}

function roomUpdate(roomId: string, match: (state: RoomState) => boolean) {
  return (event: BridgeEvent) => event.type === 'room_updated' && event.roomId === roomId && match(event.state);
}

describe('TermowifiClient', () => {
  let device: FakeDevice;
  let log: TestLogger;
  let client: TermowifiClient;

  beforeEach(async () => {
    device = new FakeDevice({ 0: HEATING_ROOM });
    await device.listen();
    log = new TestLogger();
  });

  afterEach(async () => {
    await client.stop();
    await device.close();
  });

  function createClient(options: TermowifiClientOptions = {}) {
    client = new TermowifiClient(log, { host: '127.0.0.1', port: device.port }, { ...FAST, ...options });
    return client;
  }

  it('discovers a room, reports its state and applies a new setpoint', async () => {
    await device.close();
    device = new FakeDevice({ 1: HEATING_ROOM });
    await device.listen();
    createClient();
    const discovered = waitForEvent(client, (event) => event.type === 'discovery_finished');
    const reported = waitForEvent(client, roomUpdate('1', (state) => state.humidity !== undefined));
    client.start();

    assert.deepEqual(await discovered, { type: 'discovery_finished', roomIds: ['1'] });
    await reported;

    const state = client.getRoomState('1');
    assert.equal(state?.targetTemperature, 21.5);
    assert.equal(state?.currentTemperature, 20);
    assert.equal(state?.humidity, 45);
    assert.equal(state?.hvacMode, 'heat');
    assert.equal(state?.available, true);
    assert.equal(client.connectionState, 'connected');

    const updated = waitForEvent(client, roomUpdate('1', (s) => s.targetTemperature === 22));
    assert.deepEqual(client.setTargetTemperature('1', 22), { accepted: true });
    await updated;

    assert.equal(device.received.filter((f) => f === '3B 01 FE 04 06 2C 35').length, 2);
    assert.equal(device.rooms.get(1)?.setpoint, 44);
  });

  it('sends discovery twice on connect', async () => {
    createClient();
    const discovered = waitForEvent(client, (event) => event.type === 'discovery_finished');
    client.start();
    await discovered;
    assert.deepEqual(device.received.slice(0, 2), ['3B 01 FE 04 23 00 26', '3B 01 FE 04 23 00 26']);
  });

  it('keeps the order of commands for one room', async () => {
    createClient();
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    const done = waitForEvent(client, roomUpdate('0', (s) => s.targetTemperature === 23));
    assert.equal(client.setTargetTemperature('0', 22).accepted, true);
    assert.equal(client.setTargetTemperature('0', 23).accepted, true);
    await done;

    const setpoints = device.received.filter((f) => f.startsWith('3B 01 FE 04 02 '));
    assert.deepEqual(setpoints, [
      '3B 01 FE 04 02 2C 31',
      '3B 01 FE 04 02 2C 31',
      '3B 01 FE 04 02 2E 33',
      '3B 01 FE 04 02 2E 33',
    ]);
    assert.equal(client.getRoomState('0')?.targetTemperature, 23);
  });

  it('switches a room off and back to cooling', async () => {
    createClient();
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    const off = waitForEvent(client, roomUpdate('0', (s) => s.hvacMode === 'off'));
    assert.equal(client.setHvacMode('0', 'off').accepted, true);
    await off;
    assert.equal(device.rooms.get(0)?.power, 2);

    const cooling = waitForEvent(client, roomUpdate('0', (s) => s.hvacMode === 'cool'));
    assert.equal(client.setHvacMode('0', 'cool').accepted, true);
    await cooling;
    assert.equal(device.rooms.get(0)?.operation, 3);
  });

  it('rejects commands with a reason', async () => {
    createClient({ queueCapacity: 1 });
    assert.deepEqual(client.requestRefresh('0'), {
      accepted: false,
      reason: 'not_running',
      message: 'Client is not running',
    });

    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    assert.equal(reasonOf(client.setTargetTemperature('3', 20)), 'unknown_room');
    assert.equal(reasonOf(client.setTargetTemperature('0', 14.5)), 'out_of_range');
    assert.equal(reasonOf(client.setTargetTemperature('0', 35.5)), 'out_of_range');
    assert.equal(reasonOf(client.setTargetTemperature('0', Number.NaN)), 'out_of_range');

    assert.equal(client.requestRefresh('0').accepted, true);
    assert.equal(reasonOf(client.requestRefresh('0')), 'queue_full');

    assert.equal(log.messages('warn').filter((m) => m.startsWith('Command rejected')).length, 6);
  });

  it('marks a silent room unavailable and recovers it', async () => {
    createClient({
      pollInterval: 100,
      readTimeout: 100,
      staleAfterPolls: 2,
      backoff: new ReconnectBackoff(20, 40),
    });
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    const unavailable = waitForEvent(client, (event) => event.type === 'room_unavailable');
    device.muted = true;
    const event = await unavailable;
    assert.equal(event.type === 'room_unavailable' && event.state.available, false);
    assert.equal(client.getRoomState('0')?.available, false);

    const recovered = waitForEvent(client, roomUpdate('0', (s) => s.available));
    device.muted = false;
    await recovered;
    assert.equal(client.getRoomState('0')?.available, true);
  });

  it('marks only the silent room unavailable and keeps polling the others', async () => {
    await device.close();
    device = new FakeDevice({ 0: HEATING_ROOM, 1: HEATING_ROOM, 2: HEATING_ROOM });
    await device.listen();
    createClient({ pollInterval: 100, readTimeout: 100, staleAfterPolls: 3 });

    const unavailableRooms: string[] = [];
    const states: ConnectionState[] = [];
    client.onUpdate((event) => {
      if (event.type === 'room_unavailable') unavailableRooms.push(event.roomId);
      if (event.type === 'connection_state') states.push(event.state);
    });

    const reported = waitForEvent(client, roomUpdate('2', () => true));
    client.start();
    await reported;

    const roomOneLost = waitForEvent(client, (event) => event.type === 'room_unavailable' && event.roomId === '1');
    device.rooms.delete(1);
    await roomOneLost;

    const roomTwoChanged = waitForEvent(client, roomUpdate('2', (s) => s.targetTemperature === 25));
    const roomTwo = device.rooms.get(2);
    assert.ok(roomTwo);
    roomTwo.setpoint = 50;
    await roomTwoChanged;

    assert.deepEqual(unavailableRooms, ['1']);
    assert.equal(client.getRoomState('0')?.available, true);
    assert.equal(client.getRoomState('1')?.available, false);
    assert.equal(client.getRoomState('2')?.available, true);
    assert.deepEqual(states, ['connecting', 'connected']);
    assert.equal(device.connections, 1);
  });

  it('reports rooms announced after the discovery answer once the first poll cycle ends', async () => {
    await device.close();
    device = new FakeDevice({ 0: HEATING_ROOM, 1: HEATING_ROOM });
    device.lateAnnouncements = [1];
    await device.listen();
    createClient();
    const discovered = waitForEvent(client, (event) => event.type === 'discovery_finished');
    client.start();

    assert.deepEqual(await discovered, { type: 'discovery_finished', roomIds: ['0', '1'] });
    assert.ok(log.messages('info').includes('Discovered 1 room(s): 0'));
  });

  it('drops the connection on a corrupt frame and reconnects', async () => {
    createClient({ backoff: new ReconnectBackoff(20, 40) });
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    const failed = waitForEvent(client, (e) => e.type === 'connection_state' && e.state === 'failed');
    const reconnected = waitForEvent(client, (e) => e.type === 'connection_state' && e.state === 'connected');
    device.corruptNextAnswer = true;
    assert.equal(client.requestRefresh('0').accepted, true);

    await failed;
    await reconnected;
    assert.ok(log.messages('error').includes(
      'Protocol error: Invalid frame (checksum mismatch) [3B 01 01 04 03 7A 00]. Dropping connection.',
    ));
    assert.equal(device.connections, 2);
  });

  it('reconnects after the device drops the connection', async () => {
    createClient({ backoff: new ReconnectBackoff(20, 40) });
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    const reconnected = waitForEvent(client, (e) => e.type === 'connection_state' && e.state === 'connected');
    device.dropConnections();
    await reconnected;
    assert.equal(device.connections, 2);
  });

  it('forgets rooms on stop and can be stopped twice', async () => {
    createClient();
    const reported = waitForEvent(client, roomUpdate('0', () => true));
    client.start();
    await reported;

    await client.stop();
    await client.stop();
    assert.equal(client.isRunning, false);
    assert.equal(client.connectionState, 'disconnected');
    assert.deepEqual(client.getRooms(), []);
  });
});

describe('TermowifiClient without a device', () => {
  it('keeps retrying with growing delays and exposes no rooms', async () => {
    const port = await closedPort();
    const log = new TestLogger();
    const client = new TermowifiClient(log, { host: '127.0.0.1', port }, {
      ...FAST,
      backoff: new ReconnectBackoff(20, 80),
    });
    assert.equal(client.connectionState, 'disconnected');
    const states: ConnectionState[] = [];
    client.onUpdate((event) => {
      if (event.type === 'connection_state') states.push(event.state);
    });

    const thirdAttempt = new Promise<void>((resolve) => {
      const unsubscribe = client.onUpdate((event) => {
        if (event.type === 'connection_state' && event.state === 'connecting'
          && states.filter((s) => s === 'connecting').length >= 3) {
          unsubscribe();
          resolve();
        }
      });
    });
    client.start();
    await thirdAttempt;

    assert.deepEqual(states, ['connecting', 'failed', 'connecting', 'failed', 'connecting']);
    assert.equal(client.getRoomState('0'), undefined);
    assert.deepEqual(client.getRooms(), []);
    assert.equal(reasonOf(client.setTargetTemperature('0', 22)), 'unknown_room');

    const delays = log.messages('info')
      .filter((m) => m.startsWith('Reconnecting to'))
      .map((m) => m.slice(m.lastIndexOf(' in ') + 4));
    assert.deepEqual(delays.slice(0, 2), ['0.02s', '0.04s']);

    await client.stop();
    assert.equal(client.connectionState, 'disconnected');
  });
});

describe('resolveClientConfig', () => {
  it('returns null without a host', () => {
    assert.equal(resolveClientConfig({ platform: 'Termowifi' }, new TestLogger()), null);
    assert.equal(resolveClientConfig({ platform: 'Termowifi', host: '  ' }, new TestLogger()), null);
  });

  it('applies defaults', () => {
    const resolved = resolveClientConfig({ platform: 'Termowifi', host: '192.168.1.50' }, new TestLogger());
    assert.deepEqual(resolved, {
      address: { host: '192.168.1.50', port: 12345 },
      options: {
        pollInterval: 30_000,
        connectTimeout: 5000,
        readTimeout: 5000,
        queueCapacity: 32,
        debugTcp: false,
      },
    });
  });

  it('falls back to defaults on invalid values and warns', () => {
    const log = new TestLogger();
    const resolved = resolveClientConfig({
      platform: 'Termowifi',
      host: 'thermostat.local',
      port: 70000,
      pollingInterval: -5,
      readTimeout: 2500,
      logLevel: 'debug',
    }, log);

    assert.equal(resolved?.address.port, 12345);
    assert.equal(resolved?.options.pollInterval, 30_000);
    assert.equal(resolved?.options.readTimeout, 2500);
    assert.equal(resolved?.options.debugTcp, true);
    assert.deepEqual(log.messages('warn'), [
      'Invalid "port" value 70000, using default 12345',
      'Invalid "pollingInterval" value -5, using default 30',
    ]);
  });
});
