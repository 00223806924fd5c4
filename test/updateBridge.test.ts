import { describe, it } from 'node:test';
import assert from 'node:assert/strict';
import { setImmediate as nextTick } from 'node:timers/promises';
import { UpdateBridge } from '../src/updateBridge.js';
import type { BridgeEvent } from '../src/types.js';
import { TestLogger } from './helpers/logger.js';

describe('UpdateBridge', () => {
  it('delivers events after notify returns, in order', async () => {
    const bridge = new UpdateBridge(new TestLogger());
    const received: BridgeEvent[] = [];
    bridge.subscribe((event) => received.push(event));

    bridge.notify({ type: 'room_discovered', roomId: '0' });
    bridge.notify({ type: 'connection_state', state: 'connected' });
    assert.equal(received.length, 0);

    await nextTick();
    assert.deepEqual(received, [
      { type: 'room_discovered', roomId: '0' },
      { type: 'connection_state', state: 'connected' },
    ]);
  });

  it('stops delivering after unsubscribe', async () => {
    const bridge = new UpdateBridge(new TestLogger());
    const received: BridgeEvent[] = [];
    const unsubscribe = bridge.subscribe((event) => received.push(event));

    bridge.notify({ type: 'room_discovered', roomId: '0' });
    unsubscribe();
    await nextTick();

    assert.deepEqual(received, []);
    assert.equal(bridge.listenerCount, 0);
  });

  it('logs a throwing listener and keeps delivering to the others', async () => {
    const log = new TestLogger();
    const bridge = new UpdateBridge(log);
    const received: BridgeEvent[] = [];
    bridge.subscribe(() => {
      throw new Error('listener broke');
    });
    bridge.subscribe((event) => received.push(event));

    bridge.notify({ type: 'room_discovered', roomId: '1' });
    await nextTick();

    assert.deepEqual(received, [{ type: 'room_discovered', roomId: '1' }]);
    assert.deepEqual(log.messages('error'), ['Error in room_discovered listener: listener broke']);
  });
});
