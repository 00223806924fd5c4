/**
 * Background loop that owns the device connection and the room state store.
 *
 * Each iteration either reconnects (with backoff) or sends queued commands
 * and, when due, polls every discovered room. Frames are applied to the store
 * and changes leave through the update bridge. A room that does not answer
 * misses that poll; the connection is only dropped when the device itself
 * goes silent or sends garbage, and the next iteration reconnects.
 */

import type { Command, Logger, RoomId } from './types.js';
import type { DecodedFrame } from './protocol.js';
import {
  FrameDecoder,
  buildDiscoveryRequest,
  buildInfoRequest,
  encodeCommand,
  formatFrame,
  parseRoomIndex,
  roomIdFromIndex,
} from './protocol.js';
import { DeviceConnection, ReconnectBackoff } from './connection.js';
import { RoomStateStore } from './roomStateStore.js';
import { CommandQueue } from './commandQueue.js';
import { UpdateBridge } from './updateBridge.js';
import { ConnectionError, ProtocolError, describeError } from './errors.js';
import {
  DEFAULT_COMMAND_REPEAT,
  DEFAULT_POLLING_INTERVAL,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_SETTLE_TIME,
  DEFAULT_STALE_AFTER_POLLS,
  DISCOVERY_REPEAT,
} from './settings.js';

export interface PollWorkerOptions {
  /** ms between two polls of every room. */
  pollInterval?: number;
  /** ms to wait for the first frame of an expected answer. */
  readTimeout?: number;
  /** ms of silence that ends a multi-frame answer. */
  settleTime?: number;
  commandRepeat?: number;
  staleAfterPolls?: number;
  backoff?: ReconnectBackoff;
}

type FrameMatcher = (frame: DecodedFrame) => boolean;

function sleep(ms: number, abort: AbortSignal): Promise<void> {
  if (abort.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    const done = () => {
      clearTimeout(timer);
      abort.removeEventListener('abort', done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    abort.addEventListener('abort', done, { once: true });
  });
}

function describeCommand(command: Command): string {
  switch (command.type) {
    case 'set_temperature':
      return `room ${command.roomId} target ${command.value}°C`;
    case 'set_mode':
      return `room ${command.roomId} mode ${command.mode}`;
    case 'refresh':
      return `room ${command.roomId} refresh`;
  }
}

export class PollWorker {
  private running = false;
  private loop: Promise<void> | null = null;
  private abort: AbortController | null = null;
  private firstAttempt = true;
  private nextPollAt = 0;
  private discoveryPending = false;
  private readonly decoder = new FrameDecoder();
  private readonly discovered: Set<number> = new Set();

  private readonly pollInterval: number;
  private readonly readTimeout: number;
  private readonly settleTime: number;
  private readonly commandRepeat: number;
  private readonly staleAfterPolls: number;
  private readonly backoff: ReconnectBackoff;

  constructor(
    private readonly connection: DeviceConnection,
    private readonly store: RoomStateStore,
    private readonly queue: CommandQueue,
    private readonly bridge: UpdateBridge,
    private readonly log: Logger,
    options?: PollWorkerOptions,
  ) {
    this.pollInterval = options?.pollInterval ?? DEFAULT_POLLING_INTERVAL * 1000;
    this.readTimeout = options?.readTimeout ?? DEFAULT_READ_TIMEOUT;
    this.settleTime = options?.settleTime ?? DEFAULT_SETTLE_TIME;
    this.commandRepeat = options?.commandRepeat ?? DEFAULT_COMMAND_REPEAT;
    this.staleAfterPolls = options?.staleAfterPolls ?? DEFAULT_STALE_AFTER_POLLS;
    this.backoff = options?.backoff ?? new ReconnectBackoff();

    this.connection.setOnStateChange((state) => {
      this.bridge.notify({ type: 'connection_state', state });
      if (state === 'failed') {
        // Wake an idle loop so a dropped connection is picked up immediately.
        this.queue.signal();
      }
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  knownRooms(): RoomId[] {
    return [...this.discovered].sort((a, b) => a - b).map(roomIdFromIndex);
  }

  hasRoom(roomId: RoomId): boolean {
    const room = parseRoomIndex(roomId);
    return room !== null && this.discovered.has(room);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.firstAttempt = true;
    this.backoff.reset();
    const abort = new AbortController();
    this.abort = abort;
    this.loop = this.run(abort.signal).catch((err: unknown) => {
      this.log.error('Poll worker stopped unexpectedly: %s', describeError(err));
      this.running = false;
    });
  }

  /** Interrupts any pending I/O, waits for the loop to exit and forgets all rooms. */
  async stop(): Promise<void> {
    this.running = false;
    this.abort?.abort();
    this.connection.close();
    await this.loop;
    this.loop = null;
    this.abort = null;

    const dropped = this.queue.clear();
    if (dropped > 0) {
      this.log.debug('Dropped %d queued command(s) on stop', dropped);
    }
    this.decoder.reset();
    this.discoveryPending = false;
    this.discovered.clear();
    this.store.clear();
  }

  private async run(abort: AbortSignal): Promise<void> {
    while (this.running) {
      try {
        if (this.connection.isConnected()) {
          await this.cycle(abort);
        } else {
          await this.reconnect(abort);
        }
      } catch (err) {
        if (!this.running) break;
        this.handleFailure(err);
      }
      this.markStaleRooms();
    }
  }

  private async reconnect(abort: AbortSignal): Promise<void> {
    const { host, port } = this.connection.address;

    if (!this.firstAttempt) {
      this.backoff.connectionLost(this.connection.uptime());
      const delay = this.backoff.next();
      this.log.info('Reconnecting to %s:%d in %ds', host, port, delay / 1000);
      await sleep(delay, abort);
      if (!this.running) return;
    }
    this.firstAttempt = false;

    this.log.debug('Attempting to connect to %s:%d', host, port);
    await this.connection.connect();
    this.log.info('Connected to %s:%d', host, port);

    this.decoder.reset();
    await this.discover();
    this.nextPollAt = 0;
  }

  private async cycle(abort: AbortSignal): Promise<void> {
    await this.sendQueuedCommands();

    if (performance.now() >= this.nextPollAt) {
      this.nextPollAt = performance.now() + this.pollInterval;
      if (this.discovered.size === 0) {
        await this.discover();
      }
      await this.pollRooms();
      this.finishDiscovery();
    }

    if (this.running && this.connection.isConnected()) {
      await this.queue.waitForWork(this.nextPollAt - performance.now(), abort);
    }
  }

  private async discover(): Promise<void> {
    const request = buildDiscoveryRequest();
    this.log.debug('Sending discovery request: %s', formatFrame(request));
    for (let i = 0; i < DISCOVERY_REPEAT; i++) {
      await this.connection.send(request);
    }
    await this.readAnswer((frame) => frame.type === 'room_found');
    const roomIds = this.knownRooms();
    this.log.info('Discovered %d room(s): %s', roomIds.length, roomIds.join(', '));
    this.discoveryPending = true;
  }

  /** Announces the room list once a full poll cycle has followed discovery. */
  private finishDiscovery(): void {
    if (!this.discoveryPending) return;
    this.discoveryPending = false;
    this.bridge.notify({ type: 'discovery_finished', roomIds: this.knownRooms() });
  }

  private async pollRooms(): Promise<void> {
    for (const roomId of this.knownRooms()) {
      if (!this.running) return;
      // Writes go out between room polls so they never wait a full cycle.
      await this.sendQueuedCommands();
      const room = parseRoomIndex(roomId);
      if (room !== null) {
        await this.pollRoom(room);
      }
    }
  }

  /** A room that stays silent misses this poll; staleness takes it from there. */
  private async pollRoom(room: number): Promise<void> {
    await this.connection.send(buildInfoRequest(room));
    const answered = await this.readAnswer((frame) => frame.type === 'room_state' && frame.room === room);
    if (!answered) {
      this.log.debug('No answer from room %s within %dms', roomIdFromIndex(room), this.readTimeout);
    }
  }

  private async sendQueuedCommands(): Promise<void> {
    for (let command = this.queue.shift(); command && this.running; command = this.queue.shift()) {
      this.log.debug('Sending command: %s', describeCommand(command));
      const room = parseRoomIndex(command.roomId);

      if (command.type === 'refresh') {
        if (room !== null) {
          await this.pollRoom(room);
        }
        continue;
      }

      const request = encodeCommand(command);
      for (let i = 0; i < this.commandRepeat; i++) {
        await this.connection.send(request);
      }
      await this.readAnswer();
      if (room !== null) {
        await this.pollRoom(room);
      }
    }
  }

  /**
   * Reads and applies frames until the device has been quiet for the settle
   * time. With `expect`, waits up to the read timeout for a matching frame and
   * resolves false if none came. A device that sends nothing at all in that
   * time, not even the echo of the request, fails the connection.
   */
  private async readAnswer(expect?: FrameMatcher): Promise<boolean> {
    let answered = expect === undefined;
    let heard = false;
    const deadline = performance.now() + this.readTimeout;

    for (;;) {
      answered = this.applyBufferedFrames(expect) || answered;

      if (answered) {
        const chunk = await this.connection.tryReceive(this.settleTime);
        if (!chunk) return true;
        this.decoder.push(chunk);
        continue;
      }

      const remaining = deadline - performance.now();
      if (remaining <= 0) {
        if (heard) return false;
        throw new ConnectionError('timeout', `No answer from device within ${this.readTimeout}ms`);
      }
      const chunk = await this.connection.tryReceive(remaining);
      if (chunk) {
        heard = true;
        this.decoder.push(chunk);
      }
    }
  }

  private applyBufferedFrames(expect?: FrameMatcher): boolean {
    let matched = false;
    for (;;) {
      const frame = this.decoder.next();
      if (frame.type === 'incomplete') {
        return matched;
      }
      this.applyFrame(frame);
      if (expect?.(frame)) {
        matched = true;
      }
    }
  }

  private applyFrame(frame: Exclude<DecodedFrame, { type: 'incomplete' }>): void {
    switch (frame.type) {
      case 'room_found':
        this.addRoom(frame.room);
        return;

      case 'room_state': {
        const roomId = roomIdFromIndex(frame.room);
        this.addRoom(frame.room);
        this.log.debug('[Room %s]%s %s (%s)', roomId, frame.confirmation ? '*' : '',
          JSON.stringify(frame.fields), formatFrame(frame.raw));
        if (this.store.upsert(roomId, frame.fields)) {
          const state = this.store.get(roomId);
          if (state) {
            this.bridge.notify({ type: 'room_updated', roomId, state });
          }
        }
        return;
      }

      case 'ack':
        this.log.debug('Acknowledged: %s', formatFrame(frame.raw));
        return;

      case 'unknown':
        this.log.warn('Unprocessed valid response: cid=0x%s value=0x%s',
          frame.cid.toString(16).padStart(2, '0'), frame.value.toString(16).padStart(2, '0'));
        return;

      case 'error':
        throw new ProtocolError(`Invalid frame (${frame.reason})`, frame.raw);
    }
  }

  private addRoom(room: number): void {
    if (this.discovered.has(room)) return;
    this.discovered.add(room);
    const roomId = roomIdFromIndex(room);
    this.log.debug('Room found with id: %s', roomId);
    this.bridge.notify({ type: 'room_discovered', roomId });
  }

  private markStaleRooms(): void {
    const maxAge = this.pollInterval * this.staleAfterPolls;
    for (const roomId of this.store.staleRooms(maxAge)) {
      const state = this.store.markUnavailable(roomId);
      this.log.warn('No update from room %s in %d polls, marking it unavailable', roomId, this.staleAfterPolls);
      if (state) {
        this.bridge.notify({ type: 'room_unavailable', roomId, state });
      }
    }
  }

  private handleFailure(err: unknown): void {
    if (err instanceof ConnectionError) {
      this.log.warn('Connection error: %s', err.message);
      this.connection.fail(err);
    } else if (err instanceof ProtocolError) {
      this.log.error('Protocol error: %s. Dropping connection.', err.message);
      this.connection.fail(new ConnectionError('reset', 'Dropped after protocol error', { cause: err }));
    } else {
      this.log.error('Unexpected error in poll worker: %s', describeError(err));
      this.connection.fail(new ConnectionError('reset', 'Dropped after unexpected error', { cause: err }));
    }

    const dropped = this.queue.clear();
    if (dropped > 0) {
      this.log.warn('Dropped %d queued command(s)', dropped);
    }
  }
}
