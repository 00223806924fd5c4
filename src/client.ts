/**
 * Client for a Termowifi controller.
 * All device I/O happens on a background poll worker; calls on this class
 * never wait on the network. Writes are queued and answered with a
 * SubmitResult, state changes arrive through `onUpdate`.
 */

import type {
  BridgeListener,
  Command,
  ConnectionState,
  DeviceAddress,
  HvacMode,
  Logger,
  RejectReason,
  RoomId,
  RoomState,
  SubmitResult,
  TermowifiConfig,
} from './types.js';
import { HVAC_MODES } from './types.js';
import { DeviceConnection } from './connection.js';
import type { DeviceConnectionOptions } from './connection.js';
import { PollWorker } from './pollWorker.js';
import type { PollWorkerOptions } from './pollWorker.js';
import { RoomStateStore } from './roomStateStore.js';
import { CommandQueue } from './commandQueue.js';
import { UpdateBridge } from './updateBridge.js';
import {
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_POLLING_INTERVAL,
  DEFAULT_PORT,
  DEFAULT_QUEUE_CAPACITY,
  DEFAULT_READ_TIMEOUT,
  MAX_TARGET_TEMP,
  MIN_TARGET_TEMP,
} from './settings.js';

export interface TermowifiClientOptions extends DeviceConnectionOptions, PollWorkerOptions {
  queueCapacity?: number;
}

export class TermowifiClient {
  readonly address: DeviceAddress;

  private readonly connection: DeviceConnection;
  private readonly store = new RoomStateStore();
  private readonly queue: CommandQueue;
  private readonly bridge: UpdateBridge;
  private readonly worker: PollWorker;

  constructor(
    private readonly log: Logger,
    address: DeviceAddress,
    options?: TermowifiClientOptions,
  ) {
    this.address = Object.freeze({ host: address.host, port: address.port });
    this.connection = new DeviceConnection(this.address, log, options);
    this.queue = new CommandQueue(options?.queueCapacity ?? DEFAULT_QUEUE_CAPACITY);
    this.bridge = new UpdateBridge(log);
    this.worker = new PollWorker(this.connection, this.store, this.queue, this.bridge, log, options);
  }

  get isRunning(): boolean {
    return this.worker.isRunning;
  }

  get connectionState(): ConnectionState {
    return this.connection.getState();
  }

  /** Starts the background worker and returns without waiting for the device. */
  start(): void {
    if (this.worker.isRunning) return;
    this.log.info('Starting Termowifi client for %s:%d', this.address.host, this.address.port);
    this.worker.start();
  }

  /** Stops the worker and forgets every room. Safe to call more than once. */
  async stop(): Promise<void> {
    if (this.worker.isRunning) {
      this.log.info('Stopping Termowifi client for %s:%d', this.address.host, this.address.port);
    }
    await this.worker.stop();
  }

  getRoomState(roomId: RoomId): RoomState | undefined {
    return this.store.get(roomId);
  }

  getRooms(): readonly RoomState[] {
    return this.store.snapshot();
  }

  onUpdate(listener: BridgeListener): () => void {
    return this.bridge.subscribe(listener);
  }

  setTargetTemperature(roomId: RoomId, value: number): SubmitResult {
    if (!Number.isFinite(value) || value < MIN_TARGET_TEMP || value > MAX_TARGET_TEMP) {
      return this.reject('out_of_range',
        `Target temperature ${value} for room ${roomId} is outside ${MIN_TARGET_TEMP}-${MAX_TARGET_TEMP}°C`);
    }
    return this.submit({ type: 'set_temperature', roomId, value });
  }

  setHvacMode(roomId: RoomId, mode: HvacMode): SubmitResult {
    if (!HVAC_MODES.includes(mode)) {
      return this.reject('out_of_range', `Unsupported HVAC mode "${String(mode)}" for room ${roomId}`);
    }
    return this.submit({ type: 'set_mode', roomId, mode });
  }

  /** Asks the worker to poll one room ahead of the regular interval. */
  requestRefresh(roomId: RoomId): SubmitResult {
    return this.submit({ type: 'refresh', roomId });
  }

  private submit(command: Command): SubmitResult {
    if (!this.worker.isRunning) {
      return this.reject('not_running', 'Client is not running');
    }
    if (!this.worker.hasRoom(command.roomId)) {
      return this.reject('unknown_room', `Room ${command.roomId} has not been discovered`);
    }
    if (!this.queue.submit(command)) {
      return this.reject('queue_full', `Command queue is full (${this.queue.capacity} pending)`);
    }
    return { accepted: true };
  }

  private reject(reason: RejectReason, message: string): SubmitResult {
    this.log.warn('Command rejected (%s): %s', reason, message);
    return { accepted: false, reason, message };
  }
}

export interface ResolvedClientConfig {
  address: DeviceAddress;
  options: TermowifiClientOptions;
}

function positiveNumber(log: Logger, name: string, value: unknown, fallback: number): number {
  if (value === undefined || value === null) return fallback;
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) return value;
  log.warn('Invalid "%s" value %s, using default %d', name, String(value), fallback);
  return fallback;
}

function positiveInteger(log: Logger, name: string, value: unknown, fallback: number, max: number): number {
  const n = positiveNumber(log, name, value, fallback);
  if (Number.isInteger(n) && n <= max) return n;
  log.warn('Invalid "%s" value %s, using default %d', name, String(n), fallback);
  return fallback;
}

/**
 * Builds client settings from the platform config, falling back to defaults
 * for missing or invalid values. Returns null without a host.
 */
export function resolveClientConfig(config: TermowifiConfig, log: Logger): ResolvedClientConfig | null {
  const host = typeof config.host === 'string' ? config.host.trim() : '';
  if (!host) {
    return null;
  }

  const port = positiveInteger(log, 'port', config.port, DEFAULT_PORT, 65535);
  const pollingInterval = positiveNumber(log, 'pollingInterval', config.pollingInterval, DEFAULT_POLLING_INTERVAL);

  return {
    address: { host, port },
    options: {
      pollInterval: pollingInterval * 1000,
      connectTimeout: positiveNumber(log, 'connectTimeout', config.connectTimeout, DEFAULT_CONNECT_TIMEOUT),
      readTimeout: positiveNumber(log, 'readTimeout', config.readTimeout, DEFAULT_READ_TIMEOUT),
      queueCapacity: positiveInteger(log, 'queueCapacity', config.queueCapacity, DEFAULT_QUEUE_CAPACITY, 1024),
      debugTcp: config.logLevel === 'debug',
    },
  };
}
