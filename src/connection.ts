/**
 * TCP connection to a Termowifi controller.
 *
 * Owns the socket. Inbound chunks are queued until the poll worker reads them,
 * so reads are pull-based and bounded by a timeout.
 */

import net from 'node:net';
import type { ConnectionState, DeviceAddress, Logger } from './types.js';
import { ConnectionError } from './errors.js';
import { formatFrame } from './protocol.js';
import {
  BACKOFF_INITIAL,
  BACKOFF_MAX,
  BACKOFF_STABILITY_WINDOW,
  DEFAULT_CONNECT_TIMEOUT,
  DEFAULT_READ_TIMEOUT,
  DEFAULT_WRITE_TIMEOUT,
  KEEPALIVE_INITIAL_DELAY,
} from './settings.js';

export interface DeviceConnectionOptions {
  connectTimeout?: number;
  readTimeout?: number;
  writeTimeout?: number;
  debugTcp?: boolean;
}

export type OnStateChangeFn = (state: ConnectionState) => void;

interface PendingRead {
  resolve: (chunk: Buffer | null) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export class DeviceConnection {
  private socket: net.Socket | null = null;
  private state: ConnectionState = 'disconnected';
  private chunks: Buffer[] = [];
  private pendingRead: PendingRead | null = null;
  private failure: ConnectionError | null = null;
  private abortConnect: ((err: ConnectionError) => void) | null = null;
  private connectedAt: number | null = null;
  private lostAt: number | null = null;
  private onStateChange?: OnStateChangeFn;

  private readonly connectTimeout: number;
  private readonly readTimeout: number;
  private readonly writeTimeout: number;
  private readonly debugTcp: boolean;

  constructor(
    readonly address: DeviceAddress,
    private readonly log: Logger,
    options?: DeviceConnectionOptions,
  ) {
    this.connectTimeout = options?.connectTimeout ?? DEFAULT_CONNECT_TIMEOUT;
    this.readTimeout = options?.readTimeout ?? DEFAULT_READ_TIMEOUT;
    this.writeTimeout = options?.writeTimeout ?? DEFAULT_WRITE_TIMEOUT;
    this.debugTcp = options?.debugTcp ?? false;
  }

  setOnStateChange(callback: OnStateChangeFn): void {
    this.onStateChange = callback;
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === 'connected' && this.socket !== null;
  }

  /** How long the latest connection stayed (or has been) up, in ms. */
  uptime(): number {
    if (this.connectedAt === null) return 0;
    return (this.lostAt ?? performance.now()) - this.connectedAt;
  }

  private tcpLog(message: string, ...args: unknown[]) {
    if (this.debugTcp) {
      this.log.info(message, ...args);
    } else {
      this.log.debug(message, ...args);
    }
  }

  private setState(state: ConnectionState) {
    if (this.state === state) return;
    this.state = state;
    this.onStateChange?.(state);
  }

  connect(): Promise<void> {
    this.discardSocket();
    this.chunks = [];
    this.failure = null;
    this.connectedAt = null;
    this.lostAt = null;
    this.setState('connecting');

    const { host, port } = this.address;

    return new Promise((resolve, reject) => {
      const socket = new net.Socket();
      let settled = false;

      const fail = (err: ConnectionError) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.abortConnect = null;
        this.discardSocket();
        this.setState('failed');
        reject(err);
      };

      const timer = setTimeout(() => {
        fail(new ConnectionError('timeout', `Connection to ${host}:${port} timed out after ${this.connectTimeout}ms`));
      }, this.connectTimeout);

      socket.once('error', (err) => {
        fail(new ConnectionError('unreachable', `Cannot connect to ${host}:${port}: ${err.message}`, { cause: err }));
      });

      socket.connect(port, host, () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        this.abortConnect = null;
        socket.removeAllListeners('error');
        socket.setKeepAlive(true, KEEPALIVE_INITIAL_DELAY);
        socket.setNoDelay(true);
        this.attach(socket);
        this.connectedAt = performance.now();
        this.setState('connected');
        resolve();
      });

      this.socket = socket;
      this.abortConnect = fail;
    });
  }

  private attach(socket: net.Socket) {
    socket.on('data', (chunk: Buffer) => {
      this.tcpLog('TCP recv ← %s', formatFrame(chunk));
      const pending = this.pendingRead;
      if (pending) {
        this.pendingRead = null;
        clearTimeout(pending.timer);
        pending.resolve(chunk);
      } else {
        this.chunks.push(chunk);
      }
    });
    socket.on('end', () => this.fail(new ConnectionError('closed', 'Connection closed by device')));
    socket.on('error', (err) => {
      this.fail(new ConnectionError('reset', `Connection error: ${err.message}`, { cause: err }));
    });
    socket.on('close', () => this.fail(new ConnectionError('closed', 'Connection closed')));
  }

  /** Marks the connection failed and tears the socket down. */
  fail(err: ConnectionError): void {
    if (this.failure || !this.socket) return;
    this.failure = err;
    this.discardSocket();
    this.lostAt = performance.now();
    this.rejectPendingRead(err);
    this.setState('failed');
  }

  send(data: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || this.state !== 'connected') {
      return Promise.reject(this.failure ?? new ConnectionError('closed', 'Cannot send: not connected'));
    }

    const { host, port } = this.address;
    this.tcpLog('TCP send → %s:%d: %s', host, port, formatFrame(data));

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const err = new ConnectionError('timeout', `Write timed out after ${this.writeTimeout}ms`);
        this.fail(err);
        reject(err);
      }, this.writeTimeout);

      socket.write(data, (writeErr) => {
        clearTimeout(timer);
        if (writeErr) {
          const err = new ConnectionError('reset', `Write failed: ${writeErr.message}`, { cause: writeErr });
          this.fail(err);
          reject(err);
        } else {
          resolve();
        }
      });
    });
  }

  /** Next inbound chunk. A silent device within the read timeout fails the connection. */
  async receive(timeoutMs: number = this.readTimeout): Promise<Buffer> {
    const chunk = await this.read(timeoutMs);
    if (!chunk) {
      const err = new ConnectionError('timeout', `No data from device within ${timeoutMs}ms`);
      this.fail(err);
      throw err;
    }
    return chunk;
  }

  /** Next inbound chunk, or null if the device stays quiet for `waitMs`. */
  tryReceive(waitMs: number): Promise<Buffer | null> {
    return this.read(waitMs);
  }

  private read(timeoutMs: number): Promise<Buffer | null> {
    const queued = this.chunks.shift();
    if (queued) {
      return Promise.resolve(queued);
    }
    if (this.failure || !this.socket) {
      return Promise.reject(this.failure ?? new ConnectionError('closed', 'Cannot read: not connected'));
    }
    if (this.pendingRead) {
      return Promise.reject(new Error('A read is already pending'));
    }

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRead = null;
        resolve(null);
      }, timeoutMs);
      this.pendingRead = { resolve, reject, timer };
    });
  }

  private rejectPendingRead(err: Error) {
    const pending = this.pendingRead;
    if (pending) {
      this.pendingRead = null;
      clearTimeout(pending.timer);
      pending.reject(err);
    }
  }

  private discardSocket() {
    const socket = this.socket;
    if (!socket) return;
    this.socket = null;
    socket.removeAllListeners();
    socket.on('error', (err) => this.log.debug('Discarded socket error: %s', err.message));
    socket.destroy();
  }

  /** Closes the socket and interrupts any pending connect or read. */
  close(): void {
    const err = new ConnectionError('closed', 'Connection closed');
    this.abortConnect?.(err);
    this.discardSocket();
    this.rejectPendingRead(err);
    this.chunks = [];
    this.connectedAt = null;
    this.lostAt = null;
    this.setState('disconnected');
  }
}

/**
 * Exponential reconnect delay. Doubles per failed attempt up to a cap and
 * returns to the initial delay once a connection has stayed up for the
 * stability window.
 */
export class ReconnectBackoff {
  private delay: number;

  constructor(
    private readonly initial: number = BACKOFF_INITIAL,
    private readonly max: number = BACKOFF_MAX,
    private readonly stabilityWindow: number = BACKOFF_STABILITY_WINDOW,
  ) {
    this.delay = initial;
  }

  get current(): number {
    return this.delay;
  }

  next(): number {
    const delay = this.delay;
    this.delay = Math.min(this.delay * 2, this.max);
    return delay;
  }

  connectionLost(uptimeMs: number): void {
    if (uptimeMs >= this.stabilityWindow) {
      this.reset();
    }
  }

  reset(): void {
    this.delay = this.initial;
  }
}
