import { createRequire } from 'node:module';
import type {
  API,
  DynamicPlatformPlugin,
  Logging,
  PlatformAccessory,
  Service,
  Characteristic,
} from 'homebridge';
import type { BridgeEvent, DeviceAddress, LogLevel, RoomId, RoomState, TermowifiConfig } from './types.js';
import { PLATFORM_NAME, PLUGIN_NAME } from './settings.js';
import { TermowifiClient, resolveClientConfig } from './client.js';
import { describeError } from './errors.js';
import { RoomAccessory } from './roomAccessory.js';

const require = createRequire(import.meta.url);
const { version: PLUGIN_VERSION } = require('../package.json') as { version: string };

const LOG_LEVELS: readonly LogLevel[] = ['normal', 'verbose', 'debug'];

function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export class TermowifiPlatform implements DynamicPlatformPlugin {
  public readonly Service: typeof Service;
  public readonly Characteristic: typeof Characteristic;
  public readonly config: TermowifiConfig;

  private client: TermowifiClient | null = null;
  private address: DeviceAddress | null = null;
  private readonly logLevel: LogLevel;

  private readonly cachedAccessories: Map<string, PlatformAccessory> = new Map();
  private readonly roomAccessories: Map<RoomId, RoomAccessory> = new Map();
  private unsubscribe: (() => void) | null = null;
  private pruned = false;

  constructor(
    public readonly log: Logging,
    config: TermowifiConfig,
    public readonly api: API,
  ) {
    this.config = config;
    this.logLevel = isLogLevel(config.logLevel) ? config.logLevel : 'normal';
    this.Service = api.hap.Service;
    this.Characteristic = api.hap.Characteristic;

    if (!config.platform) {
      this.log.error('Missing platform configuration');
      return;
    }

    this.api.on('didFinishLaunching', () => this.didFinishLaunching());
    this.api.on('shutdown', () => {
      this.shutdown().catch((err: unknown) => this.log.error('Shutdown failed: %s', describeError(err)));
    });
  }

  configureAccessory(accessory: PlatformAccessory) {
    this.cachedAccessories.set(accessory.UUID, accessory);
  }

  /** `host:port` of the configured controller. */
  get deviceLabel(): string {
    return this.address ? `${this.address.host}:${this.address.port}` : 'unconfigured';
  }

  requireClient(): TermowifiClient {
    if (!this.client) {
      throw new this.api.hap.HapStatusError(this.api.hap.HAPStatus.SERVICE_COMMUNICATION_FAILURE);
    }
    return this.client;
  }

  private didFinishLaunching() {
    this.log.info('Starting %s v%s', PLUGIN_NAME, PLUGIN_VERSION);

    const resolved = resolveClientConfig(this.config, this.log);
    if (!resolved) {
      this.log.error('No host configured. Set "host" to the address of the Termowifi controller.');
      return;
    }

    this.address = resolved.address;
    this.log.info('Using configured host: %s', this.deviceLabel);

    const client = new TermowifiClient(this.log, resolved.address, resolved.options);
    this.unsubscribe = client.onUpdate((event) => this.handleEvent(event));
    this.client = client;
    client.start();
  }

  private async shutdown() {
    this.unsubscribe?.();
    this.unsubscribe = null;
    await this.client?.stop();
  }

  private handleEvent(event: BridgeEvent) {
    switch (event.type) {
      case 'connection_state':
        if (this.logLevel !== 'normal') {
          this.log.info('Connection state: %s', event.state);
        }
        break;
      case 'room_discovered':
        this.log.info('Room %s discovered', event.roomId);
        break;
      case 'discovery_finished':
        this.pruneCachedAccessories(event.roomIds);
        break;
      case 'room_updated':
        this.applyRoomState(event.state);
        if (this.logLevel !== 'normal') {
          this.log.info('Poll: room=%s mode=%s target=%s°C current=%s°C humidity=%s%%',
            event.roomId,
            event.state.hvacMode,
            event.state.targetTemperature.toFixed(1),
            event.state.currentTemperature?.toFixed(1) ?? '?',
            event.state.humidity ?? '?');
        }
        break;
      case 'room_unavailable':
        this.log.warn('Room %s is unavailable', event.roomId);
        this.roomAccessories.get(event.roomId)?.updateState(event.state);
        break;
    }
  }

  private applyRoomState(state: RoomState) {
    const existing = this.roomAccessories.get(state.roomId);
    if (existing) {
      existing.updateState(state);
      return;
    }
    this.roomAccessories.set(state.roomId, this.registerAccessory(state));
  }

  private uuidFor(roomId: RoomId): string {
    return this.api.hap.uuid.generate(`${PLUGIN_NAME}:${this.deviceLabel}_${roomId}`);
  }

  private registerAccessory(state: RoomState): RoomAccessory {
    const uuid = this.uuidFor(state.roomId);
    const name = this.config.name ? `${this.config.name} ${state.name}` : state.name;

    let accessory = this.cachedAccessories.get(uuid);
    if (accessory) {
      this.log.info('Restoring cached accessory: %s', accessory.displayName);
    } else {
      this.log.info('Adding new accessory: %s', name);
      accessory = new this.api.platformAccessory(name, uuid);
      this.api.registerPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [accessory]);
      this.cachedAccessories.set(uuid, accessory);
    }

    return new RoomAccessory(this, accessory, state);
  }

  /** Unregisters cached accessories for rooms missing after the first discovery and poll cycle. */
  private pruneCachedAccessories(roomIds: RoomId[]) {
    if (this.pruned || roomIds.length === 0) return;
    this.pruned = true;

    const current = new Set(roomIds.map((roomId) => this.uuidFor(roomId)));
    for (const [cachedUuid, cachedAccessory] of this.cachedAccessories) {
      if (!current.has(cachedUuid)) {
        this.log.info('Removing stale accessory: %s', cachedAccessory.displayName);
        this.api.unregisterPlatformAccessories(PLUGIN_NAME, PLATFORM_NAME, [cachedAccessory]);
        this.cachedAccessories.delete(cachedUuid);
      }
    }
  }
}
