import type { PlatformConfig } from 'homebridge';

export type LogLevel = 'normal' | 'verbose' | 'debug';

export interface TermowifiConfig extends PlatformConfig {
  host?: string;
  port?: number;
  pollingInterval?: number;
  connectTimeout?: number;
  readTimeout?: number;
  queueCapacity?: number;
  logLevel?: LogLevel;
}

/** The subset of Homebridge's `Logging` the device layer writes to. */
export interface Logger {
  info(message: string, ...parameters: unknown[]): void;
  warn(message: string, ...parameters: unknown[]): void;
  error(message: string, ...parameters: unknown[]): void;
  debug(message: string, ...parameters: unknown[]): void;
}

export interface DeviceAddress {
  readonly host: string;
  readonly port: number;
}

export type RoomId = string;

export type HvacMode = 'heat' | 'cool' | 'off';
export type PowerState = 'on' | 'off';
export type OperationMode = 'heat' | 'cool';

export const HVAC_MODES: readonly HvacMode[] = ['heat', 'cool', 'off'];

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'failed';

/** Fields a single device frame can report for a room. */
export interface RoomFields {
  power?: PowerState;
  operation?: OperationMode;
  targetTemperature?: number;
  currentTemperature?: number;
  humidity?: number;
}

export interface RoomState {
  readonly roomId: RoomId;
  readonly name: string;
  readonly targetTemperature: number;
  readonly currentTemperature?: number;
  readonly humidity?: number;
  readonly hvacMode: HvacMode;
  readonly power: PowerState;
  readonly operation?: OperationMode;
  /** `performance.now()` of the last frame received for this room. */
  readonly lastUpdated: number;
  readonly available: boolean;
}

export type Command =
  | { type: 'set_temperature'; roomId: RoomId; value: number }
  | { type: 'set_mode'; roomId: RoomId; mode: HvacMode }
  | { type: 'refresh'; roomId: RoomId };

export type RejectReason = 'unknown_room' | 'out_of_range' | 'queue_full' | 'not_running';

export type SubmitResult =
  | { accepted: true }
  | { accepted: false; reason: RejectReason; message: string };

export type BridgeEvent =
  | { type: 'room_discovered'; roomId: RoomId }
  | { type: 'discovery_finished'; roomIds: RoomId[] }
  | { type: 'room_updated'; roomId: RoomId; state: RoomState }
  | { type: 'room_unavailable'; roomId: RoomId; state: RoomState }
  | { type: 'connection_state'; state: ConnectionState };

export type BridgeListener = (event: BridgeEvent) => void;
