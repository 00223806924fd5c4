/**
 * Last known state of every room the controller has reported.
 *
 * Only the poll worker mutates the store; every read hands out a frozen copy.
 */

import type { HvacMode, OperationMode, PowerState, RoomFields, RoomId, RoomState } from './types.js';

interface RoomRecord extends RoomFields {
  roomId: RoomId;
  lastUpdated: number;
  available: boolean;
}

function deriveHvacMode(power?: PowerState, operation?: OperationMode): HvacMode | undefined {
  if (power === 'off') return 'off';
  if (power === 'on') return operation;
  return undefined;
}

/** A room is exposed once its setpoint and mode are known. */
function toState(record: RoomRecord): RoomState | undefined {
  const hvacMode = deriveHvacMode(record.power, record.operation);
  if (record.targetTemperature === undefined || hvacMode === undefined || record.power === undefined) {
    return undefined;
  }

  const { currentTemperature, humidity, operation } = record;
  const state: RoomState = {
    roomId: record.roomId,
    name: `Room ${record.roomId}`,
    targetTemperature: record.targetTemperature,
    ...(currentTemperature !== undefined ? { currentTemperature } : {}),
    ...(humidity !== undefined ? { humidity } : {}),
    hvacMode,
    power: record.power,
    ...(operation !== undefined ? { operation } : {}),
    lastUpdated: record.lastUpdated,
    available: record.available,
  };
  return Object.freeze(state);
}

function sameState(a: RoomState | undefined, b: RoomState | undefined): boolean {
  if (!a || !b) return a === b;
  return a.targetTemperature === b.targetTemperature
    && a.currentTemperature === b.currentTemperature
    && a.humidity === b.humidity
    && a.hvacMode === b.hvacMode
    && a.operation === b.operation
    && a.available === b.available;
}

export class RoomStateStore {
  private rooms: Map<RoomId, RoomRecord> = new Map();

  /**
   * Merges reported fields into the room, creating it on first report.
   * Fields missing from `fields` keep their previous value.
   *
   * @returns true if the exposed state of the room changed
   */
  upsert(roomId: RoomId, fields: RoomFields, now: number = performance.now()): boolean {
    let record = this.rooms.get(roomId);
    if (!record) {
      record = { roomId, lastUpdated: now, available: true };
      this.rooms.set(roomId, record);
    }

    const before = toState(record);
    if (fields.power !== undefined) record.power = fields.power;
    if (fields.operation !== undefined) record.operation = fields.operation;
    if (fields.targetTemperature !== undefined) record.targetTemperature = fields.targetTemperature;
    if (fields.currentTemperature !== undefined) record.currentTemperature = fields.currentTemperature;
    if (fields.humidity !== undefined) record.humidity = fields.humidity;
    record.lastUpdated = now;
    record.available = true;

    return !sameState(before, toState(record));
  }

  /**
   * Flags a room as unavailable.
   *
   * @returns the new state if the room was exposed and available before
   */
  markUnavailable(roomId: RoomId): RoomState | undefined {
    const record = this.rooms.get(roomId);
    if (!record || !record.available) return undefined;
    record.available = false;
    return toState(record);
  }

  /** Rooms still flagged available whose last report is older than `maxAge` ms. */
  staleRooms(maxAge: number, now: number = performance.now()): RoomId[] {
    const stale: RoomId[] = [];
    for (const record of this.rooms.values()) {
      if (record.available && now - record.lastUpdated > maxAge) {
        stale.push(record.roomId);
      }
    }
    return stale;
  }

  get(roomId: RoomId): RoomState | undefined {
    const record = this.rooms.get(roomId);
    return record ? toState(record) : undefined;
  }

  /** Whether the device has reported anything for the room, exposed or not. */
  has(roomId: RoomId): boolean {
    return this.rooms.has(roomId);
  }

  snapshot(): readonly RoomState[] {
    const states: RoomState[] = [];
    for (const record of this.rooms.values()) {
      const state = toState(record);
      if (state) states.push(state);
    }
    states.sort((a, b) => a.roomId.localeCompare(b.roomId, undefined, { numeric: true }));
    return Object.freeze(states);
  }

  get roomCount(): number {
    return this.rooms.size;
  }

  clear(): void {
    this.rooms.clear();
  }
}
