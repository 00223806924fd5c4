/**
 * Termowifi wire protocol: 7-byte frames made of a 4-byte header, a command
 * id (cid), a data byte and a checksum.
 *
 * Per room index r: cid 4r power, 4r+1 operation, 4r+2 setpoint,
 * 4r+3 ambient temperature (also the info request), 0x64+r humidity.
 */

import type { Command, HvacMode, OperationMode, PowerState, RoomFields, RoomId } from './types.js';

export const FRAME_LENGTH = 7;
export const MAX_ROOMS = 5;

const FRAME_START = 0x3b;

export type HeaderKind = 'request' | 'answer' | 'confirmation';

const HEADER_KINDS: readonly HeaderKind[] = ['request', 'answer', 'confirmation'];

export const HEADERS: Record<HeaderKind, readonly number[]> = {
  request: [0x3b, 0x01, 0xfe, 0x04],
  answer: [0x3b, 0x01, 0x01, 0x04],
  confirmation: [0x3b, 0xfe, 0x01, 0x01],
};

const CHECKSUM_OFFSET: Record<HeaderKind, number> = {
  request: 0x03,
  answer: 0x06,
  confirmation: 0x00,
};

export const CID = {
  POWER: 0,
  OPERATION: 1,
  SETPOINT: 2,
  AMBIENT: 3,
  DISCOVER: 0x23,
  ROOM_ANNOUNCE: 0x32,
  HUMIDITY: 0x64,
} as const;

const POWER_ON = 0x03;
const POWER_OFF = 0x02;
const OPERATION_HEAT = 0x02;
const OPERATION_COOL = 0x03;

export type DecodedFrame =
  | { type: 'room_state'; room: number; fields: RoomFields; confirmation: boolean; raw: Buffer }
  | { type: 'room_found'; room: number; raw: Buffer }
  | { type: 'ack'; cid: number; raw: Buffer }
  | { type: 'unknown'; cid: number; value: number; raw: Buffer }
  | { type: 'error'; reason: string; raw: Buffer }
  | { type: 'incomplete' };

export function checksum(cid: number, data: number, header: HeaderKind): number {
  return (cid + data + CHECKSUM_OFFSET[header]) % 256;
}

export function formatFrame(frame: Uint8Array): string {
  return Array.from(frame, (b) => b.toString(16).padStart(2, '0').toUpperCase()).join(' ');
}

// --- value encodings ---

/** Setpoint: 0.5 °C steps starting at 15 °C for value 30. */
export function setpointFromValue(value: number): number {
  return (value - 30) * 0.5 + 15;
}

export function valueFromSetpoint(celsius: number): number {
  return Math.round((celsius - 15) * 2) + 30;
}

/** Ambient: 0.5 °C steps counting down from 45.5 °C at value 71. */
export function ambientFromValue(value: number): number {
  return 45.5 - (value - 71) * 0.5;
}

export function humidityFromValue(value: number): number {
  return Math.floor((value * 100) / 255);
}

// --- room ids ---

export function roomIdFromIndex(room: number): RoomId {
  return String(room);
}

export function parseRoomIndex(roomId: RoomId): number | null {
  if (!/^\d+$/.test(roomId)) {
    return null;
  }
  const room = Number.parseInt(roomId, 10);
  return room < MAX_ROOMS ? room : null;
}

function requireRoomIndex(roomId: RoomId): number {
  const room = parseRoomIndex(roomId);
  if (room === null) {
    throw new RangeError(`Invalid room id: ${roomId}`);
  }
  return room;
}

// --- encoding ---

function buildRequest(cid: number, data: number): Buffer {
  return Buffer.from([...HEADERS.request, cid, data, checksum(cid, data, 'request')]);
}

export function buildDiscoveryRequest(): Buffer {
  return buildRequest(CID.DISCOVER, 0x00);
}

export function buildInfoRequest(room: number): Buffer {
  return buildRequest(room * 4 + CID.AMBIENT, 0x00);
}

export function buildPowerRequest(room: number, power: PowerState): Buffer {
  return buildRequest(room * 4 + CID.POWER, power === 'on' ? POWER_ON : POWER_OFF);
}

export function buildOperationRequest(room: number, operation: OperationMode): Buffer {
  return buildRequest(room * 4 + CID.OPERATION, operation === 'heat' ? OPERATION_HEAT : OPERATION_COOL);
}

export function buildSetpointRequest(room: number, celsius: number): Buffer {
  return buildRequest(room * 4 + CID.SETPOINT, valueFromSetpoint(celsius));
}

function buildModeRequest(room: number, mode: HvacMode): Buffer {
  if (mode === 'off') {
    return buildPowerRequest(room, 'off');
  }
  return Buffer.concat([buildPowerRequest(room, 'on'), buildOperationRequest(room, mode)]);
}

export function encodeCommand(command: Command): Buffer {
  const room = requireRoomIndex(command.roomId);
  switch (command.type) {
    case 'set_temperature':
      return buildSetpointRequest(room, command.value);
    case 'set_mode':
      return buildModeRequest(room, command.mode);
    case 'refresh':
      return buildInfoRequest(room);
  }
}

// --- decoding ---

function matchHeader(frame: Uint8Array): HeaderKind | null {
  for (const kind of HEADER_KINDS) {
    if (HEADERS[kind].every((b, i) => frame[i] === b)) {
      return kind;
    }
  }
  return null;
}

function decodeRoomField(cid: number, value: number): RoomFields | null {
  if (cid >= CID.HUMIDITY && cid < CID.HUMIDITY + MAX_ROOMS) {
    return { humidity: humidityFromValue(value) };
  }
  switch (cid % 4) {
    case CID.POWER:
      if (value === POWER_ON) return { power: 'on' };
      if (value === POWER_OFF) return { power: 'off' };
      return null;
    case CID.OPERATION:
      if (value === OPERATION_HEAT) return { operation: 'heat' };
      if (value === OPERATION_COOL) return { operation: 'cool' };
      return null;
    case CID.SETPOINT:
      return { targetTemperature: setpointFromValue(value) };
    default:
      return { currentTemperature: ambientFromValue(value) };
  }
}

function roomOfCid(cid: number): number | null {
  if (cid < MAX_ROOMS * 4) {
    return Math.floor(cid / 4);
  }
  if (cid >= CID.HUMIDITY && cid < CID.HUMIDITY + MAX_ROOMS) {
    return cid - CID.HUMIDITY;
  }
  return null;
}

/** Interprets one complete frame. Never throws. */
export function decodeFrame(frame: Buffer): DecodedFrame {
  if (frame.length !== FRAME_LENGTH) {
    return { type: 'error', reason: `expected ${FRAME_LENGTH} bytes, got ${frame.length}`, raw: frame };
  }

  const header = matchHeader(frame);
  if (!header) {
    return { type: 'error', reason: 'unrecognised frame header', raw: frame };
  }

  const cid = frame[4];
  const value = frame[5];
  if (frame[6] !== checksum(cid, value, header)) {
    return { type: 'error', reason: 'checksum mismatch', raw: frame };
  }

  // The device echoes every request it receives.
  if (header === 'request') {
    return { type: 'ack', cid, raw: frame };
  }

  if (cid >= CID.ROOM_ANNOUNCE && cid < CID.ROOM_ANNOUNCE + MAX_ROOMS && value === 0x00) {
    return { type: 'room_found', room: cid - CID.ROOM_ANNOUNCE, raw: frame };
  }

  // A zero value confirms a write without reporting state.
  if (value === 0x00) {
    return { type: 'ack', cid, raw: frame };
  }

  const room = roomOfCid(cid);
  const fields = room === null ? null : decodeRoomField(cid, value);
  if (room === null || fields === null) {
    return { type: 'unknown', cid, value, raw: frame };
  }

  return { type: 'room_state', room, fields, confirmation: header === 'confirmation', raw: frame };
}

/**
 * Buffers inbound bytes across reads. `next()` yields one decoded frame at a
 * time and `incomplete` while less than a frame is buffered.
 */
export class FrameDecoder {
  private buffer: Buffer = Buffer.alloc(0);

  get buffered(): number {
    return this.buffer.length;
  }

  push(chunk: Buffer): void {
    this.buffer = this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  next(): DecodedFrame {
    if (this.buffer.length < FRAME_LENGTH) {
      return { type: 'incomplete' };
    }

    if (!matchHeader(this.buffer)) {
      // Drop bytes up to the next possible frame start.
      let skip = this.buffer.indexOf(FRAME_START, 1);
      if (skip === -1) {
        skip = this.buffer.length;
      }
      const raw = Buffer.from(this.buffer.subarray(0, skip));
      this.buffer = this.buffer.subarray(skip);
      return { type: 'error', reason: 'unrecognised frame header', raw };
    }

    const frame = Buffer.from(this.buffer.subarray(0, FRAME_LENGTH));
    this.buffer = this.buffer.subarray(FRAME_LENGTH);
    return decodeFrame(frame);
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
  }
}
