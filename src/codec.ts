/**
 * Aurora frame codec.
 *
 * Requests go out as 10-byte frames, responses come back as 8-byte frames.
 * A response carries no tag of its own: its 6 payload bytes are laid out
 * according to the request it answers, so decoding needs the pending
 * request held by a FrameSession.
 */

import { crc16, type CrcVariant } from "./crc.js";
import {
  CrcMismatchError,
  PendingRequestError,
  UnexpectedResponseError,
} from "./errors.js";
import {
  COMMAND_CODES,
  REQUEST_FRAME_LENGTH,
  RESPONSE_FRAME_LENGTH,
  describeRequest,
  type Request,
  type Response,
} from "./protocol.js";
import {
  decodeDcDcState,
  decodeGlobalState,
  decodeInverterState,
  decodeTransmissionState,
} from "./states.js";

const RESPONSE_PAYLOAD_LENGTH = RESPONSE_FRAME_LENGTH - 2;

/** Printable view of an ASCII identifier field */
function asciiText(bytes: Buffer): string {
  return bytes.toString("latin1").replace(/[^\x20-\x7e]/g, "").trim();
}

/** Encode a request addressed to the given inverter as a 10-byte frame. */
export function encodeRequest(
  address: number,
  request: Request,
  crc: CrcVariant = "x25"
): Buffer {
  if (!Number.isInteger(address) || address < 0 || address > 0xff) {
    throw new RangeError(`Invalid inverter address: ${address}`);
  }

  const frame = Buffer.alloc(REQUEST_FRAME_LENGTH);
  frame[0] = address;
  frame[1] = COMMAND_CODES[request.kind];

  switch (request.kind) {
    case "measure":
      frame[2] = request.type;
      frame[3] = request.global ? 1 : 0;
      break;
    case "cumulativeEnergy":
      frame[2] = request.duration;
      break;
    default:
      break;
  }

  frame.writeUInt16LE(crc16(frame.subarray(0, 8), crc), 8);
  return frame;
}

/**
 * Interpret the 6 payload bytes of a CRC-checked response frame against
 * the request it answers.
 */
export function decodeResponse(request: Request, payload: Buffer): Response {
  if (payload.length < RESPONSE_PAYLOAD_LENGTH) {
    throw new RangeError(
      `Response payload must be ${RESPONSE_PAYLOAD_LENGTH} bytes, got ${payload.length}`
    );
  }
  const transmission = payload[0];
  const global = payload[1];

  switch (request.kind) {
    case "state":
      return {
        kind: "state",
        transmission,
        global,
        transmissionState: decodeTransmissionState(transmission),
        globalState: decodeGlobalState(global),
        inverterState: decodeInverterState(payload[2]),
        dc1State: decodeDcDcState(payload[3]),
        dc2State: decodeDcDcState(payload[4]),
        alarm: payload[5],
      };
    case "partNumber": {
      const bytes = Buffer.from(payload.subarray(0, RESPONSE_PAYLOAD_LENGTH));
      return { kind: "partNumber", bytes, text: asciiText(bytes) };
    }
    case "serialNumber": {
      const bytes = Buffer.from(payload.subarray(0, RESPONSE_PAYLOAD_LENGTH));
      return { kind: "serialNumber", bytes, text: asciiText(bytes) };
    }
    case "version":
      return {
        kind: "version",
        transmission,
        global,
        parameters: [payload[2], payload[3], payload[4], payload[5]],
      };
    case "measure":
      return {
        kind: "measure",
        transmission,
        global,
        type: request.type,
        value: payload.readFloatBE(2),
      };
    case "manufactureDate": {
      const week = Buffer.from(payload.subarray(2, 4));
      const year = Buffer.from(payload.subarray(4, 6));
      return {
        kind: "manufactureDate",
        transmission,
        global,
        week,
        year,
        weekText: asciiText(week),
        yearText: asciiText(year),
      };
    }
    case "cumulativeEnergy":
      return {
        kind: "cumulativeEnergy",
        transmission,
        global,
        duration: request.duration,
        value: payload.readUInt32BE(2),
      };
  }
}

// ---------- Session ----------

export interface FrameSessionOptions {
  /** CRC variant used on both directions. Default: "x25" */
  crc?: CrcVariant;
}

/**
 * Codec state for one connection: the receive buffer and the single
 * pending-request slot. Exactly one request may be pending; encoding a
 * second one before its response has been decoded is an error.
 */
export class FrameSession {
  public readonly crc: CrcVariant;

  private pendingRequest: Request | null = null;
  private buffer: Buffer = Buffer.alloc(0);

  constructor(options: FrameSessionOptions = {}) {
    this.crc = options.crc ?? "x25";
  }

  get pending(): Request | null {
    return this.pendingRequest;
  }

  /** Number of received bytes not yet decoded */
  get buffered(): number {
    return this.buffer.length;
  }

  /** Encode a request and record it as pending */
  encode(address: number, request: Request): Buffer {
    if (this.pendingRequest !== null) {
      throw new PendingRequestError(describeRequest(this.pendingRequest));
    }
    const frame = encodeRequest(address, request, this.crc);
    this.pendingRequest = request;
    return frame;
  }

  /** Append bytes received from the transport */
  push(chunk: Buffer): void {
    this.buffer =
      this.buffer.length === 0 ? Buffer.from(chunk) : Buffer.concat([this.buffer, chunk]);
  }

  /**
   * Decode the next response frame.
   *
   * Returns null, consuming nothing, while fewer than 8 bytes are buffered.
   * Otherwise exactly 8 bytes are drained; a frame that fails its CRC is
   * discarded and reported as CrcMismatchError.
   */
  decode(): Response | null {
    if (this.buffer.length < RESPONSE_FRAME_LENGTH) {
      return null;
    }

    const frame = this.buffer.subarray(0, RESPONSE_FRAME_LENGTH);
    this.buffer = this.buffer.subarray(RESPONSE_FRAME_LENGTH);

    const payload = frame.subarray(0, RESPONSE_PAYLOAD_LENGTH);
    const received = frame.readUInt16LE(RESPONSE_PAYLOAD_LENGTH);
    const expected = crc16(payload, this.crc);
    if (received !== expected) {
      throw new CrcMismatchError(expected, received, Buffer.from(frame));
    }

    const request = this.pendingRequest;
    if (request === null) {
      throw new UnexpectedResponseError();
    }
    this.pendingRequest = null;
    return decodeResponse(request, payload);
  }

  /** Drop buffered bytes and the pending request */
  reset(): void {
    this.pendingRequest = null;
    this.buffer = Buffer.alloc(0);
  }
}
