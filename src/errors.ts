/**
 * Errors raised by the Aurora client, poller and uploader.
 */

export class AuroraError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AuroraError";
  }
}

/** Transport read/write failure */
export class IoError extends AuroraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IoError";
  }
}

/** The TCP bridge could not be reached */
export class ConnectionError extends IoError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConnectionError";
  }
}

export class ConnectionClosedError extends IoError {
  constructor(message = "Connection closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

export class CrcMismatchError extends AuroraError {
  public readonly expected: number;
  public readonly received: number;
  public readonly frame: Buffer;

  constructor(expected: number, received: number, frame: Buffer) {
    super(
      `CRC mismatch: expected 0x${expected.toString(16).padStart(4, "0")}, ` +
        `received 0x${received.toString(16).padStart(4, "0")} (frame ${frame.toString("hex")})`
    );
    this.name = "CrcMismatchError";
    this.expected = expected;
    this.received = received;
    this.frame = frame;
  }
}

export class UnexpectedResponseError extends AuroraError {
  constructor(message = "Got response without request") {
    super(message);
    this.name = "UnexpectedResponseError";
  }
}

/** A request was issued while the previous one still awaits its response */
export class PendingRequestError extends AuroraError {
  constructor(pending: string) {
    super(`Request already outstanding: ${pending}`);
    this.name = "PendingRequestError";
  }
}

export type StateDomain = "transmission" | "global" | "inverter" | "dcdc";

export class UnknownStateCodeError extends AuroraError {
  public readonly domain: StateDomain;
  public readonly raw: number;

  constructor(domain: StateDomain, raw: number) {
    super(`Unknown ${domain} state code: ${raw}`);
    this.name = "UnknownStateCodeError";
    this.domain = domain;
    this.raw = raw;
  }
}

export class TimeoutError extends AuroraError {
  public readonly timeoutMs: number;

  constructor(timeoutMs: number, message = `No response within ${timeoutMs}ms`) {
    super(message);
    this.name = "TimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

export class UploadError extends AuroraError {
  public readonly status?: number;

  constructor(message: string, options?: { cause?: unknown; status?: number }) {
    super(message, options);
    this.name = "UploadError";
    this.status = options?.status;
  }
}

export class ConfigError extends AuroraError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConfigError";
  }
}
