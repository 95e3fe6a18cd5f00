/**
 * AuroraClient – request/response binding of the Aurora codec to a byte
 * stream, normally a TCP connection to a TCP-to-RS485 bridge.
 *
 * The protocol is strictly one request at a time: a request is written,
 * then the next 8-byte frame received is its response. Failures are not
 * retried; any decode, I/O, timeout or abort failure tears the connection
 * down so that no late frame can be read against a later request.
 */

import net from "node:net";
import { EventEmitter } from "node:events";
import type { Duplex } from "node:stream";
import { FrameSession } from "./codec.js";
import type { CrcVariant } from "./crc.js";
import {
  ConnectionClosedError,
  ConnectionError,
  IoError,
  PendingRequestError,
  TimeoutError,
  UnexpectedResponseError,
} from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import {
  Request,
  describeRequest,
  isResponseFor,
  type CumulativeDuration,
  type MeasurementType,
  type Response,
  type ResponseFor,
} from "./protocol.js";

// ---------- Options ----------

export interface AuroraClientOptions {
  /** TCP port of the serial bridge. Default: 4001 */
  port?: number;
  /** Aurora (RS485) address of the inverter. Default: 2 */
  address?: number;
  /** Connect and response timeout in seconds, 0 to disable. Default: 60 */
  timeout?: number;
  /** CRC-16 variant. Default: "x25" */
  crc?: CrcVariant;
  /** Enable verbose/debug logging. Default: false */
  verbose?: boolean;
  /** Custom logger instance */
  logger?: Logger;
}

export interface RequestOptions {
  /** Aborting rejects the request with the signal's reason */
  signal?: AbortSignal;
  /** Overrides the client timeout for this request (ms, 0 to disable) */
  timeoutMs?: number;
}

/** Anything that answers Aurora requests one at a time */
export interface InverterService {
  request<R extends Request>(
    request: R,
    options?: RequestOptions
  ): Promise<ResponseFor<R["kind"]>>;
}

interface Waiter {
  resolve(response: Response): void;
  reject(err: unknown): void;
}

// ---------- Main class ----------

export class AuroraClient extends EventEmitter implements InverterService {
  public readonly host: string;
  public readonly port: number;
  public readonly inverterAddress: number;
  public readonly timeout: number;

  private readonly log: Logger;
  private readonly session: FrameSession;
  private stream: Duplex | null = null;
  private waiter: Waiter | null = null;
  private lastError: unknown = null;

  constructor(host: string, options: AuroraClientOptions = {}) {
    super();

    this.host = host;
    this.port = options.port ?? 4001;
    this.inverterAddress = options.address ?? 2;
    this.timeout = options.timeout ?? 60;
    this.log = resolveLogger(options);
    this.session = new FrameSession({ crc: options.crc });

    if (
      !Number.isInteger(this.inverterAddress) ||
      this.inverterAddress < 0 ||
      this.inverterAddress > 0xff
    ) {
      throw new RangeError(`Invalid inverter address: ${this.inverterAddress}`);
    }
  }

  /** Bind a client to an already open byte stream */
  static fromStream(stream: Duplex, options: AuroraClientOptions = {}): AuroraClient {
    const client = new AuroraClient("stream", options);
    client.attach(stream);
    return client;
  }

  get connected(): boolean {
    return this.stream !== null && !this.stream.destroyed;
  }

  // ---------- Connection management ----------

  /** Connect to the TCP bridge */
  async connect(): Promise<void> {
    if (this.connected) return;

    return new Promise<void>((resolve, reject) => {
      const socket = new net.Socket();
      if (this.timeout > 0) socket.setTimeout(this.timeout * 1000);

      const onError = (err: Error) => {
        cleanup();
        socket.destroy();
        reject(
          new ConnectionError(`Cannot open connection to ${this.host}:${this.port}: ${err.message}`, {
            cause: err,
          })
        );
      };

      const onTimeout = () => {
        cleanup();
        socket.destroy();
        reject(new ConnectionError(`Timed out connecting to ${this.host}:${this.port}`));
      };

      const onConnect = () => {
        cleanup();
        socket.setTimeout(0);
        this.attach(socket);
        this.log.debug(`Connected to ${this.host}:${this.port}`);
        this.emit("connect");
        resolve();
      };

      const cleanup = () => {
        socket.removeListener("error", onError);
        socket.removeListener("timeout", onTimeout);
        socket.removeListener("connect", onConnect);
      };

      socket.once("error", onError);
      socket.once("timeout", onTimeout);
      socket.once("connect", onConnect);
      socket.connect(this.port, this.host);
    });
  }

  /** Close the connection; an outstanding request is rejected */
  async disconnect(): Promise<void> {
    const stream = this.stream;
    if (!stream) return;

    const waiter = this.waiter;
    this.detach();
    waiter?.reject(new ConnectionClosedError("Disconnected"));

    if (stream.destroyed) return;
    return new Promise<void>((resolve) => {
      stream.once("close", () => resolve());
      stream.destroy();
    });
  }

  private attach(stream: Duplex): void {
    this.session.reset();
    this.lastError = null;
    this.stream = stream;

    stream.on("data", (chunk: Buffer) => this.onData(chunk));

    stream.on("error", (err: Error) => {
      this.log.debug(`Socket error: ${err.message}`);
      this.fail(new IoError(`Transport error: ${err.message}`, { cause: err }));
    });

    stream.on("close", () => {
      this.log.debug("Socket closed");
      if (this.stream !== stream) return;
      if (this.waiter) {
        this.fail(new ConnectionClosedError("Connection closed on read"));
      } else {
        this.detach();
      }
    });
  }

  private detach(): void {
    const stream = this.stream;
    if (!stream) return;
    this.stream = null;
    this.waiter = null;
    stream.removeAllListeners("data");
    stream.removeAllListeners("close");
    stream.removeAllListeners("error");
    stream.on("error", (err: Error) => {
      this.log.debug(`Socket error after detach: ${err.message}`);
    });
    this.session.reset();
    this.emit("close");
  }

  /** Reject the outstanding request and drop the connection */
  private fail(err: unknown): void {
    const waiter = this.waiter;
    const stream = this.stream;
    this.lastError = err;
    this.detach();
    stream?.destroy();

    if (waiter) {
      waiter.reject(err);
    } else {
      this.log.error(`Connection failed: ${err instanceof Error ? err.message : String(err)}`);
    }
  }

  private onData(chunk: Buffer): void {
    this.log.debug(`[${this.inverterAddress}] RAW RECD: ${chunk.toString("hex")}`);
    this.session.push(chunk);

    while (this.stream) {
      let response: Response | null;
      try {
        response = this.session.decode();
      } catch (err) {
        this.fail(err);
        return;
      }
      if (response === null) return;

      this.emit("response", response);
      this.waiter?.resolve(response);
    }
  }

  // ---------- Request/response ----------

  /** Send a request and wait for its response */
  async request<R extends Request>(
    request: R,
    options: RequestOptions = {}
  ): Promise<ResponseFor<R["kind"]>> {
    const stream = this.stream;
    if (!stream || stream.destroyed) {
      throw new ConnectionClosedError(
        this.lastError instanceof Error
          ? `Connection already closed after: ${this.lastError.message}`
          : "Connection already closed."
      );
    }
    if (this.waiter) {
      const pending = this.session.pending;
      throw new PendingRequestError(pending ? describeRequest(pending) : "unknown");
    }
    const { signal } = options;
    signal?.throwIfAborted();

    const frame = this.session.encode(this.inverterAddress, request);
    this.log.debug(`[${this.inverterAddress}] SENT: ${frame.toString("hex")}`);

    const timeoutMs = options.timeoutMs ?? this.timeout * 1000;

    const response = await new Promise<Response>((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;

      const onAbort = () => this.fail(signal?.reason);

      const cleanup = () => {
        if (timer) clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      };

      this.waiter = {
        resolve: (r: Response) => {
          cleanup();
          this.waiter = null;
          resolve(r);
        },
        reject: (err: unknown) => {
          cleanup();
          this.waiter = null;
          reject(err);
        },
      };

      if (timeoutMs > 0) {
        timer = setTimeout(() => this.fail(new TimeoutError(timeoutMs)), timeoutMs);
      }
      signal?.addEventListener("abort", onAbort, { once: true });

      stream.write(frame, (err) => {
        if (err) {
          this.fail(new IoError(`Write failed: ${err.message}`, { cause: err }));
        }
      });
    });

    const received = response.kind;
    if (!isResponseFor<R["kind"]>(response, request.kind)) {
      throw new UnexpectedResponseError(`Expected ${request.kind} response, got ${received}`);
    }
    return response;
  }

  // ---------- Public Aurora API ----------

  /** Read inverter, DC/DC and global state (command 50) */
  async readState(options?: RequestOptions): Promise<ResponseFor<"state">> {
    return this.request(Request.state(), options);
  }

  /** Read the part number (command 52) */
  async readPartNumber(options?: RequestOptions): Promise<ResponseFor<"partNumber">> {
    return this.request(Request.partNumber(), options);
  }

  /** Read the version parameters (command 58) */
  async readVersion(options?: RequestOptions): Promise<ResponseFor<"version">> {
    return this.request(Request.version(), options);
  }

  /**
   * Read a measurement (command 59)
   *
   * @param global  true for the global value, false for the module value
   */
  async measure(
    type: MeasurementType,
    global = true,
    options?: RequestOptions
  ): Promise<ResponseFor<"measure">> {
    return this.request(Request.measure(type, global), options);
  }

  /** Read the serial number (command 63) */
  async readSerialNumber(options?: RequestOptions): Promise<ResponseFor<"serialNumber">> {
    return this.request(Request.serialNumber(), options);
  }

  /** Read the manufacturing week and year (command 65) */
  async readManufactureDate(
    options?: RequestOptions
  ): Promise<ResponseFor<"manufactureDate">> {
    return this.request(Request.manufactureDate(), options);
  }

  /** Read cumulated energy in Wh for a period (command 78) */
  async readCumulativeEnergy(
    duration: CumulativeDuration,
    options?: RequestOptions
  ): Promise<ResponseFor<"cumulativeEnergy">> {
    return this.request(Request.cumulativeEnergy(duration), options);
  }
}
