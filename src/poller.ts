/**
 * Energy/voltage polling.
 *
 * Each tick asks the inverter for today's cumulated energy, then for the
 * global input 1 voltage, and yields the pair. Ticks are spaced by a
 * TickThrottle; a tick that does not complete within
 * `intervalMs × timeoutMultiplier` of its first request ends the stream
 * with a TimeoutError. Any failure ends the stream, nothing is retried.
 *
 *   idle → requestingEnergy → requestingVoltage → emit → idle
 *                 └──────────────┴──────────────→ failed
 */

import type { InverterService } from "./client.js";
import { AuroraError, TimeoutError } from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import {
  CumulativeDuration,
  MeasurementType,
  Request,
  describeRequest,
  type ResponseFor,
} from "./protocol.js";
import { TickThrottle } from "./throttle.js";

export type PollerState =
  | "idle"
  | "requestingEnergy"
  | "requestingVoltage"
  | "emit"
  | "failed";

export interface EnergyVoltageReading {
  /** Energy produced today, Wh */
  energy: number;
  /** Input 1 voltage, V */
  voltage: number;
}

export interface PollerOptions {
  /** Time between ticks in milliseconds */
  intervalMs: number;
  /** Number of intervals a tick may take before timing out */
  timeoutMultiplier: number;
  /** Initial ticks exempt from throttling. Default: 2 */
  skips?: number;
  /** Called on every state transition */
  onStateChange?: (state: PollerState, previous: PollerState) => void;
  verbose?: boolean;
  logger?: Logger;
}

/** Reject with the signal's reason once it aborts */
function aborted(signal: AbortSignal): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

export class EnergyVoltagePoller {
  public readonly timeoutMs: number;

  private readonly service: InverterService;
  private readonly throttle: TickThrottle;
  private readonly log: Logger;
  private readonly onStateChange?: (state: PollerState, previous: PollerState) => void;
  private current: PollerState = "idle";
  private started = false;
  private tickCount = 0;

  constructor(service: InverterService, options: PollerOptions) {
    if (!Number.isInteger(options.timeoutMultiplier) || options.timeoutMultiplier < 1) {
      throw new RangeError(`Invalid timeout multiplier: ${options.timeoutMultiplier}`);
    }
    this.service = service;
    this.throttle = new TickThrottle(options.intervalMs, options.skips ?? 2);
    this.timeoutMs = options.intervalMs * options.timeoutMultiplier;
    this.onStateChange = options.onStateChange;
    this.log = resolveLogger(options);
  }

  get state(): PollerState {
    return this.current;
  }

  /** Completed ticks so far */
  get ticks(): number {
    return this.tickCount;
  }

  /**
   * Unbounded stream of readings, one per tick. Ends only by throwing the
   * failure that stopped it. A poller can be iterated once.
   */
  async *readings(): AsyncGenerator<EnergyVoltageReading, void, undefined> {
    if (this.started) {
      throw new AuroraError("Poller already started; create a new poller to restart");
    }
    this.started = true;

    try {
      for (;;) {
        await this.throttle.wait();
        const reading = await this.tick();
        this.tickCount++;
        this.throttle.complete();
        this.transition("emit");
        yield reading;
        this.transition("idle");
      }
    } catch (err) {
      this.transition("failed");
      this.log.error(
        `Polling stopped: ${err instanceof Error ? err.message : String(err)}`
      );
      throw err;
    }
  }

  private transition(next: PollerState): void {
    const previous = this.current;
    this.current = next;
    this.log.debug(`poller: ${previous} -> ${next}`);
    this.onStateChange?.(next, previous);
  }

  private async tick(): Promise<EnergyVoltageReading> {
    const controller = new AbortController();
    const timeoutMs = this.timeoutMs;
    const timer = setTimeout(
      () => controller.abort(new TimeoutError(timeoutMs, `Tick did not complete within ${timeoutMs}ms`)),
      timeoutMs
    );

    try {
      this.transition("requestingEnergy");
      const energy = await this.call(
        Request.cumulativeEnergy(CumulativeDuration.Daily),
        controller.signal
      );

      this.transition("requestingVoltage");
      const voltage = await this.call(
        Request.measure(MeasurementType.Input1Voltage, true),
        controller.signal
      );

      return { energy: energy.value, voltage: voltage.value };
    } finally {
      clearTimeout(timer);
    }
  }

  private async call<R extends Request>(
    request: R,
    signal: AbortSignal
  ): Promise<ResponseFor<R["kind"]>> {
    this.log.debug(`poller: requesting ${describeRequest(request)}`);
    return Promise.race([
      this.service.request(request, { signal, timeoutMs: 0 }),
      aborted(signal),
    ]);
  }
}
