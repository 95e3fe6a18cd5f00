/**
 * PVOutput.org status upload.
 */

import { format } from "date-fns";
import { UploadError } from "./errors.js";
import { resolveLogger, type Logger } from "./logger.js";
import type { PvOutputConfig } from "./config.js";
import type { EnergyVoltageReading } from "./poller.js";

export const PVOUTPUT_ADD_STATUS_URL = "https://pvoutput.org/service/r2/addstatus.jsp";

export interface UploaderOptions {
  /** Endpoint override. Default: PVOUTPUT_ADD_STATUS_URL */
  url?: string;
  /** fetch implementation. Default: global fetch */
  fetch?: typeof fetch;
  /** Clock used to stamp the status. Default: current time */
  now?: () => Date;
  verbose?: boolean;
  logger?: Logger;
}

/**
 * Form body for addstatus: date, time, energy generation (v1, Wh) and
 * voltage (v6, V), in local time.
 */
export function formatStatusBody(reading: EnergyVoltageReading, date: Date): string {
  const voltage = Math.round(reading.voltage * 100) / 100;
  return (
    `d=${format(date, "yyyyMMdd")}` +
    `&t=${format(date, "HH:mm")}` +
    `&v1=${reading.energy}` +
    `&v6=${voltage}`
  );
}

export class PvOutputUploader {
  public readonly url: string;

  private readonly config: PvOutputConfig;
  private readonly fetchFn: typeof fetch;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(config: PvOutputConfig, options: UploaderOptions = {}) {
    this.config = config;
    this.url = options.url ?? PVOUTPUT_ADD_STATUS_URL;
    this.fetchFn = options.fetch ?? ((input, init) => fetch(input, init));
    this.now = options.now ?? (() => new Date());
    this.log = resolveLogger(options);
  }

  /**
   * Upload one reading.
   *
   * @returns true when PVOutput accepted the status, false when it answered
   *          with an error status (logged, not thrown)
   */
  async upload(reading: EnergyVoltageReading): Promise<boolean> {
    const body = formatStatusBody(reading, this.now());
    this.log.debug(`Body: ${body}`);

    let res: Awaited<ReturnType<typeof fetch>>;
    try {
      res = await this.fetchFn(this.url, {
        method: "POST",
        headers: {
          "X-Pvoutput-Apikey": this.config.apiKey,
          "X-Pvoutput-SystemId": this.config.systemId,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body,
      });
    } catch (err) {
      throw new UploadError(
        `Failed to upload an inverter reading: ${err instanceof Error ? err.message : String(err)}`,
        { cause: err }
      );
    }

    if (!res.ok) {
      let detail = "";
      try {
        detail = (await res.text()).trim();
      } catch (err) {
        this.log.debug(
          `Could not read the error body: ${err instanceof Error ? err.message : String(err)}`
        );
      }
      this.log.warn(
        `Failed to upload status (HTTP ${res.status}${detail ? `: ${detail}` : ""}), continuing`
      );
      return false;
    }
    return true;
  }
}
