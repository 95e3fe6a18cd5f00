/**
 * Monitor loop: connect to the bridge, poll energy/voltage, upload every
 * reading to PVOutput. Returns only by throwing the failure that ended the
 * polling stream; reconnecting is left to whatever supervises the process.
 */

import { AuroraClient } from "./client.js";
import type { Config } from "./config.js";
import { resolveLogger, type Logger } from "./logger.js";
import { EnergyVoltagePoller, type EnergyVoltageReading } from "./poller.js";
import { PvOutputUploader } from "./upload.js";

export interface MonitorOptions {
  /** Initial readings taken without waiting a poll interval. Default: 2 */
  skips?: number;
  /** fetch used for uploads. Default: global fetch */
  fetch?: typeof fetch;
  /** Called after each reading has been handed to the uploader */
  onReading?: (reading: EnergyVoltageReading, uploaded: boolean) => void;
  verbose?: boolean;
  logger?: Logger;
}

export async function runMonitor(config: Config, options: MonitorOptions = {}): Promise<void> {
  const log = resolveLogger(options);

  const client = new AuroraClient(config.host, {
    port: config.port,
    address: config.address,
    crc: config.crc,
    timeout: Math.ceil((config.pollIntervalMs * config.timeoutMultiplier) / 1000),
    logger: log,
  });
  const uploader = new PvOutputUploader(config.pvOutput, {
    fetch: options.fetch,
    logger: log,
  });

  await client.connect();
  log.info(`Connected to ${config.host}:${config.port}`);

  try {
    const poller = new EnergyVoltagePoller(client, {
      intervalMs: config.pollIntervalMs,
      timeoutMultiplier: config.timeoutMultiplier,
      skips: options.skips ?? 2,
      logger: log,
    });

    for await (const reading of poller.readings()) {
      log.info(`${reading.energy}Wh, ${reading.voltage}V`);
      const uploaded = await uploader.upload(reading);
      options.onReading?.(reading, uploaded);
    }
  } finally {
    await client.disconnect();
  }
}
