#!/usr/bin/env node

/**
 * aurora CLI – query Aurora protocol inverters through a TCP-to-serial
 * bridge, and run the PVOutput monitor.
 */

import { Command, InvalidArgumentError } from "commander";
import { AuroraClient } from "./client.js";
import { loadConfig, DEFAULT_CONFIG_PATH } from "./config.js";
import { encodeRequest } from "./codec.js";
import { isCrcVariant, type CrcVariant } from "./crc.js";
import { parseRequest, summarizeResponse } from "./format.js";
import { createConsoleLogger, nullLogger } from "./logger.js";
import { runMonitor } from "./monitor.js";
import type { Request } from "./protocol.js";

interface ConnectionOpts {
  host: string;
  port: number;
  address: number;
  timeout: number;
  crc: CrcVariant;
  verbose: boolean;
}

function parseCrc(value: string): CrcVariant {
  if (!isCrcVariant(value)) {
    throw new InvalidArgumentError("Expected x25 or ccitt-false.");
  }
  return value;
}

const parseDecimal = (v: string) => parseInt(v, 10);

function connectionCommand(program: Command, name: string, description: string): Command {
  return program
    .command(name)
    .description(description)
    .requiredOption("-H, --host <host>", "Host of the TCP-serial bridge")
    .option("-p, --port <number>", "TCP port", parseDecimal, 4001)
    .option("-a, --address <number>", "Aurora address of the inverter", parseDecimal, 2)
    .option("-t, --timeout <number>", "Response timeout in seconds", parseDecimal, 60)
    .option("--crc <variant>", "CRC-16 variant (x25 | ccitt-false)", parseCrc, "x25")
    .option("-v, --verbose", "Enable verbose logging", false);
}

/** Connect, send one request, print the response as JSON */
async function query(opts: ConnectionOpts, request: Request): Promise<void> {
  const client = new AuroraClient(opts.host, {
    port: opts.port,
    address: opts.address,
    timeout: opts.timeout,
    crc: opts.crc,
    verbose: opts.verbose,
  });
  try {
    await client.connect();
    const response = await client.request(request);
    console.log(JSON.stringify(summarizeResponse(response)));
  } catch (err) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exitCode = 1;
  } finally {
    await client.disconnect();
  }
}

const program = new Command();

program
  .name("aurora")
  .description("CLI for Aurora protocol solar inverters behind a TCP-serial bridge")
  .version("0.1.0");

// ---------- run ----------

program
  .command("run")
  .description("Poll energy and voltage and upload them to PVOutput")
  .option("-c, --config <path>", "TOML configuration file", DEFAULT_CONFIG_PATH)
  .option("-v, --verbose", "Enable verbose logging", false)
  .action(async (opts: { config: string; verbose: boolean }) => {
    const log = createConsoleLogger();
    try {
      const config = await loadConfig(opts.config);
      await runMonitor(config, {
        logger: opts.verbose ? log : { ...nullLogger, info: log.info, warn: log.warn, error: log.error },
      });
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

// ---------- one-shot queries ----------

connectionCommand(program, "state", "Read global, inverter and DC/DC state (command 50)").action(
  (opts: ConnectionOpts) => query(opts, parseRequest("state"))
);

connectionCommand(program, "part-number", "Read the part number (command 52)").action(
  (opts: ConnectionOpts) => query(opts, parseRequest("part-number"))
);

connectionCommand(program, "version", "Read the version parameters (command 58)").action(
  (opts: ConnectionOpts) => query(opts, parseRequest("version"))
);

connectionCommand(program, "measure", "Read a measurement (command 59)")
  .argument("<type>", "Measurement type name or code (e.g. input1-voltage, 23)")
  .option("--module", "Read the module value instead of the global one", false)
  .action(async (type: string, opts: ConnectionOpts & { module: boolean }) => {
    try {
      await query(opts, parseRequest("measure", type, !opts.module));
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

connectionCommand(program, "serial-number", "Read the serial number (command 63)").action(
  (opts: ConnectionOpts) => query(opts, parseRequest("serial-number"))
);

connectionCommand(program, "manufacture-date", "Read manufacturing week and year (command 65)").action(
  (opts: ConnectionOpts) => query(opts, parseRequest("manufacture-date"))
);

connectionCommand(program, "energy", "Read cumulated energy in Wh (command 78)")
  .argument("[period]", "daily | weekly | monthly | yearly | total | since-reset", "daily")
  .action(async (period: string, opts: ConnectionOpts) => {
    try {
      await query(opts, parseRequest("energy", period));
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
      process.exitCode = 1;
    }
  });

// ---------- frame ----------

program
  .command("frame")
  .description("Print the encoded request frame as hex, without connecting")
  .argument("<request>", "state | part-number | version | measure | serial-number | manufacture-date | energy")
  .argument("[arg]", "Measurement type or energy period")
  .option("-a, --address <number>", "Aurora address of the inverter", parseDecimal, 2)
  .option("--module", "Measure the module value instead of the global one", false)
  .option("--crc <variant>", "CRC-16 variant (x25 | ccitt-false)", parseCrc, "x25")
  .action(
    (
      name: string,
      arg: string | undefined,
      opts: { address: number; module: boolean; crc: CrcVariant }
    ) => {
      try {
        const frame = encodeRequest(opts.address, parseRequest(name, arg, !opts.module), opts.crc);
        console.log(frame.toString("hex").replace(/(..)(?!$)/g, "$1 "));
      } catch (err) {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
      }
    }
  );

await program.parseAsync();
