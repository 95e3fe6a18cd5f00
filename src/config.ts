/**
 * Monitor configuration, read from a TOML file (Config.toml by default).
 *
 *   tcp_address = "192.168.1.50:4001"
 *   aurora_address = 2
 *   poll_duration = { secs = 300, nanos = 0 }   # or: poll_interval = 300
 *   timeout_mul = 3
 *   crc = "x25"                                 # optional
 *
 *   [pv_output]
 *   system_id = "12345"
 *   api_key = "..."
 */

import { readFile } from "node:fs/promises";
import { parse, TomlError } from "smol-toml";
import { z } from "zod";
import type { CrcVariant } from "./crc.js";
import { ConfigError } from "./errors.js";

export const DEFAULT_CONFIG_PATH = "Config.toml";

// ---------- Schema ----------

const DurationSchema = z.object({
  secs: z.number().int().nonnegative(),
  nanos: z.number().int().nonnegative().max(999_999_999).default(0),
});

const PvOutputSchema = z.object({
  system_id: z.union([z.string().min(1), z.number().int().positive()]).transform(String),
  api_key: z.string().min(1),
});

export const ConfigFileSchema = z
  .object({
    tcp_address: z.string().min(1),
    aurora_address: z.number().int().min(0).max(255),
    poll_duration: DurationSchema.optional(),
    poll_interval: z.number().positive().optional(),
    timeout_mul: z.number().int().min(1),
    crc: z.enum(["x25", "ccitt-false"]).default("x25"),
    pv_output: PvOutputSchema,
  })
  .refine((c) => c.poll_duration !== undefined || c.poll_interval !== undefined, {
    message: "poll_duration or poll_interval is required",
    path: ["poll_duration"],
  });

export type ConfigFile = z.infer<typeof ConfigFileSchema>;

export interface PvOutputConfig {
  systemId: string;
  apiKey: string;
}

export interface Config {
  /** Host of the TCP-to-serial bridge */
  host: string;
  port: number;
  /** Aurora address of the inverter */
  address: number;
  pollIntervalMs: number;
  timeoutMultiplier: number;
  crc: CrcVariant;
  pvOutput: PvOutputConfig;
}

// ---------- Parsing ----------

/** Split "host:port" or "[v6addr]:port" */
export function parseTcpAddress(value: string): { host: string; port: number } {
  const match = /^(?:\[([^\]]+)\]|([^:]+)):(\d{1,5})$/.exec(value.trim());
  const port = match ? Number(match[3]) : NaN;
  if (!match || port < 1 || port > 65535) {
    throw new ConfigError(`tcp_address must be "host:port", got "${value}"`);
  }
  return { host: match[1] ?? match[2], port };
}

function pollIntervalMs(file: ConfigFile): number {
  if (file.poll_duration) {
    return file.poll_duration.secs * 1000 + Math.floor(file.poll_duration.nanos / 1_000_000);
  }
  return (file.poll_interval ?? 0) * 1000;
}

/** Validate and normalize an already parsed TOML document */
export function normalizeConfig(raw: unknown): Config {
  const result = ConfigFileSchema.safeParse(raw);
  if (!result.success) {
    const problems = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }
  const file = result.data;
  const interval = pollIntervalMs(file);
  if (interval <= 0) {
    throw new ConfigError("Invalid configuration: poll interval must be positive");
  }

  return {
    ...parseTcpAddress(file.tcp_address),
    address: file.aurora_address,
    pollIntervalMs: interval,
    timeoutMultiplier: file.timeout_mul,
    crc: file.crc,
    pvOutput: {
      systemId: file.pv_output.system_id,
      apiKey: file.pv_output.api_key,
    },
  };
}

/** Parse TOML text into a Config */
export function parseConfig(text: string): Config {
  let raw: unknown;
  try {
    raw = parse(text);
  } catch (err) {
    if (err instanceof TomlError) {
      throw new ConfigError(`Invalid TOML: ${err.message}`, { cause: err });
    }
    throw err;
  }
  return normalizeConfig(raw);
}

/** Read and parse a TOML config file */
export async function loadConfig(path = DEFAULT_CONFIG_PATH): Promise<Config> {
  let text: string;
  try {
    text = await readFile(path, "utf8");
  } catch (err) {
    throw new ConfigError(
      `Couldn't load config ${path}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return parseConfig(text);
}
