/**
 * Configuration loader for the LanWake CLI.
 * Reads lanwake.yaml from the working directory or ~/.lanwake/config.yaml.
 * Validates with Zod and provides typed defaults.
 */

import { existsSync, readFileSync } from "fs";
import { homedir } from "os";
import { join } from "path";

import yaml from "js-yaml";
import { z } from "zod";

import { ConfigurationError } from "@lanwake/core";
import { parseSocketAddress, type AddressRole } from "./address.js";

// ── Zod schema ───────────────────────────────────────────────────────────────

/** Six hex octets joined by one consistent ':', '-' or '/'. */
export const MAC_PATTERN = /^[\da-f]{2}([:\-/])[\da-f]{2}(?:\1[\da-f]{2}){4}$/i;

const socketAddressSchema = (role: AddressRole) =>
  z.string().transform((value, ctx) => {
    try {
      return parseSocketAddress(value, role);
    } catch (err) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: err instanceof Error ? err.message : String(err),
      });
      return z.NEVER;
    }
  });

const DeviceSchema = z.object({
  mac: z.string().regex(MAC_PATTERN, "expected six hex octets joined by ':', '-' or '/'"),
  destination: socketAddressSchema("destination").optional(),
  description: z.string().optional(),
});

const DefaultsSchema = z.object({
  source: socketAddressSchema("source").default("0.0.0.0:0"),
  destination: socketAddressSchema("destination").default("255.255.255.255:9"),
});

const ConfigSchema = z.object({
  defaults: DefaultsSchema.default({}),
  devices: z.record(DeviceSchema).default({}),
});

export type LanWakeConfig = z.infer<typeof ConfigSchema>;
export type DeviceConfig = z.infer<typeof DeviceSchema>;

// ── YAML key → camelCase mapping ─────────────────────────────────────────────

function camel(key: string): string {
  return key.replace(/_([a-z])/g, (_, c: string) => c.toUpperCase());
}

/** Convert snake_case YAML keys to camelCase for Zod schema. */
function toCamel(obj: unknown): unknown {
  if (Array.isArray(obj)) return obj.map(toCamel);
  if (isRecord(obj)) {
    return Object.fromEntries(Object.entries(obj).map(([k, v]) => [camel(k), toCamel(v)]));
  }
  return obj;
}

/** Like toCamel, but device names are user data and keep their spelling. */
function normalizeKeys(raw: unknown): unknown {
  if (!isRecord(raw)) return raw;
  return Object.fromEntries(
    Object.entries(raw).map(([k, v]) => {
      const key = camel(k);
      if (key === "devices" && isRecord(v)) {
        return [key, Object.fromEntries(Object.entries(v).map(([name, d]) => [name, toCamel(d)]))];
      }
      return [key, toCamel(v)];
    }),
  );
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// ── Loader ───────────────────────────────────────────────────────────────────

const SEARCH_PATHS = [
  "lanwake.yaml",
  "config/lanwake.yaml",
  join(homedir(), ".lanwake", "config.yaml"),
];

export function loadConfig(configPath?: string): LanWakeConfig {
  const paths = configPath ? [configPath] : SEARCH_PATHS;
  const found = paths.find((p) => existsSync(p));

  if (!found) {
    if (configPath) {
      throw new ConfigurationError(`Config file not found: '${configPath}'`);
    }
    return ConfigSchema.parse({});
  }

  let raw: unknown;
  try {
    raw = yaml.load(readFileSync(found, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to read config at '${found}': ${String(err)}`);
  }

  return parseConfig(raw ?? {}, found);
}

/** Validate an already-loaded YAML document. */
export function parseConfig(raw: unknown, origin = "<inline>"): LanWakeConfig {
  const result = ConfigSchema.safeParse(normalizeKeys(raw));
  if (!result.success) {
    const issues = result.error.issues.map((i) => `  ${i.path.join(".")}: ${i.message}`).join("\n");
    throw new ConfigurationError(`Invalid configuration in '${origin}':\n${issues}`);
  }
  return result.data;
}

export const defaultConfig: LanWakeConfig = ConfigSchema.parse({});
