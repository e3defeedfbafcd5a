import fs from "node:fs";
import path from "node:path";
import type { AngleConvention, MotionConfig, SimulationMode } from "@/lib/types";

export class InvalidConfigurationError extends Error {
  readonly code = "INVALID_CONFIGURATION";
  readonly details?: unknown;

  constructor(message: string, details?: unknown) {
    super(message);
    this.details = details;
  }
}

export const DEFAULT_MOTION_CONFIG: Readonly<MotionConfig> = Object.freeze({
  linearSpeed: 500,
  angularSpeed: 90,
  positionEpsilon: 1,
  angleEpsilon: 0.5,
  speedMultiplier: 1,
  tickRate: 60,
  mode: "live",
  convention: "math"
});

const POSITIVE_FIELDS = [
  "linearSpeed",
  "angularSpeed",
  "positionEpsilon",
  "angleEpsilon",
  "speedMultiplier",
  "tickRate"
] as const;

const ENV_KEYS: Record<(typeof POSITIVE_FIELDS)[number], string> = {
  linearSpeed: "SIM_LINEAR_SPEED",
  angularSpeed: "SIM_ANGULAR_SPEED",
  positionEpsilon: "SIM_POSITION_EPSILON",
  angleEpsilon: "SIM_ANGLE_EPSILON",
  speedMultiplier: "SIM_SPEED_MULTIPLIER",
  tickRate: "SIM_TICK_RATE"
};

export function isSimulationMode(value: unknown): value is SimulationMode {
  return value === "live" || value === "instant";
}

export function isAngleConvention(value: unknown): value is AngleConvention {
  return value === "math" || value === "compass";
}

export function validateMotionConfig(config: MotionConfig): void {
  for (const field of POSITIVE_FIELDS) {
    const value = config[field];
    if (typeof value !== "number" || !Number.isFinite(value) || value <= 0) {
      throw new InvalidConfigurationError(`${field} must be a positive finite number.`, { field, value });
    }
  }

  if (!isSimulationMode(config.mode)) {
    throw new InvalidConfigurationError("mode must be 'live' or 'instant'.", { field: "mode", value: config.mode });
  }

  if (!isAngleConvention(config.convention)) {
    throw new InvalidConfigurationError("convention must be 'math' or 'compass'.", {
      field: "convention",
      value: config.convention
    });
  }
}

export function createMotionConfig(overrides: Partial<MotionConfig> = {}): Readonly<MotionConfig> {
  const config: MotionConfig = { ...DEFAULT_MOTION_CONFIG, ...overrides };
  validateMotionConfig(config);
  return Object.freeze(config);
}

const KNOWN_ENV_KEYS: ReadonlySet<string> = new Set([...Object.values(ENV_KEYS), "SIM_MODE", "SIM_ANGLE_CONVENTION"]);

/**
 * Reads the `SIM_*` entries of a dotenv file. Other keys and lines without
 * `=` belong to other tools and are ignored; an unknown `SIM_*` key is
 * rejected with its line number.
 */
export function parseDotEnv(text: string, source = ".env"): Record<string, string> {
  const result: Record<string, string> = {};
  text.split(/\r?\n/).forEach((rawLine, index) => {
    const line = rawLine.trim().replace(/^export\s+/, "");
    const eq = line.indexOf("=");
    if (!line || line.startsWith("#") || eq <= 0) return;

    const key = line.slice(0, eq).trim();
    if (!key.startsWith("SIM_")) return;
    if (!KNOWN_ENV_KEYS.has(key)) {
      throw new InvalidConfigurationError(`Unknown setting ${key} in ${source}.`, { source, line: index + 1, key });
    }

    let value = line.slice(eq + 1).trim();
    if ((value.startsWith("\"") && value.endsWith("\"")) || (value.startsWith("'") && value.endsWith("'"))) {
      value = value.slice(1, -1);
    }
    result[key] = value;
  });
  return result;
}

export function loadFileEnv(cwd: string = process.cwd()): Record<string, string> {
  const candidates = [path.join(cwd, ".env"), path.join(cwd, ".env.local")];

  const merged: Record<string, string> = {};
  for (const file of candidates) {
    if (!fs.existsSync(file)) continue;
    Object.assign(merged, parseDotEnv(fs.readFileSync(file, "utf8"), path.basename(file)));
  }
  return merged;
}

function parseNumber(key: string, raw: string): number {
  const value = Number(raw);
  if (!raw.trim() || !Number.isFinite(value)) {
    throw new InvalidConfigurationError(`${key} must be a number.`, { key, value: raw });
  }
  return value;
}

/**
 * Reads overrides from the environment. Process variables win over `.env`
 * files; `.env.local` wins over `.env`. Empty values are ignored.
 */
export function readEnvOverrides(
  env: NodeJS.ProcessEnv = process.env,
  fileEnv: Record<string, string> = loadFileEnv()
): Partial<MotionConfig> {
  const lookup = (key: string): string | undefined => {
    const runtime = env[key];
    if (typeof runtime === "string" && runtime.trim()) {
      return runtime.trim();
    }
    const fromFile = fileEnv[key];
    return typeof fromFile === "string" && fromFile.trim() ? fromFile.trim() : undefined;
  };

  const overrides: Partial<MotionConfig> = {};
  for (const field of POSITIVE_FIELDS) {
    const raw = lookup(ENV_KEYS[field]);
    if (raw !== undefined) {
      overrides[field] = parseNumber(ENV_KEYS[field], raw);
    }
  }

  const mode = lookup("SIM_MODE");
  if (mode !== undefined) {
    if (!isSimulationMode(mode)) {
      throw new InvalidConfigurationError("SIM_MODE must be 'live' or 'instant'.", { key: "SIM_MODE", value: mode });
    }
    overrides.mode = mode;
  }

  const convention = lookup("SIM_ANGLE_CONVENTION");
  if (convention !== undefined) {
    if (!isAngleConvention(convention)) {
      throw new InvalidConfigurationError("SIM_ANGLE_CONVENTION must be 'math' or 'compass'.", {
        key: "SIM_ANGLE_CONVENTION",
        value: convention
      });
    }
    overrides.convention = convention;
  }

  return overrides;
}

export function loadMotionConfig(
  overrides: Partial<MotionConfig> = {},
  env: NodeJS.ProcessEnv = process.env,
  fileEnv: Record<string, string> = loadFileEnv()
): Readonly<MotionConfig> {
  return createMotionConfig({ ...readEnvOverrides(env, fileEnv), ...overrides });
}
