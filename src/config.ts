import path from "node:path";
import {
  CONNECT_TIMEOUT_MS,
  DEFAULT_HOME,
  DEFAULT_MPY_CROSS,
  DEFAULT_PASSWORD,
  DEFAULT_RUNNER,
  DEFAULT_SSH_PORT,
  DEFAULT_USER,
  POLL_INTERVAL_MS,
  PROBE_TIMEOUT_MS,
} from "./constants.js";

export type BrickdevConfig = {
  username: string;
  password: string;
  port: number;
  home: string;
  probeTimeoutMs: number;
  connectTimeoutMs: number;
  pollIntervalMs: number;
  runner: string;
  mpyCross: string;
};

export type Credentials = Pick<
  BrickdevConfig,
  "username" | "password" | "port" | "connectTimeoutMs"
>;

export const DEFAULT_CONFIG: Readonly<BrickdevConfig> = Object.freeze({
  username: DEFAULT_USER,
  password: DEFAULT_PASSWORD,
  port: DEFAULT_SSH_PORT,
  home: DEFAULT_HOME,
  probeTimeoutMs: PROBE_TIMEOUT_MS,
  connectTimeoutMs: CONNECT_TIMEOUT_MS,
  pollIntervalMs: POLL_INTERVAL_MS,
  runner: DEFAULT_RUNNER,
  mpyCross: DEFAULT_MPY_CROSS,
});

type NumericKey = "port" | "probeTimeoutMs" | "connectTimeoutMs" | "pollIntervalMs";
type StringKey = Exclude<keyof BrickdevConfig, NumericKey>;

const STRING_ENV: [StringKey, string][] = [
  ["username", "BRICKDEV_USER"],
  ["password", "BRICKDEV_PASSWORD"],
  ["home", "BRICKDEV_HOME"],
  ["runner", "BRICKDEV_RUNNER"],
  ["mpyCross", "BRICKDEV_MPY_CROSS"],
];

const NUMERIC_ENV: [NumericKey, string][] = [
  ["port", "BRICKDEV_PORT"],
  ["probeTimeoutMs", "BRICKDEV_PROBE_TIMEOUT_MS"],
  ["connectTimeoutMs", "BRICKDEV_CONNECT_TIMEOUT_MS"],
  ["pollIntervalMs", "BRICKDEV_POLL_INTERVAL_MS"],
];

export function parsePositiveInt(raw: string, label: string): number {
  const trimmed = raw.trim();
  const n = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || !Number.isSafeInteger(n) || n <= 0) {
    throw new Error(`${label} must be a positive integer (got '${raw}')`);
  }
  return n;
}

export function loadConfig({
  env = process.env,
  overrides = {},
}: {
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<BrickdevConfig>;
} = {}): BrickdevConfig {
  const config: BrickdevConfig = { ...DEFAULT_CONFIG };

  // precedence: defaults < environment < explicit overrides
  for (const [key, name] of STRING_ENV) {
    const fromEnv = env[name]?.trim();
    if (fromEnv) config[key] = fromEnv;
    const explicit = overrides[key];
    if (explicit !== undefined) config[key] = explicit;
  }
  for (const [key, name] of NUMERIC_ENV) {
    const fromEnv = env[name];
    if (fromEnv != null && fromEnv.trim() !== "") {
      config[key] = parsePositiveInt(fromEnv, name);
    }
    const explicit = overrides[key];
    if (explicit !== undefined) {
      config[key] = parsePositiveInt(String(explicit), key);
    }
  }

  if (!path.posix.isAbsolute(config.home)) {
    throw new Error(`remote home must be an absolute path (got '${config.home}')`);
  }
  config.home = path.posix.normalize(config.home);
  return config;
}

export function credentialsFrom(config: BrickdevConfig): Credentials {
  const { username, password, port, connectTimeoutMs } = config;
  return { username, password, port, connectTimeoutMs };
}
