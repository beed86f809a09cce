export const CLI_NAME = "brickdev";

// ev3dev ships with this account enabled
export const DEFAULT_USER = "robot";
export const DEFAULT_PASSWORD = "maker";
export const DEFAULT_HOME = "/home/robot";
export const DEFAULT_SSH_PORT = 22;

export const DEFAULT_RUNNER = "brickrun -r -- pybricks-micropython";
export const DEFAULT_MPY_CROSS = "mpy-cross";
export const BUILD_DIR = "build";

export const PROBE_TIMEOUT_MS = 2_000;
export const CONNECT_TIMEOUT_MS = 10_000;
// how long a single read of the diagnostic stream may wait before we
// check whether the remote process has already exited
export const POLL_INTERVAL_MS = 100;
export const DISCOVERY_TIMEOUT_MS = 5_000;
