import type { DeviceDiscovery } from "./address.js";
import { SshBackend, type DeviceBackend } from "./backend.js";
import { credentialsFrom, type BrickdevConfig } from "./config.js";
import { NullLogger, type Logger } from "./logger.js";
import { SessionCache } from "./session-cache.js";
import { SessionManager } from "./session.js";
import { SshTransportFactory } from "./ssh-transport.js";
import type { TransportFactory } from "./transport.js";

export type Client = {
  manager: SessionManager;
  cache: SessionCache;
  /** Close every cached connection. */
  shutdown(): Promise<void>;
};

/**
 * Wire a session manager with the SSH backend. The cache is owned by the
 * returned client, so two clients never share connections.
 */
export function createClient({
  config,
  logger = new NullLogger(),
  transport,
  discovery,
  extraBackends = [],
  cwd,
}: {
  config: BrickdevConfig;
  logger?: Logger;
  transport?: TransportFactory;
  discovery?: DeviceDiscovery;
  extraBackends?: DeviceBackend[];
  cwd?: string;
}): Client {
  const cache = new SessionCache({
    factory: transport ?? new SshTransportFactory(logger.child("ssh")),
    credentials: credentialsFrom(config),
    home: config.home,
    probeTimeoutMs: config.probeTimeoutMs,
    logger: logger.child("cache"),
  });
  const ssh = new SshBackend({
    cache,
    config,
    cwd,
    logger: logger.child("session"),
  });
  const manager = new SessionManager({
    backends: [ssh, ...extraBackends],
    discovery,
    logger: logger.child("session"),
  });
  return { manager, cache, shutdown: () => cache.closeAll() };
}
