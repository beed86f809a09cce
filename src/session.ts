import { classifyAddress, type AddressKind, type DeviceDiscovery } from "./address.js";
import type { BackendConnection, DeviceBackend } from "./backend.js";
import { DISCOVERY_TIMEOUT_MS } from "./constants.js";
import {
  DeviceNotFoundError,
  SessionStateError,
  UnsupportedAddressError,
} from "./errors.js";
import { errorMeta, NullLogger, type Logger } from "./logger.js";
import type { RunningProgram } from "./stream-exec.js";
import type { Address, ExecResult } from "./transport.js";

export type SessionState = "connected" | "deploying" | "running" | "disconnected";

/**
 * Connected -> [deploying -> running]* -> disconnected. One operation at a
 * time; a program's output has to be drained (or closed) before the next
 * deploy. Once disconnected the session is dead.
 */
export class DeviceSession {
  private current: SessionState = "connected";
  private readonly deployed = new Set<string>();
  private program: RunningProgram | null = null;

  constructor(
    private readonly connection: BackendConnection,
    private readonly logger: Logger,
  ) {}

  get address(): Address {
    return this.connection.address;
  }

  get state(): SessionState {
    return this.current;
  }

  private expect(op: string, ...allowed: SessionState[]): void {
    if (!allowed.includes(this.current)) {
      throw new SessionStateError(
        `cannot ${op} while session to ${this.address} is ${this.current}`,
      );
    }
  }

  async deploy(localPath: string): Promise<string> {
    this.expect("deploy", "connected");
    this.current = "deploying";
    try {
      const remotePath = await this.connection.deploy(localPath);
      this.deployed.add(remotePath);
      return remotePath;
    } finally {
      if (this.current === "deploying") this.current = "connected";
    }
  }

  async runDeployed(
    remotePath: string,
    opts: { signal?: AbortSignal } = {},
  ): Promise<RunningProgram> {
    this.expect("run", "connected");
    if (!this.deployed.has(remotePath)) {
      throw new SessionStateError(`${remotePath} was not deployed in this session`);
    }
    this.current = "running";
    let program: RunningProgram;
    try {
      program = await this.connection.run(remotePath, opts);
    } catch (err) {
      this.current = "connected";
      throw err;
    }
    const lines = this.track(program.lines);
    const tracked: RunningProgram = {
      ...program,
      lines,
      close: async () => {
        await lines.return(undefined);
        await program.close();
        this.finishRun();
      },
    };
    this.program = tracked;
    return tracked;
  }

  /** Deploy localPath, run it and hand every output line to onLine. Returns the exit status. */
  async deployAndRun(
    localPath: string,
    onLine: (line: string) => void,
    opts: { signal?: AbortSignal } = {},
  ): Promise<number | null> {
    const remotePath = await this.deploy(localPath);
    const program = await this.runDeployed(remotePath, opts);
    for await (const line of program.lines) {
      onLine(line);
    }
    return program.exitStatus();
  }

  async exec(command: string): Promise<ExecResult> {
    this.expect("exec", "connected");
    return this.connection.exec(command);
  }

  /** Safe after any failure and when already disconnected. */
  async disconnect(): Promise<void> {
    if (this.current === "disconnected") return;
    this.current = "disconnected";
    const program = this.program;
    this.program = null;
    if (program) {
      try {
        await program.close();
      } catch (err) {
        this.logger.debug("closing program failed", errorMeta(err));
      }
    }
    await this.connection.disconnect();
  }

  private finishRun(): void {
    this.program = null;
    if (this.current === "running") this.current = "connected";
  }

  private async *track(
    lines: AsyncGenerator<string, void, undefined>,
  ): AsyncGenerator<string, void, undefined> {
    try {
      yield* lines;
    } finally {
      this.finishRun();
    }
  }
}

export type SessionManagerOptions = {
  backends: DeviceBackend[];
  discovery?: DeviceDiscovery;
  discoveryTimeoutMs?: number;
  logger?: Logger;
};

/** Picks the backend for an address and hands out sessions. */
export class SessionManager {
  private readonly backends = new Map<AddressKind, DeviceBackend>();
  private readonly logger: Logger;

  constructor(private readonly opts: SessionManagerOptions) {
    for (const backend of opts.backends) {
      this.backends.set(backend.kind, backend);
    }
    this.logger = opts.logger ?? new NullLogger();
  }

  async resolve(address: Address): Promise<{ address: Address; kind: AddressKind }> {
    const trimmed = address.trim();
    const kind = classifyAddress(trimmed);
    if (kind !== "name") return { address: trimmed, kind };

    const { discovery, discoveryTimeoutMs = DISCOVERY_TIMEOUT_MS } = this.opts;
    if (!discovery) {
      throw new DeviceNotFoundError(
        `'${trimmed}' is not an address and no device discovery is available`,
        trimmed,
      );
    }
    this.logger.info("searching for device", { name: trimmed });
    const found = await discovery.find(trimmed, discoveryTimeoutMs);
    if (!found) {
      throw new DeviceNotFoundError(
        `no device named '${trimmed}' found within ${discoveryTimeoutMs}ms`,
        trimmed,
      );
    }
    const foundKind = classifyAddress(found);
    if (foundKind === "name") {
      throw new DeviceNotFoundError(
        `discovery returned '${found}' for '${trimmed}', which is not an address`,
        trimmed,
      );
    }
    return { address: found, kind: foundKind };
  }

  async connect(address: Address): Promise<DeviceSession> {
    const resolved = await this.resolve(address);
    const backend = this.backends.get(resolved.kind);
    if (!backend) {
      throw new UnsupportedAddressError(
        `no backend for ${resolved.kind} address ${resolved.address}`,
        resolved.address,
      );
    }
    const connection = await backend.connect(resolved.address);
    return new DeviceSession(connection, this.logger);
  }
}
