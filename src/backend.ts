import path from "node:path";
import type { AddressKind } from "./address.js";
import type { BrickdevConfig } from "./config.js";
import { TransferError } from "./errors.js";
import { errorMeta, NullLogger, type Logger } from "./logger.js";
import { ensureRemoteDir, remotePathFor } from "./remote-fs.js";
import type { SessionCache } from "./session-cache.js";
import { runStreaming, type RunningProgram } from "./stream-exec.js";
import type { Address, ExecResult, TransportHandle } from "./transport.js";
import { shellQuote } from "./util.js";

/** One live connection as seen by a session. */
export interface BackendConnection {
  readonly address: Address;
  /**
   * Copy localPath (relative to the working directory) to the device,
   * mirroring its directories, and return the remote path.
   */
  deploy(localPath: string): Promise<string>;
  run(remotePath: string, opts?: { signal?: AbortSignal }): Promise<RunningProgram>;
  exec(command: string): Promise<ExecResult>;
  /** Best effort, never throws. */
  disconnect(): Promise<void>;
}

export interface DeviceBackend {
  readonly kind: AddressKind;
  connect(address: Address): Promise<BackendConnection>;
}

type SshBackendOptions = {
  cache: SessionCache;
  config: Pick<BrickdevConfig, "home" | "runner" | "pollIntervalMs">;
  /** Base for relative local paths; defaults to process.cwd(). */
  cwd?: string;
  logger?: Logger;
};

class SshConnection implements BackendConnection {
  constructor(
    private readonly handle: TransportHandle,
    private readonly opts: SshBackendOptions,
    private readonly logger: Logger,
  ) {}

  get address(): Address {
    return this.handle.address;
  }

  async deploy(localPath: string): Promise<string> {
    const { home } = this.opts.config;
    const cwd = this.opts.cwd ?? process.cwd();
    const localAbs = path.resolve(cwd, localPath);
    let rel = path.relative(cwd, localAbs);
    // nothing to mirror for files outside the working directory
    if (rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) {
      rel = path.basename(localAbs);
    }
    const remotePath = remotePathFor(home, rel);

    await ensureRemoteDir(this.handle, rel, { home, logger: this.logger });

    const channel = this.handle.fileChannel ?? (await this.handle.openFileChannel());
    try {
      await channel.put(localAbs, remotePath);
    } catch (err) {
      throw new TransferError(
        `could not upload ${localPath} to ${this.address}:${remotePath}`,
        localAbs,
        remotePath,
        { cause: err },
      );
    }
    this.logger.info("uploaded", { local: rel, remote: remotePath });
    return remotePath;
  }

  run(remotePath: string, opts: { signal?: AbortSignal } = {}): Promise<RunningProgram> {
    const command = `${this.opts.config.runner} ${shellQuote(remotePath)}`;
    return runStreaming(this.handle, command, {
      pollIntervalMs: this.opts.config.pollIntervalMs,
      signal: opts.signal,
      logger: this.logger,
    });
  }

  exec(command: string): Promise<ExecResult> {
    return this.handle.exec(command);
  }

  async disconnect(): Promise<void> {
    const { handle } = this;
    try {
      await handle.fileChannel?.close();
    } catch (err) {
      this.logger.warn("closing file transfer failed", {
        address: this.address,
        ...errorMeta(err),
      });
    }
    try {
      await handle.close();
    } catch (err) {
      this.logger.warn("closing connection failed", {
        address: this.address,
        ...errorMeta(err),
      });
    } finally {
      this.opts.cache.evict(handle.address, handle);
    }
    this.logger.info("disconnected", { address: this.address });
  }
}

export class SshBackend implements DeviceBackend {
  readonly kind = "network";
  private readonly logger: Logger;

  constructor(private readonly opts: SshBackendOptions) {
    this.logger = opts.logger ?? new NullLogger();
  }

  async connect(address: Address): Promise<BackendConnection> {
    const handle = await this.opts.cache.acquire(address);
    return new SshConnection(handle, this.opts, this.logger);
  }
}
