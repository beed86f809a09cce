import type { Credentials } from "./config.js";
import { ConnectionError } from "./errors.js";
import { errorMeta, NullLogger, type Logger } from "./logger.js";
import type {
  Address,
  ProbeResult,
  TransportFactory,
  TransportHandle,
} from "./transport.js";

export type SessionCacheOptions = {
  factory: TransportFactory;
  credentials: Credentials;
  /** Directory the file channel is positioned at after connecting. */
  home: string;
  probeTimeoutMs: number;
  logger?: Logger;
};

/**
 * Connections by device address. A handle is only ever returned after it
 * answered a probe or was just created, and at most one connect attempt
 * per address is in flight: concurrent callers share it.
 */
export class SessionCache {
  private readonly handles = new Map<Address, TransportHandle>();
  private readonly inflight = new Map<Address, Promise<TransportHandle>>();
  private readonly logger: Logger;

  constructor(private readonly opts: SessionCacheOptions) {
    this.logger = opts.logger ?? new NullLogger();
  }

  acquire(address: Address): Promise<TransportHandle> {
    const pending = this.inflight.get(address);
    if (pending) return pending;
    const attempt = this.reuseOrConnect(address).finally(() => {
      this.inflight.delete(address);
    });
    this.inflight.set(address, attempt);
    return attempt;
  }

  has(address: Address): boolean {
    return this.handles.has(address);
  }

  get size(): number {
    return this.handles.size;
  }

  /**
   * Drop the entry for address. When handle is given the entry is only
   * removed if it still refers to that handle, so a session holding an
   * old handle cannot evict its replacement.
   */
  evict(address: Address, handle?: TransportHandle): boolean {
    const current = this.handles.get(address);
    if (!current) return false;
    if (handle && current !== handle) return false;
    return this.handles.delete(address);
  }

  async closeAll(): Promise<void> {
    const entries = [...this.handles.entries()];
    this.handles.clear();
    for (const [address, handle] of entries) {
      try {
        await handle.close();
      } catch (err) {
        this.logger.warn("close failed", { address, ...errorMeta(err) });
      }
    }
  }

  private async reuseOrConnect(address: Address): Promise<TransportHandle> {
    const cached = this.handles.get(address);
    if (cached) {
      const result = await this.probe(cached);
      if (result.alive) {
        this.logger.info("reusing existing connection", { address });
        return cached;
      }
      this.logger.debug("cached connection is stale", {
        address,
        reason: result.reason,
        detail: result.detail,
      });
      this.handles.delete(address);
      try {
        await cached.close();
      } catch (err) {
        this.logger.debug("closing stale connection failed", {
          address,
          ...errorMeta(err),
        });
      }
    }
    const handle = await this.connect(address);
    this.handles.set(address, handle);
    return handle;
  }

  private async probe(handle: TransportHandle): Promise<ProbeResult> {
    try {
      return await handle.probe(this.opts.probeTimeoutMs);
    } catch (err) {
      return {
        alive: false,
        reason: "error",
        detail: err instanceof Error ? err.message : String(err),
      };
    }
  }

  private async connect(address: Address): Promise<TransportHandle> {
    const { factory, credentials, home } = this.opts;
    this.logger.info("connecting", { address });
    let handle: TransportHandle;
    try {
      handle = await factory.connect(address, credentials);
    } catch (err) {
      if (err instanceof ConnectionError) throw err;
      throw new ConnectionError(`could not connect to ${address}`, address, {
        cause: err,
      });
    }
    try {
      const channel = handle.fileChannel ?? (await handle.openFileChannel());
      await channel.chdir(home);
    } catch (err) {
      try {
        await handle.close();
      } catch (closeErr) {
        this.logger.debug("close after failed setup", {
          address,
          ...errorMeta(closeErr),
        });
      }
      throw new ConnectionError(
        `connected to ${address} but could not open file transfer in ${home}`,
        address,
        { cause: err },
      );
    }
    this.logger.info("connected", { address });
    return handle;
  }
}
