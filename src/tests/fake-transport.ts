// In-process stand-in for a brick reachable over ssh. Records every remote
// mutation so tests can assert on order and count.
import path from "node:path";
import { PassThrough } from "node:stream";
import type { Credentials } from "../config.js";
import { LineReader } from "../line-reader.js";
import type {
  Address,
  ExecResult,
  FileTransferChannel,
  ProbeResult,
  RemoteProcess,
  TransportFactory,
  TransportHandle,
} from "../transport.js";

export const HOME = "/home/robot";

export const TEST_CREDENTIALS: Credentials = {
  username: "robot",
  password: "test-secret",
  port: 22,
  connectTimeoutMs: 1_000,
};

export class FakeProcess implements RemoteProcess {
  private status: number | null = null;
  private readonly stderr = new PassThrough();
  private readonly reader = new LineReader(this.stderr);
  closeCount = 0;

  constructor(readonly command: string) {}

  get exitStatus(): number | null {
    return this.status;
  }

  get closed(): boolean {
    return this.closeCount > 0;
  }

  emit(line: string): void {
    this.stderr.write(`${line}\n`);
  }

  exit(code = 0): void {
    this.status = code;
    this.stderr.end();
  }

  /** Exit without ending the stream, as a channel can before its close. */
  exitQuietly(code = 0): void {
    this.status = code;
  }

  fail(err: Error): void {
    this.stderr.destroy(err);
  }

  readLine(): Promise<string | null> {
    return this.reader.readLine();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closeCount += 1;
    if (!this.stderr.destroyed) this.stderr.destroy();
  }
}

export class FakeChannel implements FileTransferChannel {
  private dir: string;
  closeCount = 0;

  constructor(
    private readonly device: FakeDevice,
    cwd: string,
  ) {
    this.dir = cwd;
  }

  get cwd(): string {
    return this.dir;
  }

  private resolve(p: string): string {
    return path.posix.resolve(this.dir, p);
  }

  async exists(remotePath: string): Promise<boolean> {
    const target = this.resolve(remotePath);
    this.device.log.push(`exists ${target}`);
    if (this.device.failExists) throw this.device.failExists;
    return this.device.dirs.has(target) || this.device.files.has(target);
  }

  async mkdir(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    if (this.device.failMkdir?.path === target) throw this.device.failMkdir.err;
    if (!this.device.dirs.has(path.posix.dirname(target))) {
      throw new Error(`No such file: ${path.posix.dirname(target)}`);
    }
    this.device.log.push(`mkdir ${target}`);
    this.device.dirs.add(target);
  }

  async put(localPath: string, remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    if (this.device.failPut) throw this.device.failPut;
    if (!this.device.dirs.has(path.posix.dirname(target))) {
      throw new Error(`No such file: ${path.posix.dirname(target)}`);
    }
    this.device.log.push(`put ${target}`);
    this.device.files.set(target, localPath);
  }

  async chdir(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    if (!this.device.dirs.has(target)) throw new Error(`No such file: ${target}`);
    this.dir = target;
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    if (this.device.failChannelClose) throw this.device.failChannelClose;
  }
}

export class FakeHandle implements TransportHandle {
  private channel: FakeChannel | null = null;
  alive = true;
  probes = 0;
  closeCount = 0;
  readonly processes: FakeProcess[] = [];
  readonly commands: string[] = [];

  constructor(
    readonly address: Address,
    private readonly device: FakeDevice,
  ) {}

  get fileChannel(): FileTransferChannel | null {
    return this.channel;
  }

  get fakeChannel(): FakeChannel | null {
    return this.channel;
  }

  /** Simulate the brick going away. */
  kill(): void {
    this.alive = false;
  }

  async exec(command: string): Promise<ExecResult> {
    if (!this.alive) throw new Error("Channel open failure: not connected");
    this.commands.push(command);
    return { exitCode: 0, stdout: command === "pwd" ? `${HOME}\n` : "", stderr: "" };
  }

  async spawn(command: string): Promise<RemoteProcess> {
    if (!this.alive) throw new Error("Channel open failure: not connected");
    if (this.device.failSpawn) throw this.device.failSpawn;
    const proc = new FakeProcess(command);
    this.processes.push(proc);
    this.device.onSpawn?.(proc);
    return proc;
  }

  async openFileChannel(): Promise<FileTransferChannel> {
    this.channel ??= new FakeChannel(this.device, "/");
    return this.channel;
  }

  async probe(): Promise<ProbeResult> {
    this.probes += 1;
    if (!this.alive) return { alive: false, reason: "closed" };
    return { alive: true };
  }

  async close(): Promise<void> {
    this.closeCount += 1;
    this.alive = false;
    if (this.device.failHandleClose) throw this.device.failHandleClose;
  }
}

/** Filesystem, failure switches and connection counters of one fake brick. */
export class FakeDevice {
  readonly dirs = new Set<string>(["/", "/home", HOME]);
  readonly files = new Map<string, string>();
  readonly log: string[] = [];
  failExists?: Error;
  failMkdir?: { path: string; err: Error };
  failPut?: Error;
  failSpawn?: Error;
  failChannelClose?: Error;
  failHandleClose?: Error;
  onSpawn?: (proc: FakeProcess) => void;

  mutations(): string[] {
    return this.log.filter((entry) => !entry.startsWith("exists "));
  }
}

export class FakeTransportFactory implements TransportFactory {
  readonly device = new FakeDevice();
  readonly handles: FakeHandle[] = [];
  handshakes = 0;
  connectDelayMs = 0;
  failConnect?: Error;

  async connect(address: Address, credentials: Credentials): Promise<TransportHandle> {
    this.handshakes += 1;
    if (this.connectDelayMs) {
      await new Promise((resolve) => setTimeout(resolve, this.connectDelayMs));
    }
    if (this.failConnect) throw this.failConnect;
    if (credentials.password !== TEST_CREDENTIALS.password) {
      throw new Error("All configured authentication methods failed");
    }
    const handle = new FakeHandle(address, this.device);
    this.handles.push(handle);
    return handle;
  }
}
