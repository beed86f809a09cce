import path from "node:path";
import { Client, type ClientChannel, type SFTPWrapper } from "ssh2";
import type { Credentials } from "./config.js";
import {
  ConnectionError,
  ProcessSpawnError,
  RemoteFilesystemError,
  TimeoutError,
} from "./errors.js";
import { LineReader } from "./line-reader.js";
import type { Logger } from "./logger.js";
import type {
  Address,
  ExecResult,
  FileTransferChannel,
  ProbeResult,
  RemoteProcess,
  TransportFactory,
  TransportHandle,
} from "./transport.js";
import { withTimeout } from "./util.js";

// SSH_FX_NO_SUCH_FILE
const SFTP_NO_SUCH_FILE = 2;

function sftpCode(err: unknown): unknown {
  return err && typeof err === "object" && "code" in err ? err.code : undefined;
}

class SftpChannel implements FileTransferChannel {
  private dir: string;
  private closed = false;

  constructor(
    private readonly sftp: SFTPWrapper,
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

  exists(remotePath: string): Promise<boolean> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.sftp.stat(target, (err) => {
        if (!err) return resolve(true);
        if (sftpCode(err) === SFTP_NO_SUCH_FILE) return resolve(false);
        reject(err);
      });
    });
  }

  mkdir(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.sftp.mkdir(target, (err) => (err ? reject(err) : resolve()));
    });
  }

  put(localPath: string, remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    return new Promise((resolve, reject) => {
      this.sftp.fastPut(localPath, target, (err) =>
        err ? reject(err) : resolve(),
      );
    });
  }

  async chdir(remotePath: string): Promise<void> {
    const target = this.resolve(remotePath);
    const isDir = await new Promise<boolean>((resolve, reject) => {
      this.sftp.stat(target, (err, stats) => {
        if (err) {
          if (sftpCode(err) === SFTP_NO_SUCH_FILE) return resolve(false);
          return reject(err);
        }
        resolve(stats.isDirectory());
      });
    });
    if (!isDir) {
      throw new RemoteFilesystemError(`not a directory: ${target}`, target);
    }
    this.dir = target;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.sftp.end();
  }
}

class SshProcess implements RemoteProcess {
  private status: number | null = null;
  private closed = false;
  private readonly reader: LineReader;

  constructor(private readonly channel: ClientChannel) {
    this.reader = new LineReader(channel.stderr);
    // stdout is not part of the diagnostic stream but must still be
    // drained or the channel window fills up and the program stalls
    channel.resume();
    channel.on("exit", (code: number | null) => {
      // killed by a signal: no code, but it has still ended
      this.status = code ?? -1;
    });
    channel.once("close", () => {
      if (this.status == null) this.status = -1;
    });
  }

  get exitStatus(): number | null {
    return this.status;
  }

  readLine(): Promise<string | null> {
    return this.reader.readLine();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.channel.close();
  }
}

function openExecChannel(client: Client, command: string): Promise<ClientChannel> {
  return new Promise((resolve, reject) => {
    client.exec(command, (err, channel) => (err ? reject(err) : resolve(channel)));
  });
}

class SshHandle implements TransportHandle {
  private sftpChannel: SftpChannel | null = null;
  private ended = false;

  constructor(
    readonly address: Address,
    private readonly client: Client,
    private readonly logger?: Logger,
  ) {
    client.once("close", () => {
      this.ended = true;
    });
    client.once("end", () => {
      this.ended = true;
    });
  }

  get fileChannel(): FileTransferChannel | null {
    return this.sftpChannel;
  }

  async exec(
    command: string,
    { timeoutMs }: { timeoutMs?: number } = {},
  ): Promise<ExecResult> {
    const channel = await openExecChannel(this.client, command);
    const done = new Promise<ExecResult>((resolve) => {
      let stdout = "";
      let stderr = "";
      let exitCode: number | null = null;
      channel.on("data", (chunk: Buffer) => {
        stdout += chunk.toString("utf8");
      });
      channel.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString("utf8");
      });
      channel.on("exit", (code: number | null) => {
        exitCode = code;
      });
      channel.once("close", () => resolve({ exitCode, stdout, stderr }));
    });
    if (timeoutMs == null) return done;
    try {
      return await withTimeout(done, timeoutMs, command);
    } catch (err) {
      channel.close();
      throw err;
    }
  }

  async spawn(command: string): Promise<RemoteProcess> {
    try {
      const channel = await openExecChannel(this.client, command);
      return new SshProcess(channel);
    } catch (err) {
      throw new ProcessSpawnError(
        `failed to start '${command}' on ${this.address}`,
        command,
        { cause: err },
      );
    }
  }

  async openFileChannel(): Promise<FileTransferChannel> {
    if (this.sftpChannel) return this.sftpChannel;
    const sftp = await new Promise<SFTPWrapper>((resolve, reject) => {
      this.client.sftp((err, sftp) => (err ? reject(err) : resolve(sftp)));
    });
    const home = await new Promise<string>((resolve, reject) => {
      sftp.realpath(".", (err, abs) => (err ? reject(err) : resolve(abs)));
    });
    this.sftpChannel = new SftpChannel(sftp, home);
    return this.sftpChannel;
  }

  async probe(timeoutMs: number): Promise<ProbeResult> {
    if (this.ended) return { alive: false, reason: "closed" };
    try {
      await this.exec("pwd", { timeoutMs });
      return { alive: true };
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.logger?.debug("probe failed", { address: this.address, detail });
      return err instanceof TimeoutError
        ? { alive: false, reason: "timeout", detail }
        : { alive: false, reason: "error", detail };
    }
  }

  async close(): Promise<void> {
    try {
      await this.sftpChannel?.close();
    } finally {
      this.sftpChannel = null;
      this.ended = true;
      this.client.end();
    }
  }
}

export class SshTransportFactory implements TransportFactory {
  constructor(private readonly logger?: Logger) {}

  connect(address: Address, credentials: Credentials): Promise<TransportHandle> {
    const client = new Client();
    return new Promise<TransportHandle>((resolve, reject) => {
      const onError = (err: Error) => {
        client.end();
        reject(
          new ConnectionError(`could not connect to ${address}: ${err.message}`, address, {
            cause: err,
          }),
        );
      };
      client
        .once("ready", () => {
          client.removeListener("error", onError);
          // later transport errors surface through the failing call or the
          // next probe; without a listener they would crash the process
          client.on("error", (err) =>
            this.logger?.debug("ssh transport error", {
              address,
              error: err.message,
            }),
          );
          resolve(new SshHandle(address, client, this.logger));
        })
        .once("error", onError)
        .connect({
          host: address,
          port: credentials.port,
          username: credentials.username,
          password: credentials.password,
          readyTimeout: credentials.connectTimeoutMs,
        });
    });
  }
}
