// Contract between the session core and whatever actually talks to the
// device. ssh-transport.ts is the one shipped implementation; tests use an
// in-process fake.
import type { Credentials } from "./config.js";

export type Address = string;

export type ProbeResult =
  | { alive: true }
  | { alive: false; reason: "closed" | "timeout" | "error"; detail?: string };

export type ExecResult = {
  exitCode: number | null;
  stdout: string;
  stderr: string;
};

export interface FileTransferChannel {
  /** Directory that relative paths resolve against. */
  readonly cwd: string;
  exists(remotePath: string): Promise<boolean>;
  mkdir(remotePath: string): Promise<void>;
  put(localPath: string, remotePath: string): Promise<void>;
  chdir(remotePath: string): Promise<void>;
  close(): Promise<void>;
}

export interface RemoteProcess {
  /** Exit code once the process has ended, null while it runs. */
  readonly exitStatus: number | null;
  /**
   * Next line of the diagnostic (stderr) stream without its terminator,
   * or null once the stream has ended.
   */
  readLine(): Promise<string | null>;
  close(): Promise<void>;
}

export interface TransportHandle {
  readonly address: Address;
  readonly fileChannel: FileTransferChannel | null;
  exec(command: string, opts?: { timeoutMs?: number }): Promise<ExecResult>;
  spawn(command: string): Promise<RemoteProcess>;
  openFileChannel(): Promise<FileTransferChannel>;
  probe(timeoutMs: number): Promise<ProbeResult>;
  close(): Promise<void>;
}

export interface TransportFactory {
  connect(address: Address, credentials: Credentials): Promise<TransportHandle>;
}
