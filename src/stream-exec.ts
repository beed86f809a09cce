import { ProcessSpawnError, StreamReadError } from "./errors.js";
import { errorMeta, type Logger } from "./logger.js";
import type { RemoteProcess, TransportHandle } from "./transport.js";
import { POLL_INTERVAL_MS } from "./constants.js";

export type StreamOptions = {
  /** Longest a single read may wait before the exit status is rechecked. */
  pollIntervalMs?: number;
  signal?: AbortSignal;
  logger?: Logger;
};

export type RunningProgram = {
  command: string;
  /**
   * Diagnostic output, one line at a time. Ends once the program has
   * exited and its output is drained. Leaving a for-await loop early, or
   * a read error, closes the remote process.
   */
  lines: AsyncGenerator<string, void, undefined>;
  exitStatus(): number | null;
  /** Stop reading and close the remote process, whether or not lines was iterated. */
  close(): Promise<void>;
};

type ReadOutcome =
  | { kind: "line"; line: string }
  | { kind: "eof" }
  | { kind: "error"; err: unknown };

const IDLE = Symbol("idle");

function idleAfter(ms: number): { promise: Promise<typeof IDLE>; cancel: () => void } {
  let timer: NodeJS.Timeout | undefined;
  const promise = new Promise<typeof IDLE>((resolve) => {
    timer = setTimeout(() => resolve(IDLE), ms);
  });
  return { promise, cancel: () => clearTimeout(timer) };
}

function nextOutcome(proc: RemoteProcess): Promise<ReadOutcome> {
  return proc.readLine().then(
    (line): ReadOutcome => (line === null ? { kind: "eof" } : { kind: "line", line }),
    (err: unknown): ReadOutcome => ({ kind: "error", err }),
  );
}

async function* pollLines(
  proc: RemoteProcess,
  command: string,
  { pollIntervalMs = POLL_INTERVAL_MS, signal, logger }: StreamOptions,
): AsyncGenerator<string, void, undefined> {
  // a read that outlives one poll interval stays pending and is picked up
  // by the next iteration, so no line is lost to a timeout
  let pending: Promise<ReadOutcome> | null = null;
  try {
    while (!signal?.aborted) {
      pending ??= nextOutcome(proc);
      const idle = idleAfter(pollIntervalMs);
      const outcome = await Promise.race([pending, idle.promise]);
      idle.cancel();

      if (outcome === IDLE) {
        if (proc.exitStatus !== null) return;
        continue;
      }
      pending = null;
      if (outcome.kind === "eof") return;
      if (outcome.kind === "error") {
        throw new StreamReadError(`reading output of '${command}' failed`, command, {
          cause: outcome.err,
        });
      }
      yield outcome.line;
    }
  } finally {
    try {
      await proc.close();
    } catch (err) {
      logger?.warn("closing remote process failed", { command, ...errorMeta(err) });
    }
  }
}

/**
 * Start command on the device and stream its diagnostic output. A failure
 * to start rejects here, before any output sequence exists.
 */
export async function runStreaming(
  handle: TransportHandle,
  command: string,
  opts: StreamOptions = {},
): Promise<RunningProgram> {
  let proc: RemoteProcess;
  try {
    proc = await handle.spawn(command);
  } catch (err) {
    if (err instanceof ProcessSpawnError) throw err;
    throw new ProcessSpawnError(`failed to start '${command}'`, command, {
      cause: err,
    });
  }
  opts.logger?.info("started", { command });
  const lines = pollLines(proc, command, opts);
  return {
    command,
    lines,
    exitStatus: () => proc.exitStatus,
    close: async () => {
      await lines.return(undefined);
      // a generator that never started has no finally to run
      await proc.close();
    },
  };
}
