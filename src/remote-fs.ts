import path from "node:path";
import { RemoteFilesystemError } from "./errors.js";
import type { Logger } from "./logger.js";
import type { FileTransferChannel, TransportHandle } from "./transport.js";

/**
 * Split a local relative path into POSIX segments. Absolute paths and
 * paths that climb out of the working directory have no place under the
 * remote home and are rejected.
 */
export function relativeSegments(localRelativePath: string): string[] {
  const normalized = path.normalize(localRelativePath);
  if (path.isAbsolute(normalized) || path.win32.isAbsolute(localRelativePath)) {
    throw new RemoteFilesystemError(
      `expected a relative path, got '${localRelativePath}'`,
      localRelativePath,
    );
  }
  const segments = normalized
    .split(/[\\/]+/)
    .filter((s) => s !== "" && s !== ".");
  if (segments.includes("..")) {
    throw new RemoteFilesystemError(
      `path escapes the working directory: '${localRelativePath}'`,
      localRelativePath,
    );
  }
  return segments;
}

export function remotePathFor(home: string, localRelativePath: string): string {
  const segments = relativeSegments(localRelativePath);
  if (segments.length === 0) {
    throw new RemoteFilesystemError(
      `no file name in '${localRelativePath}'`,
      localRelativePath,
    );
  }
  return path.posix.join(home, ...segments);
}

async function fileChannelOf(handle: TransportHandle): Promise<FileTransferChannel> {
  return handle.fileChannel ?? (await handle.openFileChannel());
}

/**
 * Make sure the parent directory of localRelativePath exists under home
 * on the device, creating missing levels root to leaf. Every mkdir is
 * preceded by an existence check of the same path, so repeating the call
 * creates nothing. A failure part way leaves the levels made so far.
 *
 * Returns the remote directories that were created.
 */
export async function ensureRemoteDir(
  handle: TransportHandle,
  localRelativePath: string,
  { home, logger }: { home: string; logger?: Logger },
): Promise<string[]> {
  const dirs = relativeSegments(localRelativePath).slice(0, -1);
  if (dirs.length === 0) return [];

  const channel = await fileChannelOf(handle);
  const created: string[] = [];
  const check = async (remote: string) => {
    try {
      return await channel.exists(remote);
    } catch (err) {
      throw new RemoteFilesystemError(`could not check ${remote}`, remote, {
        cause: err,
      });
    }
  };

  // common case: the whole chain is already there
  if (await check(path.posix.join(home, ...dirs))) return created;

  for (let i = 1; i <= dirs.length; i++) {
    const remote = path.posix.join(home, ...dirs.slice(0, i));
    if (await check(remote)) continue;
    try {
      await channel.mkdir(remote);
    } catch (err) {
      throw new RemoteFilesystemError(`could not create ${remote}`, remote, {
        cause: err,
      });
    }
    logger?.debug("created remote directory", { path: remote });
    created.push(remote);
  }
  return created;
}
