// Thin wrapper around the mpy-cross cross-compiler. The session code never
// needs it; the CLI's `compile` command does.
import { spawn } from "node:child_process";
import fsp from "node:fs/promises";
import path from "node:path";
import { BUILD_DIR, DEFAULT_MPY_CROSS } from "./constants.js";
import { CompileError } from "./errors.js";
import type { Logger } from "./logger.js";

const INLINE_SCRIPT = "_tmp.py";

type CompileOptions = {
  mpyCross?: string;
  buildDir?: string;
  logger?: Logger;
};

function runTool(
  cmd: string,
  args: string[],
): Promise<{ code: number | null; stdout: string; stderr: string }> {
  return new Promise((resolve, reject) => {
    let stdout = "";
    let stderr = "";
    const p = spawn(cmd, args, { stdio: ["ignore", "pipe", "pipe"] });
    p.stdout?.setEncoding("utf8");
    p.stdout?.on("data", (chunk: string) => {
      stdout += chunk;
    });
    p.stderr?.setEncoding("utf8");
    p.stderr?.on("data", (chunk: string) => {
      stderr += chunk;
    });
    p.once("error", reject);
    // close rather than exit: by then stdout and stderr are fully read
    p.once("close", (code) => resolve({ code, stdout, stderr }));
  });
}

function isMissing(err: unknown): boolean {
  return !!err && typeof err === "object" && "code" in err && err.code === "ENOENT";
}

export async function makeBuildDir(buildDir = BUILD_DIR): Promise<void> {
  try {
    const st = await fsp.stat(buildDir);
    if (st.isDirectory()) return;
  } catch (err) {
    if (!isMissing(err)) throw err;
    await fsp.mkdir(buildDir, { recursive: true });
    return;
  }
  throw new CompileError(`a file named ${buildDir} already exists`, null);
}

export async function compilerVersion(mpyCross = DEFAULT_MPY_CROSS): Promise<string> {
  const { code, stdout, stderr } = await runTool(mpyCross, ["--version"]);
  if (code !== 0) {
    throw new CompileError(`${mpyCross} --version exited ${code}`, code, stderr);
  }
  return stdout.trim();
}

export async function compileFile(
  scriptPath: string,
  { mpyCross = DEFAULT_MPY_CROSS, buildDir = BUILD_DIR, logger }: CompileOptions = {},
): Promise<Buffer> {
  logger?.info("compiler", { version: await compilerVersion(mpyCross) });
  await makeBuildDir(buildDir);

  const mpyPath = path.join(buildDir, `${path.parse(scriptPath).name}.mpy`);
  const { code, stderr } = await runTool(mpyCross, [
    scriptPath,
    "-mno-unicode",
    "-o",
    mpyPath,
  ]);
  if (code !== 0) {
    throw new CompileError(
      `compiling ${scriptPath} failed (exit ${code})${stderr ? `: ${stderr.trim()}` : ""}`,
      code,
      stderr,
    );
  }
  return fsp.readFile(mpyPath);
}

/** Write a one-line program to the build directory so it can be treated like a file. */
export async function saveInlineScript(
  text: string,
  buildDir = BUILD_DIR,
): Promise<string> {
  await makeBuildDir(buildDir);
  const scriptPath = path.join(buildDir, INLINE_SCRIPT);
  await fsp.writeFile(scriptPath, `${text}\n`);
  return scriptPath;
}

export function formatMpy(bytes: Uint8Array, width = 16): string {
  const rows: string[] = [];
  for (let i = 0; i < bytes.length; i += width) {
    rows.push(
      Array.from(bytes.subarray(i, i + width), (b) =>
        b.toString(16).padStart(2, "0"),
      ).join(" "),
    );
  }
  return rows.join("\n");
}
