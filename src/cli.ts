#!/usr/bin/env node
// src/cli.ts
import fs from "node:fs";
import path from "node:path";
import { Command } from "commander";
import { createClient } from "./client.js";
import { compileFile, formatMpy, saveInlineScript } from "./compile.js";
import { loadConfig, parsePositiveInt, type BrickdevConfig } from "./config.js";
import { BUILD_DIR, CLI_NAME } from "./constants.js";
import { describeError } from "./errors.js";
import {
  ConsoleLogger,
  LOG_LEVELS,
  parseLogLevel,
  type Logger,
} from "./logger.js";
import type { DeviceSession } from "./session.js";
import type { TransportFactory } from "./transport.js";

export type CliDeps = {
  /** Stand-in transport; the real one is ssh. */
  transport?: TransportFactory;
  /** Where program output goes. */
  print?: (line: string) => void;
  cwd?: string;
};

type ConnectOpts = {
  user?: string;
  password?: string;
  home?: string;
  port?: string;
};

function readVersion(): string {
  try {
    const raw: unknown = JSON.parse(
      fs.readFileSync(path.join(__dirname, "..", "package.json"), "utf8"),
    );
    if (raw && typeof raw === "object" && "version" in raw && typeof raw.version === "string") {
      return raw.version;
    }
  } catch {
    // running from an unpacked copy without package.json
  }
  return "0.0.0";
}

function loggerFor(command: Command): Logger {
  const globals: { logLevel?: string } = command.optsWithGlobals();
  return new ConsoleLogger(parseLogLevel(globals.logLevel, "info"));
}

function configFrom(opts: ConnectOpts): BrickdevConfig {
  return loadConfig({
    overrides: {
      username: opts.user,
      password: opts.password,
      home: opts.home,
      port: opts.port != null ? parsePositiveInt(opts.port, "--port") : undefined,
    },
  });
}

/** An argument that is not an existing file is taken to be a one-line program. */
export async function resolveScript(arg: string, cwd = process.cwd()): Promise<string> {
  if (fs.existsSync(path.resolve(cwd, arg))) return arg;
  return saveInlineScript(arg, path.join(cwd, BUILD_DIR));
}

async function withSession<T>(
  device: string,
  opts: ConnectOpts,
  logger: Logger,
  deps: CliDeps,
  fn: (session: DeviceSession) => Promise<T>,
): Promise<T> {
  const client = createClient({
    config: configFrom(opts),
    logger,
    transport: deps.transport,
    cwd: deps.cwd,
  });
  const session = await client.manager.connect(device);
  try {
    return await fn(session);
  } finally {
    await session.disconnect();
  }
}

function addConnectOptions(cmd: Command): Command {
  return cmd
    .option("--user <name>", "login name on the device")
    .option("--password <password>", "login password")
    .option("--home <dir>", "remote directory programs are copied to")
    .option("--port <n>", "ssh port");
}

export function buildProgram(deps: CliDeps = {}): Command {
  const print = deps.print ?? ((line: string) => console.log(line));
  const program = new Command()
    .name(CLI_NAME)
    .description("Copy MicroPython programs to a brick, run them and show their output")
    .version(readVersion())
    .option(
      "--log-level <level>",
      `log verbosity (${LOG_LEVELS.join(", ")})`,
      "info",
    );

  addConnectOptions(
    program
      .command("run")
      .description("copy a program to the device, run it and stream its output")
      .argument("<device>", "IP address, host name or device name")
      .argument("<script>", "path to a MicroPython script, or an inline one-liner"),
  ).action(async (device: string, script: string, opts: ConnectOpts, command: Command) => {
    const logger = loggerFor(command);
    const scriptPath = await resolveScript(script, deps.cwd);
    const abort = new AbortController();
    const onSigint = () => abort.abort();
    process.once("SIGINT", onSigint);
    try {
      const status = await withSession(device, opts, logger, deps, (session) =>
        session.deployAndRun(scriptPath, print, { signal: abort.signal }),
      );
      if (status) process.exitCode = status > 0 ? status : 1;
    } finally {
      process.removeListener("SIGINT", onSigint);
    }
  });

  addConnectOptions(
    program
      .command("beep")
      .description("make the device beep, to check the connection")
      .argument("<device>", "IP address or host name"),
  ).action(async (device: string, opts: ConnectOpts, command: Command) => {
    const logger = loggerFor(command);
    const result = await withSession(device, opts, logger, deps, (session) =>
      session.exec("beep"),
    );
    if (result.exitCode) {
      logger.warn("beep exited with an error", {
        exitCode: result.exitCode,
        stderr: result.stderr.trim(),
      });
      process.exitCode = 1;
    }
  });

  program
    .command("compile")
    .description("compile a program without running it and print the bytecode")
    .argument("<script>", "path to a MicroPython script, or an inline one-liner")
    .option("--mpy-cross <path>", "cross-compiler executable")
    .action(async (script: string, opts: { mpyCross?: string }, command: Command) => {
      const logger = loggerFor(command);
      const config = loadConfig({ overrides: { mpyCross: opts.mpyCross } });
      const cwd = deps.cwd ?? process.cwd();
      const scriptPath = path.resolve(cwd, await resolveScript(script, cwd));
      const bytes = await compileFile(scriptPath, {
        mpyCross: config.mpyCross,
        buildDir: path.join(cwd, BUILD_DIR),
        logger,
      });
      print(formatMpy(bytes));
    });

  return program;
}

if (require.main === module) {
  const program = buildProgram();
  if (process.argv.length <= 2) {
    program.outputHelp();
    process.exit(0);
  }
  program.parseAsync(process.argv).catch((err: unknown) => {
    console.error(`${CLI_NAME}: ${describeError(err)}`);
    process.exitCode = 1;
  });
}
