import { createClient } from "../client";
import { loadConfig } from "../config";
import {
  DeviceNotFoundError,
  SessionStateError,
  TransferError,
  UnsupportedAddressError,
} from "../errors";
import { StructuredLogger, type LogEntry } from "../logger";
import { FakeTransportFactory, TEST_CREDENTIALS } from "./fake-transport";

const ADDRESS = "192.168.133.101";

function makeClient(
  opts: {
    find?: (name: string, timeoutMs: number) => Promise<string | null>;
    sink?: (entry: LogEntry) => void;
  } = {},
) {
  const factory = new FakeTransportFactory();
  const config = loadConfig({
    env: {},
    overrides: { password: TEST_CREDENTIALS.password, pollIntervalMs: 5 },
  });
  const client = createClient({
    config,
    transport: factory,
    cwd: "/work",
    discovery: opts.find ? { find: opts.find } : undefined,
    logger: new StructuredLogger({ sink: opts.sink }),
  });
  return { factory, device: factory.device, client };
}

describe("DeviceSession", () => {
  it("creates the directory before uploading into it", async () => {
    const { device, client } = makeClient();
    const session = await client.manager.connect(ADDRESS);
    const remote = await session.deploy("demo/hello.py");
    expect(remote).toBe("/home/robot/demo/hello.py");
    expect(device.mutations()).toEqual([
      "mkdir /home/robot/demo",
      "put /home/robot/demo/hello.py",
    ]);
    expect(device.files.get("/home/robot/demo/hello.py")).toBe("/work/demo/hello.py");
  });

  it("copies files from outside the working directory to the top of home", async () => {
    const { device, client } = makeClient();
    const session = await client.manager.connect(ADDRESS);
    expect(await session.deploy("/elsewhere/tools/beep.py")).toBe("/home/robot/beep.py");
    expect(device.mutations()).toEqual(["put /home/robot/beep.py"]);
  });

  it("runs the deployed file with the configured runner", async () => {
    const { factory, client } = makeClient();
    factory.device.onSpawn = (proc) => {
      proc.emit("Hello, brick!");
      proc.exit(0);
    };
    const session = await client.manager.connect(ADDRESS);
    const lines: string[] = [];
    const status = await session.deployAndRun("demo/hello.py", (l) => lines.push(l));
    expect(lines).toEqual(["Hello, brick!"]);
    expect(status).toBe(0);
    expect(factory.handles[0].processes[0].command).toBe(
      "brickrun -r -- pybricks-micropython /home/robot/demo/hello.py",
    );
    expect(session.state).toBe("connected");
  });

  it("reuses one connection across deploy and run cycles", async () => {
    const { factory, client } = makeClient();
    factory.device.onSpawn = (proc) => proc.exit(0);
    const session = await client.manager.connect(ADDRESS);
    await session.deployAndRun("one.py", () => {});
    await session.deployAndRun("two.py", () => {});
    const again = await client.manager.connect(ADDRESS);
    expect(again.address).toBe(ADDRESS);
    expect(factory.handshakes).toBe(1);
    expect(factory.handles[0].processes).toHaveLength(2);
  });

  it("refuses to run a path that was not deployed", async () => {
    const { client } = makeClient();
    const session = await client.manager.connect(ADDRESS);
    await expect(session.runDeployed("/home/robot/other.py")).rejects.toBeInstanceOf(
      SessionStateError,
    );
    expect(session.state).toBe("connected");
  });

  it("refuses a new deploy while output is still streaming", async () => {
    const { factory, client } = makeClient();
    factory.device.onSpawn = (proc) => proc.emit("tick");
    const session = await client.manager.connect(ADDRESS);
    const remote = await session.deploy("loop.py");
    const program = await session.runDeployed(remote);
    expect(session.state).toBe("running");
    await expect(session.deploy("loop.py")).rejects.toThrow(
      `cannot deploy while session to ${ADDRESS} is running`,
    );
    await program.close();
    expect(session.state).toBe("connected");
    expect(factory.handles[0].processes[0].closeCount).toBe(1);
  });

  it("disconnects cleanly after a failed upload", async () => {
    const { factory, client } = makeClient();
    factory.device.failPut = new Error("Failure");
    const session = await client.manager.connect(ADDRESS);
    await expect(session.deploy("demo/hello.py")).rejects.toBeInstanceOf(TransferError);
    expect(factory.device.dirs.has("/home/robot/demo")).toBe(true);

    await expect(session.disconnect()).resolves.toBeUndefined();
    const handle = factory.handles[0];
    expect(handle.fakeChannel?.closeCount).toBe(1);
    expect(handle.closeCount).toBe(1);
    expect(client.cache.has(ADDRESS)).toBe(false);
  });

  it("logs close failures on disconnect instead of throwing", async () => {
    const entries: LogEntry[] = [];
    const { factory, client } = makeClient({ sink: (e) => entries.push(e) });
    factory.device.failChannelClose = new Error("sftp gone");
    factory.device.failHandleClose = new Error("socket closed");
    const session = await client.manager.connect(ADDRESS);
    await session.disconnect();
    const warnings = entries.filter((e) => e.level === "warn");
    expect(warnings.map((e) => [e.scope, e.message, e.meta?.error])).toEqual([
      ["session", "closing file transfer failed", "sftp gone"],
      ["session", "closing connection failed", "socket closed"],
    ]);
    expect(client.cache.has(ADDRESS)).toBe(false);
  });

  it("closes a program that is still running on disconnect", async () => {
    const { factory, client } = makeClient();
    factory.device.onSpawn = (proc) => proc.emit("tick");
    const session = await client.manager.connect(ADDRESS);
    await session.runDeployed(await session.deploy("loop.py"));
    await session.disconnect();
    expect(factory.handles[0].processes[0].closeCount).toBe(1);
  });

  it("cannot be used after disconnect", async () => {
    const { client } = makeClient();
    const session = await client.manager.connect(ADDRESS);
    await session.disconnect();
    await session.disconnect();
    expect(session.state).toBe("disconnected");
    await expect(session.deploy("demo/hello.py")).rejects.toBeInstanceOf(
      SessionStateError,
    );
    await expect(session.exec("beep")).rejects.toBeInstanceOf(SessionStateError);
  });

  it("runs one-off commands", async () => {
    const { factory, client } = makeClient();
    const session = await client.manager.connect(ADDRESS);
    await session.exec("beep");
    expect(factory.handles[0].commands).toEqual(["beep"]);
  });
});

describe("SessionManager", () => {
  it("has no backend for bluetooth addresses", async () => {
    const { client } = makeClient();
    await expect(client.manager.connect("90:84:2B:00:11:22")).rejects.toBeInstanceOf(
      UnsupportedAddressError,
    );
  });

  it("needs discovery to connect by name", async () => {
    const { client } = makeClient();
    await expect(client.manager.connect("ev3dev")).rejects.toBeInstanceOf(
      DeviceNotFoundError,
    );
  });

  it("connects to the address discovery resolves", async () => {
    const find = jest.fn(async () => "10.0.0.9");
    const { factory, client } = makeClient({ find });
    const session = await client.manager.connect("ev3dev");
    expect(find).toHaveBeenCalledWith("ev3dev", 5_000);
    expect(session.address).toBe("10.0.0.9");
    expect(factory.handles[0].address).toBe("10.0.0.9");
  });

  it("reports names discovery cannot find", async () => {
    const { client } = makeClient({ find: async () => null });
    await expect(client.manager.connect("missing-hub")).rejects.toThrow(
      "no device named 'missing-hub' found within 5000ms",
    );
  });
});
