import {
  ConnectionError,
  TransferError,
  TimeoutError,
  describeError,
} from "../errors";

describe("describeError", () => {
  it("appends the cause message", () => {
    const err = new ConnectionError("could not connect to 10.0.0.5", "10.0.0.5", {
      cause: new Error("ECONNREFUSED"),
    });
    expect(describeError(err)).toBe("could not connect to 10.0.0.5 (ECONNREFUSED)");
  });

  it("does not repeat a cause with the same message", () => {
    const err = new TransferError("disk full", "a.py", "/home/robot/a.py", {
      cause: new Error("disk full"),
    });
    expect(describeError(err)).toBe("disk full");
  });

  it("renders non-errors", () => {
    expect(describeError("boom")).toBe("boom");
    expect(describeError(42)).toBe("42");
  });

  it("keeps context fields and names", () => {
    const err = new TimeoutError("probe timed out after 5ms", 5);
    expect(err).toBeInstanceOf(Error);
    expect(err.name).toBe("TimeoutError");
    expect(err.timeoutMs).toBe(5);
  });
});
