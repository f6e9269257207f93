import { cfg } from "../../src/lib/config";
import { EauApiError } from "../../src/lib/errors";
import { formatError, log } from "../../src/lib/log";

describe("log", () => {
  const level = cfg.logLevel;
  let consoleLog: jest.SpyInstance;

  beforeEach(() => {
    consoleLog = jest.spyOn(console, "log").mockImplementation(() => undefined);
  });

  afterEach(() => {
    cfg.logLevel = level;
    jest.restoreAllMocks();
  });

  it("hides info messages below the configured level", () => {
    cfg.logLevel = "warn";

    log.info("Starting login process...");

    expect(consoleLog).not.toHaveBeenCalled();
  });

  it("prints command output whatever the level", () => {
    cfg.logLevel = "error";

    log.out('{\n  "subscriptionId": "SUB1"\n}');

    expect(consoleLog).toHaveBeenCalledTimes(1);
    expect(consoleLog).toHaveBeenCalledWith('{\n  "subscriptionId": "SUB1"\n}');
  });
});

describe("formatError", () => {
  it("uses the error's own toString", () => {
    expect(formatError(new EauApiError("REQUEST_FAILED", "Get data call error", 500))).toBe(
      "500 : Get data call error",
    );
    expect(formatError(new Error("boom"))).toBe("Error: boom");
  });
});
