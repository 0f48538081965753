import { describe, expect, it } from "vitest";
import { TimeoutError } from "puppeteer-core";
import { loadConfig } from "../../src/config";
import { EXIT_CODES } from "../../src/config/constants";
import { runCli } from "../../src/probe/run-cli";
import type { BrowserSession } from "../../src/scraping/browser/browser-session";
import { FakeLauncher, FakePage } from "../helpers/fakes";
import { captureLogs, LEVELS } from "../helpers/log-capture";

describe("runCli", () => {
  it("exits 0 after a successful probe", async () => {
    const { logger, withMessage } = captureLogs();
    const launcher = new FakeLauncher();

    const code = await runCli(loadConfig({}), launcher, logger);

    expect(code).toBe(EXIT_CODES.OK);
    expect(withMessage("Probe completed successfully")[0].logFile).toBe("probe.log");
    expect(launcher.closes).toBe(1);
  });

  it("exits 0 after a soft failure", async () => {
    const { logger, withMessage } = captureLogs();
    const launcher = new FakeLauncher(
      new FakePage({ gotoError: new TimeoutError("Navigation timeout of 10000 ms exceeded") })
    );

    const code = await runCli(loadConfig({}), launcher, logger);

    expect(code).toBe(0);
    expect(withMessage("Probe completed with warnings")[0]).toMatchObject({
      level: LEVELS.warn,
      reason: "navigation_timeout",
    });
    expect(launcher.closes).toBe(1);
  });

  it("exits 1 when the browser does not launch", async () => {
    const { logger, withMessage } = captureLogs();
    const launcher = new FakeLauncher(new FakePage(), { launchError: new Error("spawn ENOENT") });

    const code = await runCli(loadConfig({}), launcher, logger);

    expect(code).toBe(1);
    expect(withMessage("Probe failed fatally")[0]).toMatchObject({
      level: LEVELS.fatal,
      error: "Failed to launch browser: spawn ENOENT",
    });
  });

  it("exits 1 on an unknown profile without launching", async () => {
    const { logger, withMessage } = captureLogs();
    const launcher = new FakeLauncher();

    const code = await runCli(loadConfig({ PROBE_PROFILE: "turbo" }), launcher, logger);

    expect(code).toBe(EXIT_CODES.FATAL);
    expect(withMessage("Invalid configuration")[0].level).toBe(LEVELS.fatal);
    expect(launcher.sessions).toEqual([]);
  });

  it("hands the session out before the probe runs", async () => {
    const { logger } = captureLogs();
    const seen: BrowserSession[] = [];

    await runCli(loadConfig({}), new FakeLauncher(), logger, {
      onSession: (session) => seen.push(session),
    });

    expect(seen).toHaveLength(1);
    expect(seen[0].isOpen).toBe(false);
  });
});
