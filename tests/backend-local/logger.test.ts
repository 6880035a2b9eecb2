import { afterEach, describe, expect, it, vi } from "vitest";

import {
  createConsoleLogger,
  withNamespace,
} from "../../packages/backend-local/src/logger.js";

afterEach(() => {
  vi.restoreAllMocks();
});

describe("createConsoleLogger", () => {
  it("prefixes messages with the namespace", () => {
    const info = vi.spyOn(console, "info").mockImplementation(() => undefined);

    createConsoleLogger("match").info("Phase changed", { phase: "Lobby" });

    expect(info).toHaveBeenCalledWith("[match]", "Phase changed", { phase: "Lobby" });
  });

  it("prints debug output only when enabled", () => {
    const debug = vi.spyOn(console, "debug").mockImplementation(() => undefined);

    createConsoleLogger("quiet", { debug: false }).debug("hidden");
    createConsoleLogger("loud", { debug: true }).debug("shown");

    expect(debug).toHaveBeenCalledTimes(1);
    expect(debug).toHaveBeenCalledWith("[loud]", "shown", "");
  });

  it("nests a child namespace", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => undefined);

    withNamespace(createConsoleLogger("backend-local"), "zone").warn?.("Zone already active");

    expect(warn).toHaveBeenCalledWith("[backend-local]", "(zone) Zone already active", "");
  });
});
