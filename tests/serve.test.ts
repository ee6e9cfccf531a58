import { afterEach, describe, expect, it, vi } from "vitest";
import { signalHandler } from "../src/commands/serve";

describe("signalHandler", () => {
  afterEach(() => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
  });

  it("reports a failed shutdown instead of leaving the rejection unhandled", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const handler = signalHandler(async () => {
      throw new Error("archive still open");
    });

    handler();

    await vi.waitFor(() =>
      expect(error).toHaveBeenCalledWith("[serve] Shutdown failed: archive still open"),
    );
    expect(process.exitCode).toBe(1);
  });

  it("runs the shutdown once per signal", () => {
    const shutdown = vi.fn(async () => {});
    signalHandler(shutdown)();
    expect(shutdown).toHaveBeenCalledTimes(1);
  });
});
