import { afterEach, describe, expect, it, vi } from "vitest";
import { registerCleanup } from "./cleanup";
import { gracefulExit } from "./exit";

describe("gracefulExit", () => {
  afterEach(() => {
    process.exitCode = undefined;
  });

  it("runs cleanup and records the code without exiting", async () => {
    const exit = vi.spyOn(process, "exit").mockImplementation(() => {
      throw new Error("process.exit called");
    });
    const close = vi.fn();
    registerCleanup(close);

    await gracefulExit(1);

    expect(close).toHaveBeenCalledTimes(1);
    expect(process.exitCode).toBe(1);
    expect(exit).not.toHaveBeenCalled();
    exit.mockRestore();
  });

  it("keeps an exit code set earlier", async () => {
    process.exitCode = 2;
    await gracefulExit();
    expect(process.exitCode).toBe(2);
  });
});
