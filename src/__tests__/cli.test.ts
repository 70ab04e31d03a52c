import { afterEach, describe, expect, it, vi } from "vitest";

const { config } = vi.hoisted(() => ({ config: vi.fn() }));
vi.mock("dotenv", () => ({ config }));

describe("cli", () => {
  const argv = process.argv;

  afterEach(() => {
    process.argv = argv;
    vi.restoreAllMocks();
  });

  it("loads .env when it runs and prints usage for help", async () => {
    const stderr = vi.spyOn(console, "error").mockImplementation(() => {});
    const exit = vi.spyOn(process, "exit").mockImplementation((code) => {
      throw new Error(`exit ${String(code)}`);
    });
    process.argv = ["node", "tidemark", "help"];

    await import("../cli.js");

    expect(config).toHaveBeenCalledTimes(1);
    expect(stderr).toHaveBeenNthCalledWith(1, "Tidemark");
    expect(exit).not.toHaveBeenCalled();
  });
});
