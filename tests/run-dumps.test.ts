import { describe, it, expect, vi } from "vitest";
import { createBufferedIO, EXIT_CODES, runSource } from "../src/runner/run";
import { createLogger } from "../src/utils/logger";

vi.mock("../src/core/printer", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../src/core/printer")>();
  return {
    ...actual,
    printAst: () => {
      throw new RangeError("Maximum call stack size exceeded");
    },
  };
});

describe("runSource debug dumps", () => {
  it("reports a crash while printing the tree as an internal error", () => {
    const io = createBufferedIO();
    const r = runSource("1 + 2", { io, logger: createLogger({ level: "silent" }), printAst: true });

    expect(r.exitCode).toBe(EXIT_CODES.runtime);
    expect(r.stdout).toBe("");
    expect(r.stderr).toBe("[line: 1] Error: Internal printer error: Maximum call stack size exceeded\n");
    expect(r.diagnostics.map((d) => d.code)).toEqual(["INTERNAL_ERROR"]);
  });
});
