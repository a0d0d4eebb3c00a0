import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import chalk from "chalk";
import { runCommandLine } from "../commands";
import { createInitialSession, type SessionState } from "../session";
import type { CliContext } from "../types";
import { getLogLevel, setLogLevel } from "../../logger";
import { TRADITIONAL_SKEW } from "../../render/skew";

function fakeCtx() {
  const written: string[] = [];
  const writeFile = vi.fn(async (_p: string, _d: string) => { /* no-op */ });
  const ctx: CliContext = { write: (t) => { written.push(t); }, writeFile };
  return { ctx, written, writeFile };
}

describe("cli/commands", () => {
  const origLevel = getLogLevel();
  const origChalk = chalk.level;
  let session: SessionState;

  beforeEach(() => {
    setLogLevel("error");
    chalk.level = 0;
    session = createInitialSession();
  });
  afterEach(() => {
    setLogLevel(origLevel);
    chalk.level = origChalk;
    vi.restoreAllMocks();
  });

  it("show prints the preview and the masks", async () => {
    const { ctx, written } = fakeCtx();
    await runCommandLine("show 10", ctx, session);
    expect(written).toEqual(["     _\n  | | |\n  | |_|\n", "masks: 0x06 0x3f\n"]);
  });

  it("color and options update and report the session", async () => {
    const { ctx, written } = fakeCtx();
    await runCommandLine("color blue", ctx, session);
    await runCommandLine("options", ctx, session);
    expect(written[0].split("\n")[0]).toBe("color: blue");
  });

  it("skew switches to the traditional preset", async () => {
    const { ctx } = fakeCtx();
    await runCommandLine("skew traditional", ctx, session);
    expect(session.options.skew).toEqual(TRADITIONAL_SKEW);
  });

  it("logs command errors without ending the session", async () => {
    const err = vi.spyOn(console, "error").mockImplementation(() => { /* no-op */ });
    const { ctx } = fakeCtx();
    const before = session.options.skew;
    expect(await runCommandLine("skew oblique", ctx, session)).toBe(true);
    expect(session.options.skew).toBe(before);
    expect(err).toHaveBeenCalledTimes(1);
  });

  it("size ignores non-positive values", async () => {
    const { ctx } = fakeCtx();
    await runCommandLine("size 0 5", ctx, session);
    expect(session.options.charSize).toEqual({ width: 36, height: 64 });
    await runCommandLine("size 18 32", ctx, session);
    expect(session.options.charSize).toEqual({ width: 18, height: 32 });
  });

  it("period selects the lit decimal points", async () => {
    const { ctx } = fakeCtx();
    await runCommandLine("period 0 2", ctx, session);
    expect([...session.periods]).toEqual([0, 2]);
    await runCommandLine("period none", ctx, session);
    expect(session.periods.size).toBe(0);
  });

  it("show previews the lit decimal points", async () => {
    const { ctx, written } = fakeCtx();
    await runCommandLine("period 0", ctx, session);
    await runCommandLine("show 1", ctx, session);
    expect(written).toEqual(["\n  |\n  |.\n", "masks: 0x06\n"]);
  });

  it("save writes the SVG through the context", async () => {
    const { ctx, writeFile } = fakeCtx();
    await runCommandLine("save out.svg 42", ctx, session);
    expect(writeFile).toHaveBeenCalledTimes(1);
    const [file, data] = writeFile.mock.calls[0];
    expect(file).toBe("out.svg");
    expect(data.startsWith('<svg xmlns="http://www.w3.org/2000/svg" width="72" height="64"')).toBe(true);
  });

  it("exit ends the session, unknown commands do not", async () => {
    const { ctx } = fakeCtx();
    expect(await runCommandLine("exit", ctx, session)).toBe(false);
    expect(await runCommandLine("frobnicate", ctx, session)).toBe(true);
    expect(await runCommandLine("   ", ctx, session)).toBe(true);
  });
});
