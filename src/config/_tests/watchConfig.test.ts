import { describe, it, expect } from "vitest";
import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { watchConfig, type Seg7Config } from "../../config";

async function waitFor(check: () => boolean, timeoutMs = 3000): Promise<void> {
  const start = Date.now();
  while (!check() && Date.now() - start < timeoutMs) {
    await new Promise((r) => setTimeout(r, 25));
  }
}

describe("config.watchConfig", () => {
  it("invokes onChange when file content changes", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "seg7-watch-"));
    const p = path.join(tmp, "seg7.yaml");
    await fs.writeFile(p, "display:\n  color: red\n", "utf8");
    let lastCfg: Seg7Config | null = null;
    const stop = watchConfig(p, (cfg) => { lastCfg = cfg; });
    await new Promise((r) => setTimeout(r, 100));
    await fs.writeFile(p, "display:\n  color: blue\n", "utf8");
    await waitFor(() => lastCfg !== null);
    stop();
    expect(lastCfg).toEqual({
      display: {
        color: "blue",
        dim_opacity: undefined,
        skew: undefined,
        width: undefined,
        height: undefined,
        allow_case_toggle: undefined,
      },
    });
  });

  it("reports invalid content through onError", async () => {
    const tmp = await fs.mkdtemp(path.join(os.tmpdir(), "seg7-watch-"));
    const p = path.join(tmp, "seg7.yaml");
    await fs.writeFile(p, "display: {}\n", "utf8");
    const errors: unknown[] = [];
    const stop = watchConfig(p, () => { /* no-op */ }, (err) => errors.push(err));
    await new Promise((r) => setTimeout(r, 100));
    await fs.writeFile(p, "display:\n  width: wide\n", "utf8");
    await waitFor(() => errors.length > 0);
    stop();
    expect(String(errors[0])).toMatch(/display\.width/);
  });
});
