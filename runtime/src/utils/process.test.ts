import { describe, it, expect } from "vitest";
import { runCommand, buildEnv, TIMEOUT_EXIT_CODE } from "./process.js";

describe("runCommand", () => {
  it("collects stdout and a zero exit code", async () => {
    const result = await runCommand("/bin/bash", ["-c", "echo hi; echo oops >&2"]);
    expect(result.stdout).toBe("hi\n");
    expect(result.stderr).toBe("oops\n");
    expect(result.exitCode).toBe(0);
    expect(result.timedOut).toBe(false);
  });

  it("reports non-zero exits without throwing", async () => {
    const result = await runCommand("/bin/bash", ["-c", "exit 3"]);
    expect(result.exitCode).toBe(3);
  });

  it("kills the whole process group on timeout", async () => {
    const result = await runCommand("/bin/bash", ["-c", "echo started; sleep 5"], { timeoutMs: 300 });
    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBe(TIMEOUT_EXIT_CODE);
    expect(result.stdout).toBe("started\n");
    expect(result.durationMs).toBeLessThan(3000);
  });

  it("caps each stream at maxBuffer", async () => {
    const result = await runCommand("/bin/bash", ["-c", "printf abcdef"], { maxBuffer: 3 });
    expect(result.stdout).toBe("abc");
    expect(result.truncated).toBe(true);
  });

  it("turns spawn failures into exit code 127", async () => {
    const result = await runCommand("/nonexistent/toolbelt-binary", []);
    expect(result.exitCode).toBe(127);
    expect(result.stderr).toContain("ENOENT");
  });
});

describe("buildEnv", () => {
  it("exposes only PATH and HOME plus extras", () => {
    const env = buildEnv({ EXTRA: "1" });
    expect(Object.keys(env).sort()).toEqual(["EXTRA", "HOME", "PATH"]);
  });
});
