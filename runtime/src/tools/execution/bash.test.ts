import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BashTool } from "./bash.js";

describe("BashTool", () => {
  let dir: string;
  let tool: BashTool;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), "toolbelt-bash-"));
    tool = new BashTool();
  });

  afterEach(async () => {
    await tool.dispose();
    await rm(dir, { recursive: true, force: true });
  });

  it("runs a command and trims the trailing newline", async () => {
    const result = await tool.execute("run", { command: "echo hello" });

    expect(result).toEqual({ success: true, output: "hello", error: null });
  });

  it("keeps the working directory and exported variables between calls", async () => {
    const first = await tool.execute("run", { command: `cd ${dir} && export TOOLBELT_TEST_VAR=1` });
    expect(first).toEqual({ success: true, output: "", error: null });

    const second = await tool.execute("run", { command: "pwd; echo ${TOOLBELT_TEST_VAR:-unset}" });
    expect(second.output).toBe(`${dir}\n1`);
  });

  it("starts a clean shell on restart", async () => {
    await tool.execute("run", { command: "export TOOLBELT_TEST_VAR=1" });

    const restarted = await tool.execute("run", { command: "", restart: true });
    expect(restarted).toEqual({ success: true, output: "Bash session restarted", error: null });

    const after = await tool.execute("run", { command: "echo ${TOOLBELT_TEST_VAR:-unset}" });
    expect(after.output).toBe("unset");
  });

  it("times out a sleeping command well before it finishes", async () => {
    const started = Date.now();
    const result = await tool.execute("run", { command: "sleep 5", timeout: 1 });
    const elapsed = Date.now() - started;

    expect(result.success).toBe(false);
    expect(result.metadata?.code).toBe("TIMED_OUT");
    expect(result.error).toBe("Command timed out after 1 seconds");
    expect(elapsed).toBeLessThan(4000);
  });

  it("refuses further commands after a timeout until restarted", async () => {
    await tool.execute("run", { command: "echo early >&2; sleep 5", timeout: 1 });

    const blocked = await tool.execute("run", { command: "echo hi" });
    expect(blocked).toEqual({
      success: false,
      output: null,
      error: "timed out: bash has not returned in 1 seconds and must be restarted",
      metadata: { code: "SESSION_CLOSED" },
    });

    await tool.execute("run", { command: "", restart: true });
    expect(await tool.execute("run", { command: "echo hi" })).toEqual({ success: true, output: "hi", error: null });
  });

  it("appends stderr to a timeout message", async () => {
    const result = await tool.execute("run", { command: "echo partial; echo warn >&2; sleep 5", timeout: 1 });

    expect(result.output).toBe("partial");
    expect(result.error).toBe("Command timed out after 1 seconds\nOriginal stderr: warn");
  });

  it("keeps stdout and stderr of a failing command", async () => {
    const result = await tool.execute("run", { command: "echo partial; echo bad >&2; false" });

    expect(result.success).toBe(false);
    expect(result.output).toBe("partial");
    expect(result.error).toBe("bad");
    expect(result.metadata?.code).toBe("EXECUTION_FAILED");
  });

  it("names the exit code when stderr is empty", async () => {
    const result = await tool.execute("run", { command: "(exit 9)" });
    expect(result.error).toBe("Command exited with code 9");

    const next = await tool.execute("run", { command: "echo still here" });
    expect(next.output).toBe("still here");
  });

  it("reports a shell that exits and then requires a restart", async () => {
    const exited = await tool.execute("run", { command: "echo bye; exit 3" });
    expect(exited).toEqual({
      success: false,
      output: "bye",
      error: "bash has exited with returncode 3",
      metadata: { code: "EXECUTION_FAILED" },
    });

    const blocked = await tool.execute("run", { command: "echo hi" });
    expect(blocked.error).toBe("bash has exited with returncode 3 and must be restarted");
    expect(blocked.metadata?.code).toBe("SESSION_CLOSED");
  });

  it("changes into the cwd parameter and stays there", async () => {
    const nested = join(dir, "it's here");
    await tool.execute("run", { command: `mkdir -p "${nested}"` });

    expect((await tool.execute("run", { command: "pwd", cwd: nested })).output).toBe(nested);
    expect((await tool.execute("run", { command: "pwd" })).output).toBe(nested);
  });

  it("starts the shell in the configured directory", async () => {
    const scoped = new BashTool({ cwd: dir });
    try {
      expect((await scoped.execute("run", { command: "pwd" })).output).toBe(dir);
    } finally {
      await scoped.dispose();
    }
  });

  it("marks truncated output", async () => {
    const capped = new BashTool({ maxOutputBytes: 10 });
    try {
      const result = await capped.execute("run", { command: "printf abcdefghijklmnopqrstuvwxyz" });
      expect(result).toEqual({ success: true, output: "abcdefghij\n[truncated]", error: null });
    } finally {
      await capped.dispose();
    }
  });

  it("rejects an empty command", async () => {
    const result = await tool.execute("run", { command: "   " });
    expect(result.error).toBe("no command provided.");
    expect(result.metadata?.code).toBe("MISSING_PARAMETER");
  });

  it("exposes run as its only action", async () => {
    expect(tool.defaultAction).toBe("run");
    const result = await tool.execute("restart", {});
    expect(result.error).toBe("Unknown action: restart. Available actions: run");
  });
});
