import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { MacOSTool, SimpleMacOSTool, appleScriptString, checkScript } from "./macos.js";
import type { CommandRunner, RunCommandResult } from "../../utils/process.js";

function ran(overrides: Partial<RunCommandResult> = {}): RunCommandResult {
  return { stdout: "", stderr: "", exitCode: 0, timedOut: false, truncated: false, durationMs: 1, ...overrides };
}

function scriptOf(runner: Mock<CommandRunner>, call: number): string {
  return runner.mock.calls[call][1][1];
}

describe("checkScript", () => {
  it("denies keychain access, admin shell scripts, keystrokes and mass deletes", () => {
    expect(checkScript('tell application "Keychain Access" to activate')).toBe(
      "Script denied: matches security pattern keychain",
    );
    expect(checkScript('do shell script "rm -rf /" with administrator privileges')).toBeDefined();
    expect(checkScript('tell application "System Events" to keystroke "a"')).toBeDefined();
    expect(checkScript('tell application "Finder" to delete every file of desktop')).toBeDefined();
  });

  it("allows ordinary scripts", () => {
    expect(checkScript('display dialog "hi"')).toBeUndefined();
  });
});

describe("appleScriptString", () => {
  it("escapes quotes and backslashes", () => {
    expect(appleScriptString('say "hi" \\ bye')).toBe('"say \\"hi\\" \\\\ bye"');
  });
});

describe("MacOSTool", () => {
  let runner: Mock<CommandRunner>;
  let tool: MacOSTool;

  beforeEach(() => {
    runner = vi.fn<CommandRunner>(async () => ran());
    tool = new MacOSTool({
      runner,
      screenshotDir: "/tmp/shots",
      now: () => new Date("2026-01-02T03:04:05.678Z"),
    });
  });

  it("rejects UI actions before an app is open", async () => {
    for (const action of ["get_ui_tree", "click_element", "input_text", "right_click", "scroll"]) {
      const result = await tool.execute(action, { element_index: 1, text: "x" });
      expect(result.error).toBe("No app is currently open. Use 'open_app' action first.");
      expect(result.metadata?.code).toBe("NOT_OPEN");
    }
    expect(runner).not.toHaveBeenCalled();
  });

  it("opens an app with AppleScript and moves to open", async () => {
    const result = await tool.execute("open_app", { app_name: "Calculator" });

    expect(result.output).toBe("Opened app 'Calculator' successfully using AppleScript");
    expect(runner).toHaveBeenCalledWith("osascript", ["-e", 'tell application "Calculator" to activate'], {
      timeoutMs: 30000,
      env: expect.objectContaining({ PATH: expect.any(String) }),
    });
  });

  it("reports a failed open and stays unopened", async () => {
    runner.mockResolvedValueOnce(ran({ exitCode: 1, stderr: "Can't get application \"Nope\".\n" }));
    const result = await tool.execute("open_app", { app_name: "Nope" });

    expect(result.error).toBe("Failed to open app 'Nope': Can't get application \"Nope\".");
    expect((await tool.execute("get_ui_tree")).metadata?.code).toBe("NOT_OPEN");
  });

  it("addresses elements of the opened process through System Events", async () => {
    await tool.execute("open_app", { app_name: "Notes" });

    const clicked = await tool.execute("click_element", { element_index: "3" });
    expect(clicked.output).toBe("Successfully clicked element 3");
    expect(scriptOf(runner, 1)).toBe(
      'tell application "System Events"\n' +
        '  tell process "Notes"\n' +
        '    perform action "AXPress" of item 3 of (entire contents of front window)\n' +
        "  end tell\n" +
        "end tell",
    );

    const typed = await tool.execute("input_text", { element_index: 2, text: 'a "b"', submit: true });
    expect(typed.output).toBe("Successfully input text into element 2");
    expect(scriptOf(runner, 2)).toContain('    set value of item 2 of (entire contents of front window) to "a \\"b\\""\n');
    expect(scriptOf(runner, 2)).toContain('    perform action "AXConfirm" of item 2 of (entire contents of front window)\n');

    expect((await tool.execute("right_click", { element_index: 4 })).output).toBe("Successfully right-clicked element 4");
    expect(scriptOf(runner, 3)).toContain('perform action "AXShowMenu" of item 4');

    expect((await tool.execute("scroll", { element_index: 5, scroll_direction: "up" })).output).toBe(
      "Successfully scrolled element 5 up",
    );
    expect(scriptOf(runner, 4)).toContain('perform action "AXScrollUpByPage" of item 5');
  });

  it("returns the UI tree listing", async () => {
    await tool.execute("open_app", { app_name: "Notes" });
    runner.mockResolvedValueOnce(ran({ stdout: "1: AXButton New Note\n2: AXTextArea body\n" }));

    const result = await tool.execute("get_ui_tree");

    expect(result.output).toBe("UI Tree for Notes:\n1: AXButton New Note\n2: AXTextArea body");
  });

  it("validates element parameters", async () => {
    await tool.execute("open_app", { app_name: "Notes" });

    expect((await tool.execute("click_element", {})).error).toBe("element_index is required for click_element action");
    expect(await tool.execute("click_element", { element_index: 0 })).toEqual({
      success: false,
      output: null,
      error: "element_index must be a positive integer",
      metadata: { code: "INVALID_PARAMETER" },
    });
    expect((await tool.execute("input_text", { element_index: 1 })).error).toBe(
      "element_index and text are required for input_text action",
    );
    expect((await tool.execute("scroll", { element_index: 1, scroll_direction: "diagonal" })).error).toBe(
      "Invalid scroll direction: diagonal",
    );
    expect((await tool.execute("scroll", { element_index: 1, scroll_direction: "constructor" })).error).toBe(
      "Invalid scroll direction: constructor",
    );
  });

  it("runs allowed scripts and denies the rest", async () => {
    runner.mockResolvedValueOnce(ran({ stdout: "42\n" }));
    const ok = await tool.execute("run_applescript", { script: "return 6 * 7" });
    const denied = await tool.execute("run_applescript", { script: 'tell application "Keychain Access" to quit' });

    expect(ok.output).toBe("AppleScript executed successfully: 42");
    expect(denied.error).toBe("Script denied: matches security pattern keychain");
    expect(denied.metadata?.code).toBe("DENIED");
    expect(runner).toHaveBeenCalledTimes(1);
  });

  it("reports script timeouts", async () => {
    runner.mockResolvedValueOnce(ran({ timedOut: true, exitCode: 124 }));
    const result = await tool.execute("run_applescript", { script: "delay 100" });
    expect(result.error).toBe("Command timed out after 30 seconds");
    expect(result.metadata?.code).toBe("TIMED_OUT");
  });

  it("captures the screen with screencapture", async () => {
    const result = await tool.execute("screenshot");

    expect(result.output).toBe("Screenshot saved: /tmp/shots/screenshot_2026-01-02T03-04-05-678Z.png");
    expect(runner.mock.calls[0][0]).toBe("screencapture");
    expect(runner.mock.calls[0][1]).toEqual(["-x", "/tmp/shots/screenshot_2026-01-02T03-04-05-678Z.png"]);
  });

  it("closes with no path back to open", async () => {
    await tool.execute("open_app", { app_name: "Notes" });
    expect((await tool.execute("close")).output).toBe("macOS session closed successfully");

    for (const action of ["open_app", "get_ui_tree", "run_applescript", "close"]) {
      const result = await tool.execute(action, { app_name: "Notes", script: "return 1" });
      expect(result.metadata?.code).toBe("SESSION_CLOSED");
      expect(result.error).toBe("macOS session is closed. Create a new tool instance to continue.");
    }
  });
});

describe("SimpleMacOSTool", () => {
  it("opens apps and runs scripts without session state", async () => {
    const runner = vi.fn<CommandRunner>(async () => ran({ stdout: "done\n" }));
    const tool = new SimpleMacOSTool({ runner });

    expect((await tool.execute("open_app", { app_name: "Safari" })).output).toBe("Successfully opened Safari");
    expect((await tool.execute("run_applescript", { script: "return 1" })).output).toBe(
      "AppleScript executed successfully: done",
    );
  });

  it("reports failures and unknown actions", async () => {
    const runner = vi.fn<CommandRunner>(async () => ran({ exitCode: 1, stderr: "execution error" }));
    const tool = new SimpleMacOSTool({ runner });

    expect((await tool.execute("open_app", { app_name: "Ghost" })).error).toBe("Failed to open Ghost: execution error");
    expect((await tool.execute("run_applescript", { script: "bad" })).error).toBe("AppleScript failed: execution error");
    expect((await tool.execute("screenshot")).error).toBe(
      "Unknown action: screenshot. Available actions: open_app, run_applescript",
    );
  });
});
