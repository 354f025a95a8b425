import { describe, it, expect } from "vitest";
import { PlanningTool, suggestBreakdown } from "./planning.js";

const fixedClock = () => new Date("2026-01-02T03:04:05.000Z");

describe("suggestBreakdown", () => {
  it("matches website keywords first", () => {
    const steps = suggestBreakdown("Build a Website with an API");
    expect(steps.map((s) => s.title)).toEqual([
      "Plan and Design",
      "Setup Project",
      "Implement Frontend",
      "Implement Backend",
      "Testing",
      "Deployment",
    ]);
  });

  it("matches api and analysis patterns", () => {
    expect(suggestBreakdown("REST api for orders")[0].title).toBe("Design API");
    expect(suggestBreakdown("quarterly sales analysis")[0].title).toBe("Data Collection");
  });

  it("falls back to the generic breakdown", () => {
    const steps = suggestBreakdown("write a novel");
    expect(steps).toHaveLength(5);
    expect(steps[0].title).toBe("Research and Planning");
  });
});

describe("PlanningTool", () => {
  it("creates a plan with numbered subtasks", async () => {
    const tool = new PlanningTool({ now: fixedClock });
    const result = await tool.execute("create_plan", { task_description: "write a novel" });

    expect(result.success).toBe(true);
    expect(result.output).toBe(
      "Created plan 'plan_1' for: write a novel\n\nSubtasks:\n" +
        "1. Research and Planning (ID: task_1)\n   Description: Research requirements and plan approach\n   Status: pending\n\n" +
        "2. Setup and Preparation (ID: task_2)\n   Description: Prepare tools and environment\n   Status: pending\n\n" +
        "3. Implementation (ID: task_3)\n   Description: Execute the main work\n   Status: pending\n\n" +
        "4. Testing and Validation (ID: task_4)\n   Description: Test and validate the results\n   Status: pending\n\n" +
        "5. Documentation (ID: task_5)\n   Description: Document the process and results\n   Status: pending\n\n",
    );
    expect(result.metadata?.artifacts?.plan_id).toBe("plan_1");
  });

  it("does not consume task ids when analyzing", async () => {
    const tool = new PlanningTool();
    const analysis = await tool.execute("analyze_task", { task_description: "write a novel" });
    await tool.execute("create_plan", { task_description: "write a novel" });

    expect(analysis.output).toContain("1. Research and Planning\n   Description: Research requirements and plan approach\n   Priority: medium\n\n");
    expect(analysis.output?.endsWith(
      "Total estimated subtasks: 5\nUse 'create_plan' action to create an actual plan from this analysis.",
    )).toBe(true);
    expect(tool.plan("plan_1")?.tasks[0].id).toBe("task_1");
  });

  it("tracks progress through completion", async () => {
    const tool = new PlanningTool();
    await tool.execute("create_plan", { task_description: "write a novel" });

    const first = await tool.execute("complete_task", { plan_id: "plan_1", task_id: "task_1" });
    expect(first.output).toBe("Completed task 'Research and Planning' (ID: task_1)\nPlan progress: 20.0% complete");

    const again = await tool.execute("complete_task", { plan_id: "plan_1", task_id: "task_1" });
    expect(again.output).toBe("Completed task 'Research and Planning' (ID: task_1)\nPlan progress: 20.0% complete");

    for (const id of ["task_2", "task_3", "task_4", "task_5"]) {
      await tool.execute("complete_task", { plan_id: "plan_1", task_id: id });
    }
    expect(tool.plan("plan_1")?.status).toBe("completed");
  });

  it("adds, updates and renders tasks", async () => {
    const tool = new PlanningTool({ now: fixedClock });
    await tool.execute("create_plan", { task_description: "write a novel" });

    const added = await tool.execute("add_task", {
      plan_id: "plan_1",
      subtask_title: "Proofread",
      subtask_description: "Read it twice",
      priority: "high",
      estimated_time: "2 hours",
      dependencies: "task_3, task_5",
    });
    expect(added.output).toBe("Added task 'Proofread' (ID: task_6) to plan plan_1");

    const updated = await tool.execute("update_task", { plan_id: "plan_1", task_id: "task_2", update_content: "started" });
    expect(updated.output).toBe("Updated task task_2 in plan plan_1");
    await tool.execute("complete_task", { plan_id: "plan_1", task_id: "task_1" });

    const view = await tool.execute("get_plan", { plan_id: "plan_1" });
    expect(view.output).toContain(
      "Plan: write a novel (ID: plan_1)\nStatus: active\nCreated: 2026-01-02T03:04:05.000Z\n" +
        "Progress: 16.7% complete (1/6 tasks)\n\nTasks:\n" +
        "✓ Research and Planning (ID: task_1) - completed\n   Research requirements and plan approach\n\n" +
        "◐ Setup and Preparation (ID: task_2) - in_progress\n   Prepare tools and environment\n\n" +
        "○ Implementation (ID: task_3) - pending\n",
    );
    expect(view.output?.endsWith(
      "○ Proofread (ID: task_6) - pending\n   Read it twice\n   Priority: high\n" +
        "   Estimated time: 2 hours\n   Dependencies: task_3, task_5\n\n",
    )).toBe(true);
    expect(tool.plan("plan_1")?.tasks[1].updates).toEqual([
      { timestamp: "2026-01-02T03:04:05.000Z", content: "started" },
    ]);
  });

  it("reports missing plans, tasks and parameters", async () => {
    const tool = new PlanningTool();
    await tool.execute("create_plan", { task_description: "x" });

    expect((await tool.execute("get_plan", { plan_id: "plan_9" })).error).toBe("Plan plan_9 not found");
    expect((await tool.execute("complete_task", { plan_id: "plan_1", task_id: "task_99" })).error).toBe(
      "Task task_99 not found in plan plan_1",
    );
    expect((await tool.execute("create_plan", {})).error).toBe("task_description is required for create_plan action");
    expect((await tool.execute("add_task", { plan_id: "plan_1" })).error).toBe(
      "plan_id, subtask_title, and subtask_description are required for add_task action",
    );
    expect((await tool.execute("get_plan", {})).metadata?.code).toBe("MISSING_PARAMETER");
  });

  it("rejects unknown actions", async () => {
    const result = await new PlanningTool().execute("delete_plan", {});
    expect(result.error).toBe(
      "Unknown action: delete_plan. Available actions: create_plan, add_task, update_task, complete_task, get_plan, analyze_task",
    );
  });
});
