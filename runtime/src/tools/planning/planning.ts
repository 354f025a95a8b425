/**
 * In-memory task planning: heuristic breakdowns, plans, tasks and progress.
 *
 * @module
 */

import breakdowns from "../../../data/task-breakdowns.json" with { type: "json" };
import type { ParameterSpec, ToolAdapter, ToolParams, ToolResult } from "../types.js";
import { errorResult, okResult } from "../types.js";
import { dispatchAction, listParam, missingParameter, nonEmptyParam } from "../action.js";
import { ToolErrorCodes } from "../../types/errors.js";
import type { Logger } from "../../utils/logger.js";
import { silentLogger } from "../../utils/logger.js";

// ============================================================================
// Types
// ============================================================================

export type TaskStatus = "pending" | "in_progress" | "completed";

export interface TaskUpdate {
  timestamp: string;
  content: string;
}

export interface PlanTask {
  id: string;
  title: string;
  description: string;
  status: TaskStatus;
  priority: string;
  estimatedTime?: string;
  dependencies: string[];
  updates: TaskUpdate[];
  completedAt?: string;
}

export interface Plan {
  id: string;
  title: string;
  description: string;
  status: "active" | "completed";
  createdAt: string;
  tasks: PlanTask[];
  completedTasks: number;
  totalTasks: number;
}

export interface BreakdownStep {
  title: string;
  description: string;
}

interface BreakdownPattern {
  name: string;
  keywords: string[];
  subtasks: BreakdownStep[];
}

const PATTERNS: readonly BreakdownPattern[] = breakdowns.patterns;
const GENERIC: readonly BreakdownStep[] = breakdowns.generic;

/**
 * Pick the breakdown for a task description. The first pattern with a
 * matching keyword wins.
 */
export function suggestBreakdown(description: string): readonly BreakdownStep[] {
  const lowered = description.toLowerCase();
  const match = PATTERNS.find((pattern) => pattern.keywords.some((keyword) => lowered.includes(keyword)));
  return match ? match.subtasks : GENERIC;
}

function progressPercent(plan: Plan): string {
  const percent = plan.totalTasks > 0 ? (plan.completedTasks / plan.totalTasks) * 100 : 0;
  return percent.toFixed(1);
}

function statusIcon(status: TaskStatus): string {
  if (status === "completed") return "✓";
  if (status === "pending") return "○";
  return "◐";
}

// ============================================================================
// PlanningTool
// ============================================================================

export interface PlanningToolConfig {
  logger?: Logger;
  /** Clock used for timestamps (default: current time) */
  now?: () => Date;
}

export class PlanningTool implements ToolAdapter {
  readonly name = "planning";
  readonly description =
    "Break complex tasks into subtasks, track progress and manage plans. " +
    "Actions: create_plan, add_task, update_task, complete_task, get_plan, analyze_task.";
  readonly category = "planning";
  readonly actions = ["create_plan", "add_task", "update_task", "complete_task", "get_plan", "analyze_task"] as const;
  readonly parameters: readonly ParameterSpec[] = [
    {
      name: "action",
      type: "string",
      description: "Planning action to perform",
      required: true,
      enum: ["create_plan", "add_task", "update_task", "complete_task", "get_plan", "analyze_task"],
    },
    { name: "task_description", type: "string", description: "Description of the task to plan", required: false },
    { name: "plan_id", type: "string", description: "ID of the plan to work with", required: false },
    { name: "task_id", type: "string", description: "ID of a task within the plan", required: false },
    { name: "subtask_title", type: "string", description: "Title for a new task", required: false },
    { name: "subtask_description", type: "string", description: "Description for a new task", required: false },
    {
      name: "priority",
      type: "string",
      description: "Task priority (high, medium, low)",
      required: false,
      default: "medium",
    },
    { name: "estimated_time", type: "string", description: "Estimated time, e.g. '2 hours'", required: false },
    { name: "dependencies", type: "string", description: "Comma-separated task IDs this task depends on", required: false },
    { name: "update_content", type: "string", description: "Progress note for update_task", required: false },
  ];

  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly plans = new Map<string, Plan>();
  private planCounter = 0;
  private taskCounter = 0;

  constructor(config: PlanningToolConfig = {}) {
    this.logger = config.logger ?? silentLogger;
    this.now = config.now ?? (() => new Date());
  }

  execute(action: string, params: ToolParams = {}): Promise<ToolResult> {
    return dispatchAction(
      "Planning",
      {
        create_plan: async (p) => this.createPlan(p),
        add_task: async (p) => this.addTask(p),
        update_task: async (p) => this.updateTask(p),
        complete_task: async (p) => this.completeTask(p),
        get_plan: async (p) => this.getPlan(p),
        analyze_task: async (p) => this.analyzeTask(p),
      },
      action,
      params,
      this.logger,
    );
  }

  /** Snapshot of a stored plan. */
  plan(planId: string): Plan | undefined {
    const plan = this.plans.get(planId);
    return plan ? structuredClone(plan) : undefined;
  }

  private createPlan(params: ToolParams): ToolResult {
    const description = nonEmptyParam(params, "task_description");
    if (description === undefined) {
      return missingParameter("task_description is required for create_plan action");
    }

    this.planCounter += 1;
    const tasks = suggestBreakdown(description).map((step) => this.newTask(step.title, step.description, "medium"));
    const plan: Plan = {
      id: `plan_${this.planCounter}`,
      title: description,
      description,
      status: "active",
      createdAt: this.now().toISOString(),
      tasks,
      completedTasks: 0,
      totalTasks: tasks.length,
    };
    this.plans.set(plan.id, plan);
    this.logger.debug(`planning: created ${plan.id} with ${tasks.length} tasks`);

    let output = `Created plan '${plan.id}' for: ${description}\n\nSubtasks:\n`;
    tasks.forEach((task, i) => {
      output += `${i + 1}. ${task.title} (ID: ${task.id})\n`;
      output += `   Description: ${task.description}\n`;
      output += `   Status: ${task.status}\n\n`;
    });
    return okResult(output, { artifacts: { plan_id: plan.id, plan: structuredClone(plan) } });
  }

  private addTask(params: ToolParams): ToolResult {
    const planId = nonEmptyParam(params, "plan_id");
    const title = nonEmptyParam(params, "subtask_title");
    const description = nonEmptyParam(params, "subtask_description");
    if (planId === undefined || title === undefined || description === undefined) {
      return missingParameter("plan_id, subtask_title, and subtask_description are required for add_task action");
    }
    const plan = this.plans.get(planId);
    if (!plan) return errorResult(`Plan ${planId} not found`, ToolErrorCodes.NOT_FOUND);

    const task = this.newTask(title, description, nonEmptyParam(params, "priority") ?? "medium");
    const estimated = nonEmptyParam(params, "estimated_time");
    if (estimated !== undefined) task.estimatedTime = estimated;
    task.dependencies = listParam(params, "dependencies") ?? [];

    plan.tasks.push(task);
    plan.totalTasks += 1;
    return okResult(`Added task '${title}' (ID: ${task.id}) to plan ${planId}`);
  }

  private updateTask(params: ToolParams): ToolResult {
    const planId = nonEmptyParam(params, "plan_id");
    const taskId = nonEmptyParam(params, "task_id");
    const content = nonEmptyParam(params, "update_content");
    if (planId === undefined || taskId === undefined || content === undefined) {
      return missingParameter("plan_id, task_id, and update_content are required for update_task action");
    }
    const found = this.findTask(planId, taskId);
    if ("error" in found) return found.error;

    found.task.updates.push({ timestamp: this.now().toISOString(), content });
    if (found.task.status === "pending") found.task.status = "in_progress";
    return okResult(`Updated task ${taskId} in plan ${planId}`);
  }

  private completeTask(params: ToolParams): ToolResult {
    const planId = nonEmptyParam(params, "plan_id");
    const taskId = nonEmptyParam(params, "task_id");
    if (planId === undefined || taskId === undefined) {
      return missingParameter("plan_id and task_id are required for complete_task action");
    }
    const found = this.findTask(planId, taskId);
    if ("error" in found) return found.error;

    const { plan, task } = found;
    if (task.status !== "completed") {
      task.status = "completed";
      task.completedAt = this.now().toISOString();
      plan.completedTasks += 1;
      if (plan.completedTasks === plan.totalTasks) plan.status = "completed";
    }
    return okResult(
      `Completed task '${task.title}' (ID: ${task.id})\nPlan progress: ${progressPercent(plan)}% complete`,
    );
  }

  private getPlan(params: ToolParams): ToolResult {
    const planId = nonEmptyParam(params, "plan_id");
    if (planId === undefined) return missingParameter("plan_id is required for get_plan action");
    const plan = this.plans.get(planId);
    if (!plan) return errorResult(`Plan ${planId} not found`, ToolErrorCodes.NOT_FOUND);

    let output = `Plan: ${plan.title} (ID: ${plan.id})\n`;
    output += `Status: ${plan.status}\n`;
    output += `Created: ${plan.createdAt}\n`;
    output += `Progress: ${progressPercent(plan)}% complete (${plan.completedTasks}/${plan.totalTasks} tasks)\n\n`;
    output += "Tasks:\n";
    for (const task of plan.tasks) {
      output += `${statusIcon(task.status)} ${task.title} (ID: ${task.id}) - ${task.status}\n`;
      output += `   ${task.description}\n`;
      if (task.priority !== "medium") output += `   Priority: ${task.priority}\n`;
      if (task.estimatedTime) output += `   Estimated time: ${task.estimatedTime}\n`;
      if (task.dependencies.length > 0) output += `   Dependencies: ${task.dependencies.join(", ")}\n`;
      output += "\n";
    }
    return okResult(output);
  }

  private analyzeTask(params: ToolParams): ToolResult {
    const description = nonEmptyParam(params, "task_description");
    if (description === undefined) {
      return missingParameter("task_description is required for analyze_task action");
    }
    const steps = suggestBreakdown(description);

    let output = `Analysis for task: ${description}\n\nSuggested breakdown:\n`;
    steps.forEach((step, i) => {
      output += `${i + 1}. ${step.title}\n`;
      output += `   Description: ${step.description}\n`;
      output += "   Priority: medium\n\n";
    });
    output += `Total estimated subtasks: ${steps.length}\n`;
    output += "Use 'create_plan' action to create an actual plan from this analysis.";
    return okResult(output);
  }

  private newTask(title: string, description: string, priority: string): PlanTask {
    this.taskCounter += 1;
    return {
      id: `task_${this.taskCounter}`,
      title,
      description,
      status: "pending",
      priority,
      dependencies: [],
      updates: [],
    };
  }

  private findTask(planId: string, taskId: string): { plan: Plan; task: PlanTask } | { error: ToolResult } {
    const plan = this.plans.get(planId);
    if (!plan) return { error: errorResult(`Plan ${planId} not found`, ToolErrorCodes.NOT_FOUND) };
    const task = plan.tasks.find((t) => t.id === taskId);
    if (!task) {
      return { error: errorResult(`Task ${taskId} not found in plan ${planId}`, ToolErrorCodes.NOT_FOUND) };
    }
    return { plan, task };
  }
}
