import { describe, expect, it } from "vitest";
import { DecompositionError, ProviderError } from "../../src/errors.js";
import type { HistoryRecorder } from "../../src/persistence/types.js";
import { Planner } from "../../src/planner/planner.js";
import type { Task } from "../../src/planner/types.js";
import { fenced, routedModel } from "../helpers/fakes.js";

const PLAN: { tasks: Task[] } = {
  tasks: [
    { type: "web_research", description: "Find capacity data", parameters: { search_terms: ["solar capacity 2023"] } },
    { type: "code_execution", description: "Chart it", parameters: { code_requirements: ["line chart"] } },
  ],
};

describe("Planner", () => {
  it("returns the validated tasks in order", async () => {
    const { model } = routedModel({ plan: fenced(PLAN) });
    const tasks = await new Planner({ model }).plan("How fast is solar growing?");

    expect(tasks.map((t) => t.type)).toEqual(["web_research", "code_execution"]);
    expect(tasks[0]?.description).toBe("Find capacity data");
  });

  it("raises DecompositionError listing every problem", async () => {
    const { model } = routedModel({
      plan: fenced({ tasks: [{ type: "web_research", description: "x", parameters: {} }] }),
    });
    const err = await new Planner({ model }).plan("q").catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DecompositionError);
    expect(err).toMatchObject({ issues: ["Task 1: parameters.search_terms: Required"] });
  });

  it("raises DecompositionError when the reply has no block", async () => {
    const { model } = routedModel({ plan: "I cannot help with that." });
    await expect(new Planner({ model }).plan("q")).rejects.toThrow(DecompositionError);
  });

  it("lets provider failures through", async () => {
    const { model } = routedModel({});
    await expect(new Planner({ model }).plan("q")).rejects.toThrow(ProviderError);
  });

  it("includes feedback and history in the prompt", async () => {
    const { model, prompts } = routedModel({ plan: fenced(PLAN) });
    const history: HistoryRecorder = {
      record: () => undefined,
      similarQueries: async () => [
        { query: "solar growth in Europe", score: 0.5, success: true, tasks: PLAN.tasks.slice(0, 1), timestamp: "t" },
      ],
      templates: async () => ({ web_research: [], data_analysis: [], code_execution: [] }),
      metrics: async () => ({
        totalExecutions: 0,
        successfulExecutions: 0,
        taskTypeCounts: { web_research: 0, data_analysis: 0, code_execution: 0 },
        successRateByType: { web_research: 0, data_analysis: 0, code_execution: 0 },
      }),
    };

    await new Planner({ model, history }).plan("solar growth", { feedback: "Cite sources" });
    const prompt = prompts[0]?.prompt ?? "";
    expect(prompt).toContain("Similar past queries and the tasks they used:");
    expect(prompt).toContain("solar growth in Europe");
    expect(prompt).toContain("Cite sources");
    expect(prompt).not.toContain("Historical success metrics");
  });

  it("plans without history when reading it fails", async () => {
    const { model } = routedModel({ plan: fenced(PLAN) });
    const failing = async (): Promise<never> => {
      throw new Error("disk gone");
    };
    const history: HistoryRecorder = {
      record: () => undefined,
      similarQueries: failing,
      templates: failing,
      metrics: failing,
    };

    const tasks = await new Planner({ model, history }).plan("q");
    expect(tasks).toHaveLength(2);
  });
});
