import { describe, expect, it } from "vitest";
import { ExecutionError } from "../../src/errors.js";
import { CodeExecutionWorker } from "../../src/workers/code-worker.js";
import { analysis, codeTask, FakeSandbox, fenced, researchTask, routedModel } from "../helpers/fakes.js";

const GENERATED = fenced({
  code: "import matplotlib.pyplot as plt\nplt.plot([1, 2])\nplt.savefig(temp_dir + '/a.png')\n",
  explanation: "Plots a line",
  visualization_type: "line",
});

describe("CodeExecutionWorker", () => {
  it("skips tasks of another type", async () => {
    const { model, prompts } = routedModel({ code: GENERATED });
    const sandbox = new FakeSandbox();
    const result = await new CodeExecutionWorker(model, sandbox).execute({ task: researchTask() });

    expect(result).toEqual({ status: "skipped", reason: "code worker cannot run a web_research task" });
    expect(prompts).toEqual([]);
    expect(sandbox.calls).toEqual([]);
  });

  it("returns code, explanation and URLs on success", async () => {
    const { model, prompts } = routedModel({ code: GENERATED });
    const sandbox = new FakeSandbox({ success: true, urls: ["https://cdn.test/a.png"], output: "ok" });
    const result = await new CodeExecutionWorker(model, sandbox).execute({
      task: codeTask(),
      analysis: analysis({ metrics: [{ name: "GW", value: 3 }] }),
    });

    expect(result).toEqual({
      status: "success",
      value: {
        status: "success",
        code: "import matplotlib.pyplot as plt\nplt.plot([1, 2])\nplt.savefig(temp_dir + '/a.png')\n",
        explanation: "Plots a line",
        urls: ["https://cdn.test/a.png"],
        output: "ok",
      },
    });
    expect(prompts[0]?.prompt).toContain("- plot a line chart");
    expect(sandbox.calls).toHaveLength(1);
  });

  it("never succeeds without URLs", async () => {
    const { model } = routedModel({ code: GENERATED });
    const sandbox = new FakeSandbox({ success: true, urls: [], output: "" });
    const result = await new CodeExecutionWorker(model, sandbox).execute({ task: codeTask() });

    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error).toBeInstanceOf(ExecutionError);
      expect(result.error.message).toBe("Code produced no visualization files");
    }
  });

  it("keeps the partial URLs of a failed upload", async () => {
    const { model } = routedModel({ code: GENERATED });
    const sandbox = new FakeSandbox({
      success: false,
      urls: ["https://cdn.test/a.png"],
      output: "",
      error: "Failed to upload b.png: HTTP 500",
    });
    const result = await new CodeExecutionWorker(model, sandbox).execute({ task: codeTask() });

    expect(result.status).toBe("error");
    if (result.status === "error" && result.error instanceof ExecutionError) {
      expect(result.error.partialUrls).toEqual(["https://cdn.test/a.png"]);
      expect(result.error.message).toBe("Failed to upload b.png: HTTP 500");
      expect(result.error.generatedCode).toContain("plt.plot");
    }
  });

  it("turns unusable generated code into an error result", async () => {
    const { model } = routedModel({ code: fenced({ code: "", explanation: "nothing" }) });
    const sandbox = new FakeSandbox();
    const result = await new CodeExecutionWorker(model, sandbox).execute({ task: codeTask() });

    expect(result.status).toBe("error");
    if (result.status === "error") {
      expect(result.error.message).toMatch(/^Code generation failed: Generated code failed validation/);
    }
    expect(sandbox.calls).toEqual([]);
  });
});
