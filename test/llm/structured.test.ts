import { describe, expect, it } from "vitest";
import { ProviderError, SchemaError } from "../../src/errors.js";
import { FunctionModel } from "../../src/llm/model.js";
import { askStructured, decodeBlock, extractBlock, parseStructured } from "../../src/llm/structured.js";
import { ReportEnvelopeSchema, zodParser } from "../../src/schemas.js";

const parseReport = zodParser(ReportEnvelopeSchema, "Report");

describe("extractBlock", () => {
  it("returns the body of a yaml fence", () => {
    expect(extractBlock("intro\n```yaml\na: 1\n```\noutro")).toBe("a: 1\n");
  });

  it("accepts json and unlabeled fences", () => {
    expect(extractBlock('```json\n{"a": 1}\n```')).toBe('{"a": 1}\n');
    expect(extractBlock("```\nb: 2\n```")).toBe("b: 2\n");
  });

  it("takes the first block when there are several", () => {
    expect(extractBlock("```yaml\nfirst: 1\n```\n```yaml\nsecond: 2\n```")).toBe("first: 1\n");
  });

  it("skips blocks in other languages", () => {
    const raw = "```python\nprint(1)\n```\nThen the result:\n```yaml\nc: 3\n```";
    expect(extractBlock(raw)).toBe("c: 3\n");
  });

  it("prefers a tagged block over an earlier untagged one", () => {
    expect(extractBlock("```\nplain: 1\n```\n```json\n{\"d\": 4}\n```")).toBe('{"d": 4}\n');
  });

  it("does not read a closing fence as an opening one", () => {
    const raw = "```python\nprint(1)\n```\nnot: structured\n```\nb: 2\n```";
    expect(extractBlock(raw)).toBe("b: 2\n");
  });

  it("throws SchemaError when there is no fence", () => {
    expect(() => extractBlock("a: 1")).toThrow(SchemaError);
    expect(() => extractBlock("a: 1")).toThrow("Response contains no fenced structured block");
  });
});

describe("decodeBlock", () => {
  it("decodes yaml and json", () => {
    expect(decodeBlock("a: 1\nb: [x, y]\n")).toEqual({ a: 1, b: ["x", "y"] });
    expect(decodeBlock('{"a": true}')).toEqual({ a: true });
  });

  it("throws SchemaError on invalid yaml", () => {
    expect(() => decodeBlock("a: [1, 2\n")).toThrow(/^Structured block is not valid YAML/);
  });
});

describe("parseStructured", () => {
  it("validates the decoded block", () => {
    const report = parseStructured(
      "```yaml\nreport:\n  executive_summary: Short.\n  detailed_findings:\n    - one\n```",
      parseReport,
    );
    expect(report).toEqual({
      executive_summary: "Short.",
      detailed_findings: ["one"],
      recommendations: [],
      visualizations: [],
      sources: [],
      next_steps: [],
    });
  });

  it("fails closed when the envelope key is missing", () => {
    expect(() => parseStructured("```yaml\nsummary: nope\n```", parseReport)).toThrow(
      "Report failed validation: report: Required",
    );
  });
});

describe("askStructured", () => {
  it("asks again with a stricter prompt after unusable output", async () => {
    const prompts: string[] = [];
    const model = new FunctionModel({
      fn: async (prompt) => {
        prompts.push(prompt);
        return prompts.length === 1 ? "no block here" : "```yaml\nreport:\n  executive_summary: ok\n```";
      },
    });

    const report = await askStructured(model, "Write it", parseReport, { label: "report" });
    expect(report.executive_summary).toBe("ok");
    expect(prompts).toHaveLength(2);
    expect(prompts[0]).toBe("Write it");
    expect(prompts[1]).toMatch(/^Write it\n\nIMPORTANT: Respond with ONLY/);
  });

  it("throws the last SchemaError once attempts run out", async () => {
    let calls = 0;
    const model = new FunctionModel({
      fn: async () => {
        calls++;
        return "```yaml\nwrong: shape\n```";
      },
    });

    await expect(askStructured(model, "p", parseReport, { label: "report", attempts: 3 })).rejects.toThrow(
      SchemaError,
    );
    expect(calls).toBe(3);
  });

  it("retries retryable provider errors and then succeeds", async () => {
    let calls = 0;
    const model = new FunctionModel({
      fn: async () => {
        calls++;
        if (calls < 3) throw new ProviderError("fake", "overloaded", { status: 529 });
        return "```yaml\nreport:\n  executive_summary: late\n```";
      },
    });

    const report = await askStructured(model, "p", parseReport, { label: "report" });
    expect(report.executive_summary).toBe("late");
    expect(calls).toBe(3);
  });

  it("does not retry a non-retryable provider error", async () => {
    let calls = 0;
    const model = new FunctionModel({
      fn: async () => {
        calls++;
        throw new ProviderError("fake", "bad key", { status: 401 });
      },
    });

    await expect(askStructured(model, "p", parseReport, { label: "report" })).rejects.toThrow("[fake] bad key");
    expect(calls).toBe(1);
  });
});
