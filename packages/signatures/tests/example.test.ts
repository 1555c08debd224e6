import { describe, it, expect } from "vitest";
import { Example } from "../src/example.js";

describe("Example", () => {
  it("copies and freezes its inputs and outputs", () => {
    const inputs: Record<string, unknown> = { review: "Terrible." };
    const example = new Example(inputs, { sentiment: "negative" });
    inputs["review"] = "changed";

    expect(example.inputs).toEqual({ review: "Terrible." });
    expect(Object.isFrozen(example.inputs)).toBe(true);
    expect(Object.isFrozen(example.outputs)).toBe(true);
  });

  it("defaults to no outputs and no label", () => {
    const example = new Example({ review: "Fine." });
    expect(example.outputs).toEqual({});
    expect(example.label).toBeUndefined();
  });

  it("withInputs merges into a new example", () => {
    const base = new Example({ review: "Fine.", lang: "en" }, { sentiment: "neutral" }, "base");
    const next = base.withInputs({ review: "Great!" });

    expect(next).not.toBe(base);
    expect(next.inputs).toEqual({ review: "Great!", lang: "en" });
    expect(next.outputs).toEqual({ sentiment: "neutral" });
    expect(next.label).toBe("base");
    expect(base.inputs).toEqual({ review: "Fine.", lang: "en" });
  });

  it("withOutputs merges into a new example", () => {
    const base = new Example({ review: "Fine." }, { sentiment: "neutral" });
    const next = base.withOutputs({ confidence: 0.6 });
    expect(next.outputs).toEqual({ sentiment: "neutral", confidence: 0.6 });
    expect(base.outputs).toEqual({ sentiment: "neutral" });
  });

  it("withLabel replaces the label only", () => {
    const next = new Example({ review: "Fine." }).withLabel("neutral case");
    expect(next.label).toBe("neutral case");
    expect(next.inputs).toEqual({ review: "Fine." });
  });
});
