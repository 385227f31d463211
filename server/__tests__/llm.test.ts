import { describe, expect, it } from "vitest";

import { readResponseOutput } from "../src/services/llm.js";

describe("readResponseOutput", () => {
  it("prefers the aggregated output text", () => {
    expect(readResponseOutput({ output_text: "  Hello there! 👋 ", output: [] })).toEqual({
      text: "Hello there! 👋",
      refusal: null
    });
  });

  it("joins output_text parts of message items", () => {
    const response = {
      output: [
        { type: "reasoning", summary: [] },
        {
          type: "message",
          role: "assistant",
          content: [
            { type: "output_text", text: "First line." },
            { type: "output_text", text: "Second line." }
          ]
        }
      ]
    };

    expect(readResponseOutput(response)).toEqual({ text: "First line.\nSecond line.", refusal: null });
  });

  it("reports refusals", () => {
    const response = {
      output_text: "",
      output: [
        {
          type: "message",
          role: "assistant",
          content: [{ type: "refusal", refusal: "I can't help with that." }]
        }
      ]
    };

    expect(readResponseOutput(response)).toEqual({ text: "", refusal: "I can't help with that." });
  });

  it("treats a content-filtered response as a refusal", () => {
    const response = {
      status: "incomplete",
      incomplete_details: { reason: "content_filter" },
      output: []
    };

    expect(readResponseOutput(response)).toEqual({ text: "", refusal: "" });
  });

  it("does not treat a token-limited response as a refusal", () => {
    const response = {
      output_text: "Once upon a",
      incomplete_details: { reason: "max_output_tokens" }
    };

    expect(readResponseOutput(response)).toEqual({ text: "Once upon a", refusal: null });
  });

  it("returns nothing for unexpected payloads", () => {
    expect(readResponseOutput(null)).toEqual({ text: "", refusal: null });
    expect(readResponseOutput("text")).toEqual({ text: "", refusal: null });
  });
});
