import { describe, expect, it } from "vitest";

import { toSpeechText } from "../src/services/speechText.js";

describe("toSpeechText", () => {
  it("truncates at the first parenthesis before any other cleanup", () => {
    expect(toSpeechText("Hello 'world' (aside) 😊 bye")).toBe("Hello");
  });

  it("drops stage directions", () => {
    expect(toSpeechText("Wow, a red apple! (smiles warmly)")).toBe("Wow, a red apple!");
  });

  it("removes paired single and double quoted spans", () => {
    expect(toSpeechText(`Say "apple" and 'banana' now`)).toBe("Say  and  now");
  });

  it("leaves a lone apostrophe alone", () => {
    expect(toSpeechText("It's fun")).toBe("It's fun");
  });

  it("pairs apostrophes non-greedily across words", () => {
    expect(toSpeechText("Let's go to the park. It's sunny")).toBe("Lets sunny");
  });

  it("strips emoji", () => {
    expect(toSpeechText("Great job! 😊🎉")).toBe("Great job!");
    expect(toSpeechText("Scissors ✂ and rocket 🚀 and pizza 🍕")).toBe("Scissors  and rocket  and pizza");
  });

  it("keeps Indic scripts intact", () => {
    expect(toSpeechText("नमस्ते! 😊")).toBe("नमस्ते!");
    expect(toSpeechText("வணக்கம்")).toBe("வணக்கம்");
  });

  it("returns an empty string for emoji-only replies", () => {
    expect(toSpeechText("🐶🐱")).toBe("");
  });
});
