import { describe, expect, it } from "vitest";

import { DEFAULT_SETTINGS, describeSettings, emptyHintFor } from "./tutorOptions";

describe("describeSettings", () => {
  it("names the mode and answer language", () => {
    expect(describeSettings(DEFAULT_SETTINGS)).toBe("Free chat, Genie answers in English");
  });

  it("names the roleplay scenario", () => {
    expect(describeSettings({ mode: "roleplay", scenario: "store", language: "ta-IN" })).toBe(
      "Role play: At the store, Genie answers in தமிழ் (Tamil)"
    );
  });

  it("falls back to raw keys it does not know", () => {
    expect(describeSettings({ mode: "roleplay", scenario: "zoo", language: "fr-FR" })).toBe(
      "Role play: zoo, Genie answers in fr-FR"
    );
  });
});

describe("emptyHintFor", () => {
  it("invites the child into the scenario", () => {
    expect(emptyHintFor({ mode: "roleplay", scenario: "home", language: "en-US" })).toBe(
      "Hold the button and say hello. Genie will play along at home."
    );
  });

  it("keeps free chat open-ended", () => {
    expect(emptyHintFor(DEFAULT_SETTINGS)).toBe("Hold the button and tell Genie about your day!");
  });
});
