import { describe, expect, it } from "vitest";

import { InMemorySessionStore } from "../src/services/sessionStore.js";

describe("InMemorySessionStore", () => {
  it("stores sessions per connection", () => {
    const store = new InMemorySessionStore();
    store.put("a", { scenario: "school", turns: [] });
    store.put("b", { scenario: "home", turns: [{ role: "user", text: "Hi" }] });

    expect(store.get("a")).toEqual({ scenario: "school", turns: [] });
    expect(store.get("b")?.scenario).toBe("home");
    expect(store.get("c")).toBeUndefined();
    expect(store.size).toBe(2);
  });

  it("reports whether a delete removed anything", () => {
    const store = new InMemorySessionStore();
    store.put("a", { scenario: "store", turns: [] });

    expect(store.delete("a")).toBe(true);
    expect(store.delete("a")).toBe(false);
    expect(store.size).toBe(0);
  });
});
