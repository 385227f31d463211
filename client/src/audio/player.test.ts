import { describe, expect, it } from "vitest";

import { isAbortError, safePlay } from "./player";

function namedError(name: string, message: string): Error {
  const error = new Error(message);
  error.name = name;
  return error;
}

describe("safePlay", () => {
  it("keeps an interrupted play() recognisable as an abort", async () => {
    const interrupted = namedError("AbortError", "The play() request was interrupted by a call to pause()");

    const result = safePlay({ play: () => Promise.reject(interrupted) });

    await expect(result).rejects.toBe(interrupted);
    await result.catch((error: unknown) => expect(isAbortError(error)).toBe(true));
  });

  it("rewraps other playback failures as plain errors", async () => {
    const blocked = namedError("NotAllowedError", "play() failed because the user didn't interact");

    const result = safePlay({ play: () => Promise.reject(blocked) });

    await expect(result).rejects.toThrow("play() failed because the user didn't interact");
    await result.catch((error: unknown) => expect(isAbortError(error)).toBe(false));
  });

  it("resolves once playback starts", async () => {
    await expect(safePlay({ play: () => Promise.resolve() })).resolves.toBeUndefined();
  });
});

describe("isAbortError", () => {
  it("only matches errors named AbortError", () => {
    expect(isAbortError(namedError("AbortError", "stopped"))).toBe(true);
    expect(isAbortError(new Error("stopped"))).toBe(false);
    expect(isAbortError({ name: "AbortError" })).toBe(false);
  });
});
