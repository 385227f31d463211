import { base64ToBytes } from "./encoding";

const DEFAULT_MIME = "audio/mpeg";

export class AudioClipPlayer {
  private readonly audioElement: HTMLAudioElement;
  private objectUrl: string | null = null;
  private playback: AbortController | null = null;

  public constructor() {
    this.audioElement = document.createElement("audio");
    this.audioElement.autoplay = true;
    this.audioElement.preload = "auto";
    this.audioElement.style.display = "none";
    document.body.appendChild(this.audioElement);
  }

  /**
   * Plays one synthesized reply and resolves once playback has ended. Rejects with an
   * `AbortError` when `stop()` interrupts it.
   */
  public async playBase64(audio: string, mimeType = DEFAULT_MIME): Promise<void> {
    await this.stop();

    const playback = new AbortController();
    this.playback = playback;

    const bytes = base64ToBytes(audio);
    const blob = new Blob([bytes], { type: mimeType });
    this.objectUrl = URL.createObjectURL(blob);
    this.audioElement.src = this.objectUrl;

    await safePlay(this.audioElement);
    await waitForAudioEnd(this.audioElement, playback.signal);
  }

  public async stop(): Promise<void> {
    this.playback?.abort();
    this.playback = null;

    this.audioElement.pause();
    this.audioElement.removeAttribute("src");
    this.audioElement.load();

    if (this.objectUrl) {
      URL.revokeObjectURL(this.objectUrl);
      this.objectUrl = null;
    }
  }

  public async dispose(): Promise<void> {
    await this.stop();
    this.audioElement.remove();
  }
}

export async function safePlay(audioElement: Pick<HTMLAudioElement, "play">): Promise<void> {
  try {
    await audioElement.play();
  } catch (error) {
    // An interrupted play() must keep its AbortError name for callers.
    if (error instanceof Error && error.name === "AbortError") {
      throw error;
    }
    throw new Error(
      error instanceof Error ? error.message : "The browser blocked audio playback, check its autoplay settings"
    );
  }
}

async function waitForAudioEnd(audioElement: HTMLAudioElement, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    throw abortError();
  }

  await new Promise<void>((resolve, reject) => {
    const onEnded = () => {
      cleanup();
      resolve();
    };

    const onError = () => {
      cleanup();
      reject(new Error("Audio playback failed"));
    };

    const onAbort = () => {
      cleanup();
      reject(abortError());
    };

    const cleanup = () => {
      audioElement.removeEventListener("ended", onEnded);
      audioElement.removeEventListener("error", onError);
      signal?.removeEventListener("abort", onAbort);
    };

    audioElement.addEventListener("ended", onEnded, { once: true });
    audioElement.addEventListener("error", onError, { once: true });
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isAbortError(cause: unknown): boolean {
  return cause instanceof Error && cause.name === "AbortError";
}

function abortError(): Error {
  try {
    return new DOMException("Playback interrupted", "AbortError");
  } catch {
    const error = new Error("Playback interrupted");
    error.name = "AbortError";
    return error;
  }
}
