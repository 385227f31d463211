export type RecordedClip = {
  blob: Blob;
  mimeType: string;
  durationMs: number;
};

// The server transcribes WEBM/Opus at 48 kHz; other containers are a fallback for Safari.
const SUPPORTED_MIME_TYPES = ["audio/webm;codecs=opus", "audio/webm", "audio/ogg;codecs=opus", "audio/mp4"];

/** Presses shorter than this are treated as accidental taps. */
const MIN_CLIP_MS = 250;

export class PttRecorder {
  private stream: MediaStream | null = null;
  private mediaRecorder: MediaRecorder | null = null;
  private chunks: Blob[] = [];
  private mimeType = "audio/webm";
  private startMs = 0;

  public async start(): Promise<void> {
    if (this.mediaRecorder?.state === "recording") {
      return;
    }

    if (!navigator.mediaDevices?.getUserMedia) {
      throw new Error("This browser cannot record from the microphone");
    }

    if (!this.stream) {
      this.stream = await navigator.mediaDevices.getUserMedia({
        audio: {
          channelCount: 1,
          sampleRate: 48000,
          echoCancellation: true,
          noiseSuppression: true,
          autoGainControl: true
        }
      });
    }

    this.mimeType = pickMimeType();
    this.chunks = [];

    const recorder = new MediaRecorder(this.stream, this.mimeType ? { mimeType: this.mimeType } : undefined);
    this.mediaRecorder = recorder;

    recorder.ondataavailable = (event) => {
      if (event.data.size > 0) {
        this.chunks.push(event.data);
      }
    };

    this.startMs = performance.now();

    await new Promise<void>((resolve, reject) => {
      recorder.onstart = () => resolve();
      recorder.onerror = () => reject(new Error("Could not start recording"));
      recorder.start(120);
    });
  }

  /** Stops recording; resolves to `null` when nothing usable was captured. */
  public async stop(): Promise<RecordedClip | null> {
    const recorder = this.mediaRecorder;
    if (!recorder || recorder.state !== "recording") {
      return null;
    }

    await new Promise<void>((resolve, reject) => {
      recorder.onstop = () => resolve();
      recorder.onerror = () => reject(new Error("Could not stop recording"));
      recorder.stop();
    });

    this.mediaRecorder = null;

    const durationMs = Math.max(0, performance.now() - this.startMs);
    const mimeType = recorder.mimeType || this.mimeType || "audio/webm";
    const blob = new Blob(this.chunks, { type: mimeType });
    this.chunks = [];

    if (blob.size === 0 || durationMs < MIN_CLIP_MS) {
      return null;
    }

    return { blob, mimeType, durationMs };
  }

  public async dispose(): Promise<void> {
    if (this.mediaRecorder?.state === "recording") {
      await this.stop();
    }

    if (this.stream) {
      for (const track of this.stream.getTracks()) {
        track.stop();
      }
      this.stream = null;
    }
  }
}

function pickMimeType(): string {
  if (typeof MediaRecorder === "undefined") {
    return "";
  }

  return SUPPORTED_MIME_TYPES.find((mimeType) => MediaRecorder.isTypeSupported(mimeType)) ?? "";
}
