// CanvasRecorder: records what the renderer draws into a video. One capture
// per recording; its chunks are joined into a Blob when the capture stops and
// handed to the save callback (a file download by default).

import type { ContextTarget, GraphicsContext } from "./GraphicsContext";
import { RecordingError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("CanvasRecorder");

/** A running capture of the canvas. stop() may deliver its last chunk and onStop later. */
export interface MediaCapture {
  start(onData: (chunk: Blob) => void, onStop: () => void): void;
  stop(): void;
}

export type CaptureFactory<Gl extends GraphicsContext = WebGL2RenderingContext> = (
  canvas: ContextTarget<Gl>,
  mimeType: string
) => MediaCapture;

export type RecordingSink = (recording: Blob, fileName: string) => void;

export interface RecordingOptions<Gl extends GraphicsContext = WebGL2RenderingContext> {
  mimeType: string;
  fileName: string;
  capture: CaptureFactory<Gl>;
  save: RecordingSink;
}

/** Captures an HTMLCanvasElement through captureStream() and MediaRecorder. */
export function mediaRecorderCapture<Gl extends GraphicsContext>(
  canvas: ContextTarget<Gl>,
  mimeType: string
): MediaCapture {
  if (typeof HTMLCanvasElement === "undefined" || !(canvas instanceof HTMLCanvasElement)) {
    throw new RecordingError("Recording needs an HTMLCanvasElement");
  }
  if (typeof MediaRecorder === "undefined" || !MediaRecorder.isTypeSupported(mimeType)) {
    throw new RecordingError(`MediaRecorder cannot record ${mimeType}`);
  }

  const stream = canvas.captureStream();
  const recorder = new MediaRecorder(stream, { mimeType });

  return {
    start(onData, onStop) {
      recorder.ondataavailable = (event) => {
        if (event.data.size > 0) onData(event.data);
      };
      recorder.onstop = () => {
        for (const track of stream.getTracks()) track.stop();
        onStop();
      };
      recorder.start();
    },
    stop() {
      if (recorder.state !== "inactive") recorder.stop();
    },
  };
}

/** Saves the recording as a file through a temporary object URL. */
export const downloadRecording: RecordingSink = (recording, fileName) => {
  const url = URL.createObjectURL(recording);
  const link = document.createElement("a");
  link.download = fileName;
  link.href = url;
  document.body.appendChild(link);
  link.click();
  document.body.removeChild(link);
  URL.revokeObjectURL(url);
};

/** WebM through MediaRecorder, downloaded as recording.webm, unless overridden. */
export function recordingOptions<Gl extends GraphicsContext>(
  overrides: Partial<RecordingOptions<Gl>> = {}
): RecordingOptions<Gl> {
  return {
    mimeType: "video/webm",
    fileName: "recording.webm",
    capture: mediaRecorderCapture,
    save: downloadRecording,
    ...overrides,
  };
}

export class CanvasRecorder<Gl extends GraphicsContext = WebGL2RenderingContext> {
  private capture: MediaCapture | null = null;

  constructor(private readonly options: RecordingOptions<Gl>) {}

  isRecording(): boolean {
    return this.capture !== null;
  }

  /** Starts a recording of `canvas`; a no-op while one is running. */
  start(canvas: ContextTarget<Gl>): void {
    if (this.capture) return;

    const { mimeType, fileName, save } = this.options;
    const chunks: Blob[] = [];
    const capture = this.options.capture(canvas, mimeType);
    capture.start(
      (chunk) => chunks.push(chunk),
      () => {
        const recording = new Blob(chunks, { type: mimeType });
        log.debug(`Recording finished: ${recording.size} byte(s) in ${chunks.length} chunk(s)`);
        save(recording, fileName);
      }
    );
    this.capture = capture;
    log.debug(`Recording started (${mimeType})`);
  }

  stop(): void {
    const capture = this.capture;
    if (!capture) return;
    this.capture = null;
    capture.stop();
  }
}
