import { beforeEach, describe, expect, it } from "vitest";
import {
  CanvasRecorder,
  downloadRecording,
  mediaRecorderCapture,
  recordingOptions,
} from "./CanvasRecorder";
import type { RecordingOptions } from "./CanvasRecorder";
import type { ContextTarget } from "./GraphicsContext";
import { RecordingError } from "./errors";
import { FakeCanvas, FakeCapture, FakeGl } from "../test/FakeGl";

describe("CanvasRecorder", () => {
  let canvas: FakeCanvas;
  let captures: FakeCapture[];
  let opened: { canvas: ContextTarget<FakeGl>; mimeType: string }[];
  let saved: { recording: Blob; fileName: string }[];
  let options: RecordingOptions<FakeGl>;

  beforeEach(() => {
    canvas = new FakeCanvas(new FakeGl());
    captures = [];
    opened = [];
    saved = [];
    options = {
      mimeType: "video/webm",
      fileName: "clip.webm",
      capture: (target, mimeType) => {
        opened.push({ canvas: target, mimeType });
        const capture = new FakeCapture();
        captures.push(capture);
        return capture;
      },
      save: (recording, fileName) => saved.push({ recording, fileName }),
    };
  });

  it("opens a capture of the canvas with the configured type", () => {
    const recorder = new CanvasRecorder(options);

    recorder.start(canvas);

    expect(opened).toEqual([{ canvas, mimeType: "video/webm" }]);
    expect(captures[0]?.started).toBe(true);
    expect(recorder.isRecording()).toBe(true);
  });

  it("ignores start while a recording is running", () => {
    const recorder = new CanvasRecorder(options);

    recorder.start(canvas);
    recorder.start(canvas);

    expect(opened).toHaveLength(1);
  });

  it("saves the joined chunks once the capture has ended", async () => {
    const recorder = new CanvasRecorder(options);
    recorder.start(canvas);
    const capture = captures[0];

    capture?.emit("ab");
    capture?.emit("cd");
    recorder.stop();

    expect(capture?.stopped).toBe(true);
    expect(recorder.isRecording()).toBe(false);
    expect(saved).toEqual([]);

    capture?.finish();

    expect(saved).toHaveLength(1);
    expect(saved[0]?.fileName).toBe("clip.webm");
    expect(saved[0]?.recording.type).toBe("video/webm");
    expect(await saved[0]?.recording.text()).toBe("abcd");
  });

  it("starts a fresh recording after a stop", async () => {
    const recorder = new CanvasRecorder(options);

    recorder.start(canvas);
    captures[0]?.emit("first");
    recorder.stop();
    captures[0]?.finish();
    recorder.start(canvas);
    captures[1]?.emit("second");
    recorder.stop();
    captures[1]?.finish();

    expect(saved).toHaveLength(2);
    expect(await saved[1]?.recording.text()).toBe("second");
  });

  it("treats stop without a recording as a no-op", () => {
    const recorder = new CanvasRecorder(options);

    recorder.stop();

    expect(recorder.isRecording()).toBe(false);
    expect(opened).toEqual([]);
  });

  it("stays idle when the capture cannot be opened", () => {
    const recorder = new CanvasRecorder<FakeGl>({
      ...options,
      capture: () => {
        throw new RecordingError("MediaRecorder cannot record video/webm");
      },
    });

    expect(() => recorder.start(canvas)).toThrow("Cannot record the canvas: MediaRecorder cannot record video/webm");
    expect(recorder.isRecording()).toBe(false);
  });
});

describe("recordingOptions", () => {
  it("fills in WebM, the default file name and the browser capture", () => {
    const filled = recordingOptions<FakeGl>({ fileName: "orbit.webm" });

    expect(filled.mimeType).toBe("video/webm");
    expect(filled.fileName).toBe("orbit.webm");
    expect(filled.capture).toBe(mediaRecorderCapture);
    expect(filled.save).toBe(downloadRecording);
  });
});

describe("mediaRecorderCapture", () => {
  it("rejects a canvas that is not an HTMLCanvasElement", () => {
    const canvas = new FakeCanvas(new FakeGl());

    expect(() => mediaRecorderCapture(canvas, "video/webm")).toThrow(RecordingError);
    expect(() => mediaRecorderCapture(canvas, "video/webm")).toThrow(
      "Cannot record the canvas: Recording needs an HTMLCanvasElement"
    );
  });
});
