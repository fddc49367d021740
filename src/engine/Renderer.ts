// Renderer: the public handle over a built graph. Renders on demand, drives
// the animation loop through the frame scheduler, records the canvas, and
// tears everything down in free().

import type { Id } from "./Id";
import type { ContextTarget, FrameScheduler, GraphicsContext } from "./GraphicsContext";
import type { RendererData } from "./RendererData";
import { AnimationDriver } from "./AnimationDriver";
import type { CanvasRecorder } from "./CanvasRecorder";
import { RendererBuilder } from "./RendererBuilder";
import { UseAfterFreeError } from "./errors";

export class Renderer<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> {
  private readonly driver: AnimationDriver;

  constructor(
    private readonly _data: RendererData<Gl, UserCtx>,
    scheduler: FrameScheduler,
    private readonly recorder: CanvasRecorder<Gl>
  ) {
    this.driver = new AnimationDriver(scheduler, () => {
      this._data.updateAndRender();
    });
  }

  static builder<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown>(): RendererBuilder<
    Gl,
    UserCtx
  > {
    return new RendererBuilder<Gl, UserCtx>();
  }

  data(): RendererData<Gl, UserCtx> {
    return this._data;
  }

  gl(): Gl {
    return this._data.gl();
  }

  canvas(): ContextTarget<Gl> {
    return this._data.canvas();
  }

  useProgram(id: Id): this {
    this._data.useProgram(id);
    return this;
  }

  useVAO(id: Id): this {
    this._data.useVAO(id);
    return this;
  }

  render(): this {
    this._data.render();
    return this;
  }

  updateAndRender(): this {
    this._data.updateAndRender();
    return this;
  }

  startAnimating(): this {
    if (this._data.isFreed()) throw new UseAfterFreeError("startAnimating");
    this.driver.start();
    return this;
  }

  stopAnimating(): this {
    this.driver.stop();
    return this;
  }

  isAnimating(): boolean {
    return this.driver.state === "running";
  }

  /** Starts recording the canvas; the file is saved once recording stops. */
  startRecording(): this {
    if (this._data.isFreed()) throw new UseAfterFreeError("startRecording");
    this.recorder.start(this._data.canvas());
    return this;
  }

  stopRecording(): this {
    this.recorder.stop();
    return this;
  }

  isRecording(): boolean {
    return this.recorder.isRecording();
  }

  isFreed(): boolean {
    return this._data.isFreed();
  }

  /** Stops recording and the loop, then deletes every handle. Repeat calls are no-ops. */
  free(): void {
    this.recorder.stop();
    this.driver.stop();
    this._data.free();
  }
}
