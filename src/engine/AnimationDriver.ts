// AnimationDriver: owns the frame loop. Stopped -> Running -> Stopped; each
// frame runs to completion before the next one is requested, and a frame
// that fires after stop() does nothing.

import type { FrameScheduler } from "./GraphicsContext";
import { createLogger } from "./logger";

const log = createLogger("AnimationDriver");

export type AnimationState = "stopped" | "running";

export class AnimationDriver {
  private _state: AnimationState = "stopped";
  private token: number | null = null;

  constructor(
    private readonly scheduler: FrameScheduler,
    private readonly frame: (time: number) => void
  ) {}

  get state(): AnimationState {
    return this._state;
  }

  start(): void {
    if (this._state === "running") return;
    this._state = "running";
    this.requestFrame();
  }

  stop(): void {
    if (this.token !== null) {
      this.scheduler.cancel(this.token);
      this.token = null;
    }
    this._state = "stopped";
  }

  private requestFrame(): void {
    const token: number = this.scheduler.request((time) => this.tick(token, time));
    this.token = token;
  }

  private tick(token: number, time: number): void {
    // Only the most recent request may run: a scheduler can still deliver a
    // frame cancelled by stop(), including one superseded by a later start().
    if (token !== this.token || this._state !== "running") return;
    this.token = null;

    try {
      this.frame(time);
    } catch (err) {
      this._state = "stopped";
      log.error("Frame failed; animation stopped", err);
      throw err;
    }

    // The frame itself may have stopped (or stopped and restarted) the loop.
    if (this._state === "running" && this.token === null) this.requestFrame();
  }
}
