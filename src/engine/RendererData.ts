// RendererData: the resolved graph. Owns every handle the build created (via
// the registry), keeps the build order for per-frame updates, and hands
// itself to the render callback as the caller's view of the live resources.

import type { Id } from "./Id";
import { refKey } from "./Id";
import type { ResourceLookup } from "./Link";
import type { Clock, ContextTarget, GraphicsContext } from "./GraphicsContext";
import type { ResourceRegistry } from "./ResourceRegistry";
import type { LinkRunner, LinkStep } from "./LinkRunner";
import { UnknownIdError, UseAfterFreeError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("RendererData");

export type RenderCallback<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> = (
  data: RendererData<Gl, UserCtx>
) => void;

/** Runs once per updateAndRender(), after the link updates and before render. */
export type UpdateCallback<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> = (
  data: RendererData<Gl, UserCtx>,
  now: number
) => void;

export interface RendererDataInit<Gl extends GraphicsContext, UserCtx> {
  gl: Gl;
  canvas: ContextTarget<Gl>;
  registry: ResourceRegistry;
  runner: LinkRunner<Gl, UserCtx>;
  steps: readonly LinkStep<Gl, UserCtx>[];
  renderCallback: RenderCallback<Gl, UserCtx>;
  updateCallback: UpdateCallback<Gl, UserCtx> | null;
  userCtx: UserCtx | undefined;
  clock: Clock;
}

export class RendererData<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown>
  implements ResourceLookup
{
  private readonly _gl: Gl;
  private readonly _canvas: ContextTarget<Gl>;
  private readonly registry: ResourceRegistry;
  private readonly runner: LinkRunner<Gl, UserCtx>;
  private readonly steps: readonly LinkStep<Gl, UserCtx>[];
  private readonly stepsByKey: ReadonlyMap<string, LinkStep<Gl, UserCtx>>;
  private readonly renderCallback: RenderCallback<Gl, UserCtx>;
  private readonly updateCallback: UpdateCallback<Gl, UserCtx> | null;
  private readonly _userCtx: UserCtx | undefined;
  private readonly clock: Clock;
  private freed = false;

  constructor(init: RendererDataInit<Gl, UserCtx>) {
    this._gl = init.gl;
    this._canvas = init.canvas;
    this.registry = init.registry;
    this.runner = init.runner;
    this.steps = init.steps;
    this.stepsByKey = new Map(init.steps.map((step) => [refKey(step.link), step]));
    this.renderCallback = init.renderCallback;
    this.updateCallback = init.updateCallback;
    this._userCtx = init.userCtx;
    this.clock = init.clock;
  }

  gl(): Gl {
    this.assertLive("gl");
    return this._gl;
  }

  canvas(): ContextTarget<Gl> {
    this.assertLive("canvas");
    return this._canvas;
  }

  userCtx(): UserCtx | undefined {
    this.assertLive("userCtx");
    return this._userCtx;
  }

  now(): number {
    this.assertLive("now");
    return this.clock();
  }

  /** `kind:id` keys of the links, in the order they were realized and are updated. */
  buildOrder(): string[] {
    return this.steps.map((step) => refKey(step.link));
  }

  /** Native handles currently owned; zero once freed. */
  handleCount(): number {
    return this.registry.handleCount;
  }

  isFreed(): boolean {
    return this.freed;
  }

  useProgram(id: Id): this {
    this.gl().useProgram(this.program(id));
    return this;
  }

  useVAO(id: Id): this {
    this.gl().bindVertexArray(this.vao(id));
    return this;
  }

  // --- lookups ---

  vertexShader(id: Id): WebGLShader {
    this.assertLive("vertexShader");
    return this.registry.vertexShader(id);
  }

  fragmentShader(id: Id): WebGLShader {
    this.assertLive("fragmentShader");
    return this.registry.fragmentShader(id);
  }

  program(id: Id): WebGLProgram {
    this.assertLive("program");
    return this.registry.program(id);
  }

  vao(id: Id): WebGLVertexArrayObject {
    this.assertLive("vao");
    return this.registry.vao(id);
  }

  buffer(id: Id): WebGLBuffer {
    this.assertLive("buffer");
    return this.registry.buffer(id);
  }

  texture(id: Id): WebGLTexture {
    this.assertLive("texture");
    return this.registry.texture(id);
  }

  framebuffer(id: Id): WebGLFramebuffer {
    this.assertLive("framebuffer");
    return this.registry.framebuffer(id);
  }

  transformFeedback(id: Id): WebGLTransformFeedback {
    this.assertLive("transformFeedback");
    return this.registry.transformFeedback(id);
  }

  attributeLocation(id: Id): number {
    this.assertLive("attributeLocation");
    return this.registry.attributeLocation(id);
  }

  uniformLocation(id: Id, programId: Id): WebGLUniformLocation {
    this.assertLive("uniformLocation");
    return this.registry.uniformLocation(id, programId);
  }

  // --- frame operations ---

  /** Runs every link's update callback once, in build order. */
  updateLinks(now: number = this.clock()): this {
    this.assertLive("updateLinks");
    for (const step of this.steps) {
      // An update callback may free the renderer; the remaining steps have no handles.
      if (this.freed) return this;
      this.runner.update(step, now);
    }
    return this;
  }

  /** Runs a single uniform's update callback; a no-op when it has none. */
  updateUniform(id: Id, now: number = this.clock()): this {
    this.assertLive("updateUniform");
    const step = this.stepsByKey.get(refKey({ kind: "uniform", id }));
    if (!step) throw new UnknownIdError("uniform", id);
    this.runner.update(step, now);
    return this;
  }

  /** Runs every uniform's update callback, in build order. */
  updateUniforms(now: number = this.clock()): this {
    this.assertLive("updateUniforms");
    for (const step of this.steps) {
      if (this.freed) return this;
      if (step.link.kind === "uniform") this.runner.update(step, now);
    }
    return this;
  }

  render(): this {
    this.assertLive("render");
    this.renderCallback(this);
    return this;
  }

  /**
   * The per-frame operation: link updates, the update callback, then render.
   * A callback that frees the renderer ends the frame early.
   */
  updateAndRender(): this {
    this.assertLive("updateAndRender");
    const now = this.clock();
    this.updateLinks(now);
    if (this.freed) return this;
    this.updateCallback?.(this, now);
    if (this.freed) return this;
    return this.render();
  }

  /** Deletes every owned handle. Safe to call more than once. */
  free(): void {
    if (this.freed) return;
    this.freed = true;
    const released = this.registry.release(this._gl);
    log.debug(`Released ${released} handle(s)`);
  }

  private assertLive(operation: string): void {
    if (this.freed) throw new UseAfterFreeError(operation);
  }
}
