// RendererBuilder: collects the canvas, callbacks and links, then build()
// validates the whole graph, orders it and realizes every handle. Nothing
// touches the GPU until build(), and a failed build leaves nothing behind.

import { ref, refKey } from "./Id";
import type { Id, ResourceKind, ResourceRef } from "./Id";
import type { AnyLink } from "./AnyLink";
import { linkRef } from "./AnyLink";
import type { ContextTarget, Clock, FrameScheduler, GraphicsContext } from "./GraphicsContext";
import { animationFrameScheduler, performanceClock } from "./GraphicsContext";
import { ShaderLink } from "./ShaderLink";
import type { ProgramLink } from "./ProgramLink";
import { VAOLink } from "./VAOLink";
import type { BufferLink } from "./BufferLink";
import type { AttributeLink } from "./AttributeLink";
import type { UniformLink } from "./UniformLink";
import type { TextureLink } from "./TextureLink";
import type { FramebufferLink } from "./FramebufferLink";
import type { TransformFeedbackLink } from "./TransformFeedbackLink";
import { DependencyGraph } from "./DependencyGraph";
import { DependencyView } from "./DependencyView";
import { ResourceRegistry } from "./ResourceRegistry";
import { LinkRunner } from "./LinkRunner";
import type { LinkStep } from "./LinkRunner";
import { RendererData } from "./RendererData";
import type { RenderCallback, UpdateCallback } from "./RendererData";
import { Renderer } from "./Renderer";
import { CanvasRecorder, recordingOptions } from "./CanvasRecorder";
import type { RecordingOptions } from "./CanvasRecorder";
import { ContextAcquisitionError, DuplicateIdError, MissingRenderCallbackError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("RendererBuilder");

// Graph insertion order. Ties in the topological sort fall back to it, so
// shaders come first and attributes and uniforms last.
const KIND_ORDER: readonly ResourceKind[] = [
  "vertexShader",
  "fragmentShader",
  "program",
  "vao",
  "buffer",
  "texture",
  "framebuffer",
  "transformFeedback",
  "attribute",
  "uniform",
];

export class RendererBuilder<Gl extends GraphicsContext = WebGL2RenderingContext, UserCtx = unknown> {
  private canvas: ContextTarget<Gl> | null = null;
  private contextAttributes: WebGLContextAttributes | undefined;
  private renderCallback: RenderCallback<Gl, UserCtx> | null = null;
  private updateCallback: UpdateCallback<Gl, UserCtx> | null = null;
  private userCtx: UserCtx | undefined;
  private scheduler: FrameScheduler = animationFrameScheduler;
  private clock: Clock = performanceClock;
  private recording: Partial<RecordingOptions<Gl>> = {};

  private readonly links = new Map<ResourceKind, Map<Id, AnyLink<Gl, UserCtx>>>(
    KIND_ORDER.map((kind) => [kind, new Map()])
  );

  setCanvas(canvas: ContextTarget<Gl>): this {
    this.canvas = canvas;
    return this;
  }

  /** Passed to getContext("webgl2", ...) as-is. */
  setContextAttributes(attributes: WebGLContextAttributes): this {
    this.contextAttributes = attributes;
    return this;
  }

  setRenderCallback(callback: RenderCallback<Gl, UserCtx>): this {
    this.renderCallback = callback;
    return this;
  }

  setUpdateCallback(callback: UpdateCallback<Gl, UserCtx>): this {
    this.updateCallback = callback;
    return this;
  }

  /** Arbitrary caller state, handed to every link callback as ctx.userCtx. */
  setUserCtx(userCtx: UserCtx): this {
    this.userCtx = userCtx;
    return this;
  }

  setScheduler(scheduler: FrameScheduler): this {
    this.scheduler = scheduler;
    return this;
  }

  setClock(clock: Clock): this {
    this.clock = clock;
    return this;
  }

  /** Overrides the recording format, file name, capture or save step. */
  setRecordingOptions(options: Partial<RecordingOptions<Gl>>): this {
    this.recording = { ...this.recording, ...options };
    return this;
  }

  addVertexShaderSrc(id: Id, source: string): this {
    return this.addShaderLink(new ShaderLink(id, "vertex", source));
  }

  addFragmentShaderSrc(id: Id, source: string): this {
    return this.addShaderLink(new ShaderLink(id, "fragment", source));
  }

  addShaderLink(link: ShaderLink): this {
    return this.register(link);
  }

  addProgramLink(link: ProgramLink): this {
    return this.register(link);
  }

  /** A bare id allocates a plain vertex array object. */
  addVAOLink(link: VAOLink<Gl, UserCtx> | Id): this {
    return this.register(typeof link === "string" ? new VAOLink<Gl, UserCtx>(link) : link);
  }

  addBufferLink(link: BufferLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  addAttributeLink(link: AttributeLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  addUniformLink(link: UniformLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  addTextureLink(link: TextureLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  addFramebufferLink(link: FramebufferLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  addTransformFeedbackLink(link: TransformFeedbackLink<Gl, UserCtx>): this {
    return this.register(link);
  }

  build(): Renderer<Gl, UserCtx> {
    const renderCallback = this.renderCallback;
    if (!renderCallback) throw new MissingRenderCallbackError();

    const { canvas, gl } = this.acquireContext();
    const ordered = this.resolve();

    const registry = new ResourceRegistry();
    const runner = new LinkRunner<Gl, UserCtx>(gl, canvas, registry, this.userCtx);
    const steps: LinkStep<Gl, UserCtx>[] = ordered.map(({ link, edges }) => ({
      link,
      deps: new DependencyView(registry, edges, refKey(linkRef(link))),
    }));

    const now = this.clock();
    try {
      for (const step of steps) runner.create(step, now);
    } catch (err) {
      const released = registry.release(gl);
      log.debug(`Build failed; released ${released} handle(s)`);
      throw err;
    }

    log.debug(`Built ${steps.length} link(s), ${registry.handleCount} handle(s)`);

    const data = new RendererData<Gl, UserCtx>({
      gl,
      canvas,
      registry,
      runner,
      steps,
      renderCallback,
      updateCallback: this.updateCallback,
      userCtx: this.userCtx,
      clock: this.clock,
    });
    return new Renderer(data, this.scheduler, new CanvasRecorder<Gl>(recordingOptions<Gl>(this.recording)));
  }

  private register(link: AnyLink<Gl, UserCtx>): this {
    const byId = this.namespace(link.kind);
    if (byId.has(link.id)) throw new DuplicateIdError(link.kind, link.id);
    byId.set(link.id, link);
    return this;
  }

  private namespace(kind: ResourceKind): Map<Id, AnyLink<Gl, UserCtx>> {
    let byId = this.links.get(kind);
    if (!byId) {
      byId = new Map();
      this.links.set(kind, byId);
    }
    return byId;
  }

  private acquireContext(): { canvas: ContextTarget<Gl>; gl: Gl } {
    const canvas = this.canvas;
    if (!canvas) throw new ContextAcquisitionError("No canvas was set");

    let gl: Gl | null;
    try {
      gl = canvas.getContext("webgl2", this.contextAttributes);
    } catch (err) {
      throw new ContextAcquisitionError("getContext(\"webgl2\") threw", err);
    }
    if (!gl) throw new ContextAcquisitionError("WebGL2 is not available on this canvas");
    return { canvas, gl };
  }

  /** Every link with its dependency edges, dependencies first. */
  private resolve(): { link: AnyLink<Gl, UserCtx>; edges: ResourceRef[] }[] {
    const graph = new DependencyGraph<{ link: AnyLink<Gl, UserCtx>; edges: ResourceRef[] }>();
    const programIds = [...this.namespace("program").keys()];

    for (const kind of KIND_ORDER) {
      for (const link of this.namespace(kind).values()) {
        const edges = link.dependencies();
        // Without a fixed location or a program list, the location is
        // queried from every program, so every program must exist first.
        if (link.kind === "attribute" && link.needsLocationQuery() && link.programIds === undefined) {
          edges.push(...programIds.map(ref.program));
        }
        graph.add(linkRef(link), { link, edges }, edges);
      }
    }

    return graph.sort();
  }
}
