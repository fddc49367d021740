// Error taxonomy. Everything structural is thrown synchronously from
// RendererBuilder.build(); UseAfterFreeError comes from a freed Renderer and
// RecordingError from a canvas or browser that cannot be recorded.

import type { Id, ResourceKind } from "./Id";

export class RendererError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "RendererError";
  }
}

export class DuplicateIdError extends RendererError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly id: Id
  ) {
    super(`Duplicate ${kind} id "${id}"`);
    this.name = "DuplicateIdError";
  }
}

export class UnknownIdError extends RendererError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly id: Id,
    /** Key of the resource that referenced the missing id, when known. */
    public readonly dependent?: string
  ) {
    super(
      dependent
        ? `Unknown ${kind} id "${id}" (required by ${dependent})`
        : `Unknown ${kind} id "${id}"`
    );
    this.name = "UnknownIdError";
  }
}

export class CyclicDependencyError extends RendererError {
  /** Node keys along the cycle; the first key is repeated at the end. */
  readonly cycle: readonly string[];

  constructor(cycle: readonly string[]) {
    super(`Cyclic dependency: ${cycle.join(" -> ")}`);
    this.name = "CyclicDependencyError";
    this.cycle = cycle;
  }
}

export class MissingRenderCallbackError extends RendererError {
  constructor() {
    super("Renderer could not be built: no render callback was supplied");
    this.name = "MissingRenderCallbackError";
  }
}

export class ContextAcquisitionError extends RendererError {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = "ContextAcquisitionError";
  }
}

export class ShaderCompileError extends RendererError {
  constructor(
    public readonly shaderId: Id,
    public readonly log: string
  ) {
    super(`Shader compile error in "${shaderId}":\n${log}`);
    this.name = "ShaderCompileError";
  }
}

export class ProgramLinkError extends RendererError {
  constructor(
    public readonly programId: Id,
    public readonly log: string
  ) {
    super(`Program link error in "${programId}":\n${log}`);
    this.name = "ProgramLinkError";
  }
}

export class HandleCreationError extends RendererError {
  constructor(
    public readonly kind: ResourceKind,
    public readonly id: Id
  ) {
    super(`Failed to create ${kind} "${id}": no handle was returned`);
    this.name = "HandleCreationError";
  }
}

export class LocationNotFoundError extends RendererError {
  constructor(
    public readonly kind: "attribute" | "uniform",
    public readonly id: Id,
    public readonly programIds: readonly Id[]
  ) {
    super(`No location for ${kind} "${id}" in program(s) [${programIds.join(", ")}]`);
    this.name = "LocationNotFoundError";
  }
}

export class UseAfterFreeError extends RendererError {
  constructor(operation: string) {
    super(`Renderer used after free(): ${operation}`);
    this.name = "UseAfterFreeError";
  }
}

export class RecordingError extends RendererError {
  constructor(message: string) {
    super(`Cannot record the canvas: ${message}`);
    this.name = "RecordingError";
  }
}
