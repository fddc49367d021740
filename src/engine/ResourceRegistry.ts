// ResourceRegistry: the ownership record for every native handle a build
// creates. One map per namespace, plus the order handles were created in, so
// release() can walk each handle exactly once, dependents first.

import type { Id, ResourceKind } from "./Id";
import type { ResourceLookup } from "./Link";
import type { GraphicsContext } from "./GraphicsContext";
import { DuplicateIdError, UnknownIdError } from "./errors";
import { createLogger } from "./logger";

const log = createLogger("ResourceRegistry");

export class ResourceStore<H> {
  private readonly entries = new Map<Id, H>();

  constructor(readonly kind: ResourceKind) {}

  set(id: Id, value: H): void {
    if (this.entries.has(id)) throw new DuplicateIdError(this.kind, id);
    this.entries.set(id, value);
  }

  get(id: Id): H {
    const value = this.entries.get(id);
    if (value === undefined) throw new UnknownIdError(this.kind, id);
    return value;
  }

  has(id: Id): boolean {
    return this.entries.has(id);
  }

  ids(): Id[] {
    return [...this.entries.keys()];
  }

  get size(): number {
    return this.entries.size;
  }

  clear(): void {
    this.entries.clear();
  }
}

export interface AttributeRecord {
  readonly location: number;
  readonly bufferId: Id;
  readonly vaoIds: readonly Id[];
}

export interface UniformRecord {
  /** One location per program the uniform was found in. */
  readonly locations: ReadonlyMap<Id, WebGLUniformLocation>;
}

/** Native handle type per namespace the registry owns and must delete. */
export interface HandleTypes {
  vertexShader: WebGLShader;
  fragmentShader: WebGLShader;
  program: WebGLProgram;
  vao: WebGLVertexArrayObject;
  buffer: WebGLBuffer;
  texture: WebGLTexture;
  framebuffer: WebGLFramebuffer;
  transformFeedback: WebGLTransformFeedback;
}

export type OwnedKind = keyof HandleTypes;

interface OwnedHandle {
  kind: OwnedKind;
  id: Id;
}

type HandleStores = { readonly [K in OwnedKind]: ResourceStore<HandleTypes[K]> };

export class ResourceRegistry implements ResourceLookup {
  private readonly stores: HandleStores = {
    vertexShader: new ResourceStore("vertexShader"),
    fragmentShader: new ResourceStore("fragmentShader"),
    program: new ResourceStore("program"),
    vao: new ResourceStore("vao"),
    buffer: new ResourceStore("buffer"),
    texture: new ResourceStore("texture"),
    framebuffer: new ResourceStore("framebuffer"),
    transformFeedback: new ResourceStore("transformFeedback"),
  };
  readonly attributes = new ResourceStore<AttributeRecord>("attribute");
  readonly uniforms = new ResourceStore<UniformRecord>("uniform");

  private owned: OwnedHandle[] = [];

  /** Stores a freshly created handle and takes ownership of it. */
  adopt<K extends OwnedKind>(kind: K, id: Id, handle: HandleTypes[K]): void {
    this.stores[kind].set(id, handle);
    this.owned.push({ kind, id });
  }

  /** Ids in one owned namespace, in creation order. */
  ids(kind: OwnedKind): Id[] {
    return this.stores[kind].ids();
  }

  /** Number of native handles currently owned. */
  get handleCount(): number {
    return this.owned.length;
  }

  /**
   * Deletes every owned handle in reverse creation order and empties the
   * registry. A deletion that throws is logged and the walk continues.
   */
  release(gl: GraphicsContext): number {
    const owned = this.owned;
    this.owned = [];
    let released = 0;

    for (let i = owned.length - 1; i >= 0; i--) {
      const record = owned[i];
      try {
        this.deleteHandle(gl, record);
        released++;
      } catch (err) {
        log.warn(`Failed to delete ${record.kind} "${record.id}"`, err);
      }
    }

    for (const store of Object.values(this.stores)) store.clear();
    this.attributes.clear();
    this.uniforms.clear();
    return released;
  }

  vertexShader(id: Id): WebGLShader {
    return this.stores.vertexShader.get(id);
  }

  fragmentShader(id: Id): WebGLShader {
    return this.stores.fragmentShader.get(id);
  }

  program(id: Id): WebGLProgram {
    return this.stores.program.get(id);
  }

  vao(id: Id): WebGLVertexArrayObject {
    return this.stores.vao.get(id);
  }

  buffer(id: Id): WebGLBuffer {
    return this.stores.buffer.get(id);
  }

  texture(id: Id): WebGLTexture {
    return this.stores.texture.get(id);
  }

  framebuffer(id: Id): WebGLFramebuffer {
    return this.stores.framebuffer.get(id);
  }

  transformFeedback(id: Id): WebGLTransformFeedback {
    return this.stores.transformFeedback.get(id);
  }

  attributeLocation(id: Id): number {
    return this.attributes.get(id).location;
  }

  uniformLocation(id: Id, programId: Id): WebGLUniformLocation {
    const location = this.uniforms.get(id).locations.get(programId);
    if (location === undefined) throw new UnknownIdError("program", programId, `uniform:${id}`);
    return location;
  }

  private deleteHandle(gl: GraphicsContext, { kind, id }: OwnedHandle): void {
    switch (kind) {
      case "vertexShader":
        gl.deleteShader(this.stores.vertexShader.get(id));
        break;
      case "fragmentShader":
        gl.deleteShader(this.stores.fragmentShader.get(id));
        break;
      case "program":
        gl.deleteProgram(this.stores.program.get(id));
        break;
      case "vao":
        gl.deleteVertexArray(this.stores.vao.get(id));
        break;
      case "buffer":
        gl.deleteBuffer(this.stores.buffer.get(id));
        break;
      case "texture":
        gl.deleteTexture(this.stores.texture.get(id));
        break;
      case "framebuffer":
        gl.deleteFramebuffer(this.stores.framebuffer.get(id));
        break;
      case "transformFeedback":
        gl.deleteTransformFeedback(this.stores.transformFeedback.get(id));
        break;
    }
  }
}
