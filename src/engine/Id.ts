// Id: names every user-defined resource. Each ResourceKind is its own
// namespace, so a buffer and a shader may share the same string.

export type Id = string;

export type ResourceKind =
  | "vertexShader"
  | "fragmentShader"
  | "program"
  | "vao"
  | "buffer"
  | "attribute"
  | "uniform"
  | "texture"
  | "framebuffer"
  | "transformFeedback";

/** A node in the resource graph: the namespace plus the id within it. */
export interface ResourceRef {
  readonly kind: ResourceKind;
  readonly id: Id;
}

export function refKey(r: ResourceRef): string {
  return `${r.kind}:${r.id}`;
}

export const ref = {
  vertexShader: (id: Id): ResourceRef => ({ kind: "vertexShader", id }),
  fragmentShader: (id: Id): ResourceRef => ({ kind: "fragmentShader", id }),
  program: (id: Id): ResourceRef => ({ kind: "program", id }),
  vao: (id: Id): ResourceRef => ({ kind: "vao", id }),
  buffer: (id: Id): ResourceRef => ({ kind: "buffer", id }),
  attribute: (id: Id): ResourceRef => ({ kind: "attribute", id }),
  uniform: (id: Id): ResourceRef => ({ kind: "uniform", id }),
  texture: (id: Id): ResourceRef => ({ kind: "texture", id }),
  framebuffer: (id: Id): ResourceRef => ({ kind: "framebuffer", id }),
  transformFeedback: (id: Id): ResourceRef => ({ kind: "transformFeedback", id }),
};
