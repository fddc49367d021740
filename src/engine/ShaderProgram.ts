// ShaderProgram: compiles GLSL and links programs for the builder. The
// boilerplate for compiling/linking is identical for every program, so it
// lives here once and reports failures with the driver's info log.

import type { Id } from "./Id";
import type { GraphicsContext } from "./GraphicsContext";
import type { ShaderType } from "./ShaderLink";
import { HandleCreationError, ProgramLinkError, ShaderCompileError } from "./errors";

export function compileShader(gl: GraphicsContext, id: Id, type: ShaderType, source: string): WebGLShader {
  const shader = gl.createShader(type === "vertex" ? gl.VERTEX_SHADER : gl.FRAGMENT_SHADER);
  if (!shader) throw new HandleCreationError(type === "vertex" ? "vertexShader" : "fragmentShader", id);

  gl.shaderSource(shader, source);
  gl.compileShader(shader);

  if (!gl.getShaderParameter(shader, gl.COMPILE_STATUS)) {
    const log = gl.getShaderInfoLog(shader) ?? "";
    gl.deleteShader(shader);
    throw new ShaderCompileError(id, log);
  }
  return shader;
}

export interface LinkProgramOptions {
  transformFeedbackVaryings: readonly string[];
  transformFeedbackBufferMode: "interleaved" | "separate";
}

export function linkProgram(
  gl: GraphicsContext,
  id: Id,
  vertexShader: WebGLShader,
  fragmentShader: WebGLShader,
  options: LinkProgramOptions
): WebGLProgram {
  const program = gl.createProgram();
  if (!program) throw new HandleCreationError("program", id);

  gl.attachShader(program, vertexShader);
  gl.attachShader(program, fragmentShader);

  // Varyings must be declared before linking to take effect.
  if (options.transformFeedbackVaryings.length > 0) {
    const mode =
      options.transformFeedbackBufferMode === "separate" ? gl.SEPARATE_ATTRIBS : gl.INTERLEAVED_ATTRIBS;
    gl.transformFeedbackVaryings(program, [...options.transformFeedbackVaryings], mode);
  }

  gl.linkProgram(program);

  if (!gl.getProgramParameter(program, gl.LINK_STATUS)) {
    const log = gl.getProgramInfoLog(program) ?? "";
    gl.deleteProgram(program);
    throw new ProgramLinkError(id, log);
  }
  return program;
}
