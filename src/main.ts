// main.ts: demo entry point. Declares a rotating, checkerboard-textured quad as
// a graph of links, builds it, and lets the renderer drive the frame loop.

import { mat4 } from "gl-matrix";
import {
  AttributeLink,
  BufferLink,
  ProgramLink,
  Renderer,
  TextureLink,
  UniformLink,
  createLogger,
} from "./engine";

const log = createLogger("main");

interface DemoCtx {
  /** Radians per second. */
  spinSpeed: number;
}

const QUAD_VERT = `#version 300 es
in vec2 aPosition;
in vec2 aTexCoord;

uniform mat4 uModel;

out vec2 vTexCoord;

void main() {
  vTexCoord = aTexCoord;
  gl_Position = uModel * vec4(aPosition, 0.0, 1.0);
}
`;

const QUAD_FRAG = `#version 300 es
precision mediump float;

in vec2 vTexCoord;

uniform sampler2D uTexture;
uniform float uTime;

out vec4 fragColor;

void main() {
  vec3 albedo = texture(uTexture, vTexCoord).rgb;
  float pulse = 0.75 + 0.25 * sin(uTime * 0.002);
  fragColor = vec4(albedo * pulse, 1.0);
}
`;

// Interleaved: pos(2) + uv(2) = 4 floats, two triangles
// prettier-ignore
const QUAD_VERTICES = new Float32Array([
  -0.6, -0.6,  0, 0,
   0.6, -0.6,  1, 0,
   0.6,  0.6,  1, 1,
  -0.6, -0.6,  0, 0,
   0.6,  0.6,  1, 1,
  -0.6,  0.6,  0, 1,
]);
const STRIDE = 4 * Float32Array.BYTES_PER_ELEMENT;

const TEX_SIZE = 64;

function makeCheckerboard(size: number, tileSize: number): Uint8Array {
  const pixels = new Uint8Array(size * size * 4);
  for (let row = 0; row < size; row++) {
    for (let col = 0; col < size; col++) {
      const i = (row * size + col) * 4;
      const v = (Math.floor(row / tileSize) + Math.floor(col / tileSize)) % 2 === 0 ? 220 : 80;
      pixels[i] = v;
      pixels[i + 1] = v;
      pixels[i + 2] = v;
      pixels[i + 3] = 255;
    }
  }
  return pixels;
}

// ---------------------------------------------------------------------------
// Graph
// ---------------------------------------------------------------------------

const canvas = document.getElementById("canvas");
if (!(canvas instanceof HTMLCanvasElement)) throw new Error("Missing #canvas element");

const model = mat4.create();

const renderer = Renderer.builder<WebGL2RenderingContext, DemoCtx>()
  .setCanvas(canvas)
  .setContextAttributes({ antialias: true })
  .setUserCtx({ spinSpeed: 0.8 })
  .addVertexShaderSrc("quad", QUAD_VERT)
  .addFragmentShaderSrc("quad", QUAD_FRAG)
  .addProgramLink(new ProgramLink("quad", "quad", "quad"))
  .addVAOLink("quad")
  .addBufferLink(
    new BufferLink("quad", ({ gl }) => {
      const buffer = gl.createBuffer();
      gl.bindBuffer(gl.ARRAY_BUFFER, buffer);
      gl.bufferData(gl.ARRAY_BUFFER, QUAD_VERTICES, gl.STATIC_DRAW);
      gl.bindBuffer(gl.ARRAY_BUFFER, null);
      return buffer;
    })
  )
  .addAttributeLink(
    new AttributeLink(["quad"], "quad", "aPosition", ({ gl, location }) => {
      gl.vertexAttribPointer(location, 2, gl.FLOAT, false, STRIDE, 0);
    })
  )
  .addAttributeLink(
    new AttributeLink(["quad"], "quad", "aTexCoord", ({ gl, location }) => {
      gl.vertexAttribPointer(location, 2, gl.FLOAT, false, STRIDE, 2 * Float32Array.BYTES_PER_ELEMENT);
    })
  )
  .addTextureLink(
    new TextureLink("checker", ({ gl }) => {
      const texture = gl.createTexture();
      gl.bindTexture(gl.TEXTURE_2D, texture);
      gl.texImage2D(
        gl.TEXTURE_2D, 0, gl.RGBA,
        TEX_SIZE, TEX_SIZE, 0,
        gl.RGBA, gl.UNSIGNED_BYTE, makeCheckerboard(TEX_SIZE, 8)
      );
      gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MIN_FILTER, gl.NEAREST);
      gl.texParameteri(gl.TEXTURE_2D, gl.TEXTURE_MAG_FILTER, gl.NEAREST);
      gl.bindTexture(gl.TEXTURE_2D, null);
      return texture;
    })
  )
  .addUniformLink(
    new UniformLink(["quad"], "uTexture", ({ gl, location }) => {
      gl.uniform1i(location, 0);
    })
  )
  .addUniformLink(
    new UniformLink(["quad"], "uTime", ({ gl, location, now }) => gl.uniform1f(location, now), {
      useCreateCallbackForUpdate: true,
    })
  )
  .addUniformLink(
    new UniformLink<WebGL2RenderingContext, DemoCtx>(
      ["quad"],
      "uModel",
      ({ gl, location }) => gl.uniformMatrix4fv(location, false, model),
      {
        update: ({ gl, location, now, userCtx }) => {
          mat4.fromZRotation(model, (now / 1000) * (userCtx?.spinSpeed ?? 1));
          gl.uniformMatrix4fv(location, false, model);
        },
      }
    )
  )
  .setRenderCallback((data) => {
    const gl = data.gl();
    const surface = data.canvas();
    gl.viewport(0, 0, surface.width, surface.height);
    gl.clearColor(0.07, 0.07, 0.07, 1);
    gl.clear(gl.COLOR_BUFFER_BIT);

    gl.activeTexture(gl.TEXTURE0);
    gl.bindTexture(gl.TEXTURE_2D, data.texture("checker"));
    data.useProgram("quad").useVAO("quad");
    gl.drawArrays(gl.TRIANGLES, 0, 6);
    gl.bindVertexArray(null);
  })
  .build();

// Keep the drawing buffer matched to the CSS size
const resize = (): void => {
  canvas.width = Math.floor(canvas.clientWidth * devicePixelRatio);
  canvas.height = Math.floor(canvas.clientHeight * devicePixelRatio);
};
resize();
window.addEventListener("resize", resize);

log.info("Build order:", renderer.data().buildOrder().join(", "));
renderer.startAnimating();

// "R" toggles a WebM recording of the canvas, downloaded when it stops
window.addEventListener("keydown", (event) => {
  if (event.key !== "r") return;
  if (renderer.isRecording()) {
    renderer.stopRecording();
    log.info("Recording stopped");
  } else {
    renderer.startRecording();
    log.info("Recording started");
  }
});

window.addEventListener("pagehide", () => renderer.free());
