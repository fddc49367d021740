import { beforeEach, describe, expect, it } from "vitest";
import { RendererBuilder } from "./RendererBuilder";
import { ref } from "./Id";
import { ProgramLink } from "./ProgramLink";
import { VAOLink } from "./VAOLink";
import { BufferLink } from "./BufferLink";
import { AttributeLink } from "./AttributeLink";
import { UniformLink } from "./UniformLink";
import { TextureLink } from "./TextureLink";
import { FramebufferLink } from "./FramebufferLink";
import { TransformFeedbackLink } from "./TransformFeedbackLink";
import {
  ContextAcquisitionError,
  CyclicDependencyError,
  DuplicateIdError,
  HandleCreationError,
  LocationNotFoundError,
  MissingRenderCallbackError,
  ProgramLinkError,
  ShaderCompileError,
  UnknownIdError,
} from "./errors";
import { FakeCanvas, FakeGl, ManualScheduler } from "../test/FakeGl";
import { catchError } from "../test/catchError";

function baseBuilder(gl: FakeGl, canvas: FakeCanvas = new FakeCanvas(gl)): RendererBuilder<FakeGl> {
  return new RendererBuilder<FakeGl>()
    .setCanvas(canvas)
    .setScheduler(new ManualScheduler())
    .setClock(() => 1000)
    .setRenderCallback(() => {});
}

function withProgram(builder: RendererBuilder<FakeGl>, programId = "p"): RendererBuilder<FakeGl> {
  return builder
    .addVertexShaderSrc("vs", "vertex source")
    .addFragmentShaderSrc("fs", "fragment source")
    .addProgramLink(new ProgramLink(programId, "vs", "fs"));
}

const createBuffer = new BufferLink<FakeGl>("b", ({ gl }) => gl.createBuffer());

describe("RendererBuilder.build", () => {
  let gl: FakeGl;

  beforeEach(() => {
    gl = new FakeGl();
  });

  it("realizes shaders, program, VAO, buffer and attribute in dependency order", () => {
    gl.attribLocations.set("a", 2);
    const seen: string[] = [];
    let rendered: WebGLShader[] = [];

    const renderer = withProgram(baseBuilder(gl))
      .addVAOLink("v")
      .addBufferLink(createBuffer)
      .addAttributeLink(
        new AttributeLink<FakeGl>(["v"], "b", "a", ({ location, vaoId }) => {
          seen.push(`${vaoId}@${location}`);
        })
      )
      .setRenderCallback((data) => {
        rendered = [data.vertexShader("vs"), data.fragmentShader("fs"), data.program("p"), data.vao("v"), data.buffer("b")];
      })
      .build();

    const data = renderer.data();
    expect(data.buildOrder()).toEqual([
      "vertexShader:vs",
      "fragmentShader:fs",
      "program:p",
      "vao:v",
      "buffer:b",
      "attribute:a",
    ]);
    expect(data.handleCount()).toBe(5);
    expect(gl.live.size).toBe(5);
    expect(seen).toEqual(["v@2"]);
    expect(data.attributeLocation("a")).toBe(2);

    renderer.render();
    expect(rendered).toEqual(gl.created);
  });

  it("binds the VAO and buffer around each attribute create call", () => {
    gl.attribLocations.set("a", 2);

    withProgram(baseBuilder(gl))
      .addVAOLink("v")
      .addBufferLink(createBuffer)
      .addAttributeLink(new AttributeLink<FakeGl>(["v"], "b", "a", () => {}))
      .build();

    const from = gl.calls.indexOf('getAttribLocation(program#3, "a")');
    expect(from).toBeGreaterThan(-1);
    expect(gl.calls.slice(from)).toEqual([
      'getAttribLocation(program#3, "a")',
      "bindVertexArray(vao#4)",
      "bindBuffer(34962, buffer#5)",
      "enableVertexAttribArray(2)",
      "bindVertexArray(null)",
      "bindBuffer(34962, null)",
    ]);
  });

  it("runs an attribute's create once per VAO and skips the query for a fixed location", () => {
    const seen: string[] = [];

    const renderer = baseBuilder(gl)
      .addVAOLink("v1")
      .addVAOLink(new VAOLink<FakeGl>("v2"))
      .addBufferLink(createBuffer)
      .addAttributeLink(
        new AttributeLink<FakeGl>(["v1", "v2"], "b", "aPosition", ({ vaoId, location }) => {
          seen.push(`${vaoId}@${location}`);
        }, { location: 7 })
      )
      .build();

    expect(seen).toEqual(["v1@7", "v2@7"]);
    expect(gl.callsNamed("getAttribLocation")).toEqual([]);
    expect(renderer.data().attributeLocation("aPosition")).toBe(7);
  });

  it("lets an attribute without a program list read every program", () => {
    gl.attribLocations.set("a", 0);
    let program: WebGLProgram | null = null;

    withProgram(baseBuilder(gl))
      .addVAOLink("v")
      .addBufferLink(createBuffer)
      .addAttributeLink(
        new AttributeLink<FakeGl>(["v"], "b", "a", ({ deps }) => {
          program = deps.program("p");
        })
      )
      .build();

    expect(program).toBe(gl.liveOfKind("program")[0]);
  });

  it("sets a uniform in every listed program with that program in use", () => {
    const seen: string[] = [];

    const renderer = withProgram(baseBuilder(gl), "p1")
      .addProgramLink(new ProgramLink("p2", "vs", "fs"))
      .addUniformLink(
        new UniformLink<FakeGl>(["p1", "p2"], "uTime", ({ programId, now }) => {
          seen.push(`${programId}@${now}`);
        })
      )
      .build();

    expect(seen).toEqual(["p1@1000", "p2@1000"]);
    expect(gl.callsNamed("useProgram")).toEqual([
      "useProgram(program#3)",
      "useProgram(null)",
      "useProgram(program#4)",
      "useProgram(null)",
    ]);
    expect(renderer.data().uniformLocation("uTime", "p2")).toBeDefined();
  });

  it("realizes textures, framebuffers and transform feedback objects", () => {
    let attached: WebGLTexture | null = null;

    const renderer = baseBuilder(gl)
      .addVertexShaderSrc("vs", "vertex source")
      .addFragmentShaderSrc("fs", "fragment source")
      .addProgramLink(new ProgramLink("p", "vs", "fs", { transformFeedbackVaryings: ["vOut"] }))
      .addFramebufferLink(
        new FramebufferLink<FakeGl>(
          "fb",
          ({ gl, deps }) => {
            attached = deps.texture("color");
            return gl.createFramebuffer();
          },
          { textureIds: ["color"] }
        )
      )
      .addTextureLink(new TextureLink<FakeGl>("color", ({ gl }) => gl.createTexture()))
      .addTransformFeedbackLink(new TransformFeedbackLink<FakeGl>("tf"))
      .build();

    const data = renderer.data();
    expect(data.buildOrder().slice(3)).toEqual(["texture:color", "framebuffer:fb", "transformFeedback:tf"]);
    expect(attached).toBe(data.texture("color"));
    expect(gl.varyings.get(data.program("p"))).toEqual({ names: ["vOut"], mode: gl.INTERLEAVED_ATTRIBS });
    expect(data.handleCount()).toBe(6);
  });

  it("hands link callbacks the user context, canvas and build time", () => {
    const canvas = new FakeCanvas(gl);
    const seen: string[] = [];

    new RendererBuilder<FakeGl, { label: string }>()
      .setCanvas(canvas)
      .setRenderCallback(() => {})
      .setClock(() => 42)
      .setUserCtx({ label: "demo" })
      .addBufferLink(
        new BufferLink<FakeGl, { label: string }>("b", (ctx) => {
          seen.push(`${ctx.userCtx?.label} ${ctx.now} ${ctx.canvas === canvas}`);
          return ctx.gl.createBuffer();
        })
      )
      .build();

    expect(seen).toEqual(["demo 42 true"]);
  });

  it("rejects a link that reaches for an undeclared dependency", () => {
    const builder = baseBuilder(gl)
      .addTextureLink(new TextureLink<FakeGl>("t", ({ gl }) => gl.createTexture()))
      .addBufferLink(
        new BufferLink<FakeGl>("b", ({ gl, deps }) => {
          deps.texture("t");
          return gl.createBuffer();
        })
      );

    expect(() => builder.build()).toThrow('Unknown texture id "t" (required by buffer:b)');
    expect(gl.live.size).toBe(0);
  });

  it("orders links by their extra dependencies", () => {
    const renderer = baseBuilder(gl)
      .addBufferLink(new BufferLink<FakeGl>("late", ({ gl }) => gl.createBuffer(), { dependencies: [ref.buffer("early")] }))
      .addBufferLink(new BufferLink<FakeGl>("early", ({ gl }) => gl.createBuffer()))
      .build();

    expect(renderer.data().buildOrder()).toEqual(["buffer:early", "buffer:late"]);
  });
});

describe("RendererBuilder registration", () => {
  it("rejects a second link under the same id in one namespace", () => {
    const builder = new RendererBuilder<FakeGl>().addBufferLink(createBuffer);

    expect(() => builder.addBufferLink(new BufferLink<FakeGl>("b", ({ gl }) => gl.createBuffer()))).toThrow(
      DuplicateIdError
    );
    expect(() => builder.addVertexShaderSrc("s", "a").addVertexShaderSrc("s", "b")).toThrow(
      'Duplicate vertexShader id "s"'
    );
  });

  it("accepts the same id across namespaces", () => {
    const gl = new FakeGl();

    const renderer = baseBuilder(gl)
      .addVertexShaderSrc("x", "vertex source")
      .addFragmentShaderSrc("x", "fragment source")
      .addProgramLink(new ProgramLink("x", "x", "x"))
      .addVAOLink("x")
      .addBufferLink(new BufferLink<FakeGl>("x", ({ gl }) => gl.createBuffer()))
      .build();

    expect(renderer.data().handleCount()).toBe(5);
  });
});

describe("RendererBuilder failures", () => {
  let gl: FakeGl;

  beforeEach(() => {
    gl = new FakeGl();
  });

  it("requires a render callback before touching the canvas", () => {
    const canvas = new FakeCanvas(gl);
    const builder = new RendererBuilder<FakeGl>().setCanvas(canvas).addVAOLink("v");

    expect(() => builder.build()).toThrow(MissingRenderCallbackError);
    expect(canvas.requestedAttributes).toEqual([]);
    expect(gl.created).toEqual([]);
  });

  it("requires a canvas", () => {
    const builder = new RendererBuilder<FakeGl>().setRenderCallback(() => {});

    expect(() => builder.build()).toThrow(ContextAcquisitionError);
    expect(() => builder.build()).toThrow("No canvas was set");
  });

  it("fails when the canvas has no WebGL2 context", () => {
    expect(() => baseBuilder(gl, new FakeCanvas(null)).build()).toThrow("WebGL2 is not available on this canvas");
  });

  it("wraps an error thrown by getContext", () => {
    const cause = new Error("context lost");

    const err = catchError(() => baseBuilder(gl, new FakeCanvas(gl, cause)).build());

    expect(err).toBeInstanceOf(ContextAcquisitionError);
    if (err instanceof ContextAcquisitionError) expect(err.cause).toBe(cause);
  });

  it("passes the context attributes through", () => {
    const canvas = new FakeCanvas(gl);

    baseBuilder(gl, canvas).setContextAttributes({ antialias: false }).build();

    expect(canvas.requestedAttributes).toEqual([{ antialias: false }]);
  });

  it("rejects references to unregistered ids before allocating anything", () => {
    const builder = baseBuilder(gl)
      .addVertexShaderSrc("vs", "vertex source")
      .addProgramLink(new ProgramLink("p", "vs", "missing"));

    expect(() => builder.build()).toThrow(UnknownIdError);
    expect(() => builder.build()).toThrow('Unknown fragmentShader id "missing" (required by program:p)');
    expect(gl.created).toEqual([]);
  });

  it("rejects a cycle and allocates zero handles", () => {
    const builder = withProgram(baseBuilder(gl))
      .addBufferLink(new BufferLink<FakeGl>("a", ({ gl }) => gl.createBuffer(), { dependencies: [ref.buffer("b")] }))
      .addBufferLink(new BufferLink<FakeGl>("b", ({ gl }) => gl.createBuffer(), { dependencies: [ref.buffer("a")] }));

    const err = catchError(() => builder.build());

    expect(err).toBeInstanceOf(CyclicDependencyError);
    if (err instanceof CyclicDependencyError) expect(err.cycle).toEqual(["buffer:a", "buffer:b", "buffer:a"]);
    expect(gl.created).toEqual([]);
  });

  it("releases everything allocated so far when a create callback throws", () => {
    const builder = withProgram(baseBuilder(gl))
      .addBufferLink(createBuffer)
      .addTextureLink(
        new TextureLink<FakeGl>("t", () => {
          throw new Error("upload failed");
        })
      );

    expect(() => builder.build()).toThrow("upload failed");
    expect(gl.created).toHaveLength(4);
    expect(gl.deleted).toEqual([...gl.created].reverse());
    expect(gl.live.size).toBe(0);
  });

  it("cleans up after a shader compile error", () => {
    gl.shaderErrors.set("broken", "ERROR: 0:3: 'x' : undeclared identifier");
    const builder = baseBuilder(gl).addVertexShaderSrc("vs", "vertex source").addFragmentShaderSrc("fs", "broken");

    const err = catchError(() => builder.build());

    expect(err).toBeInstanceOf(ShaderCompileError);
    if (err instanceof ShaderCompileError) {
      expect(err.shaderId).toBe("fs");
      expect(err.log).toBe("ERROR: 0:3: 'x' : undeclared identifier");
    }
    expect(gl.live.size).toBe(0);
  });

  it("cleans up after a program link error", () => {
    gl.linkError = "varyings mismatch";

    expect(() => withProgram(baseBuilder(gl)).build()).toThrow(ProgramLinkError);
    expect(gl.created).toHaveLength(3);
    expect(gl.live.size).toBe(0);
  });

  it("fails when a create callback returns no handle", () => {
    const builder = baseBuilder(gl).addBufferLink(new BufferLink<FakeGl>("b", () => null));

    expect(() => builder.build()).toThrow(HandleCreationError);
    expect(() => builder.build()).toThrow('Failed to create buffer "b": no handle was returned');
  });

  it("fails when no program has the attribute", () => {
    const builder = withProgram(baseBuilder(gl))
      .addVAOLink("v")
      .addBufferLink(createBuffer)
      .addAttributeLink(new AttributeLink<FakeGl>(["v"], "b", "aMissing", () => {}));

    expect(() => builder.build()).toThrow(LocationNotFoundError);
    expect(() => builder.build()).toThrow('No location for attribute "aMissing" in program(s) [p]');
    expect(gl.live.size).toBe(0);
  });

  it("fails when a program has no such uniform", () => {
    gl.missingUniforms.add("uGone");
    const builder = withProgram(baseBuilder(gl)).addUniformLink(new UniformLink<FakeGl>(["p"], "uGone", () => {}));

    expect(() => builder.build()).toThrow('No location for uniform "uGone" in program(s) [p]');
    expect(gl.live.size).toBe(0);
  });
});
