import { describe, expect, it } from "vitest";

import { main, type CliIO } from "../../src/runner/cli";

type FakeIO = CliIO & { stdout: () => string; stderr: () => string };

function fakeIO(files: Record<string, string>): FakeIO {
  let out = "";
  let err = "";
  return {
    out: (text) => {
      out += text;
    },
    err: (text) => {
      err += text;
    },
    readFile: async (path) => {
      const text = files[path];
      if (text === undefined) throw new Error("no such file");
      return text;
    },
    stdout: () => out,
    stderr: () => err,
  };
}

const DIR = "/glint-cli-test";

describe("glint cli", () => {
  it("prints usage without a command", async () => {
    const io = fakeIO({});
    expect(await main([], io)).toBe(2);
    expect(io.stdout().startsWith("Usage:\n  glint check <file...>\n")).toBe(true);
    expect(await main(["--help"], io)).toBe(0);
  });

  it("rejects unknown commands and log levels", async () => {
    const io = fakeIO({});
    expect(await main(["build"], io)).toBe(2);
    expect(io.stderr().startsWith("Unknown command 'build'\n")).toBe(true);

    const io2 = fakeIO({});
    expect(await main(["check", "a.glint", "--log-level", "loud"], io2)).toBe(2);
    expect(io2.stderr()).toBe("Unknown log level 'loud'\n");
  });

  describe("check", () => {
    it("summarizes a clean file", async () => {
      const io = fakeIO({ [`${DIR}/ok.glint`]: "let mut hp: i32 = 3;" });
      expect(await main(["check", `${DIR}/ok.glint`], io)).toBe(0);
      expect(io.stdout()).toBe("0 errors, 0 warnings\n");
      expect(io.stderr()).toBe("");
    });

    it("renders errors to stderr and fails", async () => {
      const io = fakeIO({ [`${DIR}/bad.glint`]: "let x = y;" });
      expect(await main(["check", `${DIR}/bad.glint`], io)).toBe(1);
      expect(io.stderr()).toContain(`${DIR}/bad.glint:1:9: error[E201]: Undefined variable 'y'\n  |\n1 | let x = y;\n  |         ^\n`);
      expect(io.stdout()).toBe("1 error, 0 warnings\n");
    });

    it("prints warnings to stdout unless lint is off", async () => {
      const files = { [`${DIR}/warn.glint`]: "fn _ready() { let unused = 1; }" };

      const io = fakeIO(files);
      expect(await main(["check", `${DIR}/warn.glint`], io)).toBe(0);
      expect(io.stdout()).toContain("warning[W001]: Variable 'unused' is never used");
      expect(io.stdout().endsWith("0 errors, 1 warning\n")).toBe(true);

      const quiet = fakeIO(files);
      expect(await main(["check", "--no-lint", `${DIR}/warn.glint`], quiet)).toBe(0);
      expect(quiet.stdout()).toBe("0 errors, 0 warnings\n");
    });

    it("counts an unreadable file as an error", async () => {
      const io = fakeIO({});
      expect(await main(["check", `${DIR}/missing.glint`], io)).toBe(1);
      expect(io.stderr()).toBe(`${DIR}/missing.glint: no such file\n`);
      expect(io.stdout()).toBe("1 error, 0 warnings\n");
    });

    it("needs at least one file", async () => {
      const io = fakeIO({});
      expect(await main(["check"], io)).toBe(2);
      expect(io.stderr()).toBe("glint check: no input files\n");
    });
  });

  describe("run", () => {
    const files = {
      [`${DIR}/tick.glint`]: 'fn _ready() { print("ready"); } fn _process(delta: f32) { print("tick"); }',
      [`${DIR}/boom.glint`]: "fn _ready() { let zero = 0; print(1 / zero); }",
      [`${DIR}/broken.glint`]: "let x: i32 = 1.5;",
    };

    it("prints the script output", async () => {
      const io = fakeIO(files);
      expect(await main(["run", `${DIR}/tick.glint`, "--frames", "2"], io)).toBe(0);
      expect(io.stdout()).toBe("ready\ntick\ntick\n");
    });

    it("validates --frames and --delta", async () => {
      const io = fakeIO(files);
      expect(await main(["run", `${DIR}/tick.glint`, "--frames=abc"], io)).toBe(2);
      expect(io.stderr()).toBe("--frames expects a non-negative integer, got 'abc'\n");

      const io2 = fakeIO(files);
      expect(await main(["run", `${DIR}/tick.glint`, "--delta", "0"], io2)).toBe(2);
      expect(io2.stderr()).toBe("--delta expects a positive number, got '0'\n");
    });

    it("exits with 2 on a runtime fault", async () => {
      const io = fakeIO(files);
      expect(await main(["run", `${DIR}/boom.glint`], io)).toBe(2);
      expect(io.stderr()).toContain("error[E400]: DivisionByZero: Integer division by zero");
      expect(io.stderr()).toContain("help: in _ready");
    });

    it("exits with 1 when the script does not compile", async () => {
      const io = fakeIO(files);
      expect(await main(["run", `${DIR}/broken.glint`], io)).toBe(1);
      expect(io.stdout()).toBe("");
      expect(io.stderr()).toContain("error[E200]");
    });

    it("takes exactly one file", async () => {
      const io = fakeIO(files);
      expect(await main(["run", `${DIR}/tick.glint`, `${DIR}/boom.glint`], io)).toBe(2);
      expect(io.stderr()).toBe("glint run: expected exactly one file\n");
    });
  });

  describe("codes", () => {
    it("lists one family of the registry", async () => {
      const io = fakeIO({});
      expect(await main(["codes", "--family", "lexical"], io)).toBe(0);
      const lines = io.stdout().trimEnd().split("\n");
      expect(lines).toHaveLength(4);
      expect(lines[0]).toBe("E001  Lexical Error         Invalid character");
    });

    it("rejects an unknown family", async () => {
      const io = fakeIO({});
      expect(await main(["codes", "--family", "nope"], io)).toBe(2);
      expect(io.stderr()).toBe(
        "Unknown family 'nope'. Expected one of: lexical, syntax, type, signal, lifecycle, struct, export, runtime, lint\n"
      );
    });
  });
});
