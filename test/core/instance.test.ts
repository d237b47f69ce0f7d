import { describe, expect, it } from "vitest";

import { Instance, type InstanceOptions } from "../../src/core/instance";
import type { CompiledProgram } from "../../src/core/program";
import { float, inputEvent, int, str, vector2, type RuntimeValue } from "../../src/core/values";
import { formatDiagnostics } from "../../src/diagnostics/errors";
import { compile } from "../../src/language/compile";
import { SceneHost } from "../../src/runner/host";
import { createLogger } from "../../src/utils/logger";

function build(src: string): CompiledProgram {
  const compiled = compile(src, { lint: false });
  if (!compiled.ok) throw new Error(formatDiagnostics(compiled.error));
  return compiled.value.program;
}

function instantiate(src: string, host = new SceneHost(), extra: Partial<InstanceOptions> = {}): Instance {
  const created = Instance.create(build(src), { host, self: host.root, ...extra });
  if (!created.ok) throw created.error;
  return created.value;
}

function run(inst: Instance, name: string, args: readonly RuntimeValue[] = []): void {
  const r = inst.invoke(name, args);
  if (!r.ok) throw r.error;
}

describe("evaluation", () => {
  it("short-circuits && and ||", () => {
    const host = new SceneHost();
    const inst = instantiate(
      `
      fn side(tag: String, v: bool) -> bool { print(tag); return v; }
      fn _ready() {
        if side("a", false) && side("b", true) { print("then"); }
        if side("c", true) || side("d", true) { print("or"); }
      }
      `,
      host
    );
    run(inst, "_ready");
    expect(host.output).toEqual(["a", "c", "or"]);
  });

  it("writes struct fields by value", () => {
    const host = new SceneHost();
    const inst = instantiate(
      `
      let mut a = Vector2 { x: 1.0, y: 2.0 };
      fn _ready() {
        let mut b = a;
        b.x = 5;
        print(a.x, b.x);
        print(b);
      }
      `,
      host
    );
    run(inst, "_ready");
    expect(host.output).toEqual(["1.0 5.0", "Vector2(5.0, 2.0)"]);
  });

  it("wraps i32 arithmetic and truncates division", () => {
    const host = new SceneHost();
    const inst = instantiate(
      "fn _ready() { print(7 / 2, -7 / 2, 2147483647 + 1, 1 + 2.5, 1.0 / 0.0); }",
      host
    );
    run(inst, "_ready");
    expect(host.output).toEqual(["3 -3 -2147483648 3.5 inf"]);
  });

  it("evaluates the smallest i32 literal", () => {
    const host = new SceneHost();
    const inst = instantiate("fn _ready() { let m = -2147483648; print(m, m - 1); }", host);
    run(inst, "_ready");
    expect(host.output).toEqual(["-2147483648 2147483647"]);
  });

  it("runs loops and scopes blocks", () => {
    const host = new SceneHost();
    const inst = instantiate(
      `
      fn _ready() {
        let mut i = 0;
        let mut total = 0;
        while i < 5 { total += i; i += 1; }
        print(total);
        let x = 1;
        { let x = 2; print(x); }
        print(x);
      }
      `,
      host
    );
    run(inst, "_ready");
    expect(host.output).toEqual(["10", "2", "1"]);
  });

  it("returns values and coerces arguments", () => {
    const inst = instantiate("fn half(v: f32) -> f32 { return v / 2; }");
    const r = inst.invoke("half", [int(3)]);
    expect(r).toEqual({ ok: true, value: float(1.5) });
  });

  it("delivers input events", () => {
    const host = new SceneHost();
    const inst = instantiate('fn _input(event: InputEvent) { if event.pressed { print(event.action); } }', host);
    expect(inst.invokeLifecycle("input", [inputEvent("jump", true)]).ok).toBe(true);
    expect(inst.invokeLifecycle("input", [inputEvent("jump", false)]).ok).toBe(true);
    expect(host.output).toEqual(["jump"]);
  });

  it("treats a missing lifecycle callback as a no-op", () => {
    const inst = instantiate("fn _ready() { }");
    expect(inst.handles("process")).toBe(false);
    expect(inst.invokeLifecycle("process", [float(0.1)])).toEqual({ ok: true, value: { kind: "Void" } });
  });

  it("emits signals with coerced arguments", () => {
    const host = new SceneHost();
    const inst = instantiate(
      'signal moved(dx: f32, who: String); fn _ready() { emit_signal("moved", 2, self.name); }',
      host
    );
    run(inst, "_ready");
    expect(host.emitted).toEqual([{ from: { id: 1 }, signal: "moved", args: [float(2), str("root")] }]);
  });
});

describe("node access", () => {
  it("moves self and flips direction past the boundary", () => {
    const src =
      "let mut dir: f32 = 1.0; fn _process(delta: f32) { self.position.x += dir * 100.0 * delta; if self.position.x > 10.0 { dir = -1.0; } }";
    const compiled = compile(src);
    expect(compiled.ok && compiled.value.warnings).toEqual([]);

    const host = new SceneHost();
    host.setPosition(host.root, 9.6, 0);
    const inst = instantiate(src, host);

    expect(inst.invokeLifecycle("process", [float(0.01)]).ok).toBe(true);
    expect(host.getPosition(host.root).x).toBe(Math.fround(10.6));
    expect(inst.getGlobal("dir")).toEqual(float(-1));
  });

  it("keeps moving on later frames", () => {
    const src =
      "let mut dir: f32 = 1.0; fn _process(delta: f32) { self.position.x += dir * 100.0 * delta; if self.position.x > 10.0 { dir = -1.0; } }";
    const host = new SceneHost();
    host.setPosition(host.root, 9.6, 0);
    const inst = instantiate(src, host);

    expect(inst.invokeLifecycle("process", [float(0.1)]).ok).toBe(true);
    expect(host.getPosition(host.root).x).toBeCloseTo(19.6, 5);
    expect(inst.getGlobal("dir")).toEqual(float(-1));

    expect(inst.invokeLifecycle("process", [float(0.1)]).ok).toBe(true);
    expect(host.getPosition(host.root).x).toBeCloseTo(9.6, 5);
  });

  it("looks nodes up by relative and absolute path", () => {
    const host = new SceneHost();
    const enemy = host.addNode("Enemy");
    host.addNode("Weapon", enemy);
    const inst = instantiate(
      `
      fn _ready() {
        print(get_node("Enemy/Weapon").name);
        print(get_node("/root/Enemy").name);
        print(has_node("Missing"));
        print(find_child("Weapon").name);
      }
      `,
      host
    );
    run(inst, "_ready");
    expect(host.output).toEqual(["Weapon", "Enemy", "false", "Weapon"]);
  });

  it("faults with NodeNotFound for a missing path", () => {
    const inst = instantiate('fn _ready() { get_node("Nowhere"); }');
    const r = inst.invoke("_ready");
    if (r.ok) throw new Error("expected a fault");
    expect([r.error.kind, r.error.code, r.error.message]).toEqual([
      "NodeNotFound",
      "E405",
      "Node not found at path 'Nowhere'",
    ]);
  });

  it("faults with InvalidReference on a freed node", () => {
    const host = new SceneHost();
    const enemy = host.addNode("Enemy");
    const inst = instantiate(
      `
      let mut target = self;
      fn grab() { target = get_node("Enemy"); }
      fn poke() { print(target.name); }
      `,
      host
    );
    run(inst, "grab");
    run(inst, "poke");
    host.free(enemy);

    const r = inst.invoke("poke");
    if (r.ok) throw new Error("expected a fault");
    expect(r.error.code).toBe("E402");
    expect(r.error.message).toBe(`Node ${enemy.id} has been freed`);
    expect(r.error.trace).toEqual(["poke"]);
    expect(host.output).toEqual(["Enemy"]);
  });
});

describe("faults", () => {
  it("reports integer division by zero with a call trace", () => {
    const inst = instantiate("fn boom(n: i32) -> i32 { return 10 / n; } fn _ready() { boom(0); }");
    const r = inst.invoke("_ready");
    if (r.ok) throw new Error("expected a fault");
    expect(r.error.kind).toBe("DivisionByZero");
    expect(r.error.code).toBe("E400");
    expect(r.error.trace).toEqual(["boom", "_ready"]);
  });

  it("stops runaway recursion at the call depth limit", () => {
    const host = new SceneHost();
    const inst = instantiate("fn down(n: i32) -> i32 { return down(n + 1); }", host, { maxCallDepth: 8 });
    const r = inst.invoke("down", [int(0)]);
    if (r.ok) throw new Error("expected a fault");
    expect(r.error.code).toBe("E403");
    expect(r.error.message).toBe("Maximum call depth of 8 exceeded in 'down'");
    expect(r.error.trace).toHaveLength(8);
  });

  it("is still usable after a fault", () => {
    const host = new SceneHost();
    const inst = instantiate("fn boom(n: i32) -> i32 { return 10 / n; }", host);
    expect(inst.invoke("boom", [int(0)]).ok).toBe(false);
    expect(inst.invoke("boom", [int(5)])).toEqual({ ok: true, value: int(2) });
  });

  it("rejects unknown functions and bad arguments from the host", () => {
    const inst = instantiate("fn add(a: i32, b: i32) -> i32 { return a + b; } fn scale(f: f32) -> f32 { return f; }");

    const unknown = inst.invoke("nope");
    const arity = inst.invoke("add", [int(1)]);
    const type = inst.invoke("scale", [str("x")]);
    if (unknown.ok || arity.ok || type.ok) throw new Error("expected faults");

    expect(unknown.error.code).toBe("E413");
    expect(arity.error.code).toBe("E414");
    expect(arity.error.message).toBe("Function 'add' expects 2 arguments, got 1");
    expect(type.error.message).toBe("Argument 'f' of 'scale' expects f32, got String");
  });
});

describe("exported properties", () => {
  const SRC = `
    @export(range(0.0, 1.0)) let mut volume: f32 = 0.5;
    @export(range(0, 10)) let mut hp: i32 = 5;
    @export(enum("Easy", "Hard")) let mut mode: String = "Easy";
    @export(enum("Low", "High")) let mut level: i32 = 0;
    let mut hidden = 1;
  `;

  it("starts from the declared defaults", () => {
    const inst = instantiate(SRC);
    expect(inst.getProperty("volume")).toEqual(float(0.5));
    expect(inst.getProperty("hidden")).toBeUndefined();
    expect(inst.listProperties().map((p) => [p.name, p.value])).toEqual([
      ["volume", float(0.5)],
      ["hp", int(5)],
      ["mode", str("Easy")],
      ["level", int(0)],
    ]);
  });

  it("clamps numbers into the range hint", () => {
    const inst = instantiate(SRC);
    expect(inst.setProperty("volume", float(5))).toEqual({ ok: true, value: undefined });
    expect(inst.getProperty("volume")).toEqual(float(1));
    expect(inst.setProperty("volume", int(-3)).ok).toBe(true);
    expect(inst.getProperty("volume")).toEqual(float(0));
    expect(inst.setProperty("hp", int(99)).ok).toBe(true);
    expect(inst.getProperty("hp")).toEqual(int(10));
  });

  it("rejects bad writes and keeps the old value", () => {
    const inst = instantiate(SRC);
    const kinds = [
      inst.setProperty("nope", int(1)),
      inst.setProperty("volume", str("loud")),
      inst.setProperty("volume", float(Number.NaN)),
      inst.setProperty("mode", str("Medium")),
      inst.setProperty("level", int(2)),
      inst.setProperty("hidden", int(2)),
    ].map((r) => (r.ok ? "ok" : r.error.kind));

    expect(kinds).toEqual(["UnknownProperty", "TypeMismatch", "NonFinite", "NotInEnum", "NotInEnum", "UnknownProperty"]);
    expect(inst.getProperty("volume")).toEqual(float(0.5));
    expect(inst.getGlobal("hidden")).toEqual(int(1));
  });

  it("accepts enum members by name or index", () => {
    const inst = instantiate(SRC);
    expect(inst.setProperty("mode", str("Hard")).ok).toBe(true);
    expect(inst.setProperty("level", int(1)).ok).toBe(true);
    expect([inst.getProperty("mode"), inst.getProperty("level")]).toEqual([str("Hard"), int(1)]);
  });

  it("applies host values after the initializers and warns about unknown ones", () => {
    const lines: string[] = [];
    const logger = createLogger({
      name: "test",
      level: "warn",
      timestamp: false,
      sink: { error: (m) => lines.push(m), warn: (m) => lines.push(m), info: (m) => lines.push(m), debug: (m) => lines.push(m) },
    });

    const host = new SceneHost();
    const inst = instantiate(
      "@export let mut speed: f32 = 2.0; let doubled = speed * 2.0;",
      host,
      { properties: { speed: float(3), bogus: int(1) }, logger }
    );

    expect(inst.getProperty("speed")).toEqual(float(3));
    expect(inst.getGlobal("doubled")).toEqual(float(4));
    expect(lines).toEqual(["[test] WARN: Ignoring host value for 'bogus': 'bogus' is not an exported property"]);
  });
});

describe("hot reload", () => {
  it("keeps values whose name and type still match", () => {
    const host = new SceneHost();
    const before = instantiate(
      '@export(range(0, 100)) let mut hp: i32 = 10; @export let mut speed: f32 = 1.0; @export let mut label: String = "a";',
      host
    );
    expect(before.setProperty("hp", int(50)).ok).toBe(true);
    expect(before.setProperty("speed", float(3)).ok).toBe(true);
    expect(before.setProperty("label", str("b")).ok).toBe(true);

    const reloaded = before.reload(
      build('@export(range(0, 20)) let mut hp: i32 = 10; @export let mut speed: i32 = 1; @export let mut tag: String = "t";')
    );
    if (!reloaded.ok) throw reloaded.error;
    const after = reloaded.value;

    expect(after.getProperty("hp")).toEqual(int(20));
    expect(after.getProperty("speed")).toEqual(int(1));
    expect(after.getProperty("tag")).toEqual(str("t"));
    expect(after.getProperty("label")).toBeUndefined();
  });

  it("leaves the old instance untouched", () => {
    const before = instantiate("@export let mut n: i32 = 1;");
    expect(before.setProperty("n", int(7)).ok).toBe(true);
    const reloaded = before.reload(build("@export let mut n: i32 = 1; fn _ready() { }"));
    expect(reloaded.ok).toBe(true);
    expect(before.getProperty("n")).toEqual(int(7));
    expect(before.handles("ready")).toBe(false);
  });
});

describe("scene host", () => {
  it("kills descendants when a node is freed", () => {
    const host = new SceneHost();
    const a = host.addNode("A", host.root, { position: { x: 1, y: 2 } });
    const b = host.addNode("B", a);
    host.free(a);
    expect([host.isAlive(a), host.isAlive(b), host.isAlive(host.root)]).toEqual([false, false, true]);
    expect(host.getNode(host.root, "A")).toBeNull();
  });

  it("steps up with '..'", () => {
    const host = new SceneHost();
    const a = host.addNode("A");
    host.addNode("B");
    expect(host.getNode(a, "../B")).toEqual({ id: 3 });
    expect(host.getNodeProperty(host.root, "position")).toEqual(vector2(0, 0));
  });
});
