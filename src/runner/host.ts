// src/runner/host.ts
//
// Headless scene host
// -------------------
// An in-memory node tree implementing ScriptHost, for the CLI runner and for
// tests. Nodes have numeric ids, a name, a transform and a liveness flag;
// `free` kills a node and its descendants, after which any script access to
// them faults with InvalidReference.
//
// Paths: "Child/Grandchild" is relative to the calling node, ".." steps to the
// parent, "." is the node itself and a leading "/" starts at the root
// ("/root/Player").

import type { NodeField, ScriptHost } from "../core/evaluator";
import { float, str, vector2, type NodeRef, type RuntimeValue, type Vector2Value } from "../core/values";

export type SceneNodeInit = {
  position?: { x: number; y: number };
  rotation?: number;
  scale?: { x: number; y: number };
};

export type EmittedSignal = {
  from: NodeRef;
  signal: string;
  args: RuntimeValue[];
};

export type SceneHostOptions = {
  rootName?: string;
  /** Called for every printed line, in addition to capturing it. */
  onPrint?: (line: string) => void;
};

type SceneNode = {
  id: number;
  name: string;
  parent: number | null;
  children: number[];
  position: Vector2Value;
  rotation: number;
  scale: Vector2Value;
  alive: boolean;
};

export class SceneHost implements ScriptHost {
  public readonly output: string[] = [];
  public readonly emitted: EmittedSignal[] = [];
  public readonly root: NodeRef;

  private readonly nodes = new Map<number, SceneNode>();
  private readonly onPrint?: (line: string) => void;
  private nextId = 1;

  constructor(options: SceneHostOptions = {}) {
    this.onPrint = options.onPrint;
    this.root = this.createNode(options.rootName ?? "root", null, {});
  }

  /* =========================================================
     Tree editing
     ========================================================= */

  addNode(name: string, parent: NodeRef = this.root, init: SceneNodeInit = {}): NodeRef {
    const p = this.liveNode(parent);
    if (!p) throw new Error(`Cannot add '${name}': parent ${parent.id} is not alive`);
    return this.createNode(name, p, init);
  }

  /** Kills the node and everything below it. */
  free(ref: NodeRef): void {
    const n = this.liveNode(ref);
    if (!n) return;

    const parent = n.parent === null ? undefined : this.nodes.get(n.parent);
    if (parent) parent.children = parent.children.filter((c) => c !== n.id);

    const stack = [n];
    while (stack.length > 0) {
      const cur = stack.pop();
      if (!cur) break;
      cur.alive = false;
      for (const c of cur.children) {
        const child = this.nodes.get(c);
        if (child) stack.push(child);
      }
    }
  }

  getPosition(ref: NodeRef): { x: number; y: number } {
    const n = this.requireNode(ref);
    return { x: n.position.x, y: n.position.y };
  }

  setPosition(ref: NodeRef, x: number, y: number): void {
    this.requireNode(ref).position = vector2(x, y);
  }

  nameOf(ref: NodeRef): string | undefined {
    return this.nodeOf(ref)?.name;
  }

  /** Printed lines joined, newline-terminated when non-empty. */
  stdout(): string {
    return this.output.length > 0 ? `${this.output.join("\n")}\n` : "";
  }

  /* =========================================================
     ScriptHost
     ========================================================= */

  print(line: string): void {
    this.output.push(line);
    this.onPrint?.(line);
  }

  isAlive(ref: NodeRef): boolean {
    return this.liveNode(ref) !== undefined;
  }

  sameNode(a: NodeRef, b: NodeRef): boolean {
    return a.id === b.id;
  }

  getNodeProperty(ref: NodeRef, field: NodeField): RuntimeValue {
    const n = this.requireNode(ref);
    switch (field) {
      case "position":
        return n.position;
      case "rotation":
        return float(n.rotation);
      case "scale":
        return n.scale;
      case "name":
        return str(n.name);
    }
  }

  setNodeProperty(ref: NodeRef, field: NodeField, value: RuntimeValue): void {
    const n = this.requireNode(ref);
    switch (field) {
      case "position":
      case "scale":
        if (value.kind !== "Vector2") throw new Error(`Node.${field} expects a Vector2, got ${value.kind}`);
        n[field] = value;
        return;
      case "rotation":
        if (value.kind !== "Float" && value.kind !== "Int") throw new Error(`Node.rotation expects a number, got ${value.kind}`);
        n.rotation = Math.fround(value.value);
        return;
      case "name":
        if (value.kind !== "Str") throw new Error(`Node.name expects a String, got ${value.kind}`);
        n.name = value.value;
        return;
    }
  }

  getNode(from: NodeRef, path: string): NodeRef | null {
    const start = path.startsWith("/") ? null : this.liveNode(from);
    const parts = path.split("/").filter((p) => p !== "");

    let cur: SceneNode | undefined;
    if (start) {
      cur = start;
    } else {
      // absolute: the first segment names the root
      const root = this.liveNode(this.root);
      if (!root || parts.shift() !== root.name) return null;
      cur = root;
    }

    for (const part of parts) {
      if (part === ".") continue;
      if (part === "..") {
        cur = cur.parent === null ? undefined : this.liveNode({ id: cur.parent });
      } else {
        cur = this.childNamed(cur, part);
      }
      if (!cur) return null;
    }

    return { id: cur.id };
  }

  getParent(ref: NodeRef): NodeRef | null {
    const n = this.liveNode(ref);
    if (!n || n.parent === null) return null;
    return this.liveNode({ id: n.parent }) ? { id: n.parent } : null;
  }

  /** Breadth-first over descendants. */
  findChild(from: NodeRef, name: string): NodeRef | null {
    const start = this.liveNode(from);
    if (!start) return null;

    const queue = [...start.children];
    while (queue.length > 0) {
      const id = queue.shift();
      if (id === undefined) break;
      const n = this.liveNode({ id });
      if (!n) continue;
      if (n.name === name) return { id: n.id };
      queue.push(...n.children);
    }
    return null;
  }

  emitSignal(from: NodeRef, signal: string, args: RuntimeValue[]): void {
    this.emitted.push({ from, signal, args });
  }

  /* =========================================================
     Internals
     ========================================================= */

  private createNode(name: string, parent: SceneNode | null, init: SceneNodeInit): NodeRef {
    const id = this.nextId++;
    const pos = init.position ?? { x: 0, y: 0 };
    const scale = init.scale ?? { x: 1, y: 1 };
    this.nodes.set(id, {
      id,
      name,
      parent: parent ? parent.id : null,
      children: [],
      position: vector2(pos.x, pos.y),
      rotation: Math.fround(init.rotation ?? 0),
      scale: vector2(scale.x, scale.y),
      alive: true,
    });
    if (parent) parent.children.push(id);
    return { id };
  }

  private nodeOf(ref: NodeRef): SceneNode | undefined {
    return typeof ref.id === "number" ? this.nodes.get(ref.id) : undefined;
  }

  private liveNode(ref: NodeRef): SceneNode | undefined {
    const n = this.nodeOf(ref);
    return n && n.alive ? n : undefined;
  }

  private requireNode(ref: NodeRef): SceneNode {
    const n = this.liveNode(ref);
    if (!n) throw new Error(`Node ${ref.id} is not alive`);
    return n;
  }

  private childNamed(n: SceneNode, name: string): SceneNode | undefined {
    for (const c of n.children) {
      const child = this.liveNode({ id: c });
      if (child && child.name === name) return child;
    }
    return undefined;
  }
}
