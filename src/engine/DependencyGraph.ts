// DependencyGraph: orders resources so that everything a node references is
// realized before the node itself. Depth-first, visiting nodes in insertion
// order, so the same registrations always produce the same order.

import { refKey } from "./Id";
import type { ResourceRef } from "./Id";
import { CyclicDependencyError, UnknownIdError } from "./errors";

interface Node<T> {
  value: T;
  edges: ResourceRef[];
}

type Mark = "visiting" | "done";

export class DependencyGraph<T> {
  private nodes = new Map<string, Node<T>>();

  add(node: ResourceRef, value: T, edges: readonly ResourceRef[]): void {
    this.nodes.set(refKey(node), { value, edges: [...edges] });
  }

  has(node: ResourceRef): boolean {
    return this.nodes.has(refKey(node));
  }

  get size(): number {
    return this.nodes.size;
  }

  /** Dependencies first. Throws on a dangling edge or a cycle. */
  sort(): T[] {
    const marks = new Map<string, Mark>();
    const path: string[] = [];
    const out: T[] = [];

    const visit = (key: string, node: Node<T>): void => {
      const mark = marks.get(key);
      if (mark === "done") return;
      if (mark === "visiting") {
        const start = path.indexOf(key);
        throw new CyclicDependencyError([...path.slice(start), key]);
      }

      marks.set(key, "visiting");
      path.push(key);
      for (const edge of node.edges) {
        const edgeKey = refKey(edge);
        const target = this.nodes.get(edgeKey);
        if (!target) throw new UnknownIdError(edge.kind, edge.id, key);
        visit(edgeKey, target);
      }
      path.pop();
      marks.set(key, "done");
      out.push(node.value);
    };

    for (const [key, node] of this.nodes) {
      visit(key, node);
    }
    return out;
  }
}
