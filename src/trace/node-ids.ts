import type { PatternNode } from '../pattern/types.js';

/**
 * Stable integer identities for the nodes of one pattern tree.
 *
 * Keys are compared by object identity, so two structurally equal nodes
 * at different positions get different ids. Ids are handed out in the
 * order nodes are first seen, starting at 0.
 */
export class NodeIds {
  private readonly ids = new Map<PatternNode, number>();
  private readonly nodes: PatternNode[] = [];
  private readonly governors: number[] = [];
  private readonly slots = new Map<string, number>();

  get size(): number {
    return this.nodes.length;
  }

  /**
   * The node's id, assigning the next one on first sight
   */
  assign(node: PatternNode): number {
    const existing = this.ids.get(node);
    if (existing !== undefined) {
      return existing;
    }
    const id = this.nodes.length;
    this.ids.set(node, id);
    this.nodes.push(node);
    this.governors.push(id);
    return id;
  }

  idOf(node: PatternNode): number | undefined {
    return this.ids.get(node);
  }

  nodeFor(id: number): PatternNode | undefined {
    return this.nodes[id];
  }

  /**
   * Record the outermost position testing the same subject as `id`
   */
  setGovernor(id: number, governor: number): void {
    this.governors[id] = governor;
  }

  governorOf(id: number): number | undefined {
    return this.governors[id];
  }

  /**
   * Record that `element` tests child `index` of the subject governed by
   * `owner`. The first element recorded for a slot is kept.
   */
  setSlot(owner: number, index: number, element: number): void {
    const key = `${owner}:${index}`;
    if (!this.slots.has(key)) {
      this.slots.set(key, element);
    }
  }

  elementAt(owner: number, index: number): number | undefined {
    return this.slots.get(`${owner}:${index}`);
  }
}
