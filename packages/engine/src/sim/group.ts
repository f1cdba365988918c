import { EngineError } from "../errors.js";
import type { SimNode } from "./node.js";
import type { SimState } from "./state.js";

export type GroupOwner = { kind: "state"; state: SimState } | { kind: "node"; node: SimNode };

function before(a: SimNode, b: SimNode): boolean {
  return a.priority > b.priority || (a.priority === b.priority && a.id < b.id);
}

function logicalParent(node: SimNode): SimNode | null {
  return node.nextGroup?.ownerNode ?? null;
}

function activeParent(node: SimNode): SimNode | null {
  return node.parent;
}

/** True when `node` is `start` or one of its ancestors along `parentOf`. */
function inChain(node: SimNode, start: SimNode, parentOf: (n: SimNode) => SimNode | null): boolean {
  for (let p: SimNode | null = start; p !== null; p = parentOf(p)) {
    if (p === node) return true;
  }
  return false;
}

/**
 * Members of one level of the node tree, kept in descending priority order
 * (ties by node id). The member array is never reordered while it is being
 * iterated. Priority requests made while the group's state is running a
 * pass wait for that state's next flush; inside a detached tree they wait
 * until the outermost iteration over the group ends.
 */
export class NodeGroup {
  readonly owner: GroupOwner;
  private readonly members: SimNode[] = [];
  private readonly priorityChanges = new Set<SimNode>();
  private iterating = 0;
  private flushQueued = false;

  constructor(owner: GroupOwner) {
    this.owner = owner;
  }

  get ownerNode(): SimNode | null {
    return this.owner.kind === "node" ? this.owner.node : null;
  }

  get state(): SimState | null {
    return this.owner.kind === "state" ? this.owner.state : this.owner.node.state;
  }

  get size(): number {
    return this.members.length;
  }

  has(node: SimNode): boolean {
    return node.group === this;
  }

  /** Snapshot of the members in iteration order. */
  list(): SimNode[] {
    return [...this.members];
  }

  forEach(fn: (node: SimNode) => void): void {
    if (this.members.length === 0) return;
    this.iterating++;
    try {
      for (const node of this.members) fn(node);
    } finally {
      this.iterating--;
      if (this.iterating === 0 && !this.flushQueued && this.priorityChanges.size > 0) {
        this.applyPriorityChanges();
      }
    }
  }

  /**
   * Attach `node` to this group. Throws if the node already belongs (or is
   * about to belong) to a group, or if attaching would create a cycle.
   */
  add(node: SimNode): boolean {
    if (node.nextGroup !== null) {
      throw new EngineError("ALREADY_ATTACHED", `Node ${node.name} is already attached; detach it first`);
    }
    const owner = this.ownerNode;
    if (owner !== null && inChain(node, owner, logicalParent)) {
      throw new EngineError("ATTACH_CYCLE", `Node ${node.name} cannot be attached beneath itself`);
    }
    node.nextGroup = this;
    const busy = this.busyState(node);
    if (busy !== null) {
      busy.enqueue({ kind: "node", node, to: this });
    } else {
      this.link(node);
    }
    return true;
  }

  remove(node: SimNode): boolean {
    if (node.nextGroup !== this) return false;
    node.nextGroup = null;
    const busy = this.busyState(node);
    if (busy !== null) {
      busy.enqueue({ kind: "node", node, to: null });
    } else if (node.group === this) {
      this.unlink(node);
    }
    return true;
  }

  /** Request removal of every active member that still belongs here. */
  clear(): number {
    let removed = 0;
    for (const node of this.list()) {
      if (node.nextGroup === this && this.remove(node)) removed++;
    }
    return removed;
  }

  requestPriority(node: SimNode): void {
    if (node.group !== this) return;
    const state = this.state;
    if (state?.iterating) {
      this.priorityChanges.add(node);
      if (!this.flushQueued) {
        this.flushQueued = true;
        state.enqueue({ kind: "priority", group: this });
      }
      return;
    }
    if (this.iterating > 0) {
      this.priorityChanges.add(node);
      return;
    }
    this.reposition(node);
  }

  /** Reposition every member whose priority changed since the last flush. */
  applyPriorityChanges(): void {
    this.flushQueued = false;
    const changed = [...this.priorityChanges];
    this.priorityChanges.clear();
    for (const node of changed) {
      if (node.group === this) this.reposition(node);
    }
  }

  /**
   * Make the node an active member: link it, hand it the group's container,
   * commit its pending priority, then run its `onAdded` hook.
   */
  link(node: SimNode): void {
    const owner = this.ownerNode;
    if (owner !== null && inChain(node, owner, activeParent)) {
      node.nextGroup = null;
      throw new EngineError("ATTACH_CYCLE", `Node ${node.name} cannot be linked beneath itself`);
    }
    node.group = this;
    node.parent = this.ownerNode;
    node.setState(this.state);
    node.commitPriority();
    this.insert(node);
    node.behavior.onAdded?.(node, node.state);
    node.state?.noteLinked(node);
  }

  /**
   * Run the node's `onRemoved` hook, then drop it and clear its context.
   */
  unlink(node: SimNode): void {
    node.behavior.onRemoved?.(node, node.state);
    const index = this.members.indexOf(node);
    if (index >= 0) this.members.splice(index, 1);
    this.priorityChanges.delete(node);
    node.group = null;
    node.parent = null;
    node.setState(null);
  }

  private busyState(node: SimNode): SimState | null {
    const target = this.state;
    if (target?.iterating) return target;
    const current = node.group?.state ?? null;
    if (current?.iterating) return current;
    return null;
  }

  private reposition(node: SimNode): void {
    const index = this.members.indexOf(node);
    if (index >= 0) this.members.splice(index, 1);
    node.commitPriority();
    this.insert(node);
  }

  private insert(node: SimNode): void {
    let lo = 0;
    let hi = this.members.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (before(this.members[mid], node)) lo = mid + 1;
      else hi = mid;
    }
    this.members.splice(lo, 0, node);
  }
}
