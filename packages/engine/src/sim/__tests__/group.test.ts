import test from "node:test";
import assert from "node:assert/strict";
import { isEngineError } from "../../errors.js";
import { SimNode, type NodeBehavior } from "../node.js";

function names(nodes: SimNode[]): string[] {
  return nodes.map((node) => node.name);
}

test("attaching to a detached parent links immediately without a state", () => {
  const added: Array<[string, unknown]> = [];
  const behavior: NodeBehavior = {
    onAdded: (node, state) => added.push([node.name, state]),
  };
  const parent = new SimNode({ name: "parent" });
  const child = new SimNode({ name: "child", behavior });

  assert.equal(parent.children.add(child), true);
  assert.equal(child.parent, parent);
  assert.equal(child.group, parent.children);
  assert.equal(child.state, null);
  assert.deepEqual(added, [["child", null]]);
});

test("a node already attached cannot be attached again", () => {
  const a = new SimNode();
  const b = new SimNode();
  const child = new SimNode();
  a.children.add(child);

  assert.throws(() => a.children.add(child), (err) => isEngineError(err, "ALREADY_ATTACHED"));
  assert.throws(() => b.children.add(child), (err) => isEngineError(err, "ALREADY_ATTACHED"));

  assert.equal(child.detach(), true);
  assert.equal(child.detach(), false);
  b.children.add(child);
  assert.equal(child.parent, b);
});

test("attaching beneath itself is rejected", () => {
  const a = new SimNode();
  const b = new SimNode();
  const c = new SimNode();
  a.children.add(b);
  b.children.add(c);

  assert.throws(() => a.children.add(a), (err) => isEngineError(err, "ATTACH_CYCLE"));
  assert.throws(() => c.children.add(a), (err) => isEngineError(err, "ATTACH_CYCLE"));
  assert.equal(a.parent, null);
});

test("members iterate by descending priority, ties by creation order", () => {
  const parent = new SimNode();
  const low = new SimNode({ name: "low", priority: 0 });
  const highA = new SimNode({ name: "highA", priority: 5 });
  const highB = new SimNode({ name: "highB", priority: 5 });
  const last = new SimNode({ name: "last", priority: -1 });
  for (const node of [last, low, highB, highA]) parent.children.add(node);

  assert.deepEqual(names(parent.children.list()), ["highA", "highB", "low", "last"]);

  low.setPriority(10);
  assert.equal(low.priority, 10);
  assert.deepEqual(names(parent.children.list()), ["low", "highA", "highB", "last"]);
});

test("priority changes requested during iteration wait until it ends", () => {
  const parent = new SimNode();
  const first = new SimNode({ name: "first", priority: 2 });
  const second = new SimNode({ name: "second", priority: 1 });
  parent.children.add(first);
  parent.children.add(second);

  const seen: string[] = [];
  parent.children.forEach((node) => {
    seen.push(node.name);
    if (node === first) {
      second.setPriority(9);
      assert.equal(second.priority, 1);
      assert.equal(second.pendingPriority, 9);
    }
  });

  assert.deepEqual(seen, ["first", "second"]);
  assert.equal(second.priority, 9);
  assert.deepEqual(names(parent.children.list()), ["second", "first"]);
});

test("a detached node takes a new priority straight away", () => {
  const node = new SimNode({ priority: 3 });
  node.setPriority(7);
  assert.equal(node.priority, 7);
  assert.equal(node.pendingPriority, 7);
  assert.throws(() => node.setPriority(1.5), (err) => isEngineError(err, "INVALID_PRIORITY"));
});

test("onRemoved runs while the node is still linked", () => {
  const parent = new SimNode();
  let linkedDuringHook = false;
  const child = new SimNode({
    behavior: {
      onRemoved: (node) => {
        linkedDuringHook = node.group === parent.children;
      },
    },
  });
  parent.children.add(child);
  child.detach();

  assert.equal(linkedDuringHook, true);
  assert.equal(child.group, null);
  assert.equal(child.parent, null);
  assert.equal(parent.children.size, 0);
});

test("clear removes every member", () => {
  const parent = new SimNode();
  const kids = [new SimNode(), new SimNode(), new SimNode()];
  for (const kid of kids) parent.children.add(kid);

  assert.equal(parent.children.clear(), 3);
  assert.equal(parent.children.size, 0);
  assert.ok(kids.every((kid) => kid.group === null));
});

test("timers belong to the node and survive reattachment", () => {
  const a = new SimNode();
  const b = new SimNode();
  const node = new SimNode();
  const event = () => {};
  a.children.add(node);
  node.setTimer(event, 4);

  node.detach();
  b.children.add(node);
  assert.equal(node.getTimer(event), 4);
});

test("a node outside any state experiences no time", () => {
  const node = new SimNode({ timeFactor: 8192 });
  assert.equal(node.effectiveTimeFactor, 0);
  assert.equal(node.advance(4096), 0);
  assert.equal(node.leftover, 0);
});
