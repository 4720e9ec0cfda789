// src/scene/tree/walk.ts
import { HierarchyCycleError } from "../errors.js";
import { INVALID } from "../interfaces.js";
import type { NodeLinks } from "./links.js";

const START_STACK_SIZE = 64;

/** Reusable depth stack for subtree walks; grows by doubling and is kept across frames. */
export class WalkStack {
  slots = new Int32Array(START_STACK_SIZE);

  ensure(top: number) {
    if (top < this.slots.length) return;
    let n = this.slots.length;
    while (n <= top) n = Math.max(2, n << 1);
    const next = new Int32Array(n);
    next.set(this.slots);
    this.slots = next;
  }
}

/**
 * Pre-order walk of the subtree at `root` (children in insertion order).
 * `enter` returns false to skip a node's children. Visiting more than
 * `maxNodes` nodes means the links loop, and throws.
 */
export function walkSubtree(
  links: NodeLinks,
  root: number,
  stack: WalkStack,
  maxNodes: number,
  enter: (slot: number) => boolean
) {
  let top = 0;
  stack.ensure(top);
  stack.slots[top] = root;

  let isPopping = false;
  let visited = 0;

  while (top >= 0) {
    const slot = stack.slots[top]!;

    if (!isPopping) {
      if (++visited > maxNodes)
        throw new HierarchyCycleError(`walk from slot ${root} exceeded ${maxNodes} nodes; parent links form a cycle`);

      const firstChild = enter(slot) ? links.firstChild[slot]! : INVALID;
      if (firstChild !== INVALID) {
        top++;
        stack.ensure(top);
        stack.slots[top] = firstChild;
        continue;
      }
      isPopping = true;
      continue;
    }

    // The subtree root's own siblings are outside the walk.
    if (top === 0) break;

    const sibling = links.nextSibling[slot]!;
    if (sibling !== INVALID) {
      stack.slots[top] = sibling;
      isPopping = false;
      continue;
    }
    top--;
  }
}
