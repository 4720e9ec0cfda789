// src/scene/tree/links.ts
import { INVALID } from "../interfaces.js";

/** Slot-indexed hierarchy columns. Every value is a slot, or INVALID. */
export interface NodeLinks {
  parent: Int32Array;      // INVALID if forest root
  firstChild: Int32Array;  // head of child list
  lastChild: Int32Array;   // tail of child list (O(1) append)
  nextSibling: Int32Array; // next sibling in list
  prevSibling: Int32Array; // previous sibling in list (O(1) unlink)
}

export function createLinks(capacity: number): NodeLinks {
  return {
    parent: new Int32Array(capacity).fill(INVALID),
    firstChild: new Int32Array(capacity).fill(INVALID),
    lastChild: new Int32Array(capacity).fill(INVALID),
    nextSibling: new Int32Array(capacity).fill(INVALID),
    prevSibling: new Int32Array(capacity).fill(INVALID),
  };
}

export function growLinks(links: NodeLinks, capacity: number): NodeLinks {
  const next = createLinks(capacity);
  next.parent.set(links.parent);
  next.firstChild.set(links.firstChild);
  next.lastChild.set(links.lastChild);
  next.nextSibling.set(links.nextSibling);
  next.prevSibling.set(links.prevSibling);
  return next;
}

export function resetSlot(links: NodeLinks, slot: number) {
  links.parent[slot] = INVALID;
  links.firstChild[slot] = INVALID;
  links.lastChild[slot] = INVALID;
  links.nextSibling[slot] = INVALID;
  links.prevSibling[slot] = INVALID;
}

/**
 * True if `maybeAncestor` is a strict ancestor of `slot`. Walks parents with a
 * slow/fast pair so a corrupted (cyclic) parent chain still terminates.
 */
export function isAncestor(links: NodeLinks, maybeAncestor: number, slot: number): boolean {
  if (maybeAncestor === slot || maybeAncestor === INVALID || slot === INVALID) return false;

  let slow = slot, fast = slot;
  for (;;) {
    slow = links.parent[slow]!;
    if (slow === maybeAncestor) return true;
    if (slow === INVALID) return false;

    for (let k = 0; k < 2; k++) {
      fast = links.parent[fast]!;
      if (fast === maybeAncestor) return true;
      if (fast === INVALID) return false;
    }
    if (slow === fast) return false;
  }
}

export function detachFromParent(links: NodeLinks, slot: number) {
  const parent = links.parent[slot]!;
  if (parent === INVALID) return;

  const prev = links.prevSibling[slot]!;
  const next = links.nextSibling[slot]!;

  if (prev === INVALID) links.firstChild[parent] = next;
  else links.nextSibling[prev] = next;

  if (next === INVALID) links.lastChild[parent] = prev;
  else links.prevSibling[next] = prev;

  links.parent[slot] = INVALID;
  links.prevSibling[slot] = INVALID;
  links.nextSibling[slot] = INVALID;
}

export function appendChildAtEnd(links: NodeLinks, parent: number, child: number) {
  const tail = links.lastChild[parent]!;
  if (tail === INVALID) {
    links.firstChild[parent] = child;
  } else {
    links.nextSibling[tail] = child;
  }
  links.prevSibling[child] = tail;
  links.nextSibling[child] = INVALID;
  links.lastChild[parent] = child;
  links.parent[child] = parent;
}

/** Children of `slot` in insertion order. */
export function childSlots(links: NodeLinks, slot: number): number[] {
  const out: number[] = [];
  for (let c = links.firstChild[slot]!; c !== INVALID; c = links.nextSibling[c]!) out.push(c);
  return out;
}
