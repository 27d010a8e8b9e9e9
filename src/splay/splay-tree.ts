/*
 * Splay tree used as a self-adjusting memo cache.
 *
 * Every search or insert splays the accessed key (or the last node on its
 * search path) to the root, so keys touched recently sit near the top.
 * Nodes own their two children; there are no parent pointers.
 */

export type SplayNode<V> = {
  key: number;
  value: V;
  left: SplayNode<V> | null;
  right: SplayNode<V> | null;
};

function createNode<V>(key: number, value: V): SplayNode<V> {
  return { key, value, left: null, right: null };
}

export function rotateRight<V>(x: SplayNode<V>): SplayNode<V> {
  const y = x.left;
  if (!y) return x;
  x.left = y.right;
  y.right = x;
  return y;
}

export function rotateLeft<V>(x: SplayNode<V>): SplayNode<V> {
  const y = x.right;
  if (!y) return x;
  x.right = y.left;
  y.left = x;
  return y;
}

type Side = "left" | "right";

/** One pending level of the splay: the node, which child the key lies under, and the step to replay. */
type SplayFrame<V> = {
  node: SplayNode<V>;
  child: SplayNode<V>;
  side: Side;
  step: "zig" | "zig-zig" | "zig-zag";
};

function rotateUp<V>(node: SplayNode<V>, side: Side): SplayNode<V> {
  return side === "left" ? rotateRight(node) : rotateLeft(node);
}

function opposite(side: Side): Side {
  return side === "left" ? "right" : "left";
}

/**
 * Bottom-up splay of the subtree at `root` toward `key`.
 * Returns the new subtree root: the node holding `key`, or the last node
 * visited on the path to where it would be.
 *
 * Walks down two levels at a time recording frames, then replays the
 * zig-zig / zig-zag rotations while unwinding, so the depth of the tree
 * never becomes call-stack depth.
 */
export function splay<V>(root: SplayNode<V> | null, key: number): SplayNode<V> | null {
  const path: Array<SplayFrame<V>> = [];
  let node = root;
  let sub: SplayNode<V> | null;

  for (;;) {
    if (!node || node.key === key) {
      sub = node;
      break;
    }

    const side: Side = key < node.key ? "left" : "right";
    const child = node[side];
    if (!child) {
      sub = node;
      break;
    }

    if (child.key === key) {
      path.push({ node, child, side, step: "zig" });
      sub = null;
      break;
    }

    const sameSide = side === "left" ? key < child.key : key > child.key;
    path.push({ node, child, side, step: sameSide ? "zig-zig" : "zig-zag" });
    node = sameSide ? child[side] : child[opposite(side)];
  }

  for (let i = path.length - 1; i >= 0; i--) {
    const { node: top, child, side, step } = path[i];
    let current = top;

    if (step === "zig-zig") {
      child[side] = sub;
      current = rotateUp(top, side);
    } else if (step === "zig-zag") {
      const inner = opposite(side);
      child[inner] = sub;
      if (child[inner]) top[side] = rotateUp(child, inner);
    }

    sub = current[side] ? rotateUp(current, side) : current;
  }

  return sub;
}

function checkKey(key: number): void {
  if (Number.isNaN(key)) throw new Error("SplayTree keys must not be NaN");
}

export class SplayTree<V> {
  private _root: SplayNode<V> | null = null;
  private _size = 0;

  get size(): number {
    return this._size;
  }

  /** Key at the root, or undefined for an empty tree. */
  get rootKey(): number | undefined {
    return this._root?.key;
  }

  /** Splays toward `key`; the root moves even when the key is absent. */
  search(key: number): V | undefined {
    checkKey(key);
    this._root = splay(this._root, key);
    return this._root && this._root.key === key ? this._root.value : undefined;
  }

  has(key: number): boolean {
    checkKey(key);
    this._root = splay(this._root, key);
    return this._root !== null && this._root.key === key;
  }

  insert(key: number, value: V): void {
    checkKey(key);
    const root = splay(this._root, key);

    if (!root) {
      this._root = createNode(key, value);
      this._size = 1;
      return;
    }

    if (root.key === key) {
      root.value = value;
      this._root = root;
      return;
    }

    // split the splayed tree around the new node
    const node = createNode(key, value);
    if (key < root.key) {
      node.left = root.left;
      node.right = root;
      root.left = null;
    } else {
      node.right = root.right;
      node.left = root;
      root.right = null;
    }

    this._root = node;
    this._size += 1;
  }

  /** In-order entries. Does not splay. */
  entries(): Array<[number, V]> {
    const out: Array<[number, V]> = [];
    const stack: SplayNode<V>[] = [];
    let node = this._root;

    while (node || stack.length > 0) {
      while (node) {
        stack.push(node);
        node = node.left;
      }
      const top = stack.pop();
      if (!top) break;
      out.push([top.key, top.value]);
      node = top.right;
    }

    return out;
  }

  keys(): number[] {
    return this.entries().map(([k]) => k);
  }

  /** Number of nodes on the longest root-to-leaf path (0 when empty). */
  height(): number {
    if (!this._root) return 0;

    let max = 0;
    const stack: Array<[SplayNode<V>, number]> = [[this._root, 1]];
    while (stack.length > 0) {
      const next = stack.pop();
      if (!next) break;
      const [node, depth] = next;
      max = Math.max(max, depth);
      if (node.left) stack.push([node.left, depth + 1]);
      if (node.right) stack.push([node.right, depth + 1]);
    }

    return max;
  }

  clear(): void {
    this._root = null;
    this._size = 0;
  }
}
