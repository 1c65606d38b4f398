import type { Entity } from '../types/entity.js';

export type EntityWalker = (root: Entity) => Iterable<Entity>;

/**
 * Depth-first, pre-order traversal over `children`. Each node object is
 * yielded once even when it is reachable through several parents.
 */
export function* walkEntities(root: Entity): Generator<Entity, void, undefined> {
  const seen = new Set<Entity>();
  const stack: Entity[] = [root];

  while (stack.length > 0) {
    const node = stack.pop();
    if (node === undefined || seen.has(node)) continue;
    seen.add(node);
    yield node;

    const children = node.children ?? [];
    for (let i = children.length - 1; i >= 0; i -= 1) {
      const child = children[i];
      if (child !== undefined && !seen.has(child)) stack.push(child);
    }
  }
}
