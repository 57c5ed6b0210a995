/**
 * Query resolver: expands a query or query-group name into its ordered
 * list of leaf queries.
 *
 * Groups are expanded with an explicit stack of frames rather than
 * recursion. The set of groups currently on the stack is the active
 * resolution path; meeting one of them again is a cycle.
 */

import { CircularReferenceError } from '../errors.js';
import type { QueryStore } from '../config/query-store.js';
import type { GroupDefinition, QueryDefinition } from '../types/config.js';

export interface ResolvedLeaf {
  query: QueryDefinition;
  /** Groups walked from the root to reach this leaf; empty for a bare query. */
  groupPath: string[];
}

interface Frame {
  group: GroupDefinition;
  next: number;
}

export class QueryResolver {
  constructor(private readonly store: QueryStore) {}

  /**
   * Resolve `name` to its leaf queries in declared order. A leaf reachable
   * through several paths appears once per path.
   *
   * @throws UnknownQueryError for an undefined root or member name.
   * @throws CircularReferenceError when a group reaches itself.
   */
  resolve(name: string): ResolvedLeaf[] {
    const root = this.store.get(name);
    if (root.kind === 'query') {
      return [{ query: root, groupPath: [] }];
    }

    const leaves: ResolvedLeaf[] = [];
    const stack: Frame[] = [{ group: root, next: 0 }];
    const expanding = new Set<string>([root.name]);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];

      if (frame.next >= frame.group.queries.length) {
        stack.pop();
        expanding.delete(frame.group.name);
        continue;
      }

      const memberName = frame.group.queries[frame.next];
      frame.next += 1;

      const member = this.store.get(memberName, frame.group.name);
      const path = stack.map((f) => f.group.name);

      if (member.kind === 'query') {
        leaves.push({ query: member, groupPath: path });
        continue;
      }

      if (expanding.has(member.name)) {
        throw new CircularReferenceError([...path.slice(path.indexOf(member.name)), member.name]);
      }

      expanding.add(member.name);
      stack.push({ group: member, next: 0 });
    }

    return leaves;
  }
}

/**
 * Drop repeated leaves, keeping the first occurrence. Used so a leaf
 * reachable through two group paths is fetched once per run.
 */
export function uniqueLeaves(leaves: ResolvedLeaf[]): ResolvedLeaf[] {
  const seen = new Set<string>();
  return leaves.filter((leaf) => {
    if (seen.has(leaf.query.name)) return false;
    seen.add(leaf.query.name);
    return true;
  });
}
