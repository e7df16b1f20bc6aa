/**
 * @module order/order
 * The sequencing key attached to every schema object and change.
 *
 * An Order combines a *natural* position, the triple
 * `(source rank, group rank, sequence rank)` assigned from where the item was
 * declared, with free-form *constraints*: labels the item must occur before
 * or after. Plain comparison only looks at the natural triple; the labels are
 * honoured by {@link Order.FullSort}, a depth-first topological sort biased
 * toward the natural order.
 *
 * @example
 * ```typescript
 * const widgets = new Order([0, 0, 4], { Label: 'widgets' });
 * const prices = new Order([0, 0, 1], { After: ['widgets'] });
 * Order.FullSort([prices, widgets]); // [widgets, prices]
 * ```
 */

import { CyclicOrderError, InvalidOrderError } from '../core/errors';

/**
 * Optional ordering constraints for an {@link Order}.
 */
export interface OrderConstraints {
  /** Labels this item must be sorted before */
  Before?: readonly string[];

  /** Labels this item must be sorted after */
  After?: readonly string[];

  /**
   * A label naming this item, so that other items' `Before`/`After` lists
   * can refer to it directly.
   */
  Label?: string;
}

/**
 * A node of the dependency graph built by `FullSort`: either a real Order or
 * a label that no Order carries (a placeholder).
 */
export type SortNode = Order | string;

/**
 * Immutable natural-plus-constraint sequencing key.
 */
export class Order {
  private readonly natural: readonly [number, number, number];

  /** Normalized labels this order must precede */
  readonly OccursBefore: readonly string[];

  /** Normalized labels this order must follow */
  readonly OccursAfter: readonly string[];

  /** Normalized label naming this order, or null */
  readonly Label: string | null;

  /**
   * @param order - Exactly three integers: source, group and sequence rank
   * @param constraints - Optional before/after labels and own label
   * @throws InvalidOrderError if `order` is not three integers
   */
  constructor(order: readonly number[], constraints: OrderConstraints = {}) {
    if (order.length !== 3) {
      throw new InvalidOrderError(
        order,
        `order must be of length 3, but found ${JSON.stringify(order)}`
      );
    }
    for (const value of order) {
      if (!Number.isInteger(value)) {
        throw new InvalidOrderError(
          order,
          `order must contain only integers, but found ${JSON.stringify(order)}`
        );
      }
    }
    this.natural = [order[0], order[1], order[2]];
    this.OccursBefore = Order.NormalizeLabels(constraints.Before);
    this.OccursAfter = Order.NormalizeLabels(constraints.After);
    this.Label = constraints.Label === undefined
      ? null
      : Order.NormalizeLabel(constraints.Label);
  }

  /**
   * The natural `(source, group, sequence)` triple.
   */
  Items(): readonly [number, number, number] {
    return this.natural;
  }

  /**
   * Natural comparison, ignoring the before/after labels.
   * Negative when this sorts first, positive when `other` does, 0 when equal.
   */
  CompareTo(other: Order): number {
    const mine = this.natural;
    const theirs = other.natural;
    for (let i = 0; i < mine.length; i++) {
      const diff = mine[i] - theirs[i];
      if (diff !== 0) {
        return diff;
      }
    }
    return 0;
  }

  IsBefore(other: Order): boolean {
    return this.CompareTo(other) < 0;
  }

  IsAfter(other: Order): boolean {
    return this.CompareTo(other) > 0;
  }

  toString(): string {
    return `(${this.natural.join(', ')})`;
  }

  /**
   * Strips everything except letters, digits and `.` and lower-cases the
   * result. Returns null when nothing is left.
   */
  static NormalizeLabel(raw: string): string | null {
    const cleaned = raw.replace(/[^\p{L}\p{N}.]/gu, '').toLowerCase();
    return cleaned.length > 0 ? cleaned : null;
  }

  private static NormalizeLabels(raw: readonly string[] | undefined): readonly string[] {
    if (!raw) {
      return [];
    }
    const ret: string[] = [];
    for (const value of raw) {
      const cleaned = Order.NormalizeLabel(value);
      if (cleaned !== null && !ret.includes(cleaned)) {
        ret.push(cleaned);
      }
    }
    return ret;
  }

  /**
   * Full sort of a list of orders: the natural order, subject to every
   * before/after constraint.
   *
   * A label reference resolves to the orders carrying that label; labels no
   * order carries become placeholder nodes that are dropped from the result.
   * The nodes (and each node's dependencies) are pre-sorted naturally, with
   * orders ahead of placeholders, so that the depth-first traversal keeps
   * declaration order wherever the constraints allow it.
   *
   * @throws CyclicOrderError if the constraints cannot all be satisfied
   */
  static FullSort(orders: readonly Order[]): Order[] {
    const unique = Array.from(new Set(orders));
    const nodes: SortNode[] = [...unique];
    const depends = new Map<SortNode, SortNode[]>();
    const placeholders = new Set<string>();

    const labelled = new Map<string, Order[]>();
    for (const order of unique) {
      if (order.Label !== null) {
        const named = labelled.get(order.Label);
        if (named) {
          named.push(order);
        } else {
          labelled.set(order.Label, [order]);
        }
      }
    }

    const resolve = (label: string): SortNode[] => {
      const named = labelled.get(label);
      if (named) {
        return named;
      }
      if (!placeholders.has(label)) {
        placeholders.add(label);
        nodes.push(label);
      }
      return [label];
    };

    const addDependency = (node: SortNode, prerequisite: SortNode): void => {
      const list = depends.get(node);
      if (list) {
        list.push(prerequisite);
      } else {
        depends.set(node, [prerequisite]);
      }
    };

    for (const order of unique) {
      for (const label of order.OccursAfter) {
        for (const target of resolve(label)) {
          addDependency(order, target);
        }
      }
      for (const label of order.OccursBefore) {
        for (const target of resolve(label)) {
          addDependency(target, order);
        }
      }
    }

    nodes.sort(CompareSortNodes);
    for (const list of depends.values()) {
      list.sort(CompareSortNodes);
    }

    const visiting = new Map<SortNode, boolean>();
    const stack: SortNode[] = [];
    const sorted: SortNode[] = [];
    for (const node of nodes) {
      if (!visiting.has(node)) {
        visit(node, depends, visiting, stack, sorted);
      }
    }

    return sorted.filter((node): node is Order => node instanceof Order);
  }
}

/**
 * Pre-sort comparison used by `FullSort`: orders by their natural triple,
 * labels lexicographically, and orders always ahead of labels.
 */
export function CompareSortNodes(a: SortNode, b: SortNode): number {
  if (typeof a === 'string') {
    if (typeof b === 'string') {
      return a === b ? 0 : a < b ? -1 : 1;
    }
    return 1;
  }
  if (typeof b === 'string') {
    return -1;
  }
  return a.CompareTo(b);
}

/**
 * Sorts any values carrying an Order with {@link Order.FullSort}.
 * Values sharing one Order instance keep their relative input order.
 */
export function SortByOrder<T extends { readonly Order: Order }>(items: readonly T[]): T[] {
  const byOrder = new Map<Order, T[]>();
  for (const item of items) {
    const group = byOrder.get(item.Order);
    if (group) {
      group.push(item);
    } else {
      byOrder.set(item.Order, [item]);
    }
  }

  const ret: T[] = [];
  for (const order of Order.FullSort(Array.from(byOrder.keys()))) {
    const group = byOrder.get(order);
    if (group) {
      ret.push(...group);
    }
  }
  return ret;
}

/**
 * One step of the depth-first traversal: emit every prerequisite, then the
 * node itself. Meeting a node that is still on the active path is a cycle.
 */
function visit(
  node: SortNode,
  depends: Map<SortNode, SortNode[]>,
  visiting: Map<SortNode, boolean>,
  stack: SortNode[],
  sorted: SortNode[]
): void {
  visiting.set(node, true);
  stack.push(node);

  for (const dep of depends.get(node) ?? []) {
    const state = visiting.get(dep);
    if (state === undefined) {
      visit(dep, depends, visiting, stack, sorted);
    } else if (state) {
      const cycle = stack.slice(stack.indexOf(dep));
      cycle.push(dep);
      throw new CyclicOrderError(cycle.map(String));
    }
  }

  stack.pop();
  visiting.set(node, false);
  sorted.push(node);
}
