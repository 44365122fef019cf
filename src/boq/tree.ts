/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Iterative walks over a BoQ tree. Depth is bounded by memory, not by the call stack.
*/

import { isSection } from './types';
import type { BoqNode, PositionBase, Section } from './types';

/** Join ordinal labels with '.', skipping empty ones (the root's). */
export function joinOrdinal(...labels: string[]): string {
  return labels.filter((label) => label !== '').join('.');
}

/**
 * Ordinal path as integers: '01.02.0010' → [1, 2, 10].
 * Tokens keep only their digits ('2a' → 2); a token without digits counts as 0.
 */
export function parseOrdinal(path: string): number[] {
  const compact = path.replace(/\s+/g, '');
  if (!compact) return [];
  return compact.split('.').map((token) => {
    const digits = token.replace(/\D/g, '');
    return digits ? Number.parseInt(digits, 10) : 0;
  });
}

/** Sections in pre-order, with their depth (root = 0). */
export function* walkSections<P extends PositionBase>(
  root: Section<P>
): Generator<{ section: Section<P>; parent: Section<P> | undefined; depth: number }> {
  const stack: Array<{ section: Section<P>; parent: Section<P> | undefined; depth: number }> = [
    { section: root, parent: undefined, depth: 0 },
  ];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    yield entry;
    const nested = entry.section.children.filter((child): child is Section<P> => isSection(child));
    for (let i = nested.length - 1; i >= 0; i--) {
      stack.push({ section: nested[i], parent: entry.section, depth: entry.depth + 1 });
    }
  }
}

/** Positions in document order, each with the section that owns it. */
export function* walkPositions<P extends PositionBase>(
  root: Section<P>
): Generator<{ position: P; parent: Section<P> }> {
  const stack: Array<{ section: Section<P>; next: number }> = [{ section: root, next: 0 }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.next >= top.section.children.length) {
      stack.pop();
      continue;
    }
    const child: BoqNode<P> = top.section.children[top.next++];
    if (isSection(child)) stack.push({ section: child, next: 0 });
    else yield { position: child, parent: top.section };
  }
}

/**
 * Copy the section skeleton of `root`, replacing every position with `mapPosition(position)`.
 * Positions are visited in document order.
 */
export function mapTree<P extends PositionBase, Q extends PositionBase>(
  root: Section<P>,
  mapPosition: (position: P, parent: Section<P>) => Q
): Section<Q> {
  const copySection = (section: Section<P>): Section<Q> => ({
    kind: 'section',
    id: section.id,
    label: section.label,
    title: section.title,
    path: section.path,
    children: [],
  });
  const mapped = copySection(root);
  const stack: Array<{ from: Section<P>; to: Section<Q>; next: number }> = [{ from: root, to: mapped, next: 0 }];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.next >= top.from.children.length) {
      stack.pop();
      continue;
    }
    const child: BoqNode<P> = top.from.children[top.next++];
    if (isSection(child)) {
      const copy = copySection(child);
      top.to.children.push(copy);
      stack.push({ from: child, to: copy, next: 0 });
    } else {
      top.to.children.push(mapPosition(child, top.from));
    }
  }
  return mapped;
}

/** Structure without field values: labels, kinds and order. Two trees with equal shapes differ only in data. */
export type Shape = Array<{ kind: 'section'; label: string; children: Shape } | { kind: 'position'; path: string }>;

export function shapeOf<P extends PositionBase>(root: Section<P>): Shape {
  const rootShape: Shape = [];
  const stack: Array<{ section: Section<P>; into: Shape }> = [{ section: root, into: rootShape }];
  while (stack.length > 0) {
    const entry = stack.pop();
    if (!entry) break;
    for (const child of entry.section.children) {
      if (isSection(child)) {
        const nested: Shape = [];
        entry.into.push({ kind: 'section', label: child.label, children: nested });
        stack.push({ section: child, into: nested });
      } else {
        entry.into.push({ kind: 'position', path: child.ordinalPath });
      }
    }
  }
  return [{ kind: 'section', label: root.label, children: rootShape }];
}

/** Freeze a tree in place, sections and positions alike. */
export function freezeTree<P extends PositionBase>(root: Section<P>): Section<P> {
  for (const { section } of walkSections(root)) {
    for (const child of section.children) {
      if (!isSection(child)) Object.freeze(child);
    }
    Object.freeze(section.children);
    Object.freeze(section);
  }
  return root;
}
