/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { contextLogger } from '../common/console-logger';
import { DuplicatePathError, StructuralError, UnbalancedStructureError } from '../boq/errors';
import { joinOrdinal } from '../boq/tree';
import type { BoqMeta, DraftPosition, DraftTree, Phase, Section } from '../boq/types';
import type { BoqEvent, StageOptions } from './types';

/**
 * Assemble a draft tree from reader events with an explicit stack of open sections.
 * Each position's ordinal path is the labels of its enclosing sections plus its own.
 */
export function buildBoqTree(events: Iterable<BoqEvent>, phase: Phase, options: StageOptions = {}): DraftTree {
  const logger = contextLogger(options.logger, '[builder]');
  const stack: Array<Section<DraftPosition>> = [];
  const seenPaths = new Map<string, string>();
  const meta: BoqMeta = {};
  let root: Section<DraftPosition> | undefined;
  let sectionSeq = 0;
  let positionSeq = 0;

  for (const event of events) {
    switch (event.kind) {
      case 'info':
        meta[event.key] = event.value;
        break;

      case 'sectionOpen': {
        const parent = stack[stack.length - 1];
        sectionSeq++;
        if (!parent && root) {
          throw new StructuralError(`second root section "${event.title || event.label}" after the first one closed`);
        }
        if (parent && event.label === '') {
          throw new StructuralError(`section "${event.title}" has no ordinal label`, parent.path || undefined);
        }
        const section: Section<DraftPosition> = {
          kind: 'section',
          id: event.id ?? `section#${sectionSeq}`,
          label: event.label,
          title: event.title,
          path: joinOrdinal(parent?.path ?? '', event.label),
          children: [],
        };
        if (parent) parent.children.push(section);
        else root = section;
        stack.push(section);
        break;
      }

      case 'sectionClose':
        if (!stack.pop()) {
          throw new UnbalancedStructureError('section close without an open section');
        }
        break;

      case 'position': {
        const parent = stack[stack.length - 1];
        positionSeq++;
        const id = event.fields.itemId ?? `item#${positionSeq}`;
        if (!parent) {
          throw new UnbalancedStructureError(`position ${event.label || id} outside of any section`);
        }
        if (event.label === '') {
          throw new StructuralError(`position ${id} has no ordinal label`, parent.path || undefined);
        }
        const ordinalPath = joinOrdinal(parent.path, event.label);
        const firstId = seenPaths.get(ordinalPath);
        if (firstId !== undefined) throw new DuplicatePathError(ordinalPath, firstId, id);
        seenPaths.set(ordinalPath, id);
        parent.children.push({ kind: 'position', id, label: event.label, ordinalPath, fields: event.fields });
        break;
      }
    }
  }

  if (stack.length > 0) {
    const open = stack[stack.length - 1];
    throw new UnbalancedStructureError(
      `document ended with ${stack.length} open section(s)`,
      open.path || undefined
    );
  }
  if (!root) {
    throw new StructuralError('document contains no bill of quantities');
  }

  logger.debug(`built ${sectionSeq} section(s), ${positionSeq} position(s)`);
  return { phase, root, meta };
}
