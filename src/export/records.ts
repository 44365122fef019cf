/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Storage shape of a BoQ: one lv row, title rows for sections, position rows.
  Titles and positions share one pre-order sort_index so interleaving survives a reload.
*/

import { randomUUID } from 'crypto';
import { isSection } from '../boq/types';
import type { BoqMeta, BoqTree, Phase, Position, Section } from '../boq/types';
import type { MergedPosition, MatchStatus } from '../merge/types';
import type { BoqEvent } from '../parser/types';

export type PhaseCode = 'X83' | 'X84';

export interface LvRecord {
  id: string;
  phase: PhaseCode;
  project: string | null;
  currency: string | null;
  meta: BoqMeta;
}

export interface TitleRecord {
  id: string;
  lv_id: string;
  parent_id: string | null;
  /** Tree-side identity, kept so a reload yields the same ids. */
  source_id: string;
  label: string;
  oz_path: string | null;
  title_text: string;
  level: number;
  sort_index: number;
}

export interface PositionRecord {
  id: string;
  lv_id: string;
  title_id: string;
  source_id: string;
  item_id: string | null;
  label: string;
  /** Ordinal path as written, e.g. "01.02.0010". */
  oz: string;
  /** Numeric ordinal path, e.g. "1.2.10". */
  oz_path: string;
  short_text: string;
  long_text: string | null;
  unit: string | null;
  unit_code: string | null;
  qty: string | null;
  unit_price: string | null;
  total_price_net: string | null;
  vat_rate: string;
  match_status: MatchStatus | null;
  sort_index: number;
}

export interface BoqRecords {
  lv: LvRecord;
  titles: TitleRecord[];
  positions: PositionRecord[];
}

export interface RecordOptions {
  lvId?: string;
  /** Id factory for title and position rows; random UUIDs when omitted. */
  newId?: () => string;
}

const PHASE_CODES: Record<Phase, PhaseCode> = { A: 'X83', B: 'X84' };

export function phaseCode(phase: Phase): PhaseCode {
  return PHASE_CODES[phase];
}

export function phaseOfCode(code: PhaseCode): Phase {
  return code === 'X84' ? 'B' : 'A';
}

export type RecordablePosition = Position | MergedPosition;

function positionRecord(
  position: RecordablePosition,
  ids: { id: string; lvId: string; titleId: string },
  sortIndex: number
): PositionRecord {
  return {
    id: ids.id,
    lv_id: ids.lvId,
    title_id: ids.titleId,
    source_id: position.id,
    item_id: position.itemId ?? null,
    label: position.label,
    oz: position.ordinalPath,
    oz_path: position.ozPath.join('.'),
    short_text: position.shortText,
    long_text: position.longText ?? null,
    unit: position.unit ?? null,
    unit_code: position.unitCode ?? null,
    qty: position.quantity?.toString() ?? null,
    unit_price: position.unitPrice?.toString() ?? null,
    total_price_net: position.totalPrice?.toString() ?? null,
    vat_rate: position.vatRate.toString(),
    match_status: 'match' in position ? position.match : null,
    sort_index: sortIndex,
  };
}

/**
 * Flatten a validated or merged tree into storage records, in document order.
 */
export function toBoqRecords<P extends RecordablePosition>(tree: BoqTree<P>, options: RecordOptions = {}): BoqRecords {
  const newId = options.newId ?? randomUUID;
  const lvId = options.lvId ?? randomUUID();
  const titles: TitleRecord[] = [];
  const positions: PositionRecord[] = [];
  let sortIndex = 0;

  const rootId = newId();
  titles.push({
    id: rootId,
    lv_id: lvId,
    parent_id: null,
    source_id: tree.root.id,
    label: tree.root.label,
    oz_path: tree.root.path || null,
    title_text: tree.root.title,
    level: 0,
    sort_index: sortIndex++,
  });

  const stack: Array<{ section: Section<P>; recordId: string; level: number; next: number }> = [
    { section: tree.root, recordId: rootId, level: 0, next: 0 },
  ];
  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.next >= top.section.children.length) {
      stack.pop();
      continue;
    }
    const child = top.section.children[top.next++];
    if (isSection(child)) {
      const recordId = newId();
      titles.push({
        id: recordId,
        lv_id: lvId,
        parent_id: top.recordId,
        source_id: child.id,
        label: child.label,
        oz_path: child.path || null,
        title_text: child.title,
        level: top.level + 1,
        sort_index: sortIndex++,
      });
      stack.push({ section: child, recordId, level: top.level + 1, next: 0 });
    } else {
      positions.push(positionRecord(child, { id: newId(), lvId, titleId: top.recordId }, sortIndex++));
    }
  }

  return {
    lv: {
      id: lvId,
      phase: phaseCode(tree.phase),
      project: tree.meta.project ?? null,
      currency: tree.meta.currency ?? null,
      meta: { ...tree.meta },
    },
    titles,
    positions,
  };
}

type RecordNode = { kind: 'title'; record: TitleRecord } | { kind: 'position'; record: PositionRecord };

function parentOf(node: RecordNode): string | null {
  return node.kind === 'title' ? node.record.parent_id : node.record.title_id;
}

/**
 * Replay stored records as reader events, so they can go through the tree builder and
 * validator again. Titles and positions are ordered by their shared sort_index.
 */
export function* boqEventsFromRecords(records: BoqRecords): Generator<BoqEvent> {
  for (const [key, value] of Object.entries(records.lv.meta)) {
    if (typeof value === 'string' && isMetaKey(key)) yield { kind: 'info', key, value };
  }

  const nodes: RecordNode[] = [
    ...records.titles.map((record): RecordNode => ({ kind: 'title', record })),
    ...records.positions.map((record): RecordNode => ({ kind: 'position', record })),
  ].sort((a, b) => a.record.sort_index - b.record.sort_index);

  const open: string[] = [];
  for (const node of nodes) {
    const parent = parentOf(node);
    while (open.length > 0 && open[open.length - 1] !== parent) {
      open.pop();
      yield { kind: 'sectionClose' };
    }
    if (node.kind === 'title') {
      const { record } = node;
      yield { kind: 'sectionOpen', label: record.label, title: record.title_text, id: record.source_id };
      open.push(record.id);
    } else {
      const { record } = node;
      yield {
        kind: 'position',
        label: record.label,
        fields: {
          shortText: record.short_text,
          ...(record.long_text === null ? {} : { longText: record.long_text }),
          ...(record.item_id === null ? {} : { itemId: record.item_id }),
          ...(record.qty === null ? {} : { quantity: record.qty }),
          ...(record.unit === null ? {} : { unit: record.unit }),
          ...(record.unit_price === null ? {} : { unitPrice: record.unit_price }),
          ...(record.total_price_net === null ? {} : { totalPrice: record.total_price_net }),
        },
      };
    }
  }
  while (open.pop() !== undefined) yield { kind: 'sectionClose' };
}

const META_KEYS: ReadonlyArray<keyof BoqMeta> = ['project', 'projectLabel', 'currency', 'boqName', 'phaseMarker'];

function isMetaKey(key: string): key is keyof BoqMeta {
  return META_KEYS.some((known) => known === key);
}
