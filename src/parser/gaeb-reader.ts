/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as sax from 'sax';
import { contextLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { MalformedDocumentError, StructuralError, UnsupportedPhaseError } from '../boq/errors';
import type { BoqMeta, Phase, RawPositionFields } from '../boq/types';
import { joinOrdinal } from '../boq/tree';
import { decodeChunks } from './decode';
import type { BoqEvent, BoqSource, SectionOpenEvent, StageOptions } from './types';

/** DP (Datenaustauschphase) codes this reader accepts. */
const PHASE_BY_DP = new Map<string, Phase>([
  ['83', 'A'],
  ['84', 'B'],
]);

const NAMESPACE_PHASE = /\/DA(\d{2})\//;

/** Item children holding a numeric or unit field. */
const ITEM_FIELDS = new Map<string, 'quantity' | 'unit' | 'unitPrice' | 'totalPrice'>([
  ['Qty', 'quantity'],
  ['QU', 'unit'],
  ['UP', 'unitPrice'],
  ['IT', 'totalPrice'],
]);

/** Containers whose own text is never collected; text inside them does not bubble up. */
const CONTAINERS = new Set([
  'GAEB', 'GAEBInfo', 'PrjInfo', 'Award', 'AwardInfo', 'BoQ', 'BoQInfo', 'BoQBody', 'BoQCtgy', 'Itemlist', 'Item',
]);

/** First line of a sax message; sax appends line/column/char on following lines. */
function saxReason(err: Error): string {
  return err.message.split('\n')[0].trim();
}

function localName(name: string): string {
  const colonIdx = name.indexOf(':');
  return colonIdx >= 0 ? name.slice(colonIdx + 1) : name;
}

function attributeValue(tag: sax.Tag | sax.QualifiedTag, name: string): string | undefined {
  const raw = tag.attributes[name];
  if (raw === undefined) return undefined;
  const value = (typeof raw === 'string' ? raw : raw.value).trim();
  return value === '' ? undefined : value;
}

function collapse(text: string): string {
  return text.replace(/\s+/g, ' ').trim();
}

interface SectionFrame {
  /** Depth of the BoQ / BoQCtgy element. */
  depth: number;
  open: SectionOpenEvent;
  /** Not yet emitted: the title is still being read. */
  pending: boolean;
}

interface ItemCapture {
  depth: number;
  label: string;
  fields: RawPositionFields;
}

/**
 * Turns sax callbacks into BoQ events. One instance per document.
 */
class GaebEventCollector {
  private readonly elements: string[] = [];
  private readonly texts: string[] = [];
  private readonly frames: SectionFrame[] = [];
  private readonly queue: BoqEvent[] = [];
  private item: ItemCapture | undefined;
  private positionCount = 0;
  private sectionCount = 0;

  constructor(
    private readonly phase: Phase,
    private readonly logger: Logger
  ) {}

  /** Ordinal path of the innermost open section, for error context. */
  currentPath(): string | undefined {
    const path = joinOrdinal(...this.frames.map((f) => f.open.label));
    return path || undefined;
  }

  *drain(): Generator<BoqEvent> {
    while (this.queue.length > 0) {
      const event = this.queue.shift();
      if (event) yield event;
    }
  }

  summary(): { positions: number; sections: number } {
    return { positions: this.positionCount, sections: this.sectionCount };
  }

  openTag(tag: sax.Tag | sax.QualifiedTag): void {
    const name = localName(tag.name);
    const depth = this.elements.length;
    if (depth === 0) this.openRoot(name, tag);
    this.elements.push(name);
    this.texts.push('');

    if (this.item) return;
    switch (name) {
      case 'BoQ':
        this.frames.push({
          depth,
          open: { kind: 'sectionOpen', label: '', title: '', ...this.idOf(tag) },
          pending: true,
        });
        break;
      case 'BoQCtgy':
        this.flushTop();
        this.frames.push({
          depth,
          open: { kind: 'sectionOpen', label: attributeValue(tag, 'RNoPart') ?? '', title: '', ...this.idOf(tag) },
          pending: true,
        });
        break;
      case 'BoQBody':
        this.flushTop();
        break;
      case 'Item': {
        this.flushTop();
        const itemId = attributeValue(tag, 'ID');
        this.item = {
          depth,
          label: attributeValue(tag, 'RNoPart') ?? '',
          fields: itemId ? { shortText: '', itemId } : { shortText: '' },
        };
        break;
      }
    }
  }

  closeTag(): void {
    const name = this.elements.pop();
    const collected = this.texts.pop();
    if (name === undefined || collected === undefined) return;
    const depth = this.elements.length;
    const parent = this.elements[depth - 1];
    const text = collapse(collected);

    if (this.item) {
      this.closeWithinItem(name, depth, text);
    } else if (name === 'BoQ' || name === 'BoQCtgy') {
      this.closeSection(depth);
    } else {
      this.closeLeaf(name, parent, text);
    }

    if (text && parent !== undefined && !CONTAINERS.has(parent)) {
      const top = this.texts.length - 1;
      this.texts[top] = this.texts[top] ? `${this.texts[top]} ${text}` : text;
    }
  }

  text(chunk: string): void {
    const name = this.elements[this.elements.length - 1];
    if (name === undefined || CONTAINERS.has(name)) return;
    const top = this.texts.length - 1;
    this.texts[top] = this.texts[top] ? `${this.texts[top]} ${chunk}` : chunk;
  }

  private openRoot(name: string, tag: sax.Tag | sax.QualifiedTag): void {
    if (name !== 'GAEB') {
      throw new MalformedDocumentError(`root element <${name}> is not a GAEB document`);
    }
    for (const [attr, raw] of Object.entries(tag.attributes)) {
      if (attr !== 'xmlns' && !attr.startsWith('xmlns:')) continue;
      const uri = typeof raw === 'string' ? raw : raw.value;
      const match = NAMESPACE_PHASE.exec(uri);
      if (match) this.checkPhase(match[1], `namespace ${uri}`);
    }
  }

  private idOf(tag: sax.Tag | sax.QualifiedTag): { id?: string } {
    const id = attributeValue(tag, 'ID');
    return id ? { id } : {};
  }

  private flushTop(): void {
    const frame = this.frames[this.frames.length - 1];
    if (!frame || !frame.pending) return;
    frame.pending = false;
    this.sectionCount++;
    this.queue.push(frame.open);
  }

  private closeSection(depth: number): void {
    const frame = this.frames[this.frames.length - 1];
    if (!frame || frame.depth !== depth) return;
    this.flushTop();
    this.frames.pop();
    this.queue.push({ kind: 'sectionClose' });
  }

  private closeWithinItem(name: string, depth: number, text: string): void {
    const item = this.item;
    if (!item) return;
    if (depth === item.depth) {
      this.item = undefined;
      this.positionCount++;
      this.queue.push({ kind: 'position', label: item.label, fields: item.fields });
      return;
    }
    const field = depth === item.depth + 1 ? ITEM_FIELDS.get(name) : undefined;
    if (field && text) item.fields[field] = text;
    else if (name === 'OutlineText' && text) item.fields.shortText = text;
    else if (name === 'DetailTxt' && text) item.fields.longText = text;
  }

  private closeLeaf(name: string, parent: string | undefined, text: string): void {
    if (!text) return;
    const frame = this.frames[this.frames.length - 1];
    if (name === 'LblTx' && (parent === 'BoQCtgy' || parent === 'BoQInfo') && frame?.pending) {
      frame.open.title = text;
      return;
    }
    if (parent === 'BoQInfo' && name === 'Name') {
      this.info('boqName', text);
      if (frame?.pending && !frame.open.title) frame.open.title = text;
    } else if (parent === 'PrjInfo' && name === 'NamePrj') {
      this.info('project', text);
    } else if (parent === 'PrjInfo' && name === 'LblPrj') {
      this.info('projectLabel', text);
    } else if (parent === 'AwardInfo' && name === 'Cur') {
      this.info('currency', text);
    } else if (parent === 'Award' && name === 'DP') {
      this.checkPhase(text, 'DP element');
      this.info('phaseMarker', text);
    }
  }

  private info(key: keyof BoqMeta, value: string): void {
    this.queue.push({ kind: 'info', key, value });
  }

  private checkPhase(code: string, source: string): void {
    const marked = PHASE_BY_DP.get(code.replace(/\D/g, ''));
    if (!marked) {
      throw new UnsupportedPhaseError(
        `Document declares exchange phase ${code} (${source}); only 83 (phase A) and 84 (phase B) are supported`
      );
    }
    if (marked !== this.phase) {
      throw new UnsupportedPhaseError(
        `Document is phase ${marked} (${source}) but was declared as phase ${this.phase}`
      );
    }
    this.logger.debug(`phase ${marked} confirmed by ${source}`);
  }
}

/**
 * Stream a GAEB DA XML document as structural events.
 * Lazy and single-use: content is fed to sax chunk by chunk and events are yielded
 * as soon as a chunk produced them.
 */
export function* readBoqEvents(
  source: BoqSource,
  phase: Phase,
  options: StageOptions = {}
): Generator<BoqEvent, void, undefined> {
  const logger = contextLogger(options.logger, '[reader]');
  const collector = new GaebEventCollector(phase, logger);

  const parser = sax.parser(true, { trim: true });
  parser.onerror = (err: Error) => {
    const reason = saxReason(err);
    const path = collector.currentPath();
    if (/^(Unclosed root tag|Unexpected close tag|Unmatched closing tag)/.test(reason)) {
      throw new StructuralError(`unbalanced markup: ${reason}`, path);
    }
    throw new MalformedDocumentError(reason, path, parser.line + 1, parser.column + 1);
  };
  parser.onopentag = (tag: sax.Tag | sax.QualifiedTag) => collector.openTag(tag);
  parser.onclosetag = () => collector.closeTag();
  parser.ontext = (text: string) => collector.text(text);
  parser.oncdata = (text: string) => collector.text(text);

  for (const chunk of decodeChunks(source)) {
    parser.write(chunk);
    yield* collector.drain();
  }
  parser.close();
  yield* collector.drain();

  const { positions, sections } = collector.summary();
  logger.debug(`read ${positions} position(s) in ${sections} section(s)`);
}
