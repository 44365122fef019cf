/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { TextDecoder } from 'util';
import { MalformedDocumentError } from '../boq/errors';
import type { BoqSource } from './types';

/** Whole strings and buffers are cut into pieces of this size before they reach the parser. */
export const SOURCE_SLICE_SIZE = 64 * 1024;

const DECLARED_ENCODING = /^\s*<\?xml[^>]*\bencoding\s*=\s*["']([^"']+)["']/i;

/** Encoding named in the XML declaration at the start of `head`, utf-8 when there is none. */
export function sniffEncoding(head: Uint8Array): string {
  const ascii = new TextDecoder('latin1').decode(head.subarray(0, 256));
  const match = DECLARED_ENCODING.exec(ascii.replace(/^(?:\uFEFF|\u00EF\u00BB\u00BF)/, ''));
  return match ? match[1].trim().toLowerCase() : 'utf-8';
}

function createDecoder(encoding: string): TextDecoder {
  try {
    return new TextDecoder(encoding);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MalformedDocumentError(`unsupported encoding "${encoding}" (${reason})`);
  }
}

function* slices(whole: string | Uint8Array, size: number): Generator<string | Uint8Array> {
  let start = 0;
  while (start < whole.length) {
    let end = Math.min(start + size, whole.length);
    // a surrogate pair stays in one slice
    if (typeof whole === 'string' && end < whole.length && /[\uD800-\uDBFF]/.test(whole[end - 1])) end++;
    yield typeof whole === 'string' ? whole.slice(start, end) : whole.subarray(start, end);
    start = end;
  }
}

/**
 * Turn raw content into text chunks. Bytes are decoded with the encoding the XML
 * declaration names; multi-byte sequences split across chunks are kept intact.
 * A whole string or buffer is sliced, so downstream parsing stays incremental.
 */
export function* decodeChunks(source: BoqSource, sliceSize = SOURCE_SLICE_SIZE): Generator<string> {
  const chunks = typeof source === 'string' || source instanceof Uint8Array ? slices(source, sliceSize) : source;
  let decoder: TextDecoder | undefined;
  let first = true;
  for (const chunk of chunks) {
    let text: string;
    if (typeof chunk === 'string') {
      text = chunk;
    } else {
      decoder ??= createDecoder(sniffEncoding(chunk));
      text = decoder.decode(chunk, { stream: true });
    }
    if (first && text.length > 0) {
      text = text.replace(/^\uFEFF/, '');
      first = false;
    }
    if (text) yield text;
  }
  const rest = decoder?.decode();
  if (rest) yield rest;
}
