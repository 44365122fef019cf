/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import * as fs from 'fs';
import { SourceUnreadableError } from '../boq/errors';
import type { BoqTree, Phase } from '../boq/types';
import { readBoqEvents } from './gaeb-reader';
import { validateBoqTree } from './phase-validator';
import type { ValidatorOptions } from './phase-validator';
import { buildBoqTree } from './tree-builder';
import type { BoqSource } from './types';

export type ParseOptions = ValidatorOptions;

const CHUNK_SIZE = 64 * 1024;

/**
 * Parse a document of the given phase into a validated, frozen tree.
 * Reader, builder and validator run in one pass over the content.
 */
export function parseBoq(source: BoqSource, phase: Phase, options: ParseOptions = {}): BoqTree {
  const draft = buildBoqTree(readBoqEvents(source, phase, options), phase, options);
  return validateBoqTree(draft, options);
}

function systemErrorCode(err: unknown): string {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string') return err.code;
  return err instanceof Error ? err.message : String(err);
}

/** Run a file system call, reporting its failure as a SourceUnreadableError naming the file. */
function onFile<T>(filePath: string, call: () => T): T {
  try {
    return call();
  } catch (err) {
    throw new SourceUnreadableError(filePath, systemErrorCode(err));
  }
}

/**
 * Chunks of a file. The descriptor is held only while the generator runs and is
 * closed however iteration ends: exhausted, abandoned, or aborted by a parse error.
 */
export function* readFileChunks(filePath: string, chunkSize = CHUNK_SIZE): Generator<Uint8Array> {
  const fd = onFile(filePath, () => fs.openSync(filePath, 'r'));
  try {
    const buffer = Buffer.alloc(chunkSize);
    for (;;) {
      const bytesRead = onFile(filePath, () => fs.readSync(fd, buffer, 0, chunkSize, null));
      if (bytesRead === 0) return;
      yield Buffer.from(buffer.subarray(0, bytesRead));
    }
  } finally {
    fs.closeSync(fd);
  }
}

export function parseBoqFile(filePath: string, phase: Phase, options: ParseOptions = {}): BoqTree {
  return parseBoq(readFileChunks(filePath), phase, options);
}
