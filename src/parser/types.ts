/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause

  Structural events emitted by the reader, in document order, phase-independent.
*/

import type { Logger } from '../common/logger';
import type { BoqMeta, RawPositionFields } from '../boq/types';

export interface InfoEvent {
  kind: 'info';
  key: keyof BoqMeta;
  value: string;
}

export interface SectionOpenEvent {
  kind: 'sectionOpen';
  /** Empty for the root (the BoQ itself). */
  label: string;
  title: string;
  /** GAEB ID attribute, when present. */
  id?: string;
}

export interface SectionCloseEvent {
  kind: 'sectionClose';
}

export interface PositionEvent {
  kind: 'position';
  label: string;
  fields: RawPositionFields;
}

export type BoqEvent = InfoEvent | SectionOpenEvent | SectionCloseEvent | PositionEvent;

/** Raw document content: whole, or chunked as it is read. */
export type BoqSource = string | Uint8Array | Iterable<string | Uint8Array>;

export interface StageOptions {
  logger?: Logger;
}
