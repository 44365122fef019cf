/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

export { toBoqRecords, boqEventsFromRecords, phaseCode, phaseOfCode } from './records';
export { persistBoq, blockingReasons, DEFAULT_WRITE_POLICY, STRICT_WRITE_POLICY } from './persist';
export type { BoqRecords, LvRecord, PhaseCode, PositionRecord, RecordOptions, TitleRecord } from './records';
export type { BoqRecordSink, PersistOptions, WritePolicy } from './persist';
