/*
  @author Sven Wisotzky

  © 2026 Nokia
  Licensed under the BSD 3-Clause License
  SPDX-License-Identifier: BSD-3-Clause
*/

import { contextLogger } from '../common/console-logger';
import type { Logger } from '../common/logger';
import { PersistenceBlockedError } from '../boq/errors';
import type { BoqTree } from '../boq/types';
import type { MergedTree, MergeReport } from '../merge/types';
import { toBoqRecords } from './records';
import type { BoqRecords, RecordablePosition, RecordOptions } from './records';

/** Implemented by the storage layer; one call per BoQ. */
export interface BoqRecordSink {
  write(records: BoqRecords): Promise<void>;
}

/** Which merge report entries stop a write. */
export interface WritePolicy {
  blockOnConflicts: boolean;
  blockOnUnmatchedReference: boolean;
  blockOnUnmatchedPriced: boolean;
}

export const DEFAULT_WRITE_POLICY: Readonly<WritePolicy> = Object.freeze({
  blockOnConflicts: true,
  blockOnUnmatchedReference: false,
  blockOnUnmatchedPriced: false,
});

export const STRICT_WRITE_POLICY: Readonly<WritePolicy> = Object.freeze({
  blockOnConflicts: true,
  blockOnUnmatchedReference: true,
  blockOnUnmatchedPriced: true,
});

export interface PersistOptions extends RecordOptions {
  policy?: WritePolicy;
  logger?: Logger;
}

/** Human-readable reasons why `policy` refuses a write of this report; empty when it allows it. */
export function blockingReasons(report: MergeReport, policy: WritePolicy): string[] {
  const reasons: string[] = [];
  if (policy.blockOnConflicts) {
    for (const conflict of report.conflicts) {
      const fields = conflict.fields.map((f) => `${f.field} ${f.reference} vs ${f.priced}`).join(', ');
      reasons.push(`conflict at ${conflict.referencePath}: ${fields}`);
    }
  }
  if (policy.blockOnUnmatchedReference) {
    for (const entry of report.unmatchedReference) reasons.push(`no price for ${entry.path}`);
  }
  if (policy.blockOnUnmatchedPriced) {
    for (const entry of report.unmatchedPriced) reasons.push(`priced position ${entry.path} is not in the reference`);
  }
  return reasons;
}

/**
 * Map a tree to records and hand them to `sink`, unless the policy blocks the merge report.
 * Without a report (plain validated tree) nothing can block.
 */
export async function persistBoq(
  sink: BoqRecordSink,
  tree: BoqTree | MergedTree,
  report: MergeReport | undefined,
  options: PersistOptions = {}
): Promise<BoqRecords> {
  const logger = contextLogger(options.logger, '[records]');
  const policy = options.policy ?? DEFAULT_WRITE_POLICY;
  const reasons = report ? blockingReasons(report, policy) : [];
  if (reasons.length > 0) {
    logger.warn(`write refused: ${reasons.length} blocking entr${reasons.length === 1 ? 'y' : 'ies'}`);
    throw new PersistenceBlockedError(reasons);
  }
  const records = toBoqRecords<RecordablePosition>(tree, options);
  await sink.write(records);
  logger.info(`wrote lv ${records.lv.id}: ${records.titles.length} title(s), ${records.positions.length} position(s)`);
  return records;
}
