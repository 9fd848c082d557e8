/**
 * AllocationRecordParser — turns a vGPU allocation annotation into
 * `(gpuId, allocationUnits)` records.
 *
 * Two producers write the annotation in the field:
 *
 *   compact:   `GPU-a:50,GPU-b:30`
 *   extended:  `GPU-a,NVIDIA,40000,70:GPU-b,NVIDIA,40000,10:;`
 *
 * The encoding is detected once per annotation, then every entry goes through
 * the matching rule. Entries that do not parse are dropped.
 */

import type { AllocationEncoding, AllocationRecord } from './types.js';

const MAX_UNITS = 100;
const EXTENDED_MIN_FIELDS = 4;
const EXTENDED_UNITS_FIELD = 3;

/**
 * Extended when any entry carries the full device field set with integer
 * units, compact otherwise. A malformed leading token of either encoding
 * does not decide the outcome.
 */
export function detectEncoding(text: string): AllocationEncoding {
  const extended = text.split(/[:;]/).some(entry => {
    const fields = entry.split(',');
    return fields.length >= EXTENDED_MIN_FIELDS && /^\d+$/.test(fields[EXTENDED_UNITS_FIELD].trim());
  });
  return extended ? 'extended' : 'compact';
}

export function parseAllocation(text: string | undefined, expectedSlotCount = 0): AllocationRecord[] {
  const trimmed = text?.trim() ?? '';
  const records: AllocationRecord[] = [];

  if (trimmed) {
    const encoding = detectEncoding(trimmed);
    const entries = encoding === 'compact' ? parseCompact(trimmed) : parseExtended(trimmed);
    records.push(...entries);
  }

  while (records.length < expectedSlotCount) {
    records.push({ gpuId: '', allocationUnits: 0 });
  }

  return records;
}

function parseCompact(text: string): AllocationRecord[] {
  const records: AllocationRecord[] = [];
  for (const token of text.split(',')) {
    const sep = token.indexOf(':');
    if (sep < 0) continue;
    const units = parseUnits(token.slice(sep + 1));
    if (units === null) continue;
    records.push({ gpuId: token.slice(0, sep).trim(), allocationUnits: units });
  }
  return records;
}

function parseExtended(text: string): AllocationRecord[] {
  const records: AllocationRecord[] = [];
  for (const entry of text.split(/[:;]/)) {
    const fields = entry.split(',');
    if (fields.length < EXTENDED_MIN_FIELDS) continue;
    const units = parseUnits(fields[EXTENDED_UNITS_FIELD]);
    if (units === null) continue;
    records.push({ gpuId: fields[0].trim(), allocationUnits: units });
  }
  return records;
}

function parseUnits(raw: string): number | null {
  const value = raw.trim();
  if (!/^\d+$/.test(value)) return null;
  const units = Number.parseInt(value, 10);
  return units <= MAX_UNITS ? units : null;
}
