import { InvalidTimeWindowError, MalformedRecordError } from "../errors/catalog.js";
import type { BlobRecord, TierFilterCriteria } from "./types.js";

export interface FilterOptions {
  /** Called for each record dropped because its timestamp is unusable. */
  onMalformed?: (record: BlobRecord, error: MalformedRecordError) => void;
}

function isValidDate(value: Date | null): value is Date {
  return value !== null && !Number.isNaN(value.getTime());
}

/**
 * Keeps records in `criteria.tierFilter` whose lastModified lies in
 * [startTime, endTime], both ends inclusive. Order is preserved.
 */
export function filterByWindow(
  records: readonly BlobRecord[],
  criteria: TierFilterCriteria,
  options?: FilterOptions,
): BlobRecord[] {
  const start = criteria.startTime.getTime();
  const end = criteria.endTime.getTime();
  if (Number.isNaN(start) || Number.isNaN(end) || start > end) {
    throw new InvalidTimeWindowError(criteria.startTime, criteria.endTime);
  }

  const kept: BlobRecord[] = [];
  for (const record of records) {
    if (record.tier !== criteria.tierFilter) continue;

    if (!isValidDate(record.lastModified)) {
      options?.onMalformed?.(
        record,
        new MalformedRecordError(record.name, "lastModified", record.lastModified),
      );
      continue;
    }

    const modified = record.lastModified.getTime();
    if (modified >= start && modified <= end) {
      kept.push(record);
    }
  }
  return kept;
}
