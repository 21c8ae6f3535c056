import type { BlobRecord } from "../blobs/types.js";

export const AUDIT_COLUMNS = [
  "container",
  "name",
  "versionId",
  "tier",
  "lastModified",
  "lastAccessed",
  "contentLength",
  "rehydrationStatus",
  "etag",
  "tags",
] as const;

/** RFC 4180 field quoting. */
export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function isoOrEmpty(value: Date | null): string {
  if (value === null || Number.isNaN(value.getTime())) return "";
  return value.toISOString();
}

export function recordToRow(record: BlobRecord): string[] {
  return [
    record.container,
    record.name,
    record.versionId ?? "",
    record.tier,
    isoOrEmpty(record.lastModified),
    isoOrEmpty(record.lastAccessed),
    String(record.contentLength),
    record.rehydrationStatus,
    record.etag,
    JSON.stringify(record.tags),
  ];
}

export function toCsv(header: readonly string[], rows: readonly string[][]): string {
  return [header, ...rows]
    .map((row) => row.map(escapeCsvField).join(","))
    .join("\r\n")
    .concat("\r\n");
}
