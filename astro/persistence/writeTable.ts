import fs from "node:fs/promises";
import { ephemerisLogHelpers } from "../../logging/ephemerisLog.js";

/**
 * Flat table writers.
 *
 * CSV: UTF-8 with BOM, CRLF rows, header taken from the first record's keys,
 * booleans as True/False.
 * JSON: either an envelope { metadata, total_records, data } or a bare array.
 */

export type TableCell = string | number | boolean | null | undefined;
export type TableRecord = Record<string, TableCell>;

const BOM = "\uFEFF";

export function csvCell(value: TableCell): string {
  if (value === null || value === undefined) return "";
  if (typeof value === "boolean") return value ? "True" : "False";
  const text = String(value);
  return /[",\r\n]/.test(text) ? `"${text.replace(/"/g, '""')}"` : text;
}

export function toCsv(records: readonly TableRecord[]): string {
  if (!records.length) return "";
  const header = Object.keys(records[0]);
  const lines = [header.map(csvCell).join(",")];
  for (const record of records) {
    lines.push(header.map((key) => csvCell(record[key])).join(","));
  }
  return BOM + lines.join("\r\n") + "\r\n";
}

/**
 * Returns false (and writes nothing) when there are no records.
 */
export async function writeCsvTable(
  records: readonly TableRecord[],
  filePath: string
): Promise<boolean> {
  if (!records.length) {
    ephemerisLogHelpers.exportSkippedEmpty({ path: filePath });
    return false;
  }
  await fs.writeFile(filePath, toCsv(records), "utf8");
  ephemerisLogHelpers.exportWritten({ path: filePath, records: records.length });
  return true;
}

export async function writeJsonTable(
  records: readonly TableRecord[],
  filePath: string,
  metadata: Record<string, unknown> = {}
): Promise<boolean> {
  if (!records.length) {
    ephemerisLogHelpers.exportSkippedEmpty({ path: filePath });
    return false;
  }
  const payload = {
    metadata,
    total_records: records.length,
    data: records,
  };
  await fs.writeFile(filePath, JSON.stringify(payload, null, 2), "utf8");
  ephemerisLogHelpers.exportWritten({ path: filePath, records: records.length });
  return true;
}

export async function writeJsonArray(
  records: readonly TableRecord[],
  filePath: string
): Promise<boolean> {
  if (!records.length) {
    ephemerisLogHelpers.exportSkippedEmpty({ path: filePath });
    return false;
  }
  await fs.writeFile(filePath, JSON.stringify(records, null, 2), "utf8");
  ephemerisLogHelpers.exportWritten({ path: filePath, records: records.length });
  return true;
}
