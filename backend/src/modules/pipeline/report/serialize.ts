import type { ClassificationStatus } from "../interpreter/types.js";
import type { ClassifiedRecord } from "./types.js";

/** Wire shape of one record (snake_case, absent reference fields as null). */
export type WireRecord = {
  value: string;
  min: string | null;
  max: string | null;
  units: string;
  status: ClassificationStatus;
  healthy_value: string | null;
  detected_units: string | null;
};

export function toWireRecord(record: ClassifiedRecord): WireRecord {
  return {
    value: record.value,
    min: record.min ?? null,
    max: record.max ?? null,
    units: record.unit,
    status: record.status,
    healthy_value: record.healthyValue ?? null,
    detected_units: record.detectedUnit ?? null,
  };
}

/** Insertion order of the map (catalog order) is kept in the object's key order. */
export function toWireRecords(records: ReadonlyMap<string, ClassifiedRecord>): Record<string, WireRecord> {
  const out: Record<string, WireRecord> = {};
  for (const [name, record] of records) out[name] = toWireRecord(record);
  return out;
}
