import { JsonObject } from "../types";
import { ValidationError } from "../errors";
import { KeyedFileStore } from "../storage/KeyedFileStore";
import { isJsonObject } from "../utils/json";

export const PROCESS_ID_KEY = "processid";
export const DROPBOX_KEY = "dropbox";
export const REBOOT_KEY = "reboot";

export interface ProcessRecord {
  id: number;
  key: string;
  output: string;
  record: JsonObject;
}

export function processKey(id: number): string {
  return `process-${id}`;
}

/**
 * Highest process index handed out so far (defaults to 0)
 */
export function readProcessId(store: KeyedFileStore): number {
  const value = store.get(PROCESS_ID_KEY);
  if (value === undefined) return 0;
  if (typeof value !== "number" || !Number.isInteger(value) || value < 0) {
    throw new ValidationError(`${PROCESS_ID_KEY} must be a non-negative integer`);
  }
  return value;
}

export function readProcessRecord(
  store: KeyedFileStore,
  id: number,
): ProcessRecord | undefined {
  const key = processKey(id);
  const record = store.get(key);
  if (record === undefined) return undefined;
  if (!isJsonObject(record) || typeof record.output !== "string") {
    throw new ValidationError(`${key} has no output directory`);
  }
  return { id, key, output: record.output, record };
}

/**
 * Every initialized process record from 0 up to and including `processid`
 */
export function listProcessRecords(store: KeyedFileStore): ProcessRecord[] {
  const records: ProcessRecord[] = [];
  const last = readProcessId(store);
  for (let id = 0; id <= last; id++) {
    const record = readProcessRecord(store, id);
    if (record) records.push(record);
  }
  return records;
}
