import path from "path";
import { JsonObject, JsonValue, Manifest, ManifestEntry, ManifestEntryRecord } from "../types";
import { ValidationError } from "../errors";
import { isJsonObject } from "../utils/json";
import { describeSuffix, fileSuffix } from "./descriptions";

/**
 * Builds the entry for a file under a scope root
 */
export function buildEntry(fullPath: string, root: string): ManifestEntry {
  return Object.freeze({
    fullPath,
    displayName: path.relative(root, fullPath),
    description: describeSuffix(fileSuffix(fullPath)),
  });
}

export function encodeEntry(entry: ManifestEntry): ManifestEntryRecord {
  return {
    fullname: entry.fullPath,
    display_name: entry.displayName,
    description: entry.description,
  };
}

export function isEntryRecord(value: JsonValue | undefined): value is ManifestEntryRecord {
  return (
    isJsonObject(value) &&
    typeof value.fullname === "string" &&
    typeof value.display_name === "string" &&
    typeof value.description === "string"
  );
}

export function decodeEntry(id: string, value: JsonValue): ManifestEntry {
  if (!isEntryRecord(value)) {
    throw new ValidationError(`Manifest entry ${id} is not a file record`);
  }
  return Object.freeze({
    fullPath: value.fullname,
    displayName: value.display_name,
    description: value.description,
  });
}

/**
 * Decodes a manifest in the current on-disk shape. Legacy shapes must go
 * through the migrations first.
 */
export function decodeManifest(value: JsonValue | undefined): Manifest {
  const manifest: Manifest = new Map();
  if (value === undefined) return manifest;
  if (!isJsonObject(value)) {
    throw new ValidationError("Manifest is not a JSON object");
  }
  for (const [id, record] of Object.entries(value)) {
    manifest.set(id, decodeEntry(id, record));
  }
  return manifest;
}

export function encodeManifest(manifest: Manifest): JsonObject {
  const encoded: JsonObject = {};
  for (const [id, entry] of manifest) {
    encoded[id] = encodeEntry(entry);
  }
  return encoded;
}

/**
 * ID of the entry recorded for a path, if any
 */
export function findEntryId(manifest: Manifest, fullPath: string): string | undefined {
  for (const [id, entry] of manifest) {
    if (entry.fullPath === fullPath) return id;
  }
  return undefined;
}
