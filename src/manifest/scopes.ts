import { Manifest } from "../types";
import { KeyedFileStore } from "../storage/KeyedFileStore";
import { isWithin } from "../utils/paths";
import { decodeManifest, encodeManifest } from "./entries";
import { DROPBOX_KEY, listProcessRecords, readProcessRecord } from "./processes";

export interface DropboxScope {
  kind: "dropbox";
  key: typeof DROPBOX_KEY;
  root: string;
}

export interface ProcessScope {
  kind: "process";
  key: string;
  processId: number;
  root: string;
}

/**
 * The manifest a file belongs to, along with the root its display names are relative to
 */
export type ManifestScope = DropboxScope | ProcessScope;

export type ScopeResolver = (
  store: KeyedFileStore,
  filePath: string,
) => ManifestScope | undefined;

export function dropboxResolver(root: string): ScopeResolver {
  return (_store, filePath) =>
    isWithin(filePath, root) ? { kind: "dropbox", key: DROPBOX_KEY, root } : undefined;
}

/**
 * Resolves the process whose output directory contains the path. Nested
 * outputs resolve to the deepest one.
 */
export const resolveProcessScope: ScopeResolver = (store, filePath) => {
  let match: ProcessScope | undefined;
  for (const record of listProcessRecords(store)) {
    if (!isWithin(filePath, record.output)) continue;
    if (!match || record.output.length > match.root.length) {
      match = {
        kind: "process",
        key: record.key,
        processId: record.id,
        root: record.output,
      };
    }
  }
  return match;
};

export function sameScope(a: ManifestScope | undefined, b: ManifestScope | undefined): boolean {
  if (!a || !b) return false;
  return a.key === b.key;
}

export function readScopeManifest(store: KeyedFileStore, scope: ManifestScope): Manifest {
  if (scope.kind === "dropbox") {
    return decodeManifest(store.get(scope.key));
  }
  return decodeManifest(readProcessRecord(store, scope.processId)?.record.files);
}

export function writeScopeManifest(
  store: KeyedFileStore,
  scope: ManifestScope,
  manifest: Manifest,
): void {
  if (scope.kind === "dropbox") {
    store.set(scope.key, encodeManifest(manifest));
    return;
  }
  const existing = readProcessRecord(store, scope.processId);
  store.set(scope.key, {
    ...(existing?.record ?? { output: scope.root }),
    files: encodeManifest(manifest),
  });
}

/**
 * Name of the auxiliary table derived from an entry
 */
export function tableName(scope: ManifestScope, id: string): string {
  return scope.kind === "dropbox"
    ? `data_dropbox_${id}`
    : `data_${scope.processId}_${id}`;
}
