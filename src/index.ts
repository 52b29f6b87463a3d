// Export the service that owns the manifests
export { ManifestService, ManifestServiceOptions } from "./ManifestService";

// Store and manifest model
export { KeyedFileStore } from "./storage/KeyedFileStore";
export * from "./types";
export * from "./errors";
export { describeSuffix, fileSuffix, UNKNOWN_DESCRIPTION } from "./manifest/descriptions";
export { nextId } from "./manifest/idAllocator";
export {
  buildEntry,
  decodeManifest,
  encodeManifest,
  findEntryId,
} from "./manifest/entries";
export { migrateDropboxManifest, migrateProcessFiles } from "./manifest/migrations";
export {
  ManifestScope,
  ScopeResolver,
  dropboxResolver,
  resolveProcessScope,
  tableName,
} from "./manifest/scopes";

// Reconciliation and live events
export { DirectoryReconciler, diffManifest, ReconcileResult } from "./sync/DirectoryReconciler";
export { ManifestEventHandlers } from "./sync/ManifestEventHandlers";
export { WatchSubscription, WatchHandlers, WatchEvent } from "./watch/WatchSubscription";

// Collaborators, for custom implementations
export { TableStore } from "./tables/TableStore";
export { RedisTableStore, RedisTableStoreOptions } from "./tables/RedisTableStore";
export { BootIdentityProvider, SystemBootIdentity } from "./system/BootIdentity";
export {
  loadConfiguration,
  resolveFiles,
  destinationFiles,
  ManifestConfiguration,
} from "./config/configuration";
