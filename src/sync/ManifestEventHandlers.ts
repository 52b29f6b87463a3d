import path from "path";
import { KeyedFileStore } from "../storage/KeyedFileStore";
import { TableStore } from "../tables/TableStore";
import { AsyncLock } from "../utils/AsyncLock";
import { buildEntry, findEntryId } from "../manifest/entries";
import { nextId } from "../manifest/idAllocator";
import {
  ManifestScope,
  ScopeResolver,
  readScopeManifest,
  sameScope,
  tableName,
  writeScopeManifest,
} from "../manifest/scopes";
import { WatchHandlers } from "../watch/WatchSubscription";

export interface ManifestEventHandlersOptions {
  /** Reads a fresh store from the destination files */
  loadStore: () => Promise<KeyedFileStore>;
  tableStore: TableStore;
  /** Guards every reload-mutate-save cycle */
  lock: AsyncLock;
  silent?: boolean;
}

/**
 * Keeps manifests in step with live file events. Each event reloads the
 * store, applies one change and saves it again while holding the lock.
 */
export class ManifestEventHandlers {
  private readonly loadStore: () => Promise<KeyedFileStore>;
  private readonly tableStore: TableStore;
  private readonly lock: AsyncLock;
  private readonly silent: boolean;

  constructor(options: ManifestEventHandlersOptions) {
    this.loadStore = options.loadStore;
    this.tableStore = options.tableStore;
    this.lock = options.lock;
    this.silent = options.silent || false;
  }

  /**
   * Watch handlers for a root whose files belong to the scopes the resolver finds
   */
  forResolver(resolve: ScopeResolver): WatchHandlers {
    return {
      created: (filePath) => this.handleCreate(resolve, filePath),
      deleted: (filePath) => this.handleDelete(resolve, filePath),
      moved: (srcPath, destPath) => this.handleMove(resolve, srcPath, destPath),
    };
  }

  handleCreate(resolve: ScopeResolver, filePath: string): Promise<void> {
    return this.withStore(async (store) =>
      this.applyCreate(store, resolve(store, filePath), filePath),
    );
  }

  handleDelete(resolve: ScopeResolver, filePath: string): Promise<void> {
    return this.withStore(async (store) =>
      this.applyDelete(store, resolve(store, filePath), filePath),
    );
  }

  /**
   * A rename inside one scope keeps the entry's ID. Crossing scopes, or
   * entering or leaving a watched tree, is a delete followed by a create.
   */
  handleMove(
    resolve: ScopeResolver,
    srcPath: string,
    destPath: string,
  ): Promise<void> {
    return this.withStore(async (store) => {
      const source = resolve(store, srcPath);
      const destination = resolve(store, destPath);

      if (source && destination && sameScope(source, destination)) {
        return this.applyRename(store, source, srcPath, destPath);
      }

      const deleted = await this.applyDelete(store, source, srcPath);
      const created = this.applyCreate(store, destination, destPath);
      return deleted || created;
    });
  }

  private async withStore(
    mutate: (store: KeyedFileStore) => Promise<boolean>,
  ): Promise<void> {
    await this.lock.runExclusive(async () => {
      const store = await this.loadStore();
      if (await mutate(store)) {
        await store.save();
      }
    });
  }

  private applyCreate(
    store: KeyedFileStore,
    scope: ManifestScope | undefined,
    filePath: string,
  ): boolean {
    if (!scope) {
      this.log(`ℹ️ Ignoring new file outside any manifest: ${filePath}`);
      return false;
    }

    const manifest = readScopeManifest(store, scope);
    if (findEntryId(manifest, filePath) !== undefined) {
      return false;
    }

    const id = nextId(manifest.keys());
    const entry = buildEntry(filePath, scope.root);
    manifest.set(id, entry);
    writeScopeManifest(store, scope, manifest);
    this.log(`➕ Creating file in ${scope.key}: ${id} --> ${entry.displayName}`);
    return true;
  }

  private async applyDelete(
    store: KeyedFileStore,
    scope: ManifestScope | undefined,
    filePath: string,
  ): Promise<boolean> {
    if (!scope) {
      this.log(`ℹ️ Ignoring deleted file outside any manifest: ${filePath}`);
      return false;
    }

    const manifest = readScopeManifest(store, scope);
    const id = findEntryId(manifest, filePath);
    if (id === undefined) {
      return false;
    }

    manifest.delete(id);
    writeScopeManifest(store, scope, manifest);
    this.log(`🗑️ Deleting file from ${scope.key}: ${id} --> ${filePath}`);

    const table = tableName(scope, id);
    if (await this.tableStore.tableExists(table)) {
      await this.tableStore.dropTable(table);
    }
    return true;
  }

  private applyRename(
    store: KeyedFileStore,
    scope: ManifestScope,
    srcPath: string,
    destPath: string,
  ): boolean {
    const manifest = readScopeManifest(store, scope);
    const id = findEntryId(manifest, srcPath);
    if (id === undefined) {
      return this.applyCreate(store, scope, destPath);
    }

    manifest.set(id, buildEntry(destPath, scope.root));
    writeScopeManifest(store, scope, manifest);
    this.log(
      `🔀 Moving file in ${scope.key}: ${id} (${path.relative(scope.root, srcPath)} --> ${path.relative(scope.root, destPath)})`,
    );
    return true;
  }

  private log(message: string): void {
    if (!this.silent) {
      console.log(message);
    }
  }
}
