import fs from "fs-extra";
import path from "path";
import { ManifestFiles } from "./types";
import { KeyedFileStore } from "./storage/KeyedFileStore";
import { TableStore } from "./tables/TableStore";
import { BootIdentityProvider, SystemBootIdentity } from "./system/BootIdentity";
import { destinationFiles } from "./config/configuration";
import { DirectoryReconciler } from "./sync/DirectoryReconciler";
import { ManifestEventHandlers } from "./sync/ManifestEventHandlers";
import { WatchHandlers, WatchSubscription } from "./watch/WatchSubscription";
import { decodeManifest, encodeManifest } from "./manifest/entries";
import { migrateDropboxManifest, migrateProcessFiles } from "./manifest/migrations";
import {
  DROPBOX_KEY,
  PROCESS_ID_KEY,
  REBOOT_KEY,
  listProcessRecords,
  readProcessId,
} from "./manifest/processes";
import { dropboxResolver, resolveProcessScope } from "./manifest/scopes";
import { AsyncLock } from "./utils/AsyncLock";
import { ResourceNotFoundError, StateError, errorMessage } from "./errors";

/**
 * Configuration options for ManifestService
 */
export interface ManifestServiceOptions {
  /**
   * Absolute paths for the destination files and the data directory
   */
  files: ManifestFiles;

  /**
   * Database holding the per-file derived tables
   */
  tableStore: TableStore;

  /**
   * Source of the current boot identity (default: SystemBootIdentity)
   */
  bootIdentity?: BootIdentityProvider;

  /**
   * Whether to watch the dropbox and results trees after startup (default: true)
   */
  watch?: boolean;

  /**
   * Window for pairing an unlink with an add into a move, in milliseconds
   */
  renameWindowMs?: number;

  /**
   * Poll the watched trees instead of using native events (default: false)
   */
  usePolling?: boolean;

  /**
   * Whether to shut down on SIGINT and SIGTERM (default: true)
   */
  autoCleanup?: boolean;

  /**
   * Suppress non-critical log lines (default: false)
   */
  silent?: boolean;
}

/**
 * Subdirectories of the data directory
 */
export const DATA_SUBDIRECTORIES = ["input", "results", "archive", ".tmp"] as const;

/**
 * Owns the manifest store for the life of the process: reconciles every root
 * at startup, keeps manifests current from live events and releases watchers
 * and the table store on shutdown
 */
export class ManifestService {
  private readonly files: ManifestFiles;
  private readonly tableStore: TableStore;
  private readonly bootIdentity: BootIdentityProvider;
  private readonly watch: boolean;
  private readonly renameWindowMs?: number;
  private readonly usePolling: boolean;
  private readonly autoCleanup: boolean;
  private readonly silent: boolean;

  private readonly lock = new AsyncLock();
  private readonly reconciler: DirectoryReconciler;
  private readonly handlers: ManifestEventHandlers;
  private readonly cleanupTables = new Set<string>();
  private subscriptions: WatchSubscription[] = [];
  private store?: KeyedFileStore;
  private initialized = false;
  private shutdownPromise?: Promise<void>;
  private signalHandler?: (signal: NodeJS.Signals) => void;

  /**
   * Creates a new ManifestService instance
   *
   * @param options - Configuration options
   */
  constructor(options: ManifestServiceOptions) {
    this.files = options.files;
    this.tableStore = options.tableStore;
    this.bootIdentity = options.bootIdentity || new SystemBootIdentity();
    this.watch = options.watch !== false;
    this.renameWindowMs = options.renameWindowMs;
    this.usePolling = options.usePolling || false;
    this.autoCleanup = options.autoCleanup !== false;
    this.silent = options.silent || false;

    this.reconciler = new DirectoryReconciler({ silent: this.silent });
    this.handlers = new ManifestEventHandlers({
      loadStore: () => this.loadStore(),
      tableStore: this.tableStore,
      lock: this.lock,
      silent: this.silent,
    });
  }

  getDataDir(): string {
    return this.files["data-dir"];
  }

  getDropboxRoot(): string {
    return path.join(this.getDataDir(), "archive");
  }

  getResultsRoot(): string {
    return path.join(this.getDataDir(), "results");
  }

  /**
   * The store built at startup. Event handlers work on fresh copies from
   * disk, so this instance may lag behind the destination files.
   */
  getStore(): KeyedFileStore | undefined {
    return this.store;
  }

  getSubscriptions(): WatchSubscription[] {
    return [...this.subscriptions];
  }

  /**
   * Reads a fresh store from the destination files
   */
  loadStore(): Promise<KeyedFileStore> {
    return KeyedFileStore.load(destinationFiles(this.files));
  }

  /**
   * Marks a table to be dropped when the service shuts down
   */
  flagForCleanup(table: string): void {
    this.cleanupTables.add(table);
  }

  /**
   * Starts the live watchers, then loads and reconciles every manifest
   */
  async initialize(): Promise<void> {
    if (this.shutdownPromise) {
      throw new StateError("ManifestService has been shut down");
    }
    if (this.initialized) {
      throw new StateError("ManifestService is already initialized");
    }
    this.initialized = true;

    this.log("⏳ Initializing file manifests");

    // Events seen while the manifests are reconciled wait on the lock and
    // apply on top of the startup save
    await this.lock.runExclusive(async () => {
      await this.ensureDirectories();
      if (this.watch) {
        await this.startWatching();
      }

      const store = await this.loadStore();
      this.ensureDefaults(store);
      await this.checkReboot(store);
      await this.reconcileDropbox(store);
      await this.reconcileProcesses(store);
      await store.save();
      this.store = store;
    }).catch(async (error: unknown) => {
      await this.stopSubscriptions();
      throw error;
    });

    if (this.autoCleanup) {
      this.registerCleanupHandlers();
    }

    this.log("✅ Initialization complete");
  }

  /**
   * Stops every watcher, drops flagged tables and closes the table store.
   * Only the first call does any work.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.runShutdown();
    }
    return this.shutdownPromise;
  }

  private ensureDefaults(store: KeyedFileStore): void {
    if (!store.has(PROCESS_ID_KEY)) {
      store.addKey(PROCESS_ID_KEY, 0, this.files.processes);
    }
    if (!store.has(DROPBOX_KEY)) {
      store.addKey(DROPBOX_KEY, {}, this.files.dropbox);
    }
  }

  /**
   * PIDs recorded before a reboot no longer refer to our processes
   */
  private async checkReboot(store: KeyedFileStore): Promise<void> {
    const currentBoot = await this.bootIdentity.currentBoot();
    const recordedBoot = store.get(REBOOT_KEY);

    if (recordedBoot !== undefined && recordedBoot !== currentBoot) {
      console.warn("⚠️ A reboot has occurred since the server was last started");
      console.warn(
        `⚠️ PIDs of old processes with IDs ${readProcessId(store)} and lower may be inaccurate`,
      );
    }

    if (store.has(REBOOT_KEY)) {
      store.set(REBOOT_KEY, currentBoot);
    } else {
      store.addKey(REBOOT_KEY, currentBoot, this.files.processes);
    }
  }

  private async ensureDirectories(): Promise<void> {
    for (const directory of DATA_SUBDIRECTORIES) {
      await fs.ensureDir(path.join(this.getDataDir(), directory));
    }
  }

  private async reconcileDropbox(store: KeyedFileStore): Promise<void> {
    const root = this.getDropboxRoot();
    const { value, migrated } = migrateDropboxManifest(store.get(DROPBOX_KEY), root);
    for (const id of migrated) {
      this.log(`ℹ️ Updating dropbox entry ${id} to new format`);
    }

    const { manifest } = await this.reconciler.reconcile(decodeManifest(value), root);
    store.set(DROPBOX_KEY, encodeManifest(manifest));
  }

  private async reconcileProcesses(store: KeyedFileStore): Promise<void> {
    for (const processRecord of listProcessRecords(store)) {
      this.log(`ℹ️ Checking files for process ${processRecord.id}`);

      const { value, migrated } = migrateProcessFiles(
        processRecord.record.files,
        processRecord.output,
      );
      if (migrated.length > 0) {
        this.log(`ℹ️ Updating file manifest of process ${processRecord.id} to new format`);
      }

      const { manifest } = await this.reconciler.reconcile(
        decodeManifest(value),
        processRecord.output,
      );
      store.set(processRecord.key, {
        ...processRecord.record,
        files: encodeManifest(manifest),
      });
    }
  }

  private async startWatching(): Promise<void> {
    const roots = [
      {
        label: "Dropbox",
        root: this.getDropboxRoot(),
        resolve: dropboxResolver(this.getDropboxRoot()),
      },
      {
        label: "Results",
        root: this.getResultsRoot(),
        resolve: resolveProcessScope,
      },
    ];

    for (const { label, root, resolve } of roots) {
      const subscription = new WatchSubscription(root, {
        label,
        renameWindowMs: this.renameWindowMs,
        usePolling: this.usePolling,
        silent: this.silent,
      });
      if (!this.silent) {
        subscription.subscribe(this.eventLogger(label));
      }
      subscription.subscribe(this.handlers.forResolver(resolve));
      this.subscriptions.push(subscription);
      await subscription.start();
    }
  }

  private eventLogger(label: string): WatchHandlers {
    return {
      created: (filePath) => console.log(`${label} Event: created ${filePath}`),
      deleted: (filePath) => console.log(`${label} Event: deleted ${filePath}`),
      moved: (srcPath, destPath) =>
        console.log(`${label} Event: moved ${srcPath} --> ${destPath}`),
    };
  }

  /**
   * Register handlers to shut down cleanly on termination signals
   */
  private registerCleanupHandlers(): void {
    const handler = (signal: NodeJS.Signals): void => {
      this.log(`ℹ️ Received ${signal}, shutting down`);
      this.shutdown().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error("❌ Error during shutdown:", errorMessage(error));
          process.exit(1);
        },
      );
    };

    this.signalHandler = handler;
    process.once("SIGINT", handler);
    process.once("SIGTERM", handler);
  }

  private removeCleanupHandlers(): void {
    if (!this.signalHandler) return;
    process.off("SIGINT", this.signalHandler);
    process.off("SIGTERM", this.signalHandler);
    this.signalHandler = undefined;
  }

  private async runShutdown(): Promise<void> {
    this.log("🧹 Cleaning up watchers and database connections");
    this.removeCleanupHandlers();

    try {
      await this.stopSubscriptions();

      for (const table of this.cleanupTables) {
        try {
          await this.tableStore.dropTable(table);
        } catch (error: unknown) {
          if (!(error instanceof ResourceNotFoundError)) {
            throw error;
          }
        }
      }
      this.cleanupTables.clear();
    } finally {
      await this.tableStore.close();
    }
  }

  private async stopSubscriptions(): Promise<void> {
    for (const subscription of this.subscriptions) {
      await subscription.stop();
    }
  }

  private log(message: string): void {
    if (!this.silent) {
      console.log(message);
    }
  }
}
