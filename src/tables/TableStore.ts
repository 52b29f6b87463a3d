/**
 * Interface for the database that holds per-file derived tables
 */
export interface TableStore {
  /**
   * Checks whether a table exists
   *
   * @param name - Table name derived from the owning scope and entry ID
   */
  tableExists(name: string): Promise<boolean>;

  /**
   * Drops a table. Dropping a missing table is a no-op.
   */
  dropTable(name: string): Promise<void>;

  /**
   * Releases the underlying connection
   */
  close(): Promise<void>;
}
