/**
 * Migration step names and the error raised when a schema step fails
 *
 * @module migrations/types
 */

/** Schema steps a migration can fail in */
export type MigrationOperation =
  | 'pragma'
  | 'create_table'
  | 'create_index'
  | 'alter_table'
  | 'insert'
  | 'query'
  | 'update'
  | 'migrate'
  | 'version_check';

/**
 * Raised when creating or upgrading a page store schema fails.
 * `tableName` names the table or index the step touched, when there is one.
 */
export class MigrationError extends Error {
  constructor(
    message: string,
    public readonly operation: MigrationOperation,
    public readonly tableName?: string,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = 'MigrationError';
  }

  /** Short label for logs, e.g. `create_table(pages)` */
  get step(): string {
    return this.tableName === undefined ? this.operation : `${this.operation}(${this.tableName})`;
  }
}
