import type { RowDecodeError, RowDecoder } from "./row_decode_error";

export type SqlArg = string | number | bigint | null;

export type ChangeResult = {
  changes: number;
  lastInsertRowid: number | bigint;
};

export class Cursor<T> {
  constructor(
    private readonly rows: readonly T[],
    readonly failures: readonly RowDecodeError[] = []
  ) {}

  get length(): number {
    return this.rows.length;
  }

  asArray(): T[] {
    return [...this.rows];
  }
}

export interface StoreConnection {
  executeChange(sql: string, args?: readonly SqlArg[]): ChangeResult;
  executeQuery<T>(sql: string, args: readonly SqlArg[], decoder: RowDecoder<T>): Cursor<T>;
  lastInsertedRowId(): number | bigint;
}

/**
 * A unit of work runs to completion on one connection before control returns to the
 * event loop. It must not be async: statements issued after an await would land
 * outside the transaction.
 */
export type UnitOfWork<T> = (connection: StoreConnection) => T;

export interface TransactionExecutor {
  runStatement(sql: string, args?: readonly SqlArg[]): Promise<ChangeResult>;
  runQuery<T>(sql: string, args: readonly SqlArg[], decoder: RowDecoder<T>): Promise<Cursor<T>>;
  runInTransaction<T>(work: UnitOfWork<T>): Promise<T>;
  withRawConnection<T>(work: UnitOfWork<T>): Promise<T>;
}
