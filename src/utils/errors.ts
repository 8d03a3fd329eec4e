/**
 * Errors thrown by the transaction layer.
 *
 * Failed cache operations (missing keys, unmet add/replace/cas preconditions,
 * invalid increments) are reported through `false`/`null` results instead;
 * these classes are reserved for programming faults.
 */

export class CacheTransactionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CacheTransactionError';
    Error.captureStackTrace(this, this.constructor);
  }
}

export class UncommittedTransactionError extends CacheTransactionError {
  constructor(public readonly pending: number) {
    super(
      `Transaction is about to be closed without having been committed or rolled back (${pending} deferred action(s) pending)`
    );
    this.name = 'UncommittedTransactionError';
  }
}

export class TransactionStateError extends CacheTransactionError {
  constructor(message: string) {
    super(message);
    this.name = 'TransactionStateError';
  }
}
