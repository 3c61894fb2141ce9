import {Either, Left} from 'purify-ts';
import {LedgerError} from '../domain';
import {stateConflict} from '../pure/ledgerErrors';

/**
 * Non-reentrant execution lock. While one guarded call is in flight, any
 * other call through the same guard is rejected rather than queued, which
 * covers a value transfer calling back into the ledger mid-operation.
 *
 * Share one instance between components to make their entry points a single
 * protected set.
 */
export class ReentrancyGuard {
  private entered: string | null = null;

  async run<T>(
    operation: string,
    work: () => Promise<Either<LedgerError, T>>
  ): Promise<Either<LedgerError, T>> {
    if (this.entered !== null) {
      return Left(stateConflict(`${operation} rejected: ${this.entered} is still in progress`));
    }
    this.entered = operation;
    try {
      return await work();
    } finally {
      this.entered = null;
    }
  }
}
