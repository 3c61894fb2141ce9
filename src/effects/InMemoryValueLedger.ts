import {ParticipantId} from '../domain';
import {ValueTransferPort} from '../pure/effects';

/**
 * A single fungible-value system kept in process memory. Stands in for the
 * external token service: the ledger only ever sees it through
 * ValueTransferPort handles obtained from portFor().
 */
export class InMemoryValueLedger {
  private readonly balances = new Map<ParticipantId, bigint>();

  constructor(readonly name: string) {}

  mint(to: ParticipantId, amount: bigint): void {
    if (amount <= 0n) {
      throw new Error(`Cannot mint a non-positive amount of ${this.name}: ${amount}`);
    }
    this.balances.set(to, this.balanceOf(to) + amount);
  }

  balanceOf(id: ParticipantId): bigint {
    return this.balances.get(id) ?? 0n;
  }

  totalSupply(): bigint {
    return [...this.balances.values()].reduce((sum, balance) => sum + balance, 0n);
  }

  portFor(holder: ParticipantId): ValueTransferPort {
    return {
      holder,
      transferFrom: async (from, to, amount) => this.move(from, to, amount),
      transfer: async (to, amount) => this.move(holder, to, amount),
      balanceOf: async id => this.balanceOf(id),
    };
  }

  private move(from: ParticipantId, to: ParticipantId, amount: bigint): boolean {
    const available = this.balanceOf(from);
    if (amount < 0n || available < amount) {
      return false;
    }
    this.balances.set(from, available - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
    return true;
  }
}
