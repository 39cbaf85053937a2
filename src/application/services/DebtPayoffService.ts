import type { Debt, DebtPayoffCalculator, StrategyComparison } from '../../domain/services/DebtPayoffCalculator.js';
import type { RecordQueryService } from './RecordQueryService.js';

/** Plans credit card payoff from the newest statement balance of each card. */
export class DebtPayoffService {
  constructor(
    private readonly records: RecordQueryService,
    private readonly calculator: DebtPayoffCalculator,
  ) {}

  listDebts(): Debt[] {
    return this.records
      .listLatestBalances()
      .filter((balance) => balance.accountType === 'credit_card' && balance.balance > 0)
      .map((balance) => ({
        name: balance.bankName,
        balance: balance.balance,
        apr: balance.apr ?? 0,
        minimumPayment: balance.minimumPayment ?? 0,
      }));
  }

  compareStrategies(monthlyPayment: number): StrategyComparison {
    return this.calculator.compare(this.listDebts(), monthlyPayment);
  }
}
