import dayjs from 'dayjs';

export interface Debt {
  name: string;
  balance: number;
  apr: number; // percent, e.g. 24.99
  minimumPayment: number;
}

export type PayoffStrategy = 'snowball' | 'avalanche';

export interface DebtPayoff {
  name: string;
  startingBalance: number;
  totalInterest: number;
  monthsToPayoff: number | null;
  payoffDate: string | null;
}

export interface PayoffPlan {
  strategy: PayoffStrategy;
  totalDebt: number;
  totalInterest: number;
  totalPaid: number;
  monthsToPayoff: number | null;
  payoffDate: string | null;
  /** False when the budget cannot clear every debt within the simulation horizon. */
  feasible: boolean;
  debts: DebtPayoff[];
}

export interface StrategyComparison {
  snowball: PayoffPlan;
  avalanche: PayoffPlan;
  recommendation: string;
}

export const MAX_PAYOFF_MONTHS = 600;

const ORDERINGS: Record<PayoffStrategy, (a: Debt, b: Debt) => number> = {
  snowball: (a, b) => a.balance - b.balance,
  avalanche: (a, b) => b.apr - a.apr || a.balance - b.balance,
};

// Amounts are tracked in cents.
interface DebtLedger {
  debt: Debt;
  balance: number;
  minimum: number;
  interest: number;
  paid: number;
  paidOffMonth: number | null;
}

const toCents = (amount: number): number => Math.round(amount * 100);

const fromCents = (cents: number): number => cents / 100;

const sumOf = (ledgers: DebtLedger[], pick: (ledger: DebtLedger) => number): number =>
  ledgers.reduce((total, ledger) => total + pick(ledger), 0);

/**
 * Month-by-month payoff simulation. Each month every open debt accrues interest,
 * receives its minimum payment, and whatever is left of the budget goes to the
 * debts in strategy order.
 */
export class DebtPayoffCalculator {
  constructor(private readonly now: () => Date = () => new Date()) {}

  plan(debts: Debt[], monthlyPayment: number, strategy: PayoffStrategy): PayoffPlan {
    const ledgers: DebtLedger[] = debts
      .filter((debt) => debt.balance > 0)
      .sort(ORDERINGS[strategy])
      .map((debt) => ({
        debt,
        balance: toCents(debt.balance),
        minimum: toCents(debt.minimumPayment),
        interest: 0,
        paid: 0,
        paidOffMonth: null,
      }));
    const budget = toCents(monthlyPayment);
    const startingDebt = sumOf(ledgers, (ledger) => ledger.balance);

    let month = 0;
    while (month < MAX_PAYOFF_MONTHS && ledgers.some((ledger) => ledger.paidOffMonth === null)) {
      month += 1;
      this.payMonth(ledgers, budget, month);
    }

    const feasible = ledgers.every((ledger) => ledger.paidOffMonth !== null);

    return {
      strategy,
      totalDebt: fromCents(startingDebt),
      totalInterest: fromCents(sumOf(ledgers, (ledger) => ledger.interest)),
      totalPaid: fromCents(sumOf(ledgers, (ledger) => ledger.paid)),
      monthsToPayoff: feasible ? month : null,
      payoffDate: feasible ? this.dateAfter(month) : null,
      feasible,
      debts: ledgers.map((ledger) => ({
        name: ledger.debt.name,
        startingBalance: ledger.debt.balance,
        totalInterest: fromCents(ledger.interest),
        monthsToPayoff: ledger.paidOffMonth,
        payoffDate: ledger.paidOffMonth === null ? null : this.dateAfter(ledger.paidOffMonth),
      })),
    };
  }

  compare(debts: Debt[], monthlyPayment: number): StrategyComparison {
    const snowball = this.plan(debts, monthlyPayment, 'snowball');
    const avalanche = this.plan(debts, monthlyPayment, 'avalanche');
    return { snowball, avalanche, recommendation: this.recommend(snowball, avalanche) };
  }

  private payMonth(ledgers: DebtLedger[], budget: number, month: number): void {
    const open = ledgers.filter((ledger) => ledger.paidOffMonth === null);

    for (const ledger of open) {
      const interest = Math.round((ledger.balance * ledger.debt.apr) / 1200);
      ledger.balance += interest;
      ledger.interest += interest;
    }

    let available = budget;
    const pay = (ledger: DebtLedger, amount: number): void => {
      const payment = Math.max(0, Math.min(amount, ledger.balance, available));
      ledger.balance -= payment;
      ledger.paid += payment;
      available -= payment;
    };

    for (const ledger of open) {
      pay(ledger, ledger.minimum);
    }
    for (const ledger of open) {
      pay(ledger, ledger.balance);
    }

    for (const ledger of open) {
      if (ledger.balance === 0) {
        ledger.paidOffMonth = month;
      }
    }
  }

  private recommend(snowball: PayoffPlan, avalanche: PayoffPlan): string {
    const snowballMonths = snowball.monthsToPayoff ?? Number.POSITIVE_INFINITY;
    const avalancheMonths = avalanche.monthsToPayoff ?? Number.POSITIVE_INFINITY;

    if (avalancheMonths < snowballMonths && avalanche.totalInterest < snowball.totalInterest) {
      return 'Avalanche strategy saves more time and money';
    }
    if (snowballMonths < avalancheMonths) {
      return 'Snowball strategy pays off faster (psychological benefit)';
    }
    if (avalanche.totalInterest < snowball.totalInterest) {
      return 'Avalanche strategy saves more money in interest';
    }
    return 'Both strategies are similar - choose based on preference';
  }

  private dateAfter(months: number): string {
    return dayjs(this.now()).add(months, 'month').format('YYYY-MM-DD');
  }
}
