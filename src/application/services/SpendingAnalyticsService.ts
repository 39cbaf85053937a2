import type { Transaction } from '../../domain/entities/Transaction.js';
import type {
  CategorySpendingDTO,
  DateRangeDTO,
  MerchantSpendingDTO,
  MonthlySummaryDTO,
  SpendingTrendDTO,
  SpendingTrendsQueryDTO,
} from '../dto/AnalyticsDTO.js';
import type { StoragePort } from '../ports/StoragePort.js';

const roundCurrency = (value: number): number => Math.round(value * 100) / 100;

const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

const spent = (transactions: Transaction[]): number => sum(transactions.map((txn) => -txn.amount));

const groupBy = (transactions: Transaction[], keyOf: (txn: Transaction) => string): Map<string, Transaction[]> => {
  const groups = new Map<string, Transaction[]>();
  for (const txn of transactions) {
    const key = keyOf(txn);
    const group = groups.get(key);
    if (group) {
      group.push(txn);
    } else {
      groups.set(key, [txn]);
    }
  }
  return groups;
};

const monthOf = (txn: Transaction): string => txn.date.slice(0, 7);

const byMonth = ([a]: [string, Transaction[]], [b]: [string, Transaction[]]): number => a.localeCompare(b);

/**
 * Spending reports over stored transactions. Negative amounts are spending,
 * positive amounts income.
 */
export class SpendingAnalyticsService {
  constructor(private readonly storage: StoragePort) {}

  monthlySummary(year?: number): MonthlySummaryDTO[] {
    const range = year === undefined ? {} : { startDate: `${year}-01-01`, endDate: `${year}-12-31` };

    return [...groupBy(this.storage.listTransactions(range), monthOf).entries()].sort(byMonth).map(([month, transactions]) => {
      const income = sum(transactions.filter((txn) => txn.amount > 0).map((txn) => txn.amount));
      const spending = spent(transactions.filter((txn) => txn.amount < 0));
      return {
        month,
        transactionCount: transactions.length,
        income: roundCurrency(income),
        spending: roundCurrency(spending),
        net: roundCurrency(income - spending),
        averageTransaction: roundCurrency((income - spending) / transactions.length),
      };
    });
  }

  categoryBreakdown(range: DateRangeDTO = {}): CategorySpendingDTO[] {
    const groups = groupBy(this.expenses(range), (txn) => txn.category ?? 'Uncategorized');
    const totalSpending = sum([...groups.values()].map(spent));

    return [...groups.entries()]
      .map(([category, transactions]) => {
        const categorySpending = spent(transactions);
        return {
          category,
          transactionCount: transactions.length,
          totalSpending: roundCurrency(categorySpending),
          averageTransaction: roundCurrency(categorySpending / transactions.length),
          percentage: totalSpending > 0 ? roundCurrency((categorySpending / totalSpending) * 100) : 0,
        };
      })
      .sort((a, b) => b.totalSpending - a.totalSpending || a.category.localeCompare(b.category));
  }

  topMerchants(limit = 20, range: DateRangeDTO = {}): MerchantSpendingDTO[] {
    return [...groupBy(this.expenses(range), (txn) => txn.merchant ?? 'Unknown').entries()]
      .map(([merchant, transactions]) => {
        const merchantSpending = spent(transactions);
        const dates = transactions.map((txn) => txn.date).sort();
        return {
          merchant,
          transactionCount: transactions.length,
          totalSpending: roundCurrency(merchantSpending),
          averageTransaction: roundCurrency(merchantSpending / transactions.length),
          firstTransaction: dates[0] ?? '',
          lastTransaction: dates[dates.length - 1] ?? '',
        };
      })
      .sort((a, b) => b.totalSpending - a.totalSpending || a.merchant.localeCompare(b.merchant))
      .slice(0, limit);
  }

  // The first month in the window has no baseline, so its change is null.
  spendingTrends(query: Partial<SpendingTrendsQueryDTO> = {}): SpendingTrendDTO[] {
    const months = query.months ?? 12;
    const monthly = [...groupBy(this.expenses({}, query.category), monthOf).entries()]
      .sort(byMonth)
      .slice(-months)
      .map(([month, transactions]) => ({ month, spending: roundCurrency(spent(transactions)) }));

    return monthly.map((current, index): SpendingTrendDTO => {
      const previous = index > 0 ? monthly[index - 1] : undefined;
      if (!previous || previous.spending <= 0) {
        return { ...current, change: null };
      }
      const amount = current.spending - previous.spending;
      return {
        ...current,
        change: {
          amount: roundCurrency(amount),
          percent: roundCurrency((amount / previous.spending) * 100),
          direction: amount > 0 ? 'up' : amount < 0 ? 'down' : 'stable',
        },
      };
    });
  }

  private expenses(range: DateRangeDTO, category?: string): Transaction[] {
    return this.storage.listTransactions({ ...range, category }).filter((txn) => txn.amount < 0);
  }
}
