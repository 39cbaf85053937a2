import dayjs from 'dayjs';
import type {
  RecurringCadence,
  RecurringDetectorPort,
  RecurringSeries,
} from '../../../application/ports/RecurringDetectorPort.js';
import { roundCurrency } from '../../../domain/services/AmountParser.js';
import { normalizeCounterparty } from '../../../domain/services/DescriptionNormalizer.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';

type StoredTransaction = Transaction & { id: number };

interface CadenceWindow {
  cadence: RecurringCadence;
  minDays: number;
  maxDays: number;
}

const cadenceWindows: CadenceWindow[] = [
  { cadence: 'weekly', minDays: 6, maxDays: 8 },
  { cadence: 'biweekly', minDays: 13, maxDays: 15 },
  { cadence: 'monthly', minDays: 27, maxDays: 33 },
  { cadence: 'quarterly', minDays: 85, maxDays: 95 },
  { cadence: 'yearly', minDays: 355, maxDays: 375 },
];

export interface RecurringDetectorOptions {
  minOccurrences?: number;
  amountTolerance?: number;
  intervalTolerance?: number;
}

const mean = (values: number[]): number => values.reduce((sum, value) => sum + value, 0) / values.length;

/**
 * Flags expense series that repeat at a steady cadence with a steady amount.
 * Series are grouped per counterparty; callers pass one account's transactions at a time.
 */
export class CadenceRecurringDetector implements RecurringDetectorPort {
  private readonly minOccurrences: number;
  private readonly amountTolerance: number;
  private readonly intervalTolerance: number;

  constructor(options: RecurringDetectorOptions = {}) {
    this.minOccurrences = options.minOccurrences ?? 3;
    this.amountTolerance = options.amountTolerance ?? 0.1;
    this.intervalTolerance = options.intervalTolerance ?? 0.2;
  }

  detect(transactions: Transaction[]): RecurringSeries[] {
    const series: RecurringSeries[] = [];

    for (const [merchant, group] of this.groupByMerchant(transactions)) {
      const pattern = this.analyzeRecurringPattern(merchant, group);
      if (pattern) {
        series.push(pattern);
      }
    }

    return series;
  }

  private groupByMerchant(transactions: Transaction[]): Map<string, StoredTransaction[]> {
    const groups = new Map<string, StoredTransaction[]>();

    for (const txn of transactions) {
      // Only persisted expenses can be flagged.
      if (txn.id === undefined || txn.amount >= 0) {
        continue;
      }
      const merchant = normalizeCounterparty(txn.merchant, txn.description);
      if (!merchant) {
        continue;
      }
      const group = groups.get(merchant) ?? [];
      group.push({ ...txn, id: txn.id });
      groups.set(merchant, group);
    }

    return groups;
  }

  private analyzeRecurringPattern(merchant: string, transactions: StoredTransaction[]): RecurringSeries | null {
    if (transactions.length < this.minOccurrences) {
      return null;
    }

    const sorted = [...transactions].sort((a, b) => a.date.localeCompare(b.date) || a.id - b.id);
    const intervals: number[] = [];
    for (let index = 1; index < sorted.length; index += 1) {
      intervals.push(dayjs(sorted[index].date).diff(dayjs(sorted[index - 1].date), 'day'));
    }

    const averageInterval = mean(intervals);
    const cadence = this.detectCadence(averageInterval);
    if (!cadence || !this.isConsistentInterval(intervals, averageInterval) || !this.isConsistentAmount(sorted)) {
      return null;
    }

    return {
      merchant,
      cadence,
      averageAmount: roundCurrency(mean(sorted.map((txn) => Math.abs(txn.amount)))),
      averageIntervalDays: Math.round(averageInterval * 10) / 10,
      transactionIds: sorted.map((txn) => txn.id),
    };
  }

  private detectCadence(averageInterval: number): RecurringCadence | null {
    const window = cadenceWindows.find(
      (candidate) => averageInterval >= candidate.minDays && averageInterval <= candidate.maxDays,
    );
    return window ? window.cadence : null;
  }

  private isConsistentAmount(transactions: StoredTransaction[]): boolean {
    const amounts = transactions.map((txn) => Math.abs(txn.amount));
    const averageAmount = mean(amounts);
    return amounts.every((amount) => Math.abs(amount - averageAmount) / averageAmount <= this.amountTolerance);
  }

  private isConsistentInterval(intervals: number[], averageInterval: number): boolean {
    // At least 80% of gaps must sit within tolerance of the average.
    const consistent = intervals.filter(
      (interval) => Math.abs(interval - averageInterval) / averageInterval <= this.intervalTolerance,
    );
    return consistent.length / intervals.length >= 0.8;
  }
}
