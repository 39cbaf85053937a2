import crypto from 'node:crypto';
import type { AccountBalance } from '../entities/AccountBalance.js';
import type { InvestmentAccount } from '../entities/InvestmentAccount.js';
import type { Paystub } from '../entities/Paystub.js';
import type { TaxDocument } from '../entities/TaxDocument.js';
import type { Transaction } from '../entities/Transaction.js';
import { normalizeCounterparty } from './DescriptionNormalizer.js';

const digest = (parts: Array<string | number | undefined>): string => {
  const serialized = parts.map((part) => (part === undefined ? '' : String(part))).join('|');
  return crypto.createHash('sha256').update(serialized).digest('hex');
};

const accountScope = (record: { bankName: string; accountType: string }): string =>
  `${record.bankName.trim().toLowerCase()}:${record.accountType}`;

// Scoped to the account, not the file: the same purchase on two overlapping statements is one fact.
export const buildTransactionKey = (
  txn: Pick<Transaction, 'date' | 'amount' | 'merchant' | 'description' | 'bankName' | 'accountType'>,
): string =>
  digest(['transaction', accountScope(txn), txn.date, txn.amount.toFixed(2), normalizeCounterparty(txn.merchant, txn.description)]);

export const buildBalanceKey = (
  balance: Pick<AccountBalance, 'statementDate' | 'sourceFile' | 'bankName' | 'accountType'>,
): string => digest(['balance', balance.statementDate, balance.sourceFile, accountScope(balance)]);

export const buildInvestmentAccountKey = (
  account: Pick<InvestmentAccount, 'statementDate' | 'sourceFile' | 'bankName' | 'accountType'>,
): string => digest(['investment', account.statementDate, account.sourceFile, accountScope(account)]);

// One file may hold several paystubs, so the pay date is part of the key.
export const buildPaystubKey = (paystub: Pick<Paystub, 'payDate' | 'sourceFile'>): string =>
  digest(['paystub', paystub.payDate, paystub.sourceFile]);

// Brokerages reuse download names like `1099-INT_2023.pdf`, so the issuer is part of the key.
export const buildTaxDocumentKey = (
  document: Pick<TaxDocument, 'taxYear' | 'formKind' | 'payerName' | 'sourceFile' | 'bankName' | 'accountType'>,
): string =>
  digest([
    'tax',
    accountScope(document),
    document.taxYear,
    document.formKind,
    document.payerName?.trim().toLowerCase(),
    document.sourceFile,
  ]);
