import { z } from 'zod';
import type { BalanceFilterDTO, StoreStatisticsDTO, TransactionFilterDTO } from '../../../application/dto/RecordQueryDTO.js';
import { StoreUnavailableError } from '../../../application/errors/IngestionErrors.js';
import type { RecordKind, StoragePort } from '../../../application/ports/StoragePort.js';
import type { AccountBalance } from '../../../domain/entities/AccountBalance.js';
import { ACCOUNT_TYPES, DOCUMENT_KINDS, type AccountType, type Classification } from '../../../domain/entities/Classification.js';
import type { ImportedFile } from '../../../domain/entities/ImportedFile.js';
import {
  INVESTMENT_TRANSACTION_TYPES,
  type Holding,
  type InvestmentAccount,
  type InvestmentTransaction,
} from '../../../domain/entities/InvestmentAccount.js';
import type { Paystub } from '../../../domain/entities/Paystub.js';
import { TAX_FORM_KINDS, type TaxDocument } from '../../../domain/entities/TaxDocument.js';
import type { Transaction } from '../../../domain/entities/Transaction.js';
import {
  BalanceRowSchema,
  HoldingRowSchema,
  ImportedFileRowSchema,
  InvestmentAccountRowSchema,
  InvestmentTransactionRowSchema,
  PaystubRowSchema,
  SCHEMA,
  TaxDocumentRowSchema,
  TransactionRowSchema,
  type BalanceRow,
  type HoldingRow,
  type ImportedFileRow,
  type InvestmentAccountRow,
  type InvestmentTransactionRow,
  type PaystubRow,
  type TaxDocumentRow,
  type TransactionRow,
} from './schema.js';
import { SqlJsDriver, type SqlParams, type SqlRow } from './SqlJsDriver.js';

type SqlValue = string | number | null;

const RECORD_TABLES: Record<RecordKind, string> = {
  transaction: 'transactions',
  balance: 'account_balances',
  investment_account: 'investment_accounts',
  paystub: 'paystubs',
  tax_document: 'tax_documents',
};

const AmountMapSchema = z.record(z.number());

const oneOf = <T extends string>(values: readonly T[], value: string, fallback: T): T =>
  values.find((candidate) => candidate === value) ?? fallback;

const optional = <T>(value: T | null): T | undefined => (value === null ? undefined : value);

const nullable = <T>(value: T | undefined): T | null => (value === undefined ? null : value);

const accountTypeOf = (value: string): AccountType => oneOf(ACCOUNT_TYPES, value, 'unknown');

const parseAmountMap = (json: string): Record<string, number> => AmountMapSchema.parse(JSON.parse(json));

const CountRowSchema = z.object({ total: z.number() });
const DateRangeRowSchema = z.object({ earliest: z.string().nullable(), latest: z.string().nullable() });

/**
 * SQLite store on sql.js. All calls are synchronous, so a document's unit of work
 * can never interleave with another.
 */
export class SqliteStorageAdapter implements StoragePort {
  private readonly driver: SqlJsDriver;

  constructor(readonly location: string) {
    try {
      this.driver = SqlJsDriver.open(location);
      this.initializeTables();
    } catch (error) {
      throw new StoreUnavailableError(location, error);
    }
  }

  private initializeTables(): void {
    this.driver.exec(SCHEMA);
  }

  runInTransaction<T>(work: () => T): T {
    return this.driver.transaction(work);
  }

  findImportedFile(fileIdentity: string): ImportedFile | null {
    const row = this.driver.get('SELECT * FROM imported_files WHERE file_identity = ?', [fileIdentity]);
    return row ? this.mapImportedFile(ImportedFileRowSchema.parse(row)) : null;
  }

  recordImportedFile(file: ImportedFile): void {
    this.driver.run(
      `INSERT INTO imported_files
         (file_identity, source_path, source_file, document_kind, record_count, unclassified, imported_at)
       VALUES (@fileIdentity, @sourcePath, @sourceFile, @documentKind, @recordCount, @unclassified, @importedAt)
       ON CONFLICT(file_identity) DO UPDATE SET
         source_path = excluded.source_path,
         source_file = excluded.source_file,
         document_kind = excluded.document_kind,
         record_count = excluded.record_count,
         unclassified = excluded.unclassified,
         imported_at = excluded.imported_at`,
      {
        fileIdentity: file.fileIdentity,
        sourcePath: file.sourcePath,
        sourceFile: file.sourceFile,
        documentKind: file.documentKind,
        recordCount: file.recordCount,
        unclassified: file.unclassified ? 1 : 0,
        importedAt: file.importedAt,
      },
    );
  }

  hasRecordKey(kind: RecordKind, dedupeKey: string): boolean {
    const row = this.driver.get(`SELECT 1 AS found FROM ${RECORD_TABLES[kind]} WHERE dedupe_key = ? LIMIT 1`, [dedupeKey]);
    return row !== undefined;
  }

  insertTransaction(transaction: Transaction, dedupeKey: string): number {
    return this.insert(
      `INSERT INTO transactions
         (dedupe_key, date, amount, description, merchant, category, sub_category, category_confidence, is_recurring,
          bank_name, account_type, source_file)
       VALUES (@dedupeKey, @date, @amount, @description, @merchant, @category, @subCategory, @categoryConfidence, @isRecurring,
          @bankName, @accountType, @sourceFile)`,
      {
        dedupeKey,
        date: transaction.date,
        amount: transaction.amount,
        description: transaction.description,
        merchant: nullable(transaction.merchant),
        category: nullable(transaction.category),
        subCategory: nullable(transaction.subCategory),
        categoryConfidence: nullable(transaction.categoryConfidence),
        isRecurring: transaction.isRecurring ? 1 : 0,
        bankName: transaction.bankName,
        accountType: transaction.accountType,
        sourceFile: transaction.sourceFile,
      },
    );
  }

  insertBalance(balance: AccountBalance, dedupeKey: string): number {
    return this.insert(
      `INSERT INTO account_balances
         (dedupe_key, statement_date, balance, credit_limit, available_credit, minimum_payment, payment_due_date, apr,
          bank_name, account_type, source_file)
       VALUES (@dedupeKey, @statementDate, @balance, @creditLimit, @availableCredit, @minimumPayment, @paymentDueDate, @apr,
          @bankName, @accountType, @sourceFile)`,
      {
        dedupeKey,
        statementDate: nullable(balance.statementDate),
        balance: balance.balance,
        creditLimit: nullable(balance.creditLimit),
        availableCredit: nullable(balance.availableCredit),
        minimumPayment: nullable(balance.minimumPayment),
        paymentDueDate: nullable(balance.paymentDueDate),
        apr: nullable(balance.apr),
        bankName: balance.bankName,
        accountType: balance.accountType,
        sourceFile: balance.sourceFile,
      },
    );
  }

  insertInvestmentAccount(account: InvestmentAccount, dedupeKey: string): number {
    return this.insert(
      `INSERT INTO investment_accounts (dedupe_key, portfolio_value, statement_date, bank_name, account_type, source_file)
       VALUES (@dedupeKey, @portfolioValue, @statementDate, @bankName, @accountType, @sourceFile)`,
      {
        dedupeKey,
        portfolioValue: nullable(account.portfolioValue),
        statementDate: nullable(account.statementDate),
        bankName: account.bankName,
        accountType: account.accountType,
        sourceFile: account.sourceFile,
      },
    );
  }

  insertHolding(investmentAccountId: number, holding: Holding): number {
    return this.insert(
      `INSERT INTO holdings (investment_account_id, ticker, name, quantity, value, bank_name, account_type, source_file)
       SELECT @accountId, @ticker, @name, @quantity, @value, bank_name, account_type, source_file
       FROM investment_accounts WHERE id = @accountId`,
      {
        accountId: investmentAccountId,
        ticker: nullable(holding.ticker),
        name: holding.name,
        quantity: holding.quantity,
        value: holding.value,
      },
    );
  }

  insertInvestmentTransaction(investmentAccountId: number, transaction: InvestmentTransaction): number {
    return this.insert(
      `INSERT INTO investment_transactions
         (investment_account_id, date, type, ticker, quantity, price, amount, bank_name, account_type, source_file)
       SELECT @accountId, @date, @type, @ticker, @quantity, @price, @amount, bank_name, account_type, source_file
       FROM investment_accounts WHERE id = @accountId`,
      {
        accountId: investmentAccountId,
        date: nullable(transaction.date),
        type: transaction.type,
        ticker: nullable(transaction.ticker),
        quantity: nullable(transaction.quantity),
        price: nullable(transaction.price),
        amount: transaction.amount,
      },
    );
  }

  insertPaystub(paystub: Paystub, dedupeKey: string): number {
    return this.insert(
      `INSERT INTO paystubs
         (dedupe_key, pay_date, pay_period_start, pay_period_end, employer_name, gross, regular_hours, overtime_hours,
          regular_rate, overtime_rate, bonus, commission, net, deductions, total_deductions, ytd_gross, ytd_net, ytd_taxes,
          bank_name, account_type, source_file)
       VALUES (@dedupeKey, @payDate, @payPeriodStart, @payPeriodEnd, @employerName, @gross, @regularHours, @overtimeHours,
          @regularRate, @overtimeRate, @bonus, @commission, @net, @deductions, @totalDeductions, @ytdGross, @ytdNet, @ytdTaxes,
          @bankName, @accountType, @sourceFile)`,
      {
        dedupeKey,
        payDate: nullable(paystub.payDate),
        payPeriodStart: nullable(paystub.payPeriodStart),
        payPeriodEnd: nullable(paystub.payPeriodEnd),
        employerName: nullable(paystub.employerName),
        gross: nullable(paystub.gross),
        regularHours: nullable(paystub.regularHours),
        overtimeHours: nullable(paystub.overtimeHours),
        regularRate: nullable(paystub.regularRate),
        overtimeRate: nullable(paystub.overtimeRate),
        bonus: nullable(paystub.bonus),
        commission: nullable(paystub.commission),
        net: nullable(paystub.net),
        deductions: JSON.stringify(paystub.deductions),
        totalDeductions: nullable(paystub.totalDeductions),
        ytdGross: nullable(paystub.ytdGross),
        ytdNet: nullable(paystub.ytdNet),
        ytdTaxes: nullable(paystub.ytdTaxes),
        bankName: paystub.bankName,
        accountType: paystub.accountType,
        sourceFile: paystub.sourceFile,
      },
    );
  }

  insertTaxDocument(document: TaxDocument, dedupeKey: string): number {
    return this.insert(
      `INSERT INTO tax_documents (dedupe_key, tax_year, form_kind, payer_name, fields, bank_name, account_type, source_file)
       VALUES (@dedupeKey, @taxYear, @formKind, @payerName, @fields, @bankName, @accountType, @sourceFile)`,
      {
        dedupeKey,
        taxYear: document.taxYear,
        formKind: document.formKind,
        payerName: nullable(document.payerName),
        fields: JSON.stringify(document.fields),
        bankName: document.bankName,
        accountType: document.accountType,
        sourceFile: document.sourceFile,
      },
    );
  }

  loadAccountTransactions(account: Classification): Transaction[] {
    return this.driver
      .all('SELECT * FROM transactions WHERE bank_name = ? AND account_type = ? ORDER BY date, id', [
        account.bankName,
        account.accountType,
      ])
      .map((row) => this.mapTransaction(TransactionRowSchema.parse(row)));
  }

  markTransactionsRecurring(transactionIds: number[]): number {
    let changed = 0;
    for (const id of transactionIds) {
      changed += this.driver.run('UPDATE transactions SET is_recurring = 1 WHERE id = ? AND is_recurring = 0', [id]).changes;
    }
    return changed;
  }

  listTransactions(filter: TransactionFilterDTO): Transaction[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    if (filter.startDate) {
      clauses.push('date >= ?');
      params.push(filter.startDate);
    }
    if (filter.endDate) {
      clauses.push('date <= ?');
      params.push(filter.endDate);
    }
    if (filter.category) {
      clauses.push('category = ?');
      params.push(filter.category);
    }
    if (filter.bankName) {
      clauses.push('bank_name = ?');
      params.push(filter.bankName);
    }
    if (filter.accountType) {
      clauses.push('account_type = ?');
      params.push(filter.accountType);
    }
    if (filter.isRecurring !== undefined) {
      clauses.push('is_recurring = ?');
      params.push(filter.isRecurring ? 1 : 0);
    }

    return this.driver
      .all(`SELECT * FROM transactions${this.where(clauses)} ORDER BY date, id`, params)
      .map((row) => this.mapTransaction(TransactionRowSchema.parse(row)));
  }

  listBalances(filter: BalanceFilterDTO): AccountBalance[] {
    const clauses: string[] = [];
    const params: SqlValue[] = [];

    if (filter.startDate) {
      clauses.push('statement_date >= ?');
      params.push(filter.startDate);
    }
    if (filter.endDate) {
      clauses.push('statement_date <= ?');
      params.push(filter.endDate);
    }
    if (filter.bankName) {
      clauses.push('bank_name = ?');
      params.push(filter.bankName);
    }
    if (filter.accountType) {
      clauses.push('account_type = ?');
      params.push(filter.accountType);
    }

    return this.driver
      .all(`SELECT * FROM account_balances${this.where(clauses)} ORDER BY statement_date, id`, params)
      .map((row) => this.mapBalance(BalanceRowSchema.parse(row)));
  }

  listPaystubs(): Paystub[] {
    return this.driver
      .all('SELECT * FROM paystubs ORDER BY pay_date, id')
      .map((row) => this.mapPaystub(PaystubRowSchema.parse(row)));
  }

  listTaxDocuments(taxYear?: number): TaxDocument[] {
    const rows =
      taxYear === undefined
        ? this.driver.all('SELECT * FROM tax_documents ORDER BY tax_year, form_kind, id')
        : this.driver.all('SELECT * FROM tax_documents WHERE tax_year = ? ORDER BY form_kind, id', [taxYear]);
    return rows.map((row) => this.mapTaxDocument(TaxDocumentRowSchema.parse(row)));
  }

  listInvestmentAccounts(): InvestmentAccount[] {
    const accounts = this.parseRows(
      this.driver.all('SELECT * FROM investment_accounts ORDER BY statement_date, id'),
      InvestmentAccountRowSchema,
    );
    const holdings = this.parseRows(this.driver.all('SELECT * FROM holdings ORDER BY id'), HoldingRowSchema);
    const transactions = this.parseRows(
      this.driver.all('SELECT * FROM investment_transactions ORDER BY date, id'),
      InvestmentTransactionRowSchema,
    );

    return accounts.map((row) => ({
      id: row.id,
      bankName: row.bank_name,
      accountType: accountTypeOf(row.account_type),
      portfolioValue: optional(row.portfolio_value),
      statementDate: optional(row.statement_date),
      sourceFile: row.source_file,
      holdings: holdings.filter((holding) => holding.investment_account_id === row.id).map((holding) => this.mapHolding(holding)),
      transactions: transactions
        .filter((txn) => txn.investment_account_id === row.id)
        .map((txn) => this.mapInvestmentTransaction(txn)),
    }));
  }

  listImportedFiles(): ImportedFile[] {
    return this.driver
      .all('SELECT * FROM imported_files ORDER BY imported_at, file_identity')
      .map((row) => this.mapImportedFile(ImportedFileRowSchema.parse(row)));
  }

  getStatistics(): StoreStatisticsDTO {
    const count = (sql: string): number => CountRowSchema.parse(this.driver.get(sql)).total;
    const range = DateRangeRowSchema.parse(
      this.driver.get('SELECT MIN(date) AS earliest, MAX(date) AS latest FROM transactions'),
    );

    return {
      importedFiles: count('SELECT COUNT(*) AS total FROM imported_files'),
      unclassifiedFiles: count('SELECT COUNT(*) AS total FROM imported_files WHERE unclassified = 1'),
      transactions: count('SELECT COUNT(*) AS total FROM transactions'),
      recurringTransactions: count('SELECT COUNT(*) AS total FROM transactions WHERE is_recurring = 1'),
      balances: count('SELECT COUNT(*) AS total FROM account_balances'),
      investmentAccounts: count('SELECT COUNT(*) AS total FROM investment_accounts'),
      holdings: count('SELECT COUNT(*) AS total FROM holdings'),
      investmentTransactions: count('SELECT COUNT(*) AS total FROM investment_transactions'),
      paystubs: count('SELECT COUNT(*) AS total FROM paystubs'),
      taxDocuments: count('SELECT COUNT(*) AS total FROM tax_documents'),
      earliestTransactionDate: range.earliest,
      latestTransactionDate: range.latest,
    };
  }

  close(): void {
    this.driver.close();
  }

  private insert(sql: string, params: SqlParams): number {
    const result = this.driver.run(sql, params);
    if (result.changes === 0) {
      throw new Error('Insert affected no rows');
    }
    return result.lastInsertRowid;
  }

  private parseRows<T>(rows: SqlRow[], schema: z.ZodType<T>): T[] {
    return rows.map((row) => schema.parse(row));
  }

  private where(clauses: string[]): string {
    return clauses.length > 0 ? ` WHERE ${clauses.join(' AND ')}` : '';
  }

  private mapImportedFile(row: ImportedFileRow): ImportedFile {
    return {
      fileIdentity: row.file_identity,
      sourcePath: row.source_path,
      sourceFile: row.source_file,
      documentKind: oneOf(DOCUMENT_KINDS, row.document_kind, 'unclassified'),
      recordCount: row.record_count,
      unclassified: row.unclassified === 1,
      importedAt: row.imported_at,
    };
  }

  private mapTransaction(row: TransactionRow): Transaction {
    return {
      id: row.id,
      date: row.date,
      amount: row.amount,
      description: row.description,
      merchant: optional(row.merchant),
      category: optional(row.category),
      subCategory: optional(row.sub_category),
      categoryConfidence: optional(row.category_confidence),
      bankName: row.bank_name,
      accountType: accountTypeOf(row.account_type),
      sourceFile: row.source_file,
      isRecurring: row.is_recurring === 1,
    };
  }

  private mapBalance(row: BalanceRow): AccountBalance {
    return {
      id: row.id,
      statementDate: optional(row.statement_date),
      balance: row.balance,
      creditLimit: optional(row.credit_limit),
      availableCredit: optional(row.available_credit),
      minimumPayment: optional(row.minimum_payment),
      paymentDueDate: optional(row.payment_due_date),
      apr: optional(row.apr),
      bankName: row.bank_name,
      accountType: accountTypeOf(row.account_type),
      sourceFile: row.source_file,
    };
  }

  private mapHolding(row: HoldingRow): Holding {
    return {
      ticker: optional(row.ticker),
      name: row.name,
      quantity: row.quantity,
      value: row.value,
    };
  }

  private mapInvestmentTransaction(row: InvestmentTransactionRow): InvestmentTransaction {
    return {
      date: optional(row.date),
      type: oneOf(INVESTMENT_TRANSACTION_TYPES, row.type, 'buy'),
      ticker: optional(row.ticker),
      quantity: optional(row.quantity),
      price: optional(row.price),
      amount: row.amount,
    };
  }

  private mapPaystub(row: PaystubRow): Paystub {
    return {
      id: row.id,
      payDate: optional(row.pay_date),
      payPeriodStart: optional(row.pay_period_start),
      payPeriodEnd: optional(row.pay_period_end),
      employerName: optional(row.employer_name),
      gross: optional(row.gross),
      regularHours: optional(row.regular_hours),
      overtimeHours: optional(row.overtime_hours),
      regularRate: optional(row.regular_rate),
      overtimeRate: optional(row.overtime_rate),
      bonus: optional(row.bonus),
      commission: optional(row.commission),
      net: optional(row.net),
      deductions: parseAmountMap(row.deductions),
      totalDeductions: optional(row.total_deductions),
      ytdGross: optional(row.ytd_gross),
      ytdNet: optional(row.ytd_net),
      ytdTaxes: optional(row.ytd_taxes),
      bankName: row.bank_name,
      accountType: accountTypeOf(row.account_type),
      sourceFile: row.source_file,
    };
  }

  private mapTaxDocument(row: TaxDocumentRow): TaxDocument {
    return {
      id: row.id,
      taxYear: row.tax_year,
      formKind: oneOf(TAX_FORM_KINDS, row.form_kind, '1099-INT'),
      payerName: optional(row.payer_name),
      fields: parseAmountMap(row.fields),
      bankName: row.bank_name,
      accountType: accountTypeOf(row.account_type),
      sourceFile: row.source_file,
    };
  }
}
