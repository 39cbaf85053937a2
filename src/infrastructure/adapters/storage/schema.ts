import { z } from 'zod';

export const SCHEMA = `
  CREATE TABLE IF NOT EXISTS imported_files (
    file_identity TEXT PRIMARY KEY,
    source_path TEXT NOT NULL,
    source_file TEXT NOT NULL,
    document_kind TEXT NOT NULL,
    record_count INTEGER NOT NULL DEFAULT 0,
    unclassified INTEGER NOT NULL DEFAULT 0,
    imported_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedupe_key TEXT NOT NULL,
    date TEXT NOT NULL,
    amount REAL NOT NULL,
    description TEXT NOT NULL,
    merchant TEXT,
    category TEXT,
    sub_category TEXT,
    category_confidence REAL,
    is_recurring INTEGER NOT NULL DEFAULT 0,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS account_balances (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedupe_key TEXT NOT NULL,
    statement_date TEXT,
    balance REAL NOT NULL,
    credit_limit REAL,
    available_credit REAL,
    minimum_payment REAL,
    payment_due_date TEXT,
    apr REAL,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS investment_accounts (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedupe_key TEXT NOT NULL,
    portfolio_value REAL,
    statement_date TEXT,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS holdings (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    investment_account_id INTEGER NOT NULL REFERENCES investment_accounts(id) ON DELETE CASCADE,
    ticker TEXT,
    name TEXT NOT NULL,
    quantity REAL NOT NULL,
    value REAL NOT NULL,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS investment_transactions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    investment_account_id INTEGER NOT NULL REFERENCES investment_accounts(id) ON DELETE CASCADE,
    date TEXT,
    type TEXT NOT NULL,
    ticker TEXT,
    quantity REAL,
    price REAL,
    amount REAL NOT NULL,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS paystubs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedupe_key TEXT NOT NULL,
    pay_date TEXT,
    pay_period_start TEXT,
    pay_period_end TEXT,
    employer_name TEXT,
    gross REAL,
    regular_hours REAL,
    overtime_hours REAL,
    regular_rate REAL,
    overtime_rate REAL,
    bonus REAL,
    commission REAL,
    net REAL,
    deductions TEXT NOT NULL DEFAULT '{}',
    total_deductions REAL,
    ytd_gross REAL,
    ytd_net REAL,
    ytd_taxes REAL,
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS tax_documents (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    dedupe_key TEXT NOT NULL,
    tax_year INTEGER NOT NULL,
    form_kind TEXT NOT NULL,
    payer_name TEXT,
    fields TEXT NOT NULL DEFAULT '{}',
    bank_name TEXT NOT NULL,
    account_type TEXT NOT NULL,
    source_file TEXT NOT NULL
  );

  CREATE UNIQUE INDEX IF NOT EXISTS idx_transactions_dedupe ON transactions(dedupe_key);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_balances_dedupe ON account_balances(dedupe_key);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_investment_accounts_dedupe ON investment_accounts(dedupe_key);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_paystubs_dedupe ON paystubs(dedupe_key);
  CREATE UNIQUE INDEX IF NOT EXISTS idx_tax_documents_dedupe ON tax_documents(dedupe_key);

  CREATE INDEX IF NOT EXISTS idx_transactions_date ON transactions(date);
  CREATE INDEX IF NOT EXISTS idx_transactions_account ON transactions(bank_name, account_type);
  CREATE INDEX IF NOT EXISTS idx_balances_account ON account_balances(bank_name, account_type, statement_date);
  CREATE INDEX IF NOT EXISTS idx_holdings_account ON holdings(investment_account_id);
  CREATE INDEX IF NOT EXISTS idx_investment_transactions_account ON investment_transactions(investment_account_id);
`;

const text = z.string();
const nullableText = z.string().nullable();
const real = z.number();
const nullableReal = z.number().nullable();

export const ImportedFileRowSchema = z.object({
  file_identity: text,
  source_path: text,
  source_file: text,
  document_kind: text,
  record_count: real,
  unclassified: real,
  imported_at: text,
});

const AccountColumns = z.object({
  id: real,
  bank_name: text,
  account_type: text,
  source_file: text,
});

export const TransactionRowSchema = AccountColumns.extend({
  date: text,
  amount: real,
  description: text,
  merchant: nullableText,
  category: nullableText,
  sub_category: nullableText,
  category_confidence: nullableReal,
  is_recurring: real,
});

export const BalanceRowSchema = AccountColumns.extend({
  statement_date: nullableText,
  balance: real,
  credit_limit: nullableReal,
  available_credit: nullableReal,
  minimum_payment: nullableReal,
  payment_due_date: nullableText,
  apr: nullableReal,
});

export const InvestmentAccountRowSchema = AccountColumns.extend({
  portfolio_value: nullableReal,
  statement_date: nullableText,
});

export const HoldingRowSchema = z.object({
  investment_account_id: real,
  ticker: nullableText,
  name: text,
  quantity: real,
  value: real,
});

export const InvestmentTransactionRowSchema = z.object({
  investment_account_id: real,
  date: nullableText,
  type: text,
  ticker: nullableText,
  quantity: nullableReal,
  price: nullableReal,
  amount: real,
});

export const PaystubRowSchema = AccountColumns.extend({
  pay_date: nullableText,
  pay_period_start: nullableText,
  pay_period_end: nullableText,
  employer_name: nullableText,
  gross: nullableReal,
  regular_hours: nullableReal,
  overtime_hours: nullableReal,
  regular_rate: nullableReal,
  overtime_rate: nullableReal,
  bonus: nullableReal,
  commission: nullableReal,
  net: nullableReal,
  deductions: text,
  total_deductions: nullableReal,
  ytd_gross: nullableReal,
  ytd_net: nullableReal,
  ytd_taxes: nullableReal,
});

export const TaxDocumentRowSchema = AccountColumns.extend({
  tax_year: real,
  form_kind: text,
  payer_name: nullableText,
  fields: text,
});

export type ImportedFileRow = z.infer<typeof ImportedFileRowSchema>;
export type TransactionRow = z.infer<typeof TransactionRowSchema>;
export type BalanceRow = z.infer<typeof BalanceRowSchema>;
export type InvestmentAccountRow = z.infer<typeof InvestmentAccountRowSchema>;
export type HoldingRow = z.infer<typeof HoldingRowSchema>;
export type InvestmentTransactionRow = z.infer<typeof InvestmentTransactionRowSchema>;
export type PaystubRow = z.infer<typeof PaystubRowSchema>;
export type TaxDocumentRow = z.infer<typeof TaxDocumentRowSchema>;
