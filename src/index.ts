#!/usr/bin/env node
import { parseArgs } from 'node:util';
import type { BatchSummary } from './application/services/BatchImportService.js';
import { describeError, StoreUnavailableError } from './application/errors/IngestionErrors.js';
import { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
import { loadConfig, parseDateRange, type AppConfig } from './infrastructure/config/Config.js';
import { createLogger } from './infrastructure/logging/Logger.js';

const usage = 'Usage: ledger-ingest <input-dir> [--export-db path] [--force-reimport] [--date-range START:END]';

const parseCommandLine = (argv: string[]): { inputDir: string; config: AppConfig } => {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: {
      'export-db': { type: 'string' },
      'force-reimport': { type: 'boolean', default: false },
      'date-range': { type: 'string' },
    },
  });

  const [inputDir] = positionals;
  if (!inputDir || positionals.length > 1) {
    throw new Error(usage);
  }

  const base = loadConfig();
  return {
    inputDir,
    config: {
      ...base,
      store: { path: values['export-db'] ?? base.store.path },
      ingestion: {
        forceReimport: values['force-reimport'] || base.ingestion.forceReimport,
        dateRange: values['date-range'] ? parseDateRange(values['date-range']) : base.ingestion.dateRange,
      },
    },
  };
};

const formatSummary = (summary: BatchSummary): string => {
  const lines = [
    `Processed ${summary.processed} file(s): ${summary.imported} imported, ${summary.skipped} skipped, ${summary.failed} failed, ${summary.unclassified} unclassified`,
    `Inserted: ${summary.inserted.transactions} transactions, ${summary.inserted.balances} balances, ` +
      `${summary.inserted.investmentAccounts} investment accounts, ${summary.inserted.paystubs} paystubs, ` +
      `${summary.inserted.taxDocuments} tax documents`,
  ];

  for (const outcome of summary.outcomes.filter((entry) => entry.status === 'failed')) {
    lines.push(`  FAILED ${outcome.sourceFile}: ${outcome.error ?? 'unknown error'}`);
  }

  return `${lines.join('\n')}\n`;
};

const main = async (): Promise<number> => {
  let parsed: { inputDir: string; config: AppConfig };
  try {
    parsed = parseCommandLine(process.argv.slice(2));
  } catch (error) {
    process.stderr.write(`${describeError(error)}\n`);
    return 2;
  }

  const logger = createLogger(parsed.config.logging.level);
  let container: AppContainer;
  try {
    container = new AppContainer({ config: parsed.config, logger });
  } catch (error) {
    if (error instanceof StoreUnavailableError) {
      logger.error('Cannot open the store', { path: parsed.config.store.path, error: error.message });
      return 1;
    }
    throw error;
  }

  try {
    const summary = await container.batchImportService.importDirectory(parsed.inputDir);
    process.stdout.write(formatSummary(summary));
    return summary.failed > 0 ? 1 : 0;
  } finally {
    container.close();
  }
};

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    process.stderr.write(`Batch import aborted: ${describeError(error)}\n`);
    process.exitCode = 1;
  });
