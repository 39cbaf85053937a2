import type { Logger } from 'winston';
import type { AccountClassifierPort } from '../../application/ports/AccountClassifierPort.js';
import type { CategorizerPort } from '../../application/ports/CategorizerPort.js';
import type { ExtractorSet } from '../../application/ports/DocumentExtractorPort.js';
import type { DocumentReaderPort } from '../../application/ports/DocumentReaderPort.js';
import type { RecurringDetectorPort } from '../../application/ports/RecurringDetectorPort.js';
import type { StoragePort } from '../../application/ports/StoragePort.js';
import { BatchImportService } from '../../application/services/BatchImportService.js';
import { DebtPayoffService } from '../../application/services/DebtPayoffService.js';
import { DocumentRouter } from '../../application/services/DocumentRouter.js';
import { IngestionService } from '../../application/services/IngestionService.js';
import { PersistenceCoordinator } from '../../application/services/PersistenceCoordinator.js';
import { RecordQueryService } from '../../application/services/RecordQueryService.js';
import { SpendingAnalyticsService } from '../../application/services/SpendingAnalyticsService.js';
import { DebtPayoffCalculator } from '../../domain/services/DebtPayoffCalculator.js';
import { RuleBasedCategorizer } from '../adapters/categorizer/RuleBasedCategorizer.js';
import { RuleBasedAccountClassifier } from '../adapters/classifier/RuleBasedAccountClassifier.js';
import { BalanceExtractor } from '../adapters/extractors/BalanceExtractor.js';
import { InvestmentStatementExtractor } from '../adapters/extractors/InvestmentStatementExtractor.js';
import { PaystubExtractor } from '../adapters/extractors/PaystubExtractor.js';
import { TaxFormExtractor } from '../adapters/extractors/TaxFormExtractor.js';
import { TransactionExtractor } from '../adapters/extractors/TransactionExtractor.js';
import { FileSystemDocumentReader } from '../adapters/reader/FileSystemDocumentReader.js';
import { CadenceRecurringDetector } from '../adapters/recurring/CadenceRecurringDetector.js';
import { SqliteStorageAdapter } from '../adapters/storage/SqliteStorageAdapter.js';
import { loadConfig, type AppConfig } from '../config/Config.js';
import { createLogger } from '../logging/Logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: Logger;
  storage?: StoragePort;
  classifier?: AccountClassifierPort;
  categorizer?: CategorizerPort;
  recurringDetector?: RecurringDetectorPort;
  extractors?: Partial<ExtractorSet>;
  reader?: DocumentReaderPort;
  now?: () => Date;
}

export const createExtractorSet = (overrides: Partial<ExtractorSet> = {}): ExtractorSet => ({
  tax: overrides.tax ?? new TaxFormExtractor(),
  paystub: overrides.paystub ?? new PaystubExtractor(),
  investment: overrides.investment ?? new InvestmentStatementExtractor(),
  balance: overrides.balance ?? new BalanceExtractor(),
  transaction: overrides.transaction ?? new TransactionExtractor(),
});

/** Wires one store handle through every stage. Call `close()` when the batch or server ends. */
export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;

  readonly storage: StoragePort;
  readonly classifier: AccountClassifierPort;
  readonly categorizer: CategorizerPort;
  readonly recurringDetector: RecurringDetectorPort;
  readonly reader: DocumentReaderPort;
  readonly router: DocumentRouter;
  readonly coordinator: PersistenceCoordinator;
  readonly ingestionService: IngestionService;
  readonly batchImportService: BatchImportService;
  readonly recordQueryService: RecordQueryService;
  readonly spendingAnalyticsService: SpendingAnalyticsService;
  readonly debtPayoffService: DebtPayoffService;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? createLogger(this.config.logging.level);

    this.storage = overrides.storage ?? new SqliteStorageAdapter(this.config.store.path);
    this.classifier = overrides.classifier ?? new RuleBasedAccountClassifier();
    this.categorizer = overrides.categorizer ?? new RuleBasedCategorizer();
    this.recurringDetector = overrides.recurringDetector ?? new CadenceRecurringDetector();
    this.reader = overrides.reader ?? new FileSystemDocumentReader();

    this.router = new DocumentRouter(createExtractorSet(overrides.extractors), this.logger, {
      dateRange: this.config.ingestion.dateRange,
    });
    this.coordinator = new PersistenceCoordinator(this.storage, this.recurringDetector, this.logger);
    this.ingestionService = new IngestionService(
      this.classifier,
      this.router,
      this.categorizer,
      this.coordinator,
      this.storage,
      this.logger,
      { forceReimport: this.config.ingestion.forceReimport, now: overrides.now },
    );
    this.batchImportService = new BatchImportService(this.reader, this.ingestionService, this.logger);
    this.recordQueryService = new RecordQueryService(this.storage);
    this.spendingAnalyticsService = new SpendingAnalyticsService(this.storage);
    this.debtPayoffService = new DebtPayoffService(this.recordQueryService, new DebtPayoffCalculator(overrides.now));
  }

  close(): void {
    this.storage.close();
  }
}
