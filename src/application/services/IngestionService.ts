import type { Logger } from 'winston';
import { UNKNOWN_BANK, type Classification } from '../../domain/entities/Classification.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { buildTransactionKey } from '../../domain/services/RecordKeys.js';
import { DocumentInputSchema, type DocumentInputDTO, type TabularRowDTO } from '../dto/DocumentInputDTO.js';
import { emptyTally, sumTally, type ImportOutcomeDTO } from '../dto/ImportOutcomeDTO.js';
import {
  describeError,
  EnrichmentFailure,
  ExtractionFailure,
  PersistenceFailure,
  RecognitionFailure,
} from '../errors/IngestionErrors.js';
import type { AccountClassifierPort } from '../ports/AccountClassifierPort.js';
import type { CategorizerPort } from '../ports/CategorizerPort.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { countRoutedRecords, type DocumentRouter, type RoutedDocument } from './DocumentRouter.js';
import type { CommitResult, PersistenceCoordinator } from './PersistenceCoordinator.js';

export interface IngestionServiceOptions {
  forceReimport?: boolean;
  now?: () => Date;
}

export interface IngestDocumentOptions {
  forceReimport?: boolean;
}

type Enrichment = ImportOutcomeDTO['enrichment'];

const rowsToText = (rows: TabularRowDTO[]): string =>
  rows.map((row) => Object.values(row).filter((value) => value !== null).join(' ')).join('\n');

export class IngestionService {
  constructor(
    private readonly classifier: AccountClassifierPort,
    private readonly router: DocumentRouter,
    private readonly categorizer: CategorizerPort,
    private readonly coordinator: PersistenceCoordinator,
    private readonly storage: StoragePort,
    private readonly logger: Logger,
    private readonly options: IngestionServiceOptions = {},
  ) {}

  /**
   * Runs one document through classify, route, enrich and commit. Never throws: every
   * per-document failure is reported on the returned outcome.
   */
  ingestDocument(input: DocumentInputDTO, options: IngestDocumentOptions = {}): ImportOutcomeDTO {
    const validated = DocumentInputSchema.safeParse(input);
    if (!validated.success) {
      const message = validated.error.issues.map((issue) => issue.message).join('; ');
      this.logger.error('Rejected document input', { fileName: input.fileName, error: message });
      return this.failed(input, message);
    }

    const document = validated.data;
    const forceReimport = options.forceReimport ?? this.options.forceReimport ?? false;

    const existing = this.storage.findImportedFile(document.fileIdentity);
    if (existing && !forceReimport) {
      this.logger.info('Skipping previously imported file', {
        sourceFile: document.fileName,
        fileIdentity: document.fileIdentity,
        importedAt: existing.importedAt,
      });
      return {
        ...this.outcome(document, 'skipped'),
        documentKind: existing.documentKind,
        unclassified: existing.unclassified,
      };
    }

    try {
      return this.process(document);
    } catch (error) {
      this.logger.error('Document processing failed', { sourceFile: document.fileName, error });
      return this.failed(document, describeError(error));
    }
  }

  private process(document: DocumentInputDTO): ImportOutcomeDTO {
    const sourceFile = document.fileName;
    const text = document.text ?? rowsToText(document.rows ?? []);

    const classification = this.classifier.classify(sourceFile, text);
    this.reportRecognition(sourceFile, classification);

    let routed = this.router.route({ text, rows: document.rows, sourceFile }, classification);
    let enrichment: Enrichment = 'not_run';

    if (routed.kind === 'statement' && routed.transactions.length > 0) {
      const categorized = this.categorize(routed.transactions, sourceFile);
      enrichment = categorized ? 'ok' : 'partial';
      routed = { ...routed, transactions: categorized ?? routed.transactions };
    }

    let committed: CommitResult;
    try {
      committed = this.coordinator.commit(routed, {
        fileIdentity: document.fileIdentity,
        sourcePath: document.sourcePath,
        sourceFile,
        documentKind: routed.kind,
        unclassified: routed.kind === 'unclassified',
        importedAt: (this.options.now?.() ?? new Date()).toISOString(),
      });
    } catch (error) {
      const failure = new PersistenceFailure(sourceFile, error);
      this.logger.error(failure.message, { sourceFile, fileIdentity: document.fileIdentity, error });
      return { ...this.failed(document, failure.message), documentKind: routed.kind };
    }

    this.reportExtraction(sourceFile, routed);

    if (committed.inserted.transactions > 0) {
      const recurring = this.coordinator.detectRecurring([classification], sourceFile);
      if (recurring.failures.length > 0) {
        enrichment = 'partial';
      } else if (enrichment === 'not_run') {
        enrichment = 'ok';
      }
    }

    this.logger.info('Document imported', {
      sourceFile,
      documentKind: routed.kind,
      bankName: classification.bankName,
      accountType: classification.accountType,
      inserted: sumTally(committed.inserted),
      duplicates: sumTally(committed.duplicates),
    });

    return {
      ...this.outcome(document, 'imported'),
      documentKind: routed.kind,
      unclassified: routed.kind === 'unclassified',
      inserted: committed.inserted,
      duplicates: committed.duplicates,
      enrichment,
    };
  }

  private categorize(transactions: Transaction[], sourceFile: string): Transaction[] | null {
    try {
      const keyed = transactions.map((txn) => ({ key: buildTransactionKey(txn), txn }));
      const categories = this.categorizer.categorize(
        keyed.map(({ key, txn }) => ({
          recordKey: key,
          description: txn.description,
          merchant: txn.merchant,
          amount: txn.amount,
        })),
      );
      return keyed.map(({ key, txn }) => {
        const result = categories[key];
        return result
          ? { ...txn, category: result.category, subCategory: result.subCategory, categoryConfidence: result.confidence }
          : txn;
      });
    } catch (error) {
      const failure = new EnrichmentFailure('categorization', sourceFile, error);
      this.logger.warn(failure.message, { sourceFile, error });
      return null;
    }
  }

  private reportRecognition(sourceFile: string, classification: Classification): void {
    if (classification.bankName === UNKNOWN_BANK || classification.accountType === 'unknown') {
      const failure = new RecognitionFailure(sourceFile);
      this.logger.debug(failure.message, { sourceFile, ...classification });
    }
  }

  private reportExtraction(sourceFile: string, routed: RoutedDocument): void {
    if (routed.kind === 'unclassified') {
      this.logger.warn('Document marked imported as unclassified', { sourceFile });
      return;
    }
    if (countRoutedRecords(routed) === 0) {
      const failure = new ExtractionFailure(sourceFile, routed.kind);
      this.logger.warn(failure.message, { sourceFile });
    }
  }

  private outcome(document: DocumentInputDTO, status: ImportOutcomeDTO['status']): ImportOutcomeDTO {
    return {
      fileIdentity: document.fileIdentity,
      sourceFile: document.fileName,
      status,
      unclassified: false,
      inserted: emptyTally(),
      duplicates: emptyTally(),
      enrichment: 'not_run',
    };
  }

  private failed(document: DocumentInputDTO, error: string): ImportOutcomeDTO {
    return { ...this.outcome(document, 'failed'), error };
  }
}
