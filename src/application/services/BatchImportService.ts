import path from 'node:path';
import type { Logger } from 'winston';
import { emptyTally, type ImportOutcomeDTO, type RecordTallyDTO } from '../dto/ImportOutcomeDTO.js';
import { describeError } from '../errors/IngestionErrors.js';
import type { DocumentReaderPort, UploadedDocument } from '../ports/DocumentReaderPort.js';
import type { IngestDocumentOptions, IngestionService } from './IngestionService.js';

export interface BatchSummary {
  processed: number;
  imported: number;
  skipped: number;
  failed: number;
  unclassified: number;
  inserted: RecordTallyDTO;
  duplicates: RecordTallyDTO;
  outcomes: ImportOutcomeDTO[];
}

const addTally = (target: RecordTallyDTO, source: RecordTallyDTO): void => {
  target.transactions += source.transactions;
  target.balances += source.balances;
  target.investmentAccounts += source.investmentAccounts;
  target.paystubs += source.paystubs;
  target.taxDocuments += source.taxDocuments;
};

export const summarizeOutcomes = (outcomes: ImportOutcomeDTO[]): BatchSummary => {
  const summary: BatchSummary = {
    processed: outcomes.length,
    imported: 0,
    skipped: 0,
    failed: 0,
    unclassified: 0,
    inserted: emptyTally(),
    duplicates: emptyTally(),
    outcomes,
  };

  for (const outcome of outcomes) {
    summary[outcome.status] += 1;
    if (outcome.status === 'imported' && outcome.unclassified) {
      summary.unclassified += 1;
    }
    addTally(summary.inserted, outcome.inserted);
    addTally(summary.duplicates, outcome.duplicates);
  }

  return summary;
};

/**
 * Feeds files through ingestion one at a time. A file that cannot be read becomes a
 * failed outcome and the batch moves on.
 */
export class BatchImportService {
  constructor(
    private readonly reader: DocumentReaderPort,
    private readonly ingestion: IngestionService,
    private readonly logger: Logger,
  ) {}

  async importDirectory(directory: string, options: IngestDocumentOptions = {}): Promise<BatchSummary> {
    const files = await this.reader.listDocuments(directory);
    this.logger.info('Starting batch import', { directory, files: files.length });

    const outcomes: ImportOutcomeDTO[] = [];
    for (const filePath of files) {
      outcomes.push(await this.importFile(filePath, options));
    }

    const summary = summarizeOutcomes(outcomes);
    this.logger.info('Batch import finished', {
      directory,
      imported: summary.imported,
      skipped: summary.skipped,
      failed: summary.failed,
      unclassified: summary.unclassified,
    });
    return summary;
  }

  async importFile(filePath: string, options: IngestDocumentOptions = {}): Promise<ImportOutcomeDTO> {
    try {
      const input = await this.reader.readFile(filePath);
      return this.ingestion.ingestDocument(input, options);
    } catch (error) {
      return this.unreadable(path.basename(filePath), error);
    }
  }

  async importUpload(upload: UploadedDocument, options: IngestDocumentOptions = {}): Promise<ImportOutcomeDTO> {
    try {
      const input = await this.reader.readUpload(upload);
      return this.ingestion.ingestDocument(input, options);
    } catch (error) {
      return this.unreadable(upload.fileName, error);
    }
  }

  private unreadable(sourceFile: string, error: unknown): ImportOutcomeDTO {
    this.logger.error('Failed to read document', { sourceFile, error });
    return {
      fileIdentity: '',
      sourceFile,
      status: 'failed',
      unclassified: false,
      inserted: emptyTally(),
      duplicates: emptyTally(),
      enrichment: 'not_run',
      error: describeError(error),
    };
  }
}
