import type { DocumentKind } from '../../domain/entities/Classification.js';

export const describeError = (error: unknown): string => (error instanceof Error ? error.message : 'Unknown error');

/** No bank or account-type rule matched. Records are kept and labelled `unknown`. */
export class RecognitionFailure extends Error {
  constructor(readonly sourceFile: string) {
    super(`Could not recognize issuing bank or account type for ${sourceFile}`);
    this.name = 'RecognitionFailure';
  }
}

/** The routed extractor found nothing it could parse in recognized text. */
export class ExtractionFailure extends Error {
  constructor(
    readonly sourceFile: string,
    readonly documentKind: DocumentKind,
  ) {
    super(`No ${documentKind} records could be extracted from ${sourceFile}`);
    this.name = 'ExtractionFailure';
  }
}

/** Writing a document's core records failed; its unit of work was rolled back. */
export class PersistenceFailure extends Error {
  constructor(
    readonly sourceFile: string,
    cause: unknown,
  ) {
    super(`Failed to persist records from ${sourceFile}: ${describeError(cause)}`, { cause });
    this.name = 'PersistenceFailure';
  }
}

export type EnrichmentStep = 'categorization' | 'recurring_detection';

export class EnrichmentFailure extends Error {
  constructor(
    readonly step: EnrichmentStep,
    readonly sourceFile: string,
    cause: unknown,
  ) {
    super(`${step} failed for ${sourceFile}: ${describeError(cause)}`, { cause });
    this.name = 'EnrichmentFailure';
  }
}

/** The store could not be opened. Fatal to the whole run. */
export class StoreUnavailableError extends Error {
  constructor(
    readonly location: string,
    cause: unknown,
  ) {
    super(`Unable to open store at ${location}: ${describeError(cause)}`, { cause });
    this.name = 'StoreUnavailableError';
  }
}
