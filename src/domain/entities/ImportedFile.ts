import type { DocumentKind } from './Classification.js';

export interface ImportedFile {
  fileIdentity: string;
  sourcePath: string;
  sourceFile: string;
  documentKind: DocumentKind;
  recordCount: number;
  unclassified: boolean;
  importedAt: string; // ISO timestamp
}
