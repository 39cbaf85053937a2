import type { DocumentInputDTO } from '../dto/DocumentInputDTO.js';

export interface UploadedDocument {
  fileName: string;
  content: Buffer;
}

export interface DocumentReaderPort {
  readonly supportedExtensions: readonly string[];
  isSupported(fileName: string): boolean;
  listDocuments(directory: string): Promise<string[]>;
  readFile(filePath: string): Promise<DocumentInputDTO>;
  readUpload(upload: UploadedDocument): Promise<DocumentInputDTO>;
}
