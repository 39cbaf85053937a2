import { readdir, readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseCsv } from 'csv-parse/sync';
import { PDFParse } from 'pdf-parse';
import * as XLSX from 'xlsx';
import { z } from 'zod';
import { DocumentInputSchema, TabularRowSchema, type DocumentInputDTO, type TabularRowDTO } from '../../../application/dto/DocumentInputDTO.js';
import type { DocumentReaderPort, UploadedDocument } from '../../../application/ports/DocumentReaderPort.js';
import { resolveFileIdentity } from '../../../domain/services/FileIdentity.js';

const SUPPORTED_EXTENSIONS = ['.pdf', '.txt', '.csv', '.xlsx', '.xls'] as const;

const TabularRowsSchema = z.array(TabularRowSchema);

interface ReadContent {
  text?: string;
  rows?: TabularRowDTO[];
}

async function extractPdfText(buffer: Buffer): Promise<string> {
  const parser = new PDFParse({ data: buffer });
  try {
    const result = await parser.getText();
    return result.text || '';
  } finally {
    await parser.destroy();
  }
}

function extractCsv(buffer: Buffer): ReadContent {
  const text = buffer.toString('utf8');
  const records: unknown = parseCsv(text, { columns: true, skip_empty_lines: true, trim: true, relax_column_count: true });
  return { text, rows: TabularRowsSchema.parse(records) };
}

function extractWorkbook(buffer: Buffer): ReadContent {
  const workbook = XLSX.read(buffer, { type: 'buffer' });
  const rows: TabularRowDTO[] = [];
  const sheetTexts: string[] = [];

  for (const sheetName of workbook.SheetNames) {
    const sheet = workbook.Sheets[sheetName];
    if (!sheet) {
      continue;
    }
    rows.push(...TabularRowsSchema.parse(XLSX.utils.sheet_to_json<unknown>(sheet, { raw: false, defval: null })));
    sheetTexts.push(XLSX.utils.sheet_to_csv(sheet));
  }

  return { text: sheetTexts.join('\n'), rows };
}

/** Reads statements from disk or from an upload buffer into the pipeline's input shape. */
export class FileSystemDocumentReader implements DocumentReaderPort {
  readonly supportedExtensions: readonly string[] = SUPPORTED_EXTENSIONS;

  isSupported(fileName: string): boolean {
    return this.supportedExtensions.includes(path.extname(fileName).toLowerCase());
  }

  async listDocuments(directory: string): Promise<string[]> {
    const entries = await readdir(directory, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isFile() && this.isSupported(entry.name))
      .map((entry) => path.join(directory, entry.name))
      .sort((a, b) => a.localeCompare(b));
  }

  async readFile(filePath: string): Promise<DocumentInputDTO> {
    const content = await readFile(filePath);
    return this.toInput(path.basename(filePath), path.resolve(filePath), content);
  }

  async readUpload(upload: UploadedDocument): Promise<DocumentInputDTO> {
    return this.toInput(path.basename(upload.fileName), `upload:${upload.fileName}`, upload.content);
  }

  private async toInput(fileName: string, sourcePath: string, content: Buffer): Promise<DocumentInputDTO> {
    if (!this.isSupported(fileName)) {
      throw new Error(`Unsupported file type: ${fileName}`);
    }

    const extracted = await this.extractContent(fileName, content);
    return DocumentInputSchema.parse({
      fileIdentity: resolveFileIdentity({ content, fileName }),
      fileName,
      sourcePath,
      ...extracted,
    });
  }

  private async extractContent(fileName: string, content: Buffer): Promise<ReadContent> {
    switch (path.extname(fileName).toLowerCase()) {
      case '.pdf':
        return { text: await extractPdfText(content) };
      case '.csv':
        return extractCsv(content);
      case '.xlsx':
      case '.xls':
        return extractWorkbook(content);
      default:
        return { text: content.toString('utf8') };
    }
  }
}
