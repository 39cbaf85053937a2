import dayjs from 'dayjs';
import type { DocumentExtractorPort, ExtractionSource } from '../../../application/ports/DocumentExtractorPort.js';
import type { Classification } from '../../../domain/entities/Classification.js';
import type { TaxDocument, TaxFormKind } from '../../../domain/entities/TaxDocument.js';
import { AMOUNT, findAmount, findText, labelled, normalizeFileName } from './FieldPatterns.js';

interface FormDefinition {
  kind: TaxFormKind;
  fileMarkers: RegExp[];
  textMarkers: RegExp[];
  payer: RegExp[];
  fields: Record<string, string[]>;
}

const FEDERAL_WITHHELD = String.raw`federal\s+(?:income\s+)?tax\s+withheld`;

const forms: FormDefinition[] = [
  {
    kind: '1099-INT',
    fileMarkers: [/\b1099\s?int\b/i],
    textMarkers: [/\bform\s+1099[-\s]?int\b/i, /\b1099[-\s]?int\b/i],
    payer: [/payer(?:'s)?(?:\s+name)?:[ \t]*([^\n]+)/i],
    fields: {
      interest_income: [String.raw`(?:total\s+)?interest\s+income`, String.raw`box\s*1\b`],
      early_withdrawal_penalty: [String.raw`early\s+withdrawal\s+penalty`, String.raw`box\s*2\b`],
      us_savings_bond_interest: [String.raw`interest\s+on\s+u\.?s\.?\s+savings\s+bonds`, String.raw`box\s*3\b`],
      federal_tax_withheld: [FEDERAL_WITHHELD, String.raw`box\s*4\b`],
      tax_exempt_interest: [String.raw`tax[-\s]exempt\s+interest`, String.raw`box\s*8\b`],
    },
  },
  {
    kind: '1099-DIV',
    fileMarkers: [/\b1099\s?div\b/i],
    textMarkers: [/\bform\s+1099[-\s]?div\b/i, /\b1099[-\s]?div\b/i],
    payer: [/payer(?:'s)?(?:\s+name)?:[ \t]*([^\n]+)/i],
    fields: {
      ordinary_dividends: [String.raw`(?:total\s+)?ordinary\s+dividends`, String.raw`box\s*1a\b`],
      qualified_dividends: [String.raw`qualified\s+dividends`, String.raw`box\s*1b\b`],
      total_capital_gain: [String.raw`total\s+capital\s+gain(?:\s+distr(?:ibutions?|\.))?`, String.raw`box\s*2a\b`],
      federal_tax_withheld: [FEDERAL_WITHHELD, String.raw`box\s*4\b`],
      foreign_tax_paid: [String.raw`foreign\s+tax\s+paid`, String.raw`box\s*7\b`],
    },
  },
  {
    kind: '1099-B',
    fileMarkers: [/\b1099\s?b\b/i],
    textMarkers: [/\bform\s+1099[-\s]?b\b/i, /\b1099[-\s]?b\b/i, /proceeds\s+from\s+broker/i],
    payer: [/(?:payer|broker)(?:'s)?(?:\s+name)?:[ \t]*([^\n]+)/i],
    fields: {
      proceeds: [String.raw`(?:total\s+)?proceeds`],
      cost_basis: [String.raw`(?:total\s+)?cost(?:\s+or\s+other)?\s+basis`],
      wash_sale_loss_disallowed: [String.raw`wash\s+sale\s+loss\s+disallowed`],
      gain_loss: [String.raw`(?:net\s+|realized\s+)?gain(?:\s*(?:or|/)\s*\(?loss\)?)?`],
      federal_tax_withheld: [FEDERAL_WITHHELD, String.raw`box\s*4\b`],
    },
  },
  {
    kind: 'W-2',
    fileMarkers: [/\bw\s?2\b/i],
    textMarkers: [/\bform\s+w[-\s]?2\b/i, /wage\s+and\s+tax\s+statement/i],
    payer: [/employer(?:'s)?(?:\s+name)?:[ \t]*([^\n]+)/i],
    fields: {
      wages: [String.raw`wages,?\s+tips,?(?:\s+other\s+comp(?:ensation|\.)?)?`, String.raw`box\s*1\b`],
      federal_tax_withheld: [FEDERAL_WITHHELD, String.raw`box\s*2\b`],
      social_security_wages: [String.raw`social\s+security\s+wages`, String.raw`box\s*3\b`],
      social_security_tax: [String.raw`social\s+security\s+tax\s+withheld`, String.raw`box\s*4\b`],
      medicare_wages: [String.raw`medicare\s+wages(?:\s+and\s+tips)?`, String.raw`box\s*5\b`],
      medicare_tax: [String.raw`medicare\s+tax\s+withheld`, String.raw`box\s*6\b`],
      state_wages: [String.raw`state\s+wages,?(?:\s+tips,?\s+etc\.?)?`, String.raw`box\s*16\b`],
      state_tax: [String.raw`state\s+income\s+tax`, String.raw`box\s*17\b`],
    },
  },
];

const compiledFields = new Map(
  forms.map((form) => [
    form.kind,
    Object.entries(form.fields).map(([field, labels]) => ({
      field,
      patterns: labels.map((label) => labelled(label, AMOUNT)),
    })),
  ]),
);

const taxYearPatterns = [
  /calendar\s+year[:\s]+((?:19|20)\d{2})\b/i,
  /tax\s+year[:\s]+((?:19|20)\d{2})\b/i,
  /\b((?:19|20)\d{2})\s+form\s+(?:1099|w-?2)/i,
  /\byear[:\s]+((?:19|20)\d{2})\b/i,
];

const fileNameYear = /(?<!\d)((?:19|20)\d{2})(?!\d)/;

export interface TaxFormExtractorOptions {
  currentYear?: () => number;
}

/**
 * Reads 1099-INT, 1099-DIV, 1099-B and W-2 forms. A detected form always yields one
 * record, even when none of its boxes could be read.
 */
export class TaxFormExtractor implements DocumentExtractorPort<'tax'> {
  readonly kind = 'tax' as const;
  private readonly currentYear: () => number;

  constructor(options: TaxFormExtractorOptions = {}) {
    this.currentYear = options.currentYear ?? (() => dayjs().year());
  }

  detectForm(text: string, sourceFile: string): FormDefinition | undefined {
    const name = normalizeFileName(sourceFile);

    return (
      forms.find((form) => form.fileMarkers.some((marker) => marker.test(name))) ??
      forms.find((form) => form.textMarkers.some((marker) => marker.test(text)))
    );
  }

  extract(source: ExtractionSource, classification: Classification): TaxDocument[] {
    const form = this.detectForm(source.text, source.sourceFile);
    if (!form) {
      return [];
    }

    const fields: Record<string, number> = {};
    for (const { field, patterns } of compiledFields.get(form.kind) ?? []) {
      const value = findAmount(source.text, patterns);
      if (value !== undefined) {
        fields[field] = value;
      }
    }

    return [
      {
        taxYear: this.resolveTaxYear(source.text, source.sourceFile),
        formKind: form.kind,
        payerName: findText(source.text, form.payer),
        fields,
        bankName: classification.bankName,
        accountType: classification.accountType,
        sourceFile: source.sourceFile,
      },
    ];
  }

  private resolveTaxYear(text: string, sourceFile: string): number {
    const stated = findText(text, taxYearPatterns) ?? fileNameYear.exec(sourceFile)?.[1];
    return stated ? Number(stated) : this.currentYear();
  }
}
