import type { DocumentExtractorPort, ExtractionSource } from '../../../application/ports/DocumentExtractorPort.js';
import type { Classification } from '../../../domain/entities/Classification.js';
import type { Paystub } from '../../../domain/entities/Paystub.js';
import { roundCurrency } from '../../../domain/services/AmountParser.js';
import {
  AMOUNT,
  DATE,
  RANGE_SEPARATOR,
  countKeywords,
  current,
  findAmount,
  findDate,
  findText,
  labelled,
} from './FieldPatterns.js';

const paystubKeywords = [
  'pay stub',
  'paystub',
  'pay statement',
  'earnings statement',
  'payroll',
  'gross pay',
  'net pay',
  'take home',
  'pay period',
  'federal tax',
  'social security',
  'medicare',
] as const;

const amountPatterns = (...labels: string[]): RegExp[] => labels.map((label) => labelled(label, AMOUNT));

const payDatePatterns = [labelled(String.raw`(?<!next\s)pay\s+date`, DATE), labelled(String.raw`check\s+date`, DATE)];
const payPeriodPattern = new RegExp(String.raw`pay\s+period[:\s]+` + DATE + RANGE_SEPARATOR + DATE, 'i');

const grossPatterns = amountPatterns(
  current(String.raw`gross\s+pay`),
  current(String.raw`gross\s+earnings`),
  current(String.raw`total\s+gross`),
  current(String.raw`\bgross`),
);
const netPatterns = amountPatterns(
  current(String.raw`net\s+pay`),
  current(String.raw`take\s+home(?:\s+pay)?`),
  current(String.raw`\bnet`),
);
const totalDeductionPatterns = amountPatterns(
  current(String.raw`total\s+deductions?`),
  current(String.raw`deductions?\s+total`),
);
const earningsPatterns = {
  regularHours: amountPatterns(current(String.raw`(?:regular|reg)\s+hours?`)),
  overtimeHours: amountPatterns(current(String.raw`(?:overtime|ot)\s+hours?`)),
  regularRate: amountPatterns(String.raw`(?:regular|hourly)\s+rate`),
  overtimeRate: amountPatterns(String.raw`(?:overtime|ot)\s+rate`),
  bonus: amountPatterns(current(String.raw`\bbonus`)),
  commission: amountPatterns(current(String.raw`\bcommissions?`)),
};
const employerPatterns = [/(?:employer|company)(?:\s+name)?:[ \t]*([^\n]+)/i];

const ytdGrossPatterns = amountPatterns(String.raw`ytd\s+gross(?:\s+pay)?`, String.raw`year\s+to\s+date\s+gross`);
const ytdNetPatterns = amountPatterns(String.raw`ytd\s+net(?:\s+pay)?`, String.raw`year\s+to\s+date\s+net`);
const ytdTaxPatterns = amountPatterns(String.raw`ytd\s+taxes?`, String.raw`year\s+to\s+date\s+taxes?`);

const deductionPatterns: Array<[string, RegExp[]]> = Object.entries({
  federal_tax: [
    String.raw`federal\s+(?:income\s+)?tax(?:\s+withheld)?`,
    String.raw`fed\s+(?:income\s+)?tax`,
    String.raw`federal\s+withholding`,
  ],
  state_tax: [String.raw`state\s+(?:income\s+)?tax(?:\s+withheld)?`, String.raw`state\s+withholding`],
  local_tax: [String.raw`local\s+(?:income\s+)?tax`, String.raw`local\s+withholding`],
  social_security: [String.raw`social\s+security(?:\s+tax)?`, String.raw`oasdi`, String.raw`ss\s+tax`],
  medicare: [String.raw`medicare(?:\s+tax)?`],
  health_insurance: [String.raw`health\s+insurance`, String.raw`medical(?:\s+insurance)?`],
  dental_insurance: [String.raw`dental(?:\s+insurance)?`],
  vision_insurance: [String.raw`vision(?:\s+insurance)?`],
  retirement_401k: [String.raw`401\s?\(?k\)?`, String.raw`retirement`],
  hsa: [String.raw`\bhsa\b`, String.raw`health\s+savings(?:\s+account)?`],
  fsa: [String.raw`\bfsa\b`, String.raw`flexible\s+spending(?:\s+account)?`],
}).map(([category, labels]): [string, RegExp[]] => [category, amountPatterns(...labels.map(current))]);

const payDateMarker = /(?<!next\s+)pay\s+date/gi;

const hasEarnings = (segment: string): boolean =>
  findAmount(segment, grossPatterns) !== undefined || findAmount(segment, netPatterns) !== undefined;

/**
 * Splits a multi-paystub export at each later `pay date` that opens a stub of its own, i.e. one
 * followed by gross or net pay. The header stays with the first stub.
 */
const splitStubs = (text: string): string[] => {
  const starts = [...text.matchAll(payDateMarker)].map((match) => match.index ?? 0).slice(1);
  const ends = [...starts.slice(1), text.length];
  const segments: string[] = [];
  let segmentStart = 0;

  starts.forEach((start, index) => {
    if (hasEarnings(text.slice(start, ends[index]))) {
      segments.push(text.slice(segmentStart, start));
      segmentStart = start;
    }
  });
  segments.push(text.slice(segmentStart));

  return segments;
};

export class PaystubExtractor implements DocumentExtractorPort<'paystub'> {
  readonly kind = 'paystub' as const;

  isPaystub(text: string): boolean {
    return countKeywords(text, paystubKeywords) >= 3;
  }

  extract(source: ExtractionSource, classification: Classification): Paystub[] {
    if (!source.text || !this.isPaystub(source.text)) {
      return [];
    }

    const documentEmployer = findText(source.text, employerPatterns);

    return splitStubs(source.text).flatMap((segment) => {
      const stub = this.extractStub(segment, source.sourceFile, classification);
      if (!stub) {
        return [];
      }

      return [{ ...stub, employerName: stub.employerName ?? documentEmployer }];
    });
  }

  private extractStub(text: string, sourceFile: string, classification: Classification): Paystub | null {
    const payDate = findDate(text, payDatePatterns);
    const gross = findAmount(text, grossPatterns);
    const net = findAmount(text, netPatterns);

    if (gross === undefined && net === undefined) {
      return null;
    }

    const deductions: Record<string, number> = {};
    for (const [category, patterns] of deductionPatterns) {
      const value = findAmount(text, patterns);
      if (value !== undefined) {
        deductions[category] = Math.abs(value);
      }
    }

    const stated = findAmount(text, totalDeductionPatterns);
    const deductionValues = Object.values(deductions);
    const totalDeductions =
      stated ?? (deductionValues.length > 0 ? roundCurrency(deductionValues.reduce((sum, value) => sum + value, 0)) : undefined);

    return {
      payDate,
      payPeriodStart: findDate(text, [payPeriodPattern], 1),
      payPeriodEnd: findDate(text, [payPeriodPattern], 2),
      employerName: findText(text, employerPatterns),
      gross,
      regularHours: findAmount(text, earningsPatterns.regularHours),
      overtimeHours: findAmount(text, earningsPatterns.overtimeHours),
      regularRate: findAmount(text, earningsPatterns.regularRate),
      overtimeRate: findAmount(text, earningsPatterns.overtimeRate),
      bonus: findAmount(text, earningsPatterns.bonus),
      commission: findAmount(text, earningsPatterns.commission),
      net,
      deductions,
      totalDeductions,
      ytdGross: findAmount(text, ytdGrossPatterns),
      ytdNet: findAmount(text, ytdNetPatterns),
      ytdTaxes: findAmount(text, ytdTaxPatterns),
      bankName: classification.bankName,
      accountType: classification.accountType,
      sourceFile,
    };
  }
}
