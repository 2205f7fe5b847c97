import { ValidationError, formatMinorUnits, minorUnitDigits, parseMinorUnits } from '@ledgerline/shared-utils';

export const VAT_BOXES = [
  'vatDueSales',
  'vatDueAcquisitions',
  'totalVatDue',
  'vatReclaimedCurrPeriod',
  'netVatDue',
  'totalValueSalesExVAT',
  'totalValuePurchasesExVAT',
  'totalValueGoodsSuppliedExVAT',
  'totalAcquisitionsExVAT',
] as const;

export type VatBox = (typeof VAT_BOXES)[number];

/** The nine VAT boxes in minor units. */
export type VatReturnFigures = Record<VatBox, number>;

// Boxes 6-9 are declared in whole pounds.
export const WHOLE_UNIT_VAT_BOXES: ReadonlySet<VatBox> = new Set<VatBox>([
  'totalValueSalesExVAT',
  'totalValuePurchasesExVAT',
  'totalValueGoodsSuppliedExVAT',
  'totalAcquisitionsExVAT',
]);

function wholeUnits(amount: number, currency: string, field: string): string {
  const factor = 10 ** minorUnitDigits(currency);
  if (amount % factor !== 0) {
    throw new ValidationError(`${field} must be a whole number of major units`, { field, amount });
  }
  return String(amount / factor);
}

/**
 * Serialises a VAT return body. Amounts are written as exact decimal literals built from the
 * minor-unit integers, so no floating-point value is ever computed on the way out.
 */
export function serializeVatReturn(
  periodKey: string,
  figures: VatReturnFigures,
  currency: string = 'GBP'
): string {
  const fields = [`"periodKey":${JSON.stringify(periodKey)}`];
  for (const box of VAT_BOXES) {
    const amount = figures[box];
    const literal = WHOLE_UNIT_VAT_BOXES.has(box)
      ? wholeUnits(amount, currency, box)
      : formatMinorUnits(amount, currency);
    fields.push(`"${box}":${literal}`);
  }
  fields.push('"finalised":true');
  return `{${fields.join(',')}}`;
}

export function serializeDecimalLines(lines: Record<string, number>, currency: string = 'GBP'): string {
  const fields = Object.keys(lines)
    .sort()
    .map((key) => `${JSON.stringify(key)}:${formatMinorUnits(lines[key] ?? 0, currency)}`);
  return `{${fields.join(',')}}`;
}

/** Final declaration body: the declaration flag plus the declared figures as exact decimals. */
export function serializeFinalDeclaration(lines: Record<string, number>, currency: string = 'GBP'): string {
  return `{"declaration":{"declaration":true},"figures":${serializeDecimalLines(lines, currency)}}`;
}

/** Converts a decimal amount received from the authority back into minor units. */
export function decimalToMinorUnits(value: number | string, currency: string = 'GBP'): number {
  return parseMinorUnits(typeof value === 'number' ? value.toFixed(minorUnitDigits(currency)) : value, currency);
}
