import { VAT_BOXES, WHOLE_UNIT_VAT_BOXES } from '@ledgerline/hmrc';
import { TaxKind, TaxReturn } from '@ledgerline/shared-types';
import { ValidationError, createLogger, isMinorUnitAmount, minorUnitDigits } from '@ledgerline/shared-utils';

const logger = createLogger('filing-service');

export interface PreSubmissionValidation {
  taxReturnId: string;
  isValid: boolean;
  errors: string[];
  warnings: string[];
  checks: Array<{
    check: string;
    passed: boolean;
    message: string;
    severity: 'error' | 'warning' | 'info';
  }>;
}

type Check = PreSubmissionValidation['checks'][number];

function vatChecks(taxReturn: TaxReturn): Check[] {
  const checks: Check[] = [];
  const lines = taxReturn.lines;
  const missing = VAT_BOXES.filter((box) => lines[box] === undefined);
  checks.push({
    check: 'VAT boxes present',
    passed: missing.length === 0,
    message: missing.length === 0 ? 'All nine boxes present' : `Missing boxes: ${missing.join(', ')}`,
    severity: missing.length === 0 ? 'info' : 'error',
  });
  if (missing.length > 0) {
    return checks;
  }

  const box = (id: (typeof VAT_BOXES)[number]): number => lines[id] ?? 0;

  const totalConsistent = box('totalVatDue') === box('vatDueSales') + box('vatDueAcquisitions');
  checks.push({
    check: 'Total VAT due',
    passed: totalConsistent,
    message: totalConsistent ? 'Box 3 equals box 1 plus box 2' : 'Box 3 must equal box 1 plus box 2',
    severity: totalConsistent ? 'info' : 'error',
  });

  const netConsistent = box('netVatDue') === Math.abs(box('totalVatDue') - box('vatReclaimedCurrPeriod'));
  checks.push({
    check: 'Net VAT due',
    passed: netConsistent,
    message: netConsistent
      ? 'Box 5 is the difference between box 3 and box 4'
      : 'Box 5 must be the absolute difference between box 3 and box 4',
    severity: netConsistent ? 'info' : 'error',
  });

  const factor = 10 ** minorUnitDigits(taxReturn.currency);
  const fractional = VAT_BOXES.filter((id) => WHOLE_UNIT_VAT_BOXES.has(id) && box(id) % factor !== 0);
  checks.push({
    check: 'Whole-unit boxes',
    passed: fractional.length === 0,
    message: fractional.length === 0 ? 'Boxes 6-9 are whole units' : `Not whole units: ${fractional.join(', ')}`,
    severity: fractional.length === 0 ? 'info' : 'error',
  });

  const negative = VAT_BOXES.filter((id) => box(id) < 0);
  if (negative.length > 0) {
    checks.push({
      check: 'Negative boxes',
      passed: false,
      message: `Negative values in ${negative.join(', ')}`,
      severity: box('netVatDue') < 0 ? 'error' : 'warning',
    });
  }

  if (VAT_BOXES.every((id) => box(id) === 0)) {
    checks.push({ check: 'Nil return', passed: true, message: 'Every box is zero', severity: 'warning' });
  }
  return checks;
}

function incomeTaxChecks(taxReturn: TaxReturn): Check[] {
  const negative = Object.entries(taxReturn.lines)
    .filter(([, value]) => value < 0)
    .map(([line]) => line);
  return [
    {
      check: 'Non-negative lines',
      passed: negative.length === 0,
      message: negative.length === 0 ? 'No negative lines' : `Negative values in ${negative.join(', ')}`,
      severity: negative.length === 0 ? 'info' : 'error',
    },
  ];
}

/** Checks a return before anything is sent. Nothing here touches the network. */
export function validateForSubmission(taxReturn: TaxReturn): PreSubmissionValidation {
  const checks: Check[] = [];

  checks.push({
    check: 'Authority period key',
    passed: Boolean(taxReturn.periodKey),
    message: taxReturn.periodKey ? `Period key ${taxReturn.periodKey}` : 'No authority period key assigned',
    severity: taxReturn.periodKey ? 'info' : 'error',
  });

  const nonInteger = Object.entries(taxReturn.lines)
    .filter(([, value]) => !isMinorUnitAmount(value))
    .map(([line]) => line);
  checks.push({
    check: 'Minor-unit amounts',
    passed: nonInteger.length === 0,
    message: nonInteger.length === 0 ? 'All lines are integers' : `Not integer minor units: ${nonInteger.join(', ')}`,
    severity: nonInteger.length === 0 ? 'info' : 'error',
  });

  checks.push(...(taxReturn.taxKind === TaxKind.VAT ? vatChecks(taxReturn) : incomeTaxChecks(taxReturn)));

  const errors = checks.filter((check) => check.severity === 'error').map((check) => check.message);
  const warnings = checks.filter((check) => check.severity === 'warning').map((check) => check.message);

  return { taxReturnId: taxReturn.id, isValid: errors.length === 0, errors, warnings, checks };
}

export function assertSubmittable(taxReturn: TaxReturn): PreSubmissionValidation {
  const validation = validateForSubmission(taxReturn);
  if (!validation.isValid) {
    logger.warn('Tax return failed pre-submission validation', {
      taxReturnId: taxReturn.id,
      errors: validation.errors,
    });
    throw new ValidationError(`Tax return ${taxReturn.id} is not submittable: ${validation.errors.join('; ')}`, validation);
  }
  return validation;
}
