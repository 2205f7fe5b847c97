import {
  MtdClient,
  MtdObligation,
  MtdRequestOptions,
  MtdSubmissionReceipt,
  VAT_BOXES,
  VatReturnFigures,
  emptyVatFigures,
} from '@ledgerline/hmrc';
import { CalendarDate, TaxKind, TaxLines, TaxReturn } from '@ledgerline/shared-types';
import { ValidationError } from '@ledgerline/shared-utils';

export type AuthorityObligation = MtdObligation;
export type AuthorityReceipt = MtdSubmissionReceipt;
export type AuthorityRequestOptions = MtdRequestOptions;

export interface DateWindow {
  from: CalendarDate;
  to: CalendarDate;
}

/** What the authority holds for a return's period, used to settle an unknown outcome. */
export interface AuthorityFilingStatus {
  fulfilled: boolean;
  reference?: string;
  /** False when the authority holds figures that differ from the return's lines. */
  matches?: boolean;
}

/** The subset of the authority API the filing service uses. */
export interface AuthorityGateway {
  listObligations(taxKind: TaxKind, window: DateWindow, options: AuthorityRequestOptions): Promise<AuthorityObligation[]>;
  submitReturn(taxReturn: TaxReturn, options: AuthorityRequestOptions): Promise<AuthorityReceipt>;
  filingStatus(taxReturn: TaxReturn, options: AuthorityRequestOptions): Promise<AuthorityFilingStatus>;
}

export interface TaxpayerIdentifiers {
  vrn?: string;
  /** National Insurance number; income tax obligations and declarations are keyed on it. */
  nino?: string;
}

export function toVatFigures(lines: TaxLines): VatReturnFigures {
  const figures = emptyVatFigures();
  for (const box of VAT_BOXES) {
    const value = lines[box];
    if (value === undefined) {
      throw new ValidationError(`VAT return is missing ${box}`);
    }
    figures[box] = value;
  }
  return figures;
}

function requirePeriodKey(taxReturn: TaxReturn): string {
  if (!taxReturn.periodKey) {
    throw new ValidationError(`Tax return ${taxReturn.id} has no authority period key`);
  }
  return taxReturn.periodKey;
}

/** Gateway over the Making Tax Digital REST API. */
export class MtdGateway implements AuthorityGateway {
  constructor(
    private readonly client: MtdClient,
    private readonly identifiers: TaxpayerIdentifiers
  ) {}

  async listObligations(
    taxKind: TaxKind,
    window: DateWindow,
    options: AuthorityRequestOptions
  ): Promise<AuthorityObligation[]> {
    return taxKind === TaxKind.VAT
      ? this.client.getVatObligations(this.vrn(), window, options)
      : this.client.getSelfAssessmentObligations(this.nino(), window, options);
  }

  async submitReturn(taxReturn: TaxReturn, options: AuthorityRequestOptions): Promise<AuthorityReceipt> {
    const periodKey = requirePeriodKey(taxReturn);
    return taxReturn.taxKind === TaxKind.VAT
      ? this.client.submitVatReturn(this.vrn(), periodKey, toVatFigures(taxReturn.lines), options)
      : this.client.submitFinalDeclaration(this.nino(), periodKey, taxReturn.lines, options);
  }

  async filingStatus(taxReturn: TaxReturn, options: AuthorityRequestOptions): Promise<AuthorityFilingStatus> {
    const periodKey = requirePeriodKey(taxReturn);
    const obligations = await this.listObligations(
      taxReturn.taxKind,
      { from: taxReturn.start, to: taxReturn.end },
      options
    );
    const obligation = obligations.find(
      (candidate) =>
        candidate.periodKey === periodKey || (candidate.start === taxReturn.start && candidate.end === taxReturn.end)
    );
    if (obligation?.status !== 'fulfilled') {
      return { fulfilled: false };
    }

    const reference = `${periodKey}:${obligation.received ?? 'received'}`;
    if (taxReturn.taxKind !== TaxKind.VAT) {
      return { fulfilled: true, reference };
    }
    const filed = await this.client.getVatReturn(this.vrn(), periodKey, options);
    const ours = toVatFigures(taxReturn.lines);
    const matches = filed !== undefined && VAT_BOXES.every((box) => filed[box] === ours[box]);
    return { fulfilled: true, reference, matches };
  }

  private vrn(): string {
    if (!this.identifiers.vrn) {
      throw new ValidationError('HMRC_VRN is not configured');
    }
    return this.identifiers.vrn;
  }

  private nino(): string {
    if (!this.identifiers.nino) {
      throw new ValidationError('HMRC_NINO is not configured');
    }
    return this.identifiers.nino;
  }
}
