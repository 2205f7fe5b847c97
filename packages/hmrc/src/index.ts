import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { z } from 'zod';
import { normaliseAxiosError, MtdApiError } from './errors';
import {
  VAT_BOXES,
  VatReturnFigures,
  decimalToMinorUnits,
  serializeFinalDeclaration,
  serializeVatReturn,
} from './wire';

export * from './errors';
export * from './wire';

export type MtdEnvironment = 'sandbox' | 'production';

const SANDBOX_BASE_URL = 'https://test-api.service.hmrc.gov.uk';
const PRODUCTION_BASE_URL = 'https://api.service.hmrc.gov.uk';
const DEFAULT_TIMEOUT_MS = 30000;

export interface MtdClientConfig {
  env?: MtdEnvironment;
  baseUrl?: string;
  timeoutMs?: number;
  /** Gov-Client-* / Gov-Vendor-* fraud prevention headers sent with every API call. */
  fraudPreventionHeaders?: Record<string, string>;
  /** Replaces axios' HTTP transport (used for in-process stand-ins). */
  adapter?: AxiosAdapter;
}

export interface MtdRequestOptions {
  accessToken: string;
  timeoutMs?: number;
}

export interface MtdObligation {
  periodKey?: string;
  start: string;
  end: string;
  due: string;
  status: 'open' | 'fulfilled';
  received?: string;
}

export interface MtdSubmissionReceipt {
  processingDate: string;
  /** Best reference the authority returned: form bundle number, receipt id, or charge reference. */
  reference: string;
  formBundleNumber?: string;
  receiptId?: string;
  chargeRefNumber?: string;
  paymentIndicator?: string;
  raw: Record<string, unknown>;
}

export interface MtdTokenSet {
  accessToken: string;
  refreshToken?: string;
  expiresIn: number;
  refreshTokenExpiresIn?: number;
  scope?: string;
  tokenType: string;
}

const obligationsSchema = z.object({
  obligations: z
    .array(
      z.object({
        periodKey: z.string().optional(),
        start: z.string(),
        end: z.string(),
        due: z.string(),
        status: z.enum(['O', 'F']),
        received: z.string().optional(),
      })
    )
    .default([]),
});

const submissionResponseSchema = z
  .object({
    processingDate: z.string().optional(),
    formBundleNumber: z.string().optional(),
    chargeRefNumber: z.string().optional(),
    paymentIndicator: z.string().optional(),
    id: z.string().optional(),
  })
  .passthrough();

const decimalAmount = z.union([z.number(), z.string()]);

const vatReturnSchema = z.object({
  vatDueSales: decimalAmount,
  vatDueAcquisitions: decimalAmount,
  totalVatDue: decimalAmount,
  vatReclaimedCurrPeriod: decimalAmount,
  netVatDue: decimalAmount,
  totalValueSalesExVAT: decimalAmount,
  totalValuePurchasesExVAT: decimalAmount,
  totalValueGoodsSuppliedExVAT: decimalAmount,
  totalAcquisitionsExVAT: decimalAmount,
});

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token_expires_in: z.number().optional(),
  scope: z.string().optional(),
  token_type: z.string().default('bearer'),
});

export function resolveBaseUrl(env?: MtdEnvironment, baseUrl?: string): string {
  if (baseUrl) {
    return baseUrl.replace(/\/+$/, '');
  }
  return env === 'production' ? PRODUCTION_BASE_URL : SANDBOX_BASE_URL;
}

function parseResponse<T extends z.ZodTypeAny>(
  schema: T,
  response: AxiosResponse<unknown>,
  context: string
): z.output<T> {
  const parsed = schema.safeParse(response.data);
  if (!parsed.success) {
    throw new MtdApiError(response.status, response.data, `${context} (unexpected response shape)`);
  }
  return parsed.data;
}

function toObligation(obligation: z.output<typeof obligationsSchema>['obligations'][number]): MtdObligation {
  return {
    periodKey: obligation.periodKey,
    start: obligation.start,
    end: obligation.end,
    due: obligation.due,
    status: obligation.status === 'F' ? 'fulfilled' : 'open',
    received: obligation.received,
  };
}

function headerValue(response: AxiosResponse<unknown>, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return typeof value === 'string' ? value : undefined;
}

export class MtdClient {
  private readonly client: AxiosInstance;
  private readonly timeoutMs: number;

  constructor(config: MtdClientConfig = {}) {
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.client = axios.create({
      baseURL: resolveBaseUrl(config.env, config.baseUrl),
      timeout: this.timeoutMs,
      adapter: config.adapter,
      headers: {
        Accept: 'application/vnd.hmrc.1.0+json',
        'Content-Type': 'application/json',
        ...config.fraudPreventionHeaders,
      },
    });
  }

  private requestConfig(options: MtdRequestOptions) {
    return {
      timeout: options.timeoutMs ?? this.timeoutMs,
      headers: { Authorization: `Bearer ${options.accessToken}` },
    };
  }

  async getVatObligations(
    vrn: string,
    params: { from: string; to: string; status?: 'O' | 'F' },
    options: MtdRequestOptions
  ): Promise<MtdObligation[]> {
    const context = 'VAT obligation retrieval';
    try {
      const response = await this.client.get<unknown>(`/organisations/vat/${vrn}/obligations`, {
        ...this.requestConfig(options),
        params,
      });
      return parseResponse(obligationsSchema, response, context).obligations.map(toObligation);
    } catch (error) {
      throw normaliseAxiosError(error, context, options.timeoutMs ?? this.timeoutMs);
    }
  }

  async submitVatReturn(
    vrn: string,
    periodKey: string,
    figures: VatReturnFigures,
    options: MtdRequestOptions
  ): Promise<MtdSubmissionReceipt> {
    const context = 'VAT return submission';
    const body = serializeVatReturn(periodKey, figures);
    try {
      const response = await this.client.post<unknown>(
        `/organisations/vat/${vrn}/returns`,
        body,
        this.requestConfig(options)
      );
      const data = parseResponse(submissionResponseSchema, response, context);
      const receiptId = headerValue(response, 'receipt-id');
      return {
        processingDate: data.processingDate ?? new Date().toISOString(),
        reference: data.formBundleNumber ?? receiptId ?? data.chargeRefNumber ?? `${vrn}:${periodKey}`,
        formBundleNumber: data.formBundleNumber,
        receiptId,
        chargeRefNumber: data.chargeRefNumber,
        paymentIndicator: data.paymentIndicator,
        raw: data,
      };
    } catch (error) {
      throw normaliseAxiosError(error, context, options.timeoutMs ?? this.timeoutMs);
    }
  }

  /** Returns the filed figures for a period, or undefined when nothing has been filed. */
  async getVatReturn(
    vrn: string,
    periodKey: string,
    options: MtdRequestOptions
  ): Promise<VatReturnFigures | undefined> {
    const context = 'VAT return retrieval';
    try {
      const response = await this.client.get<unknown>(
        `/organisations/vat/${vrn}/returns/${encodeURIComponent(periodKey)}`,
        this.requestConfig(options)
      );
      const data = parseResponse(vatReturnSchema, response, context);
      const figures = emptyVatFigures();
      for (const box of VAT_BOXES) {
        figures[box] = decimalToMinorUnits(data[box]);
      }
      return figures;
    } catch (error) {
      const normalised = normaliseAxiosError(error, context, options.timeoutMs ?? this.timeoutMs);
      if (normalised instanceof MtdApiError && normalised.status === 404) {
        return undefined;
      }
      throw normalised;
    }
  }

  /** Income and expenditure obligations for an individual, keyed by National Insurance number. */
  async getSelfAssessmentObligations(
    nino: string,
    params: { from: string; to: string },
    options: MtdRequestOptions
  ): Promise<MtdObligation[]> {
    const context = 'self-assessment obligation retrieval';
    try {
      const response = await this.client.get<unknown>(`/individuals/obligations/${nino}/income-and-expenditure`, {
        ...this.requestConfig(options),
        params,
      });
      return parseResponse(obligationsSchema, response, context).obligations.map(toObligation);
    } catch (error) {
      throw normaliseAxiosError(error, context, options.timeoutMs ?? this.timeoutMs);
    }
  }

  async submitFinalDeclaration(
    nino: string,
    taxYear: string,
    lines: Record<string, number>,
    options: MtdRequestOptions
  ): Promise<MtdSubmissionReceipt> {
    const context = 'self-assessment declaration';
    try {
      const response = await this.client.post<unknown>(
        `/individuals/self-assessment/${nino}/final-declaration/${encodeURIComponent(taxYear)}`,
        serializeFinalDeclaration(lines),
        this.requestConfig(options)
      );
      const data = parseResponse(submissionResponseSchema, response, context);
      const receiptId = headerValue(response, 'receipt-id');
      return {
        processingDate: data.processingDate ?? new Date().toISOString(),
        reference: data.id ?? receiptId ?? `${nino}:${taxYear}`,
        receiptId,
        raw: data,
      };
    } catch (error) {
      throw normaliseAxiosError(error, context, options.timeoutMs ?? this.timeoutMs);
    }
  }
}

export function emptyVatFigures(): VatReturnFigures {
  return {
    vatDueSales: 0,
    vatDueAcquisitions: 0,
    totalVatDue: 0,
    vatReclaimedCurrPeriod: 0,
    netVatDue: 0,
    totalValueSalesExVAT: 0,
    totalValuePurchasesExVAT: 0,
    totalValueGoodsSuppliedExVAT: 0,
    totalAcquisitionsExVAT: 0,
  };
}

// OAuth2 token endpoint

export interface TokenEndpointConfig {
  env?: MtdEnvironment;
  baseUrl?: string;
  timeoutMs?: number;
  adapter?: AxiosAdapter;
}

export interface ClientCredentials {
  clientId: string;
  clientSecret: string;
  scope?: string;
}

async function executeTokenRequest(
  config: TokenEndpointConfig,
  body: Record<string, string>,
  context: string
): Promise<MtdTokenSet> {
  try {
    const response = await axios.post<unknown>(
      `${resolveBaseUrl(config.env, config.baseUrl)}/oauth/token`,
      new URLSearchParams(body).toString(),
      {
        timeout: config.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        adapter: config.adapter,
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      }
    );
    const data = parseResponse(tokenResponseSchema, response, context);
    return {
      accessToken: data.access_token,
      refreshToken: data.refresh_token,
      expiresIn: data.expires_in ?? 14400,
      refreshTokenExpiresIn: data.refresh_token_expires_in,
      scope: data.scope,
      tokenType: data.token_type,
    };
  } catch (error) {
    throw normaliseAxiosError(error, context, config.timeoutMs);
  }
}

export function exchangeAuthorizationCode(
  config: TokenEndpointConfig,
  credentials: ClientCredentials & { authorizationCode: string; redirectUri: string }
): Promise<MtdTokenSet> {
  return executeTokenRequest(
    config,
    {
      grant_type: 'authorization_code',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      code: credentials.authorizationCode,
      redirect_uri: credentials.redirectUri,
    },
    'authorization code exchange'
  );
}

export function requestClientCredentialsToken(
  config: TokenEndpointConfig,
  credentials: ClientCredentials
): Promise<MtdTokenSet> {
  return executeTokenRequest(
    config,
    {
      grant_type: 'client_credentials',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      scope: credentials.scope ?? '',
    },
    'client credentials grant'
  );
}

export function refreshAccessToken(
  config: TokenEndpointConfig,
  credentials: ClientCredentials & { refreshToken: string }
): Promise<MtdTokenSet> {
  return executeTokenRequest(
    config,
    {
      grant_type: 'refresh_token',
      client_id: credentials.clientId,
      client_secret: credentials.clientSecret,
      refresh_token: credentials.refreshToken,
    },
    'token refresh'
  );
}

export function buildAuthorizationUrl(
  config: TokenEndpointConfig,
  params: { clientId: string; redirectUri: string; scope: string; state: string }
): string {
  const query = new URLSearchParams({
    response_type: 'code',
    client_id: params.clientId,
    redirect_uri: params.redirectUri,
    scope: params.scope,
    state: params.state,
  });
  return `${resolveBaseUrl(config.env, config.baseUrl)}/oauth/authorize?${query.toString()}`;
}
