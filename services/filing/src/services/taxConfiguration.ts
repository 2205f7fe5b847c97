import { z } from 'zod';
import { AccountType, CalendarDate, PostingSide, TaxKind } from '@ledgerline/shared-types';
import { NotFoundError, ValidationError, calendarDateSchema, currencyCodeSchema, rateFromPercent } from '@ledgerline/shared-utils';
import uk2023 from '../../data/taxConfigurations/uk-2023.1.json';
import uk2024 from '../../data/taxConfigurations/uk-2024.1.json';

const percentSchema = z.string().refine((value) => {
  try {
    rateFromPercent(value);
    return true;
  } catch {
    return false;
  }
}, 'Expected a percentage such as "20" or "17.5"');

const lineRefSchema = z.string().min(1);
const amountSchema = z.number().int();

const selectorSchema = z.object({
  types: z.array(z.nativeEnum(AccountType)).optional(),
  codes: z.array(z.string()).optional(),
  excludeCodes: z.array(z.string()).optional(),
});

const lineRuleSchema = z.discriminatedUnion('kind', [
  z.object({
    kind: z.literal('aggregate'),
    select: selectorSchema,
    /** Side whose movements count as positive. */
    orientation: z.nativeEnum(PostingSide),
    ratePercent: percentSchema.optional(),
    wholeUnits: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('constant'), amount: amountSchema }),
  z.object({ kind: z.literal('sum'), lines: z.array(lineRefSchema).min(1) }),
  z.object({
    kind: z.literal('difference'),
    minuend: lineRefSchema,
    subtrahend: lineRefSchema,
    floorAtZero: z.boolean().optional(),
  }),
  z.object({ kind: z.literal('absDifference'), lines: z.tuple([lineRefSchema, lineRefSchema]) }),
  z.object({
    kind: z.literal('taperedAllowance'),
    base: amountSchema,
    incomeLine: lineRefSchema,
    threshold: amountSchema,
    taperPercent: percentSchema,
  }),
  z.object({
    kind: z.literal('band'),
    of: lineRefSchema,
    from: amountSchema,
    to: amountSchema.optional(),
    ratePercent: percentSchema,
  }),
]);

const lineDefinitionSchema = z.object({
  id: z.string().min(1),
  label: z.string().min(1),
  rule: lineRuleSchema,
});

export const taxConfigurationSchema = z
  .object({
    version: z.string().min(1),
    effectiveFrom: calendarDateSchema,
    currency: currencyCodeSchema,
    vat: z.array(lineDefinitionSchema).min(1),
    incomeTax: z.array(lineDefinitionSchema).min(1),
  })
  .superRefine((config, ctx) => {
    for (const kind of ['vat', 'incomeTax'] as const) {
      const seen = new Set<string>();
      config[kind].forEach((line, index) => {
        for (const reference of referencedLines(line.rule)) {
          if (!seen.has(reference)) {
            ctx.addIssue({
              code: z.ZodIssueCode.custom,
              path: [kind, index, 'rule'],
              message: `Line ${line.id} refers to ${reference}, which is not defined before it`,
            });
          }
        }
        if (seen.has(line.id)) {
          ctx.addIssue({ code: z.ZodIssueCode.custom, path: [kind, index, 'id'], message: `Duplicate line ${line.id}` });
        }
        seen.add(line.id);
      });
    }
  });

export type AccountSelector = z.infer<typeof selectorSchema>;
export type LineRule = z.infer<typeof lineRuleSchema>;
export type LineDefinition = z.infer<typeof lineDefinitionSchema>;
export type TaxConfiguration = z.infer<typeof taxConfigurationSchema>;

/** Lines a rule reads; they must be defined earlier in the same table. */
export function referencedLines(rule: LineRule): string[] {
  switch (rule.kind) {
    case 'aggregate':
    case 'constant':
      return [];
    case 'sum':
      return rule.lines;
    case 'difference':
      return [rule.minuend, rule.subtrahend];
    case 'absDifference':
      return [...rule.lines];
    case 'taperedAllowance':
      return [rule.incomeLine];
    case 'band':
      return [rule.of];
  }
}

export function linesFor(config: TaxConfiguration, kind: TaxKind): LineDefinition[] {
  return kind === TaxKind.VAT ? config.vat : config.incomeTax;
}

export function parseTaxConfiguration(input: unknown): TaxConfiguration {
  const result = taxConfigurationSchema.safeParse(input);
  if (!result.success) {
    throw new ValidationError('Invalid tax configuration', result.error.issues);
  }
  return result.data;
}

/**
 * Versioned tax rules. A configuration is never replaced once registered, so a period closed
 * under a version recomputes under exactly the same rules.
 */
export class TaxConfigurationRegistry {
  private readonly versions = new Map<string, TaxConfiguration>();

  constructor(configurations: TaxConfiguration[] = []) {
    configurations.forEach((configuration) => this.register(configuration));
  }

  register(configuration: TaxConfiguration): void {
    if (this.versions.has(configuration.version)) {
      throw new ValidationError(`Tax configuration ${configuration.version} is already registered`);
    }
    this.versions.set(configuration.version, configuration);
  }

  get(version: string): TaxConfiguration {
    const configuration = this.versions.get(version);
    if (!configuration) {
      throw new NotFoundError('Tax configuration', version);
    }
    return configuration;
  }

  /** Latest version whose `effectiveFrom` is on or before `date`. */
  effectiveOn(date: CalendarDate): TaxConfiguration {
    let effective: TaxConfiguration | undefined;
    for (const configuration of this.versions.values()) {
      if (configuration.effectiveFrom <= date && (!effective || configuration.effectiveFrom > effective.effectiveFrom)) {
        effective = configuration;
      }
    }
    if (!effective) {
      throw new NotFoundError('Tax configuration effective on', date);
    }
    return effective;
  }

  list(): TaxConfiguration[] {
    return [...this.versions.values()];
  }
}

export function defaultTaxConfigurations(): TaxConfigurationRegistry {
  return new TaxConfigurationRegistry([parseTaxConfiguration(uk2023), parseTaxConfiguration(uk2024)]);
}
