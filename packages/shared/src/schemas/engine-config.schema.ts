import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
import { formatZodIssues } from './claim.schema.js';

export const CONFIDENCE_FUSION_NAMES = ['minimum', 'geometric-mean'] as const;

export const EngineConfigSchema = z
  .object({
    /** Claims billed above this are rejected outright. */
    maxClaimAmount: z.number().positive().default(100_000),
    /** Claims at or below this are eligible for auto-approval. */
    autoApprovalAmountCeiling: z.number().nonnegative().default(1_000),
    autoApprovalConfidenceFloor: z.number().min(0).max(1).default(0.8),
    minDocumentationScore: z.number().min(0).max(1).default(0.5),
    serviceDateWindowDays: z.number().int().positive().default(365),
    /** Field Validator sanity ceiling; above it the amount itself is invalid. */
    amountHardCeiling: z.number().positive().default(100_000),
    /** Field Validator warns on extracted fields scored below this. */
    lowConfidenceFloor: z.number().min(0).max(1).default(0.6),
    confidenceFusion: z.enum(CONFIDENCE_FUSION_NAMES).default('minimum'),
  })
  .strict()
  .refine((c) => c.autoApprovalAmountCeiling <= c.maxClaimAmount, {
    message: 'autoApprovalAmountCeiling must not exceed maxClaimAmount',
    path: ['autoApprovalAmountCeiling'],
  });

export type EngineConfig = Readonly<z.output<typeof EngineConfigSchema>>;
export type EngineConfigInput = z.input<typeof EngineConfigSchema>;
export type ConfidenceFusionName = (typeof CONFIDENCE_FUSION_NAMES)[number];

/**
 * Apply defaults and range checks to an engine configuration.
 * @throws ConfigurationError listing every offending option.
 */
export function parseEngineConfig(input: unknown = {}): EngineConfig {
  const result = EngineConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError('Invalid engine configuration', formatZodIssues(result.error));
  }
  return Object.freeze(result.data);
}

function optionalNumber(value: string | undefined): number | undefined {
  return value === undefined || value.trim() === '' ? undefined : Number(value);
}

/**
 * Engine options from `RULES_*` environment variables. Unset values are left
 * out so the schema defaults apply; pass the result to `parseEngineConfig`.
 */
export function engineConfigFromEnv(env: Record<string, string | undefined>) {
  return {
    maxClaimAmount: optionalNumber(env.RULES_MAX_CLAIM_AMOUNT),
    autoApprovalAmountCeiling: optionalNumber(env.RULES_AUTO_APPROVAL_AMOUNT_CEILING),
    autoApprovalConfidenceFloor: optionalNumber(env.RULES_AUTO_APPROVAL_CONFIDENCE_FLOOR),
    minDocumentationScore: optionalNumber(env.RULES_MIN_DOCUMENTATION_SCORE),
    serviceDateWindowDays: optionalNumber(env.RULES_SERVICE_DATE_WINDOW_DAYS),
    amountHardCeiling: optionalNumber(env.RULES_AMOUNT_HARD_CEILING),
    lowConfidenceFloor: optionalNumber(env.RULES_LOW_CONFIDENCE_FLOOR),
    confidenceFusion: env.RULES_CONFIDENCE_FUSION,
  };
}
