import { SchemaError, type Claim, type ConfidenceFusionName, type FieldConfidence } from '@claimsentry/shared';
import { extractedFields } from './claim-profile.js';

/**
 * Combines mean field confidence and documentation score into the single
 * confidence a decision is made on. Must return a value in [0, 1].
 */
export type ConfidenceFusion = (meanFieldConfidence: number, documentationScore: number) => number;

/** Conservative: the weaker signal wins. */
export const minimumFusion: ConfidenceFusion = (meanFieldConfidence, documentationScore) =>
  Math.min(meanFieldConfidence, documentationScore);

export const geometricMeanFusion: ConfidenceFusion = (meanFieldConfidence, documentationScore) =>
  Math.sqrt(meanFieldConfidence * documentationScore);

export const CONFIDENCE_FUSIONS: Readonly<Record<ConfidenceFusionName, ConfidenceFusion>> = {
  minimum: minimumFusion,
  'geometric-mean': geometricMeanFusion,
};

/** Score for one field; a field the extractor did not score counts as 0. */
export function confidenceFor(confidence: FieldConfidence, field: string): number {
  return Object.hasOwn(confidence, field) ? (confidence[field] ?? 0) : 0;
}

function assertConfidenceMap(confidence: FieldConfidence): void {
  const bad = Object.entries(confidence)
    .filter(([, score]) => typeof score !== 'number' || !Number.isFinite(score) || score < 0 || score > 1)
    .map(([field, score]) => `${field}: ${String(score)} is not a confidence in [0, 1]`);
  if (bad.length > 0) {
    throw new SchemaError('Field confidence map is malformed', bad);
  }
}

/**
 * Mean extraction confidence over the claim's extracted fields.
 * @throws SchemaError for scores outside [0, 1].
 */
export function meanFieldConfidence(claim: Claim, confidence: FieldConfidence): number {
  assertConfidenceMap(confidence);
  const fields = extractedFields(claim);
  if (fields.length === 0) return 0;
  const total = fields.reduce((sum, field) => sum + confidenceFor(confidence, field), 0);
  return total / fields.length;
}
