import {
  ConfigurationError,
  SchemaError,
  parseClaim,
  parseEngineConfig,
  parseFieldConfidence,
  sha256,
  stableStringify,
  type Claim,
  type ClaimAssessment,
  type Decision,
  type DecisionCorrection,
  type EngineConfig,
  type EngineConfigInput,
  type FieldConfidence,
  type RuleName,
  type RuleOutcome,
  type ValidationResult,
} from '@claimsentry/shared';
import { CONFIDENCE_FUSIONS, meanFieldConfidence, type ConfidenceFusion } from './confidence.js';
import { validateClaim } from './field-validator.js';
import { formatNumber } from './format.js';
import { RulesEngine } from './rules-engine.js';

export interface DecisionEngineOptions {
  /** Source of decision timestamps when a call does not pass one. */
  clock?: () => Date;
  /** Overrides the fusion named by `config.confidenceFusion`. */
  fusion?: ConfidenceFusion;
}

/**
 * Freeze a decision and stamp it with a content hash of its fields.
 */
export function buildDecision(fields: Omit<Decision, 'decisionId'>): Decision {
  const decisionId = sha256(stableStringify(fields));
  return Object.freeze({ decisionId, ...fields, rationale: Object.freeze([...fields.rationale]) });
}

/**
 * A correction never edits the original: it is a new decision that
 * references the one it supersedes.
 */
export function correctDecision(previous: Decision, correction: DecisionCorrection, at: Date): Decision {
  const reason = correction.reason.trim();
  const correctedBy = correction.correctedBy.trim();
  if (reason === '' || correctedBy === '') {
    throw new SchemaError('Decision correction is malformed', [
      ...(reason === '' ? ['reason: required'] : []),
      ...(correctedBy === '' ? ['correctedBy: required'] : []),
    ]);
  }
  return buildDecision({
    claimId: previous.claimId,
    verdict: correction.verdict,
    precedenceRule: 'MANUAL_CORRECTION',
    overallConfidence: previous.overallConfidence,
    rationale: [
      `manual correction by ${correctedBy}`,
      `verdict ${previous.verdict} -> ${correction.verdict}`,
      `reason: ${reason}`,
    ],
    timestamp: at.toISOString(),
    supersedesDecisionId: previous.decisionId,
  });
}

function requireOutcome(outcomes: readonly RuleOutcome[], name: RuleName): RuleOutcome {
  const outcome = outcomes.find((o) => o.ruleName === name);
  if (!outcome) {
    throw new SchemaError(`Rule outcome "${name}" is missing`, [`ruleOutcomes: expected an entry for ${name}`]);
  }
  return outcome;
}

/**
 * Fuses validation, business rules and extraction confidence into one
 * auditable decision. Configuration is fixed at construction; build a new
 * engine to change thresholds.
 */
export class DecisionEngine {
  readonly config: EngineConfig;
  private readonly rules: RulesEngine;
  private readonly fusion: ConfidenceFusion;
  private readonly clock: () => Date;

  /** @throws ConfigurationError for out-of-range thresholds. */
  constructor(config: EngineConfigInput = {}, options: DecisionEngineOptions = {}) {
    this.config = parseEngineConfig(config);
    this.rules = new RulesEngine(this.config);
    this.fusion = options.fusion ?? CONFIDENCE_FUSIONS[this.config.confidenceFusion];
    this.clock = options.clock ?? (() => new Date());
  }

  validate(claim: Claim, confidence: FieldConfidence = {}): ValidationResult {
    return validateClaim(claim, confidence, this.config);
  }

  evaluateRules(claim: Claim, validation: ValidationResult): readonly RuleOutcome[] {
    return this.rules.evaluate(claim, validation);
  }

  overallConfidence(claim: Claim, validation: ValidationResult, confidence: FieldConfidence): number {
    const score = validation.documentationScore;
    if (!Number.isFinite(score) || score < 0 || score > 1) {
      throw new SchemaError('Validation result is malformed', [`documentationScore: ${score} is not in [0, 1]`]);
    }
    const mean = meanFieldConfidence(claim, confidence);
    const fused = this.fusion(mean, validation.documentationScore);
    if (!Number.isFinite(fused) || fused < 0 || fused > 1) {
      throw new ConfigurationError(`Confidence fusion returned ${fused}, expected a value in [0, 1]`);
    }
    return fused;
  }

  /**
   * Apply the decision precedence, first match wins:
   * validation errors, amount over maximum, auto-approval, manual review.
   */
  decide(
    claim: Claim,
    validation: ValidationResult,
    ruleOutcomes: readonly RuleOutcome[],
    extractionConfidence: FieldConfidence,
    at: Date = this.clock(),
  ): Decision {
    const maxAmount = requireOutcome(ruleOutcomes, 'max-claim-amount');
    const approvalAmount = requireOutcome(ruleOutcomes, 'auto-approval-amount');
    const documentation = requireOutcome(ruleOutcomes, 'documentation-completeness');

    const mean = meanFieldConfidence(claim, extractionConfidence);
    const overallConfidence = this.overallConfidence(claim, validation, extractionConfidence);
    const floor = this.config.autoApprovalConfidenceFloor;
    const confidenceMet = overallConfidence >= floor;
    const confidenceLine = `overallConfidence ${formatNumber(overallConfidence)} ${confidenceMet ? '>=' : '<'} autoApprovalConfidenceFloor ${formatNumber(floor)}`;
    const inputsLine = `meanFieldConfidence ${formatNumber(mean)}, documentationScore ${formatNumber(validation.documentationScore)}`;

    const base = { claimId: claim.claimId, overallConfidence, timestamp: at.toISOString() };

    if (!validation.valid) {
      const errors = validation.issues.filter((issue) => issue.severity === 'error');
      return buildDecision({
        ...base,
        verdict: 'REJECTED',
        precedenceRule: 'VALIDATION_FAILED',
        rationale: [
          'validation failed',
          `errorIssues ${errors.length} > 0`,
          ...errors.map((issue) => `${issue.code} (${issue.field}): ${issue.message}`),
          inputsLine,
        ],
      });
    }

    if (!maxAmount.passed) {
      return buildDecision({
        ...base,
        verdict: 'REJECTED',
        precedenceRule: 'AMOUNT_EXCEEDS_MAXIMUM',
        rationale: ['amount exceeds maximum', maxAmount.detail, inputsLine],
      });
    }

    const comparisons = [approvalAmount.detail, confidenceLine, documentation.detail, inputsLine];
    if (approvalAmount.passed && confidenceMet && documentation.passed) {
      return buildDecision({
        ...base,
        verdict: 'APPROVED',
        precedenceRule: 'AUTO_APPROVAL',
        rationale: ['auto-approval criteria met', ...comparisons],
      });
    }

    return buildDecision({
      ...base,
      verdict: 'MANUAL_REVIEW',
      precedenceRule: 'MANUAL_REVIEW',
      rationale: ['manual review required', ...comparisons],
    });
  }

  /** Validate, evaluate every rule and decide; the audit trail always comes back with the verdict. */
  assess(claim: Claim, confidence: FieldConfidence = {}, at: Date = this.clock()): ClaimAssessment {
    const validation = this.validate(claim, confidence);
    const ruleOutcomes = this.evaluateRules(claim, validation);
    const decision = this.decide(claim, validation, ruleOutcomes, confidence, at);
    return Object.freeze({ decision, validation, ruleOutcomes });
  }

  /**
   * Assess an unparsed extractor record.
   * @throws SchemaError when the record or its confidence map is malformed.
   */
  assessRecord(record: unknown, confidence?: unknown, at: Date = this.clock()): ClaimAssessment {
    return this.assess(parseClaim(record), parseFieldConfidence(confidence), at);
  }

  correct(previous: Decision, correction: DecisionCorrection, at: Date = this.clock()): Decision {
    return correctDecision(previous, correction, at);
  }
}
