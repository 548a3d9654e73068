import {
  calendarDay,
  daysBetween,
  type Claim,
  type EngineConfig,
  type RuleName,
  type RuleOutcome,
  type ValidationResult,
} from '@claimsentry/shared';
import { isBlank } from './claim-profile.js';
import { formatNumber } from './format.js';

interface Rule {
  name: RuleName;
  evaluate(claim: Claim, validation: ValidationResult, config: EngineConfig): Omit<RuleOutcome, 'ruleName'>;
}

function compare(label: string, observed: number, op: '<=' | '>=', thresholdLabel: string, threshold: number) {
  const passed = op === '<=' ? observed <= threshold : observed >= threshold;
  const shownOp = passed ? op : op === '<=' ? '>' : '<';
  return {
    passed,
    observed,
    threshold,
    detail: `${label} ${formatNumber(observed)} ${shownOp} ${thresholdLabel} ${formatNumber(threshold)}`,
  };
}

/** Evaluated in this order; every rule is recorded even when an earlier one already settles the verdict. */
const RULES: readonly Rule[] = [
  {
    name: 'validation-clean',
    evaluate(_claim, validation) {
      const errors = validation.issues.filter((issue) => issue.severity === 'error').length;
      return {
        passed: validation.valid,
        observed: errors,
        threshold: 0,
        detail: validation.valid ? 'no error-severity issues' : `${errors} error-severity issue(s)`,
      };
    },
  },
  {
    name: 'max-claim-amount',
    evaluate(claim, _validation, config) {
      return compare('billedAmount', claim.billedAmount, '<=', 'maxClaimAmount', config.maxClaimAmount);
    },
  },
  {
    name: 'service-date-window',
    evaluate(claim, _validation, config) {
      if (isBlank(claim.serviceDate) || isBlank(claim.submittedAt)) {
        return { passed: false, detail: 'service date or submission date missing' };
      }
      const age = daysBetween(claim.serviceDate, calendarDay(claim.submittedAt));
      const window = config.serviceDateWindowDays;
      return {
        passed: age >= 0 && age <= window,
        observed: age,
        threshold: window,
        detail:
          age < 0
            ? `serviceDate is ${-age} day(s) after submission`
            : `serviceDate is ${age} day(s) before submission (window ${window})`,
      };
    },
  },
  {
    name: 'auto-approval-amount',
    evaluate(claim, _validation, config) {
      return compare(
        'billedAmount',
        claim.billedAmount,
        '<=',
        'autoApprovalAmountCeiling',
        config.autoApprovalAmountCeiling,
      );
    },
  },
  {
    name: 'documentation-completeness',
    evaluate(_claim, validation, config) {
      return compare(
        'documentationScore',
        validation.documentationScore,
        '>=',
        'minDocumentationScore',
        config.minDocumentationScore,
      );
    },
  },
];

/**
 * Claim-level business predicates over a fixed, read-only configuration.
 */
export class RulesEngine {
  constructor(private readonly config: EngineConfig) {}

  get ruleNames(): RuleName[] {
    return RULES.map((rule) => rule.name);
  }

  evaluate(claim: Claim, validation: ValidationResult): readonly RuleOutcome[] {
    return Object.freeze(
      RULES.map((rule) => Object.freeze({ ruleName: rule.name, ...rule.evaluate(claim, validation, this.config) })),
    );
  }
}
