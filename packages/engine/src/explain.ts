import type { ClaimAssessment } from '@claimsentry/shared';
import { formatPercent } from './format.js';

/**
 * Human-readable account of an assessment for reviewers and the demo CLI.
 */
export function explainDecision(assessment: ClaimAssessment): string {
  const { decision, validation, ruleOutcomes } = assessment;
  const lines = [
    `Claim ${decision.claimId}: ${decision.verdict}`,
    `Confidence: ${formatPercent(decision.overallConfidence)}`,
    'Rationale:',
    ...decision.rationale.map((line, i) => `${i + 1}. ${line}`),
  ];

  const failed = ruleOutcomes.filter((outcome) => !outcome.passed);
  if (failed.length > 0) {
    lines.push('Failed rules:', ...failed.map((outcome) => `- ${outcome.ruleName}: ${outcome.detail}`));
  }

  if (validation.issues.length > 0) {
    lines.push(
      'Issues:',
      ...validation.issues.map((issue) => `- [${issue.severity}] ${issue.code} ${issue.field}: ${issue.message}`),
    );
  }
  return lines.join('\n');
}
