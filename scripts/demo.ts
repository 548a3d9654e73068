#!/usr/bin/env npx tsx
/**
 * demo.ts
 *
 * Runs the sample claims in scripts/fixtures through the decision engine
 * in-process and prints an explanation for each. No database needed.
 *
 * Usage: npx tsx scripts/demo.ts [path/to/claims.json]
 * Env:   RULES_* thresholds, as for the backend
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { DecisionEngine, explainDecision, runBatch, summarizeBatch } from '@claimsentry/engine';
import { engineConfigFromEnv, parseEngineConfig, type Verdict } from '@claimsentry/shared';

const DEFAULT_FIXTURE = fileURLToPath(new URL('./fixtures/sample-claims.json', import.meta.url));

// ─── ANSI colors ──────────────────────────────────────────────────────────────

const GREEN = '\x1b[32m';
const RED = '\x1b[31m';
const YELLOW = '\x1b[33m';
const CYAN = '\x1b[36m';
const DIM = '\x1b[2m';
const BOLD = '\x1b[1m';
const RESET = '\x1b[0m';

const VERDICT_COLORS: Record<Verdict, string> = {
  APPROVED: GREEN,
  REJECTED: RED,
  MANUAL_REVIEW: YELLOW,
};

function heading(msg: string) {
  console.log(`\n${BOLD}${CYAN}${'='.repeat(60)}${RESET}`);
  console.log(`${BOLD}${CYAN}  ${msg}${RESET}`);
  console.log(`${BOLD}${CYAN}${'='.repeat(60)}${RESET}\n`);
}

const FixtureSchema = z.object({
  submittedAt: z.string().datetime({ offset: true }),
  items: z.array(z.object({ claim: z.unknown(), confidence: z.unknown().optional() })),
});

function loadFixture(path: string) {
  return FixtureSchema.parse(JSON.parse(readFileSync(path, 'utf8')));
}

function main(): void {
  const fixture = loadFixture(process.argv[2] ?? DEFAULT_FIXTURE);
  const engine = new DecisionEngine(parseEngineConfig(engineConfigFromEnv(process.env)));
  const at = new Date(fixture.submittedAt);

  heading(`Assessing ${fixture.items.length} claim(s)`);
  const submissions = fixture.items.map(({ claim, confidence }) => ({ claim, confidence }));
  const results = runBatch(engine, submissions, { at });

  for (const result of results) {
    if (result.status === 'failure') {
      console.log(`${RED}${BOLD}${result.claimId}: ${result.error.kind}${RESET} ${result.error.message}`);
      for (const detail of result.error.details) console.log(`  ${DIM}${detail}${RESET}`);
    } else {
      const color = VERDICT_COLORS[result.assessment.decision.verdict];
      const [first = '', ...rest] = explainDecision(result.assessment).split('\n');
      console.log(`${color}${BOLD}${first}${RESET}`);
      for (const line of rest) console.log(`  ${line}`);
      console.log(`  ${DIM}decision ${result.assessment.decision.decisionId.slice(0, 12)}${RESET}`);
    }
    console.log();
  }

  heading('Summary');
  const summary = summarizeBatch(results);
  console.log(`  ${GREEN}approved${RESET}       ${summary.approved}`);
  console.log(`  ${RED}rejected${RESET}       ${summary.rejected}`);
  console.log(`  ${YELLOW}manual review${RESET}  ${summary.manualReview}`);
  console.log(`  ${RED}failed${RESET}         ${summary.failed}`);
  console.log(`  ${BOLD}total${RESET}          ${summary.total}`);
}

try {
  main();
} catch (err) {
  console.error(`${RED}Demo failed:${RESET}`, err);
  process.exit(1);
}
