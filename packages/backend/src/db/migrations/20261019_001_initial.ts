import type { Knex } from 'knex';

export async function up(knex: Knex): Promise<void> {
  // claim_decisions: append-only, keyed by the decision content hash
  await knex.schema.createTable('claim_decisions', (t) => {
    t.string('id', 64).primary();
    t.string('claim_id', 100).notNullable().index('idx_decisions_claim');
    t.enum('verdict', ['APPROVED', 'REJECTED', 'MANUAL_REVIEW'])
      .notNullable()
      .index('idx_decisions_verdict');
    t.enum('precedence_rule', [
      'VALIDATION_FAILED',
      'AMOUNT_EXCEEDS_MAXIMUM',
      'AUTO_APPROVAL',
      'MANUAL_REVIEW',
      'MANUAL_CORRECTION',
    ]).notNullable();
    t.double('overall_confidence').notNullable();
    t.json('rationale_json').notNullable();
    t.json('validation_json').nullable();
    t.json('rule_outcomes_json').nullable();
    t.string('supersedes_decision_id', 64).nullable();
    t.timestamp('decided_at', { precision: 3 }).notNullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
    t.foreign('supersedes_decision_id').references('claim_decisions.id');
  });

  // audit_log
  await knex.schema.createTable('audit_log', (t) => {
    t.string('id', 36).primary();
    t.string('claim_id', 100).nullable().index('idx_audit_claim');
    t.string('event_type', 50).notNullable().index('idx_audit_event');
    t.enum('actor_type', ['SYSTEM', 'USER', 'ENGINE']).notNullable();
    t.string('actor_id', 100).nullable();
    t.json('detail_json').notNullable();
    t.timestamp('created_at').notNullable().defaultTo(knex.fn.now());
  });
}

export async function down(knex: Knex): Promise<void> {
  await knex.schema.dropTableIfExists('audit_log');
  await knex.schema.dropTableIfExists('claim_decisions');
}
