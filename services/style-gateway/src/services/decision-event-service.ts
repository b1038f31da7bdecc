/**
 * Style Decision Audit Events
 *
 * Records every served decision in a Supabase table when auditing is
 * enabled. Emission is best effort and never affects the response.
 */

import { randomUUID } from 'crypto';
import { getSupabase } from '../lib/supabase';
import { getServiceConfig } from '../lib/service-config';
import { InteractionContext, NO_MATCH_INDEX, StyleDecision, StyleRuleSet } from '../types/interaction-style';

export interface StyleDecisionEventResult {
  ok: boolean;
  event_id?: string;
  skipped?: boolean;
  error?: string;
}

/**
 * Emit a decision event for audit.
 */
export async function emitStyleDecisionEvent(
  decision: StyleDecision,
  context: InteractionContext,
  ruleSet: StyleRuleSet
): Promise<StyleDecisionEventResult> {
  const config = getServiceConfig();
  if (!config.auditEnabled) {
    return { ok: true, skipped: true };
  }

  const supabase = getSupabase();
  if (!supabase) {
    return { ok: false, error: 'Supabase not configured' };
  }

  const eventId = randomUUID();

  try {
    const { error } = await supabase.from(config.decisionEventsTable).insert({
      id: eventId,
      created_at: new Date().toISOString(),
      style: decision.style,
      matched_rule_index: decision.matched_rule_index,
      fallback: decision.matched_rule_index === NO_MATCH_INDEX,
      context,
      rule_source: ruleSet.source.kind,
      rule_count: ruleSet.rules.length,
      rules_version: ruleSet.version ?? null
    });

    if (error) {
      console.warn(`[StyleDecision] Failed to emit decision event: ${error.message}`);
      return { ok: false, error: error.message };
    }

    return { ok: true, event_id: eventId };
  } catch (err) {
    const errorMessage = err instanceof Error ? err.message : 'Unknown error';
    console.warn(`[StyleDecision] Error emitting decision event: ${errorMessage}`);
    return { ok: false, error: errorMessage };
  }
}
