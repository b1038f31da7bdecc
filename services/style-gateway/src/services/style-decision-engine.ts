/**
 * Interaction Style Decision Engine
 *
 * Selects an interaction style for a context by scanning an ordered rule
 * list. The first rule whose conditions all hold wins; when none holds the
 * configured fallback style is returned with index -1.
 *
 * Core Principles:
 * - Deterministic: same (context, rules) -> same decision
 * - First match wins: list order is priority order
 * - Total: every well-formed input yields exactly one decision
 * - Pure: inputs are only read, never modified
 */

import {
  CONTEXT_ATTRIBUTE_NAMES,
  DEFAULT_FALLBACK_STYLE,
  InteractionContext,
  NO_MATCH_INDEX,
  StyleDecision,
  StyleRule,
  StyleRuleSet
} from '../types/interaction-style';

// =============================================================================
// Matching
// =============================================================================

/**
 * True when every constrained attribute is set on the context with the
 * required value. Unconstrained attributes are wildcards.
 */
export function ruleMatchesContext(rule: StyleRule, context: InteractionContext): boolean {
  for (const attribute of CONTEXT_ATTRIBUTE_NAMES) {
    const required = rule.conditions[attribute];
    if (required === undefined) continue;
    if (context[attribute] !== required) return false;
  }
  return true;
}

/**
 * Evaluate rules in order and return the first match.
 */
export function evaluateStyleRules(
  context: InteractionContext,
  rules: readonly StyleRule[],
  fallbackStyle: string = DEFAULT_FALLBACK_STYLE
): StyleDecision {
  for (let index = 0; index < rules.length; index++) {
    const rule = rules[index];
    if (ruleMatchesContext(rule, context)) {
      return { style: rule.style, matched_rule_index: index };
    }
  }

  return { style: fallbackStyle, matched_rule_index: NO_MATCH_INDEX };
}

/**
 * Decide against a loaded rule set, honouring its fallback style.
 */
export function decideStyle(context: InteractionContext, ruleSet: StyleRuleSet): StyleDecision {
  return evaluateStyleRules(context, ruleSet.rules, ruleSet.fallback_style);
}

// =============================================================================
// Reporting
// =============================================================================

/**
 * Compact "key=value" rendering of the attributes that are set.
 */
export function describeContext(context: InteractionContext): string {
  const parts = CONTEXT_ATTRIBUTE_NAMES
    .filter(attribute => context[attribute] !== undefined)
    .map(attribute => `${attribute}=${context[attribute]}`);
  return parts.length > 0 ? parts.join(' ') : '(empty)';
}

/**
 * Get a summary of a decision for logging.
 */
export function getDecisionSummary(decision: StyleDecision, ruleSet: StyleRuleSet): string {
  if (decision.matched_rule_index === NO_MATCH_INDEX) {
    return `${decision.style} (fallback, ${ruleSet.rules.length} rules checked)`;
  }
  return `${decision.style} (rule #${decision.matched_rule_index} of ${ruleSet.rules.length})`;
}
