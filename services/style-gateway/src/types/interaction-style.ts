/**
 * Interaction Style Types
 *
 * Core types for the deterministic interaction style decision engine.
 * A context describes what is known about the user at decision time; an
 * ordered rule list maps contexts to a named style.
 *
 * All decisions are deterministic: same inputs -> same outputs.
 */

import { z } from 'zod';

// =============================================================================
// Context Attributes (Canon)
// =============================================================================

export const KNOWLEDGE_LEVELS = ['novice', 'intermediate', 'expert'] as const;
export const EMOTIONS = ['positive', 'neutral', 'negative'] as const;
export const GOAL_CLARITIES = ['clear', 'ambiguous'] as const;
export const URGENCY_LEVELS = ['high', 'normal', 'low'] as const;
export const STAKES_LEVELS = ['high', 'medium', 'low'] as const;

export type KnowledgeLevel = typeof KNOWLEDGE_LEVELS[number];
export type Emotion = typeof EMOTIONS[number];
export type GoalClarity = typeof GOAL_CLARITIES[number];
export type Urgency = typeof URGENCY_LEVELS[number];
export type Stakes = typeof STAKES_LEVELS[number];

/**
 * Closed value set for every context attribute.
 * Order here is the order attributes are reported and checked.
 */
export const CONTEXT_ATTRIBUTES = {
  knowledge: KNOWLEDGE_LEVELS,
  emotion: EMOTIONS,
  clarity: GOAL_CLARITIES,
  urgency: URGENCY_LEVELS,
  stakes: STAKES_LEVELS
} as const;

export type ContextAttribute = keyof typeof CONTEXT_ATTRIBUTES;

export const CONTEXT_ATTRIBUTE_NAMES: readonly ContextAttribute[] = [
  'knowledge',
  'emotion',
  'clarity',
  'urgency',
  'stakes'
];

/**
 * Human-readable description of each attribute (surfaced by the attributes endpoint)
 */
export const CONTEXT_ATTRIBUTE_DESCRIPTIONS: Record<ContextAttribute, string> = {
  knowledge: 'Estimated knowledge level of the user',
  emotion: 'Detected emotional valence',
  clarity: "Clarity of the user's goal",
  urgency: 'Urgency level',
  stakes: 'Risk level of the task'
};

// =============================================================================
// Interaction Context
// =============================================================================

/**
 * Per-attribute schemas. `null` is accepted on the wire and means "unknown".
 */
const knowledgeField = z.enum(KNOWLEDGE_LEVELS).nullish();
const emotionField = z.enum(EMOTIONS).nullish();
const clarityField = z.enum(GOAL_CLARITIES).nullish();
const urgencyField = z.enum(URGENCY_LEVELS).nullish();
const stakesField = z.enum(STAKES_LEVELS).nullish();

/**
 * Inbound context payload. Unknown keys are stripped.
 */
export const InteractionContextSchema = z.object({
  knowledge: knowledgeField,
  emotion: emotionField,
  clarity: clarityField,
  urgency: urgencyField,
  stakes: stakesField
});

export type InteractionContextInput = z.infer<typeof InteractionContextSchema>;

/**
 * A context as the engine sees it: every attribute optional, never null.
 */
export type InteractionContext = Readonly<{
  knowledge?: KnowledgeLevel;
  emotion?: Emotion;
  clarity?: GoalClarity;
  urgency?: Urgency;
  stakes?: Stakes;
}>;

// =============================================================================
// Rules
// =============================================================================

/**
 * Constraint mapping: only the attributes present are checked.
 */
export type StyleConditions = Readonly<{
  knowledge?: KnowledgeLevel;
  emotion?: Emotion;
  clarity?: GoalClarity;
  urgency?: Urgency;
  stakes?: Stakes;
}>;

export interface StyleRule {
  readonly conditions: StyleConditions;
  /** Free-form style label returned when this rule wins */
  readonly style: string;
  readonly description?: string;
}

export const DEFAULT_FALLBACK_STYLE = 'hybrid';

export type StyleRuleSource =
  | { kind: 'file'; path: string }
  | { kind: 'supabase'; table: string };

/**
 * A loaded, validated rule configuration. List order is priority order.
 */
export interface StyleRuleSet {
  readonly rules: readonly StyleRule[];
  readonly fallback_style: string;
  readonly source: StyleRuleSource;
  readonly version?: string;
}

// =============================================================================
// Decision
// =============================================================================

export interface StyleDecision {
  style: string;
  /** Zero-based index of the winning rule, or -1 for the fallback */
  matched_rule_index: number;
}

export const NO_MATCH_INDEX = -1;
