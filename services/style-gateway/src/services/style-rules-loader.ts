/**
 * Style Rules Loader
 *
 * Loads the ordered style rule list once per process and hands the same
 * read-only rule set to every decision.
 *
 * Sources:
 * - file:     YAML document (default: config/style_rules.yaml)
 * - supabase: active rows of a rules table, ordered by position
 *
 * Any malformed entry rejects the whole rule set with a ConfigurationError.
 */

import fs from 'fs';
import * as yaml from 'js-yaml';
import { z } from 'zod';
import { getSupabase } from '../lib/supabase';
import { getServiceConfig } from '../lib/service-config';
import { ConfigurationError, formatZodIssues } from '../lib/errors';
import {
  DEFAULT_FALLBACK_STYLE,
  EMOTIONS,
  GOAL_CLARITIES,
  KNOWLEDGE_LEVELS,
  STAKES_LEVELS,
  StyleConditions,
  StyleRule,
  StyleRuleSet,
  StyleRuleSource,
  URGENCY_LEVELS
} from '../types/interaction-style';

// =============================================================================
// Document Schema
// =============================================================================

/**
 * Condition keys are closed; a null value means "no constraint".
 */
const ConditionsSchema = z
  .object({
    knowledge: z.enum(KNOWLEDGE_LEVELS).nullish(),
    emotion: z.enum(EMOTIONS).nullish(),
    clarity: z.enum(GOAL_CLARITIES).nullish(),
    urgency: z.enum(URGENCY_LEVELS).nullish(),
    stakes: z.enum(STAKES_LEVELS).nullish()
  })
  .strict();

const StyleLabelSchema = z
  .string({ required_error: 'style is required', invalid_type_error: 'style must be a string' })
  .refine(s => s.trim().length > 0, 'style must not be empty');

const RuleEntrySchema = z.object({
  conditions: ConditionsSchema.nullish(),
  style: StyleLabelSchema,
  description: z.string().nullish()
});

const RulesDocumentSchema = z.object({
  version: z.union([z.string(), z.number()]).optional(),
  fallback_style: StyleLabelSchema.optional(),
  strategies: z.array(RuleEntrySchema).nullish()
});

type RuleEntry = z.infer<typeof RuleEntrySchema>;

function describeSource(source: StyleRuleSource): string {
  return source.kind === 'file' ? source.path : `supabase:${source.table}`;
}

/**
 * Drop null/absent constraints so only real requirements remain.
 */
function toConditions(raw: RuleEntry['conditions']): StyleConditions {
  const conditions: {
    -readonly [K in keyof StyleConditions]: StyleConditions[K];
  } = {};
  if (!raw) return conditions;

  if (raw.knowledge) conditions.knowledge = raw.knowledge;
  if (raw.emotion) conditions.emotion = raw.emotion;
  if (raw.clarity) conditions.clarity = raw.clarity;
  if (raw.urgency) conditions.urgency = raw.urgency;
  if (raw.stakes) conditions.stakes = raw.stakes;
  return Object.freeze(conditions);
}

function toRule(entry: RuleEntry): StyleRule {
  const rule: StyleRule = entry.description
    ? { conditions: toConditions(entry.conditions), style: entry.style, description: entry.description }
    : { conditions: toConditions(entry.conditions), style: entry.style };
  return Object.freeze(rule);
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validate a parsed rules document and build a frozen rule set.
 */
export function parseStyleRulesDocument(raw: unknown, source: StyleRuleSource): StyleRuleSet {
  const where = describeSource(source);

  if (raw === null || raw === undefined) {
    throw new ConfigurationError(`Style rules config at ${where} is empty`);
  }

  const parsed = RulesDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = formatZodIssues(parsed.error);
    throw new ConfigurationError(`Style rules config at ${where} is malformed: ${issues.join('; ')}`, issues);
  }

  const doc = parsed.data;
  const rules = Object.freeze((doc.strategies ?? []).map(toRule));

  return Object.freeze({
    rules,
    fallback_style: doc.fallback_style ?? DEFAULT_FALLBACK_STYLE,
    source,
    ...(doc.version !== undefined ? { version: String(doc.version) } : {})
  });
}

/**
 * Read and validate a YAML rules file.
 */
export function loadStyleRulesFromFile(filePath: string): StyleRuleSet {
  if (!fs.existsSync(filePath)) {
    throw new ConfigurationError(`Style rules config not found at ${filePath}`);
  }

  let contents: string;
  try {
    contents = fs.readFileSync(filePath, 'utf8');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Style rules config at ${filePath} could not be read: ${message}`);
  }

  let raw: unknown;
  try {
    raw = yaml.load(contents, { filename: filePath });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Style rules config at ${filePath} is not valid YAML: ${message}`);
  }

  return parseStyleRulesDocument(raw, { kind: 'file', path: filePath });
}

/**
 * Load active rules from a Supabase table, lowest position first.
 * Rows carry the same fields as a YAML entry; other columns are ignored.
 */
export async function loadStyleRulesFromSupabase(table: string): Promise<StyleRuleSet> {
  const supabase = getSupabase();

  if (!supabase) {
    throw new ConfigurationError('Supabase not configured - cannot fetch style rules');
  }

  const { data, error } = await supabase
    .from(table)
    .select('conditions, style, description')
    .eq('is_active', true)
    .order('position', { ascending: true });

  if (error) {
    console.error('[StyleRules] Error fetching rules:', error.message);
    throw new ConfigurationError(`Failed to fetch style rules from ${table}: ${error.message}`);
  }

  return parseStyleRulesDocument({ strategies: data ?? [] }, { kind: 'supabase', table });
}

// =============================================================================
// Process-wide Cache
// =============================================================================

let cachedRuleSet: StyleRuleSet | null = null;
let pendingLoad: Promise<StyleRuleSet> | null = null;

async function loadFromConfiguredSource(): Promise<StyleRuleSet> {
  const config = getServiceConfig();
  const ruleSet = config.rulesSource === 'supabase'
    ? await loadStyleRulesFromSupabase(config.rulesTable)
    : loadStyleRulesFromFile(config.rulesPath);

  console.log(
    `[StyleRules] Loaded ${ruleSet.rules.length} rules from ${describeSource(ruleSet.source)} ` +
    `(fallback: ${ruleSet.fallback_style})`
  );
  return ruleSet;
}

/**
 * Load the configured rule set on first call and reuse it afterwards.
 * Concurrent first callers share one load; a failed load is not cached.
 */
export function getStyleRules(): Promise<StyleRuleSet> {
  if (cachedRuleSet) return Promise.resolve(cachedRuleSet);
  if (pendingLoad) return pendingLoad;

  pendingLoad = loadFromConfiguredSource()
    .then(ruleSet => {
      cachedRuleSet = ruleSet;
      return ruleSet;
    })
    .finally(() => {
      pendingLoad = null;
    });

  return pendingLoad;
}

/**
 * The cached rule set, or null before the first successful load.
 */
export function peekStyleRules(): StyleRuleSet | null {
  return cachedRuleSet;
}

export function resetStyleRulesCache(): void {
  cachedRuleSet = null;
  pendingLoad = null;
}
