/**
 * Interaction Style Decision Routes
 *
 * Endpoints:
 * - POST /api/v1/style/decide      - Decide the style for a context
 * - GET  /api/v1/style/rules       - List the loaded rules in priority order
 * - GET  /api/v1/style/attributes  - List context attributes and their values
 * - GET  /api/v1/style/health      - Health check
 *
 * The bare POST /decide endpoint (decision only, no envelope) is mounted
 * from index.ts using decideHandler.
 */

import { Router, Request, Response } from 'express';
import { ConfigurationError, ValidationError } from '../lib/errors';
import { decideStyle, describeContext, getDecisionSummary } from '../services/style-decision-engine';
import { getStyleRules, peekStyleRules } from '../services/style-rules-loader';
import { parseInteractionContext } from '../services/interaction-context';
import { emitStyleDecisionEvent } from '../services/decision-event-service';
import {
  CONTEXT_ATTRIBUTES,
  CONTEXT_ATTRIBUTE_DESCRIPTIONS,
  CONTEXT_ATTRIBUTE_NAMES,
  InteractionContext,
  StyleDecision,
  StyleRuleSet
} from '../types/interaction-style';

const router = Router();

// =============================================================================
// Shared Helpers
// =============================================================================

interface DecisionOutcome {
  decision: StyleDecision;
  context: InteractionContext;
  ruleSet: StyleRuleSet;
}

export const JSON_BODY_REQUIRED = 'body: Content-Type must be application/json';

export function sendValidationError(res: Response, err: ValidationError): Response {
  console.warn('[StyleDecision] Validation failed:', err.issues.join(', '));
  return res.status(400).json({
    ok: false,
    error: err.message,
    details: err.issues.join(', ')
  });
}

function sendConfigurationError(res: Response, err: ConfigurationError): Response {
  console.error('[StyleDecision] Style rules unavailable:', err.message);
  return res.status(500).json({
    ok: false,
    error: 'Style rules unavailable',
    message: err.message
  });
}

/**
 * Validate, decide and audit. Returns null when a response was already sent.
 */
async function runDecision(req: Request, res: Response): Promise<DecisionOutcome | null> {
  if (!req.is('application/json')) {
    sendValidationError(res, new ValidationError('Validation failed', [JSON_BODY_REQUIRED]));
    return null;
  }

  let context: InteractionContext;
  try {
    context = parseInteractionContext(req.body);
  } catch (err) {
    if (err instanceof ValidationError) {
      sendValidationError(res, err);
      return null;
    }
    throw err;
  }

  let ruleSet: StyleRuleSet;
  try {
    ruleSet = await getStyleRules();
  } catch (err) {
    if (err instanceof ConfigurationError) {
      sendConfigurationError(res, err);
      return null;
    }
    throw err;
  }

  const decision = decideStyle(context, ruleSet);
  console.log(`[StyleDecision] ${describeContext(context)} -> ${getDecisionSummary(decision, ruleSet)}`);

  await emitStyleDecisionEvent(decision, context, ruleSet);

  return { decision, context, ruleSet };
}

/**
 * POST /decide
 *
 * Responds with the bare decision: { style, matched_rule_index }.
 */
export async function decideHandler(req: Request, res: Response): Promise<void> {
  try {
    const outcome = await runDecision(req, res);
    if (!outcome) return;
    res.status(200).json(outcome.decision);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[StyleDecision] Decision error:', message);
    res.status(500).json({ ok: false, error: 'Style decision failed', message });
  }
}

// =============================================================================
// Routes
// =============================================================================

/**
 * POST /decide -> POST /api/v1/style/decide
 */
router.post('/decide', async (req: Request, res: Response) => {
  console.log('[StyleDecision] POST /style/decide');

  try {
    const outcome = await runDecision(req, res);
    if (!outcome) return;

    return res.status(200).json({
      ok: true,
      style: outcome.decision.style,
      matched_rule_index: outcome.decision.matched_rule_index,
      summary: getDecisionSummary(outcome.decision, outcome.ruleSet)
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('[StyleDecision] Decision error:', message);
    return res.status(500).json({
      ok: false,
      error: 'Style decision failed',
      message
    });
  }
});

/**
 * GET /rules -> GET /api/v1/style/rules
 *
 * Loaded rules in evaluation order.
 */
router.get('/rules', async (_req: Request, res: Response) => {
  console.log('[StyleDecision] GET /style/rules');

  try {
    const ruleSet = await getStyleRules();

    return res.status(200).json({
      ok: true,
      version: ruleSet.version ?? null,
      source: ruleSet.source,
      fallback_style: ruleSet.fallback_style,
      rules: ruleSet.rules.map((rule, index) => ({
        index,
        conditions: rule.conditions,
        style: rule.style,
        description: rule.description ?? null
      })),
      count: ruleSet.rules.length
    });
  } catch (err) {
    if (err instanceof ConfigurationError) {
      return sendConfigurationError(res, err);
    }
    const message = err instanceof Error ? err.message : String(err);
    return res.status(500).json({ ok: false, error: 'Failed to list style rules', message });
  }
});

/**
 * GET /attributes -> GET /api/v1/style/attributes
 */
router.get('/attributes', (_req: Request, res: Response) => {
  const attributes = CONTEXT_ATTRIBUTE_NAMES.map(name => ({
    name,
    description: CONTEXT_ATTRIBUTE_DESCRIPTIONS[name],
    values: CONTEXT_ATTRIBUTES[name]
  }));

  return res.status(200).json({
    ok: true,
    attributes,
    count: attributes.length
  });
});

/**
 * GET /health -> GET /api/v1/style/health
 */
router.get('/health', (_req: Request, res: Response) => {
  const ruleSet = peekStyleRules();

  return res.status(200).json({
    ok: true,
    status: 'ok',
    service: 'style-decision',
    timestamp: new Date().toISOString(),
    rules: {
      loaded: ruleSet !== null,
      count: ruleSet ? ruleSet.rules.length : 0,
      source: ruleSet ? ruleSet.source.kind : null
    }
  });
});

export default router;
