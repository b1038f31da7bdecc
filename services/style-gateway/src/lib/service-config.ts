/**
 * Style gateway settings, read from the environment once per process.
 */

import path from 'path';
import { z } from 'zod';
import { ConfigurationError, formatZodIssues } from './errors';

export const DEFAULT_STYLE_RULES_PATH = path.resolve(__dirname, '../../config/style_rules.yaml');

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform(v => v === 'true' || v === '1');

const ServiceConfigSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(8080),
  STYLE_RULES_SOURCE: z.enum(['file', 'supabase']).default('file'),
  STYLE_RULES_PATH: z.string().min(1).default(DEFAULT_STYLE_RULES_PATH),
  STYLE_RULES_TABLE: z.string().min(1).default('style_rules'),
  STYLE_DECISION_AUDIT: booleanFlag,
  STYLE_DECISION_EVENTS_TABLE: z.string().min(1).default('style_decision_events'),
  CORS_ALLOWED_ORIGINS: z
    .string()
    .optional()
    .transform(v => (v ?? '').split(',').map(o => o.trim()).filter(o => o.length > 0))
});

export interface ServiceConfig {
  port: number;
  rulesSource: 'file' | 'supabase';
  rulesPath: string;
  rulesTable: string;
  auditEnabled: boolean;
  decisionEventsTable: string;
  corsAllowedOrigins: string[];
}

/**
 * Parse settings from an environment map. Empty strings count as unset.
 */
export function parseServiceConfig(env: NodeJS.ProcessEnv): ServiceConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      cleaned[key] = value;
    }
  }

  const parsed = ServiceConfigSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigurationError('Invalid style gateway environment', formatZodIssues(parsed.error));
  }

  const data = parsed.data;
  return {
    port: data.PORT,
    rulesSource: data.STYLE_RULES_SOURCE,
    rulesPath: path.resolve(data.STYLE_RULES_PATH),
    rulesTable: data.STYLE_RULES_TABLE,
    auditEnabled: data.STYLE_DECISION_AUDIT,
    decisionEventsTable: data.STYLE_DECISION_EVENTS_TABLE,
    corsAllowedOrigins: data.CORS_ALLOWED_ORIGINS
  };
}

let cachedConfig: ServiceConfig | null = null;

export const getServiceConfig = (): ServiceConfig => {
  if (cachedConfig) return cachedConfig;
  cachedConfig = parseServiceConfig(process.env);
  return cachedConfig;
};

export function resetServiceConfig(): void {
  cachedConfig = null;
}
