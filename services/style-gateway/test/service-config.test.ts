import path from 'path';
import { parseServiceConfig, DEFAULT_STYLE_RULES_PATH } from '../src/lib/service-config';
import { ConfigurationError } from '../src/lib/errors';

describe('parseServiceConfig', () => {
  test('applies defaults to an empty environment', () => {
    expect(parseServiceConfig({})).toEqual({
      port: 8080,
      rulesSource: 'file',
      rulesPath: DEFAULT_STYLE_RULES_PATH,
      rulesTable: 'style_rules',
      auditEnabled: false,
      decisionEventsTable: 'style_decision_events',
      corsAllowedOrigins: []
    });
  });

  test('the default rules path points at the shipped config directory', () => {
    expect(path.basename(DEFAULT_STYLE_RULES_PATH)).toBe('style_rules.yaml');
    expect(path.basename(path.dirname(DEFAULT_STYLE_RULES_PATH))).toBe('config');
  });

  test('reads explicit settings', () => {
    const config = parseServiceConfig({
      PORT: '9090',
      STYLE_RULES_SOURCE: 'supabase',
      STYLE_RULES_PATH: '/srv/rules.yaml',
      STYLE_RULES_TABLE: 'tone_rules',
      STYLE_DECISION_AUDIT: '1',
      CORS_ALLOWED_ORIGINS: 'https://a.example.test, https://b.example.test,'
    });

    expect(config.port).toBe(9090);
    expect(config.rulesSource).toBe('supabase');
    expect(config.rulesPath).toBe('/srv/rules.yaml');
    expect(config.rulesTable).toBe('tone_rules');
    expect(config.auditEnabled).toBe(true);
    expect(config.corsAllowedOrigins).toEqual(['https://a.example.test', 'https://b.example.test']);
  });

  test('resolves a relative rules path against the working directory', () => {
    const config = parseServiceConfig({ STYLE_RULES_PATH: 'config/rules.yaml' });

    expect(config.rulesPath).toBe(path.resolve('config/rules.yaml'));
  });

  test('blank values count as unset', () => {
    const config = parseServiceConfig({ PORT: '', STYLE_RULES_SOURCE: '  ' });

    expect(config.port).toBe(8080);
    expect(config.rulesSource).toBe('file');
  });

  test('rejects an unknown rules source', () => {
    expect(() => parseServiceConfig({ STYLE_RULES_SOURCE: 'redis' })).toThrow(ConfigurationError);
  });

  test('lists every invalid setting', () => {
    try {
      parseServiceConfig({ PORT: 'eighty', STYLE_DECISION_AUDIT: 'yes' });
      throw new Error('expected a ConfigurationError');
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.message).toBe('Invalid style gateway environment');
      expect(err.issues).toHaveLength(2);
      expect(err.issues[0]).toMatch(/^PORT: /);
      expect(err.issues[1]).toMatch(/^STYLE_DECISION_AUDIT: /);
    }
  });
});
