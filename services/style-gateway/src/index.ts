import express from 'express';
import { setupCors } from './middleware/cors';
import { jsonBodyErrors } from './middleware/json-errors';
import styleDecisionRouter, { decideHandler } from './routes/style-decision';
import { getServiceConfig } from './lib/service-config';
import { getStyleRules } from './services/style-rules-loader';

const app = express();

setupCors(app);

// JSON body parser must come before route handlers
app.use(express.json());

// Liveness
app.get('/healthz', (_req, res) => {
  res.json({ status: 'ok' });
});

app.get('/health', (_req, res) => {
  res.json({ status: 'healthy', timestamp: new Date().toISOString() });
});

app.get('/alive', (_req, res) => {
  res.json({ status: 'ok', service: 'style-gateway', timestamp: new Date().toISOString() });
});

app.post('/decide', decideHandler);
app.use('/api/v1/style', styleDecisionRouter);

// Must follow the routes: turns body-parser failures into JSON 400s
app.use(jsonBodyErrors);

/**
 * Load the style rules before accepting traffic; an unloadable rule set is fatal.
 */
export async function startServer(): Promise<void> {
  const { port } = getServiceConfig();

  try {
    await getStyleRules();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    console.error('❌ Style gateway cannot start:', message);
    process.exit(1);
  }

  app.listen(port, () => {
    console.log('✅ Style gateway running on port ' + port);
    console.log('🎯 Decide: POST http://localhost:' + port + '/decide');
  });
}

// Start server
if (process.env.NODE_ENV !== 'test') {
  startServer().catch(err => {
    console.error('❌ Style gateway crashed during startup:', err);
    process.exit(1);
  });
}

export default app;
