import 'dotenv/config';
import express from 'express';
import cron from 'node-cron';
import { getEnv, validateEnv } from './lib/env';
import { getDb, closeDb } from './lib/db';
import { errorMessage } from './lib/errors';
import { getAppConfig } from './lib/config';
import { createWorkflowOrchestrator } from './handlers/workflow';
import { createApiHandlers } from './handlers/api';
import { countProcessed } from './services/processed-posts';

const app = express();
app.use(express.json());

// Initialize database on startup
getDb();

const env = getEnv();
const orchestrator = createWorkflowOrchestrator(env, getAppConfig());
const api = createApiHandlers({ orchestrator, countProcessed });

// Health check
app.get('/health', async (_req, res) => {
  const reply = await api.health();
  res.status(reply.status).json(reply.body);
});

app.get('/pages', (_req, res) => {
  const reply = api.listPages();
  res.status(reply.status).json(reply.body);
});

// Recent workflow results
app.get('/runs', async (req, res) => {
  const reply = await api.recentRuns(req.query.limit);
  res.status(reply.status).json(reply.body);
});

app.get('/schedule', (_req, res) => {
  const reply = api.schedule();
  res.status(reply.status).json(reply.body);
});

// Manual run triggers, executed in the background
app.post('/runs', (_req, res) => {
  const reply = api.startRun();
  res.status(reply.status).json(reply.body);
});

app.post('/runs/:pageId', (req, res) => {
  const reply = api.startRun(req.params.pageId);
  res.status(reply.status).json(reply.body);
});

// ============================================
// START SERVER
// ============================================

const PORT = env.PORT;

if (!cron.validate(env.WORKFLOW_CRON)) {
  console.error(`[server] Invalid WORKFLOW_CRON expression "${env.WORKFLOW_CRON}"`);
  process.exit(1);
}

cron.schedule(env.WORKFLOW_CRON, async () => {
  console.log('[cron] Running scheduled workflow');
  const { valid, missing } = validateEnv(env);
  if (!valid) {
    console.error(`[cron] Missing required env vars: ${missing.join(', ')}`);
    return;
  }
  if (orchestrator.isRunning) {
    console.warn('[cron] Previous run still in progress, skipping');
    return;
  }

  try {
    await orchestrator.run();
  } catch (error) {
    console.error('[cron] Workflow run failed:', errorMessage(error));
  }
});

// Graceful shutdown
process.on('SIGTERM', () => {
  console.log('[server] SIGTERM received, shutting down');
  closeDb();
  process.exit(0);
});

process.on('SIGINT', () => {
  console.log('[server] SIGINT received, shutting down');
  closeDb();
  process.exit(0);
});

app.listen(PORT, '0.0.0.0', () => {
  console.log(`[server] reel-reposter running on port ${PORT}`);
  console.log(`[server] Workflow schedule: ${env.WORKFLOW_CRON}`);
  console.log(`[server] Pages: ${orchestrator.listPages().map((p) => p.id).join(', ')}`);

  const { valid, missing } = validateEnv(env);
  if (!valid) {
    console.warn(`[server] Warning: Missing env vars: ${missing.join(', ')}`);
  }
});
