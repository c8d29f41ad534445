import { Hono } from 'hono';
import { getHealthStatus } from './health.js';
import {
  handleApplicationDetails,
  handleApply,
  handleAudit,
  handleListApplications,
  handlePreview,
  handleStatus,
  handleStatusAll,
} from './handlers.js';
import type { Orchestrator } from './orchestrator.js';

export type AppOptions = {
  operatorSecret: string;
};

export const createApp = (orchestrator: Orchestrator, options: AppOptions) => {
  const app = new Hono();

  app.get('/health', (c) => c.json(getHealthStatus(orchestrator.listApplications().length)));

  app.get('/v1/applications', (c) => {
    const result = handleListApplications(orchestrator);
    return c.json(result.body, result.status);
  });

  app.get('/v1/applications/:app', (c) => {
    const result = handleApplicationDetails(orchestrator, c.req.param('app'));
    return c.json(result.body, result.status);
  });

  app.get('/v1/status', async (c) => {
    const result = await handleStatusAll(orchestrator, c.req.raw.signal);
    return c.json(result.body, result.status);
  });

  app.get('/v1/applications/:app/status', async (c) => {
    const result = await handleStatus(orchestrator, c.req.param('app'), c.req.raw.signal);
    return c.json(result.body, result.status);
  });

  app.post('/v1/applications/:app/actions/:action/preview', async (c) => {
    const result = await handlePreview(orchestrator, c.req.param('app'), c.req.param('action'), await c.req.text());
    return c.json(result.body, result.status);
  });

  app.post('/v1/applications/:app/actions/:action/apply', async (c) => {
    const result = await handleApply(
      orchestrator,
      c.req.raw,
      c.req.param('app'),
      c.req.param('action'),
      options.operatorSecret,
    );
    return c.json(result.body, result.status);
  });

  app.get('/v1/audit', async (c) => {
    const result = await handleAudit(orchestrator, c.req.query('app'));
    return c.json(result.body, result.status);
  });

  return app;
};
