import { Router } from 'express';
import { access } from 'node:fs/promises';

export interface HealthOptions {
  templatePath: string;
}

export function createHealthRouter(options: HealthOptions): Router {
  const health = Router();

  health.get('/health/app', async (_req, res) => {
    const templateReady = await access(options.templatePath).then(
      () => true,
      () => false,
    );

    res.status(templateReady ? 200 : 503).json({
      success: templateReady,
      app: {
        status: templateReady ? 'pass' : 'fail',
        build: process.env.GIT_SHA || 'dev',
        template: templateReady ? 'present' : 'missing',
      },
    });
  });

  return health;
}
