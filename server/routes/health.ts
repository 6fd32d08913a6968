import { Router } from 'express';

import { getDatabase } from '../database/schema';
import type { Platform } from '../platform';

export function createHealthRouter(platform: Platform): Router {
  const health = Router();

  health.get('/health', (_req, res) => {
    res.json({
      success: true,
      app: {
        status: 'pass',
        build: process.env.GIT_SHA || 'dev',
      },
      database: getDatabase() ? 'postgres' : 'memory',
      queue: platform.queue.driver,
    });
  });

  return health;
}
