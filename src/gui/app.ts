import express from 'express';
import path from 'path';

import { EngineConfig } from '../core/config';

export interface AppPaths {
  publicDir: string;
  assetsDir: string;
}

export function resolveAppPaths(projectRoot: string): AppPaths {
  return {
    publicDir: path.resolve(projectRoot, 'public'),
    assetsDir: path.resolve(projectRoot, 'dist', 'assets'),
  };
}

/**
 * Static host for the browser game. The engine runs in the page; the server
 * only hands out the page, the bundle, and the engine settings.
 */
export function createApp(paths: AppPaths, config: EngineConfig): express.Express {
  const app = express();

  app.use('/assets', express.static(paths.assetsDir, { fallthrough: true }));
  app.use(express.static(paths.publicDir, { fallthrough: true }));

  app.get('/api/config', (_req, res) => {
    res.json(config);
  });

  app.use((_req, res) => {
    res.status(404).send('Not Found');
  });

  return app;
}
