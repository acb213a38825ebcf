import cors from 'cors';
import express from 'express';
import { z } from 'zod';
import { httpLog } from '../../shared/src/logger';
import { formatTarget } from '../../shared/src/models';
import type { Actuator } from './actuator';
import type { ClientTargetRegistry } from './clientTargetRegistry';
import type { DeviceLink } from './deviceLink';
import { type RelayStats, type VehicleStatus, videoTargetSchema } from './models';

export interface ApiDeps {
  registry: ClientTargetRegistry;
  actuator: Actuator;
  relay: { stats(): RelayStats };
  channel: { sessionCount(): number };
  battery: () => number;
  deviceLink?: DeviceLink;
}

export function collectStatus(deps: ApiDeps): VehicleStatus {
  return {
    state: deps.actuator.snapshot(),
    battery: deps.battery(),
    target: deps.registry.get(),
    sessions: deps.channel.sessionCount(),
    relay: deps.relay.stats(),
    device: deps.deviceLink?.status(),
  };
}

export function buildRouter(deps: ApiDeps): express.Router {
  const router = express.Router();

  router.get('/vehicle/status', (_req, res) => {
    res.json(collectStatus(deps));
  });

  // Same effect as a `stop` on the command channel
  router.post('/vehicle/stop', (_req, res) => {
    httpLog.info('POST /vehicle/stop');
    deps.actuator.stop();
    res.status(202).json({ status: 'stopped' });
  });

  // Manual target for bench testing; not owned by any command connection
  router.post('/vehicle/video-target', (req, res, next) => {
    try {
      const target = videoTargetSchema.parse(req.body);
      deps.registry.set(target);
      httpLog.info(`POST /vehicle/video-target ${formatTarget(target)}`);
      res.status(202).json({ status: 'registered', target });
    } catch (err) {
      next(err);
    }
  });

  router.delete('/vehicle/video-target', (_req, res) => {
    httpLog.info('DELETE /vehicle/video-target');
    deps.registry.clear();
    res.status(204).end();
  });

  // Error handler
  router.use(
    (
      err: unknown,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction
    ) => {
      if (err instanceof z.ZodError) {
        res.status(400).json({ error: 'invalid_payload', details: err.errors });
        return;
      }
      httpLog.error('Unexpected error', err);
      res.status(500).json({ error: 'internal_error' });
    }
  );

  return router;
}

export function createApp(deps: ApiDeps): express.Express {
  const app = express();
  app.use(cors());
  app.use(express.json());
  app.use(buildRouter(deps));
  return app;
}
