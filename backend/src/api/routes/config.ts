import { Router } from 'express';
import type { ServiceNameRegistry } from '../../services/service-names.js';
import { sendStoreError, validateBody } from '../middleware.js';

const MAX_NAME_LENGTH = 64;

function toJson(names: Map<number, string>): Record<string, string> {
  return Object.fromEntries(Array.from(names, ([port, name]) => [String(port), name]));
}

export function createConfigRouter(registry: ServiceNameRegistry): Router {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      res.json({ serviceNames: toJson(await registry.overrides()) });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  router.post('/', validateBody(['port', 'service_name']), async (req, res, next) => {
    const { port, service_name: serviceName } = req.body;
    if (typeof serviceName !== 'string' || !serviceName.trim()) {
      res.status(400).json({ error: 'service_name must be a non-empty string' });
      return;
    }
    if (serviceName.trim().length > MAX_NAME_LENGTH) {
      res.status(400).json({ error: `service_name must be at most ${MAX_NAME_LENGTH} characters` });
      return;
    }
    try {
      res.json({ serviceNames: toJson(await registry.setName(port, serviceName)) });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  router.delete('/', validateBody(['port']), async (req, res, next) => {
    try {
      res.json({ serviceNames: toJson(await registry.removeName(req.body.port)) });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  return router;
}
