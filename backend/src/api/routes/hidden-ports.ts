import { Router } from 'express';
import type { HiddenPortStore } from '../../services/hidden-port-store.js';
import { serializeHiddenEntries } from '../serializers.js';
import { sendStoreError, validateBody } from '../middleware.js';

export function createHiddenPortsRouter(store: HiddenPortStore): Router {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      const entries = await store.list();
      res.json({ entries: serializeHiddenEntries(entries) });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  // Body: { port, protocol? } or { start, end, protocol? }
  router.post('/', async (req, res, next) => {
    try {
      const result = await store.hide(req.body ?? {});
      res.json({ entries: serializeHiddenEntries(result.entries), changed: result.changed });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  router.delete('/', async (req, res, next) => {
    try {
      const result = await store.unhide(req.body ?? {});
      res.json({ entries: serializeHiddenEntries(result.entries), changed: result.changed });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  // Body: { ports: [...], protocol? }; items are port numbers or target objects
  router.post('/batch', validateBody(['ports']), async (req, res, next) => {
    const { ports, protocol } = req.body;
    if (!Array.isArray(ports)) {
      res.status(400).json({ error: 'ports must be an array' });
      return;
    }
    try {
      const result = await store.hideBatch(ports, protocol);
      res.json({ entries: serializeHiddenEntries(result.entries), changed: result.changed });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  router.delete('/batch', validateBody(['ports']), async (req, res, next) => {
    const { ports, protocol } = req.body;
    if (!Array.isArray(ports)) {
      res.status(400).json({ error: 'ports must be an array' });
      return;
    }
    try {
      const result = await store.unhideBatch(ports, protocol);
      res.json({ entries: serializeHiddenEntries(result.entries), changed: result.changed });
    } catch (err) {
      sendStoreError(err, res, next);
    }
  });

  return router;
}
