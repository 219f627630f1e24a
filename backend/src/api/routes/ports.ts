import { Router, type Request, type Response } from 'express';
import { isProtocol } from '../../models/types.js';
import type { PortService } from '../../services/port-service.js';
import { filterByProtocol, filterEntries } from '../../services/port-search.js';
import { serializeScan } from '../serializers.js';
import { logger } from '../../services/logger.js';

export function createPortsRouter(portService: PortService): Router {
  const router = Router();

  const sendListing = async (req: Request, res: Response, refreshed: boolean): Promise<void> => {
    const { search, protocol } = req.query;
    if (protocol !== undefined && !isProtocol(protocol)) {
      res.status(400).json({ error: 'protocol must be one of: tcp, udp' });
      return;
    }

    try {
      const scan = await portService.scan();
      let entries = scan.entries;
      if (protocol !== undefined) {
        entries = filterByProtocol(entries, protocol);
      }
      if (typeof search === 'string' && search.trim()) {
        entries = filterEntries(entries, search);
      }
      res.json({
        ...serializeScan(scan, entries),
        matched: entries.length,
        ...(refreshed ? { refreshed: true } : {}),
      });
    } catch (err) {
      logger.error({ err }, 'port listing failed');
      const message = err instanceof Error ? err.message : 'Failed to list ports';
      res.status(500).json({ error: message });
    }
  };

  router.get('/ports', (req, res) => sendListing(req, res, false));

  // No cache sits in front of /ports, so a refresh is just another pass
  router.get('/refresh', (req, res) => sendListing(req, res, true));

  return router;
}
