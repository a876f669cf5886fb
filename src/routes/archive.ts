import { Router } from 'express';
import { ArchiveStore } from '../recorder/archiveStore';
import { ArchiveRecord } from '../types/wecs';
import { asyncHandler, parseLimit } from './asyncHandler';

export const UNCAPPED = 'uncapped';

export function presentArchiveRecord(record: ArchiveRecord) {
  return {
    ...record,
    powerCapKw: record.powerCapKw === null ? UNCAPPED : record.powerCapKw,
  };
}

export function createArchiveRouter(store: ArchiveStore): Router {
  const router = Router();

  router.get(
    '/',
    asyncHandler(async (req, res) => {
      const limit = parseLimit(req.query.limit, 10_000);
      if (limit === null) {
        res.status(400).json({ error: 'limit must be a positive integer' });
        return;
      }
      const { entityId, runId } = req.query;
      if (entityId !== undefined && typeof entityId !== 'string') {
        res.status(400).json({ error: 'entityId must be a single value' });
        return;
      }
      if (runId !== undefined && typeof runId !== 'string') {
        res.status(400).json({ error: 'runId must be a single value' });
        return;
      }

      const records = await store.read({ entityId, runId, limit: limit ?? 500 });
      res.json({ backend: store.kind, count: records.length, records: records.map(presentArchiveRecord) });
    }),
  );

  return router;
}
