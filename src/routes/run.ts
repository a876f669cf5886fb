import { Router } from 'express';
import { DecisionHistory } from '../observability/decisionRecord';
import { getRunState } from '../state/runMonitor';
import { parseLimit } from './asyncHandler';

export function createRunRouter(decisions: DecisionHistory): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const run = getRunState();
    const latest = decisions.latest();
    res.json({
      ...run,
      progress:
        run.status === 'done'
          ? 1
          : run.durationSeconds && run.simTimeSeconds !== null
            ? run.simTimeSeconds / run.durationSeconds
            : 0,
      lastDecision: latest
        ? {
            simTime: latest.simTime,
            timestamp: latest.timestamp,
            action: latest.action,
            totalKw: latest.totalKw,
            ceilingKw: latest.ceilingKw,
            factor: latest.factor,
          }
        : null,
    });
  });

  router.get('/decisions', (req, res) => {
    const limit = parseLimit(req.query.limit, 1000);
    if (limit === null) {
      res.status(400).json({ error: 'limit must be a positive integer' });
      return;
    }
    res.json(decisions.list(limit));
  });

  return router;
}
