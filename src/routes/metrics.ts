import { Router } from 'express';
import {
  collectHealthMetrics,
  metricsContentType,
  renderPrometheus,
} from '../observability/metrics';

const router = Router();

router.get('/', (_req, res) => {
  collectHealthMetrics();
  res.setHeader('Content-Type', metricsContentType());
  res.send(renderPrometheus());
});

export default router;
