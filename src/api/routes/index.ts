import { Router } from 'express';
import accountsRoutes from './accounts.routes';
import { getMetrics } from '@/api/controllers/metrics.controller';

const router = Router();

// Health check endpoint (skipped by request and metrics logging)
router.get('/health', (_req, res) => {
  res.json({ status: 'OK' });
});

// Prometheus-format metrics
router.get('/metrics', getMetrics);

router.use('/accounts', accountsRoutes);

export default router;
