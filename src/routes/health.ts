import { Router } from 'express';
import logger from '../utils/logger';

/**
 * @param pageCount Reports how many pages the loaded corpus holds
 */
export function createHealthRouter(pageCount: () => number): Router {
  const router = Router();

  router.get('/', (req, res) => {
    logger.debug('Health check request received');
    res.status(200).json({
      status: 'success',
      message: 'Server is healthy',
      pages: pageCount(),
      timestamp: new Date().toISOString(),
    });
  });

  return router;
}
