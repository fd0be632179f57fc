import { Router } from 'express';
import { apiKeyAuth } from '../middleware/apiKeyAuth';
import { apiRateLimiter } from '../middleware/rateLimiter';
import eventRoutes from './events';
import scheduleRoutes from './schedules';

const router = Router();

router.use(apiKeyAuth);
router.use(apiRateLimiter);

router.use('/events', eventRoutes);
router.use('/schedules', scheduleRoutes);

export default router;
