import { Router, Request, Response, NextFunction } from 'express';
import { validate } from '../middleware/validate';
import { jobEventSchema, JobEventInput } from '../validators/events';
import { getRuntime } from '../services/runtime';

const router = Router();

/**
 * POST /api/events/jobs/:jobId { event: 'saved' | 'location_changed' | 'tick' }
 */
router.post('/jobs/:jobId', validate(jobEventSchema), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { event }: JobEventInput = req.body;
    const queued = await getRuntime().events.jobEvent(req.params.jobId, event);
    res.status(202).json({ success: true, data: { queued } });
  } catch (err) {
    next(err);
  }
});

/**
 * POST /api/events/subject-groups/:subjectGroupId
 */
router.post('/subject-groups/:subjectGroupId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const queued = await getRuntime().events.subjectGroupEvent(req.params.subjectGroupId);
    res.status(202).json({ success: true, data: { queued } });
  } catch (err) {
    next(err);
  }
});

export default router;
