import { Router, Request, Response, NextFunction } from 'express';
import { Types } from 'mongoose';
import { validate } from '../middleware/validate';
import { createScheduleSchema, dispatchRequestSchema, updateScheduleSchema } from '../validators/schedule';
import type { CreateScheduleInput, DispatchRequest, UpdateScheduleInput } from '../validators/schedule';
import { NotificationSchedule } from '../models/NotificationSchedule';
import { toScheduleConfig } from '../services/scheduleStore';
import { assertScheduleConfig } from '../services/triggerWindow';
import { loadRoot } from '../services/relationshipProvider';
import { getRuntime } from '../services/runtime';
import { ConflictError, NotFoundError } from '../utils/errors';

const router = Router();

function isDuplicateKey(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;
}

async function findScheduleOr404(id: string) {
  const schedule = Types.ObjectId.isValid(id) ? await NotificationSchedule.findById(id) : null;
  if (!schedule) throw new NotFoundError('Schedule');
  return schedule;
}

/**
 * GET /api/schedules?active=true&triggerType=job
 */
router.get('/', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const filter: Record<string, unknown> = {};
    if (req.query.active !== undefined) filter.active = req.query.active === 'true';
    if (typeof req.query.triggerType === 'string') filter.triggerType = req.query.triggerType;

    const schedules = await NotificationSchedule.find(filter).sort({ name: 1 }).lean();
    res.json({ success: true, data: { schedules } });
  } catch (err) {
    next(err);
  }
});

/**
 * POST /api/schedules
 */
router.post('/', validate(createScheduleSchema), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const input: CreateScheduleInput = req.body;
    const schedule = new NotificationSchedule(input);
    assertScheduleConfig(toScheduleConfig(schedule));

    try {
      await schedule.save();
    } catch (err) {
      if (isDuplicateKey(err)) throw new ConflictError(`A schedule named "${input.name}" already exists`);
      throw err;
    }

    res.status(201).json({ success: true, data: { schedule } });
  } catch (err) {
    next(err);
  }
});

/**
 * PATCH /api/schedules/:id
 */
router.patch('/:id', validate(updateScheduleSchema), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const input: UpdateScheduleInput = req.body;
    const schedule = await findScheduleOr404(req.params.id);
    schedule.set(input);
    assertScheduleConfig(toScheduleConfig(schedule));
    await schedule.save();

    res.json({ success: true, data: { schedule } });
  } catch (err) {
    next(err);
  }
});

/**
 * POST /api/schedules/:id/dispatch: run one dispatch synchronously and
 * return its batch result.
 */
router.post('/:id/dispatch', validate(dispatchRequestSchema), async (req: Request, res: Response, next: NextFunction) => {
  try {
    const { root: ref }: DispatchRequest = req.body;
    const { dispatcher, provider } = getRuntime();

    const schedule = await findScheduleOr404(req.params.id);
    const root = await loadRoot(provider, ref);
    if (!root) throw new NotFoundError(ref.kind === 'job' ? 'Job' : 'Subject group');

    const result = await dispatcher.dispatch(String(schedule._id), root);
    res.json({ success: result.failures.length === 0, data: { result } });
  } catch (err) {
    next(err);
  }
});

export default router;
