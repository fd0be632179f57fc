import { z } from 'zod';
import { JOB_EVENTS } from '../services/eventRouter';

export const jobEventSchema = z.object({
  event: z.enum(JOB_EVENTS).default('saved'),
});

export type JobEventInput = z.infer<typeof jobEventSchema>;
