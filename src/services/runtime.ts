import { getRedisClient } from '../config/redis';
import { createChannelSender } from './channels';
import { NotificationDispatcher } from './dispatcher';
import { EventRouter, MongoScheduleDirectory } from './eventRouter';
import { enqueueDispatch } from './queue';
import { HttpRelationshipProvider, RelationshipProvider } from './relationshipProvider';
import { RedisScheduleLock } from './scheduleLock';
import { MongoScheduleStore } from './scheduleStore';
import { HandlebarsRenderer } from './templateEngine';

export interface Runtime {
  provider: RelationshipProvider;
  dispatcher: NotificationDispatcher;
  events: EventRouter;
}

let runtime: Runtime | null = null;

/**
 * Production wiring shared by the API server and the worker.
 */
export function getRuntime(): Runtime {
  if (!runtime) {
    const provider = new HttpRelationshipProvider();
    runtime = {
      provider,
      dispatcher: new NotificationDispatcher({
        store: new MongoScheduleStore(),
        provider,
        renderer: new HandlebarsRenderer(),
        channels: createChannelSender,
        lock: new RedisScheduleLock(getRedisClient()),
      }),
      events: new EventRouter(new MongoScheduleDirectory(), enqueueDispatch),
    };
  }
  return runtime;
}
