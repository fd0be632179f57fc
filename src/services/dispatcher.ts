import { randomUUID } from 'crypto';
import { config } from '../config';
import type {
  ChannelKind,
  ChannelSummary,
  ContextBundle,
  ContextualTemplateConfig,
  DispatchStatus,
  RootEntity,
  ScheduleConfig,
} from '../types/notification';
import { Clock, systemClock } from '../utils/clock';
import { settleWithConcurrency } from '../utils/concurrency';
import {
  AppError,
  ChannelError,
  ConfigurationError,
  DeliveryFailure,
  DispatchError,
  NotFoundError,
} from '../utils/errors';
import { resolveAudience } from './audienceResolver';
import type { ChannelFactory, ChannelSender } from './channels';
import { CompiledContext, compileContext, resolutionErrors, resolveContext } from './contextResolver';
import type { RelationshipProvider } from './relationshipProvider';
import { InProcessScheduleLock, ScheduleLock } from './scheduleLock';
import type { ScheduleStore } from './scheduleStore';
import type { TemplateRenderer } from './templateEngine';
import { assertScheduleConfig, evaluateWindow } from './triggerWindow';

export interface DispatcherDeps {
  store: ScheduleStore;
  provider: RelationshipProvider;
  renderer: TemplateRenderer;
  channels: ChannelFactory;
  clock?: Clock;
  lock?: ScheduleLock;
  /** Max in-flight deliveries per channel. */
  concurrency?: number;
}

export interface DispatchResult {
  scheduleId: string;
  dispatchId: string;
  status: DispatchStatus;
  reason: string;
  deactivated: boolean;
  recipients: number;
  channels: ChannelSummary[];
  failures: DeliveryFailure[];
}

interface ChannelOutcome {
  summary: ChannelSummary;
  failures: DeliveryFailure[];
}

type DeliveryOutcome = 'sent' | 'duplicate';

/** Key in the resolved context used as the email subject line. */
export const EMAIL_SUBJECT_KEY = 'email_subject';

/**
 * Tracks posts to a single chat room. A message counts as posted only once a
 * send succeeds; a failed attempt hands the message to the next claimant.
 */
class RoomPosts {
  private readonly attempts = new Map<string, Promise<boolean>>();

  /** Resolves to null when the message already reached the room, else to the settle callback of a new attempt. */
  async claim(message: string): Promise<((delivered: boolean) => void) | null> {
    for (;;) {
      const earlier = this.attempts.get(message);
      if (!earlier) break;
      if (await earlier) return null;
      // First waiter after a failure takes over; the rest wait on its attempt
      if (this.attempts.get(message) === earlier) break;
    }
    let settle: (delivered: boolean) => void = () => undefined;
    this.attempts.set(
      message,
      new Promise<boolean>((resolve) => {
        settle = resolve;
      })
    );
    return settle;
  }
}

function configuredChannels(schedule: ScheduleConfig): Array<{ channel: ChannelKind; connectorId: string }> {
  const out: Array<{ channel: ChannelKind; connectorId: string }> = [];
  if (schedule.emailConnectorId) out.push({ channel: 'EMAIL', connectorId: schedule.emailConnectorId });
  if (schedule.smsConnectorId) out.push({ channel: 'SMS', connectorId: schedule.smsConnectorId });
  if (schedule.chatConnectorId) out.push({ channel: 'CHAT', connectorId: schedule.chatConnectorId });
  return out;
}

function emailSubject(context: Record<string, unknown>, fallback: string): string {
  const value = context[EMAIL_SUBJECT_KEY];
  return typeof value === 'string' && value.length > 0 ? value : fallback;
}

function toFailure(channel: ChannelKind, err: unknown, bundle?: ContextBundle): DeliveryFailure {
  return {
    channel,
    recipientId: bundle?.recipient.id,
    code: err instanceof AppError ? err.code : 'UNKNOWN',
    message: err instanceof Error ? err.message : String(err),
  };
}

/**
 * Throw the aggregated failures of a dispatch, if there were any.
 */
export function assertDelivered(result: DispatchResult): void {
  if (result.failures.length > 0) {
    throw new DispatchError(result.scheduleId, result.failures);
  }
}

/**
 * Evaluates a schedule against a root entity and, when its window is open,
 * delivers the rendered template to every resolved recipient on every
 * configured channel.
 *
 * Calls for the same schedule are serialised through the lock so that two
 * near-simultaneous triggers cannot both pass the recurrence check.
 */
export class NotificationDispatcher {
  private readonly store: ScheduleStore;
  private readonly provider: RelationshipProvider;
  private readonly renderer: TemplateRenderer;
  private readonly channels: ChannelFactory;
  private readonly clock: Clock;
  private readonly lock: ScheduleLock;
  private readonly concurrency: number;

  constructor(deps: DispatcherDeps) {
    this.store = deps.store;
    this.provider = deps.provider;
    this.renderer = deps.renderer;
    this.channels = deps.channels;
    this.clock = deps.clock ?? systemClock;
    this.lock = deps.lock ?? new InProcessScheduleLock();
    this.concurrency = deps.concurrency ?? config.dispatch.concurrency;
  }

  dispatch(scheduleId: string, root: RootEntity): Promise<DispatchResult> {
    return this.lock.withLock(scheduleId, () => this.run(scheduleId, root));
  }

  private async run(scheduleId: string, root: RootEntity): Promise<DispatchResult> {
    const schedule = await this.store.findSchedule(scheduleId);
    if (!schedule) throw new NotFoundError(`Schedule ${scheduleId}`);
    assertScheduleConfig(schedule);

    // Template problems abort the dispatch before any deactivation
    const contextual = await this.store.findContextualTemplate(schedule.contextualTemplateId);
    if (!contextual) {
      throw new ConfigurationError(`Schedule ${schedule.name} references a missing template`);
    }
    const compiled = compileContext(contextual.context);
    for (const err of resolutionErrors(compiled)) {
      console.warn(`[Dispatcher] ${schedule.name}: ${err.message}; rendering it as null`);
    }

    const result: DispatchResult = {
      scheduleId,
      dispatchId: randomUUID(),
      status: 'skipped',
      reason: '',
      deactivated: false,
      recipients: 0,
      channels: [],
      failures: [],
    };

    const channels = configuredChannels(schedule);
    if (channels.length === 0) {
      return { ...result, status: 'inert', reason: 'no connector configured' };
    }

    const decision = evaluateWindow(schedule, root, this.clock.now());
    if (decision.shouldDeactivate && schedule.active) {
      await this.store.deactivate(schedule.id);
      result.deactivated = true;
      console.log(`[Dispatcher] Deactivated schedule ${schedule.name} (${decision.reason})`);
    }
    if (!decision.eligible) {
      return { ...result, status: 'skipped', reason: decision.reason };
    }

    const audience = await resolveAudience(this.provider, schedule.filters, root);
    result.recipients = audience.length;
    if (audience.length === 0) {
      return { ...result, status: 'empty', reason: 'no recipients' };
    }

    console.log(
      `[Dispatcher] ${schedule.name}: ${audience.length} recipients on ${channels.map((c) => c.channel).join(', ')}`
    );

    const outcomes = await Promise.all(
      channels.map(({ channel, connectorId }) =>
        this.deliverChannel(schedule, channel, connectorId, audience, contextual, compiled, result.dispatchId)
      )
    );

    for (const outcome of outcomes) {
      result.channels.push(outcome.summary);
      result.failures.push(...outcome.failures);
    }
    result.status = 'dispatched';
    result.reason = decision.reason;

    if (result.failures.length > 0) {
      console.error(`[Dispatcher] ${schedule.name}: ${result.failures.length} deliveries failed`);
    }
    return result;
  }

  private recipientAddress(channel: ChannelKind, schedule: ScheduleConfig, bundle: ContextBundle): string {
    const { recipient } = bundle;
    let address: string | null | undefined;
    switch (channel) {
      case 'EMAIL':
        address = recipient.email;
        break;
      case 'SMS':
        address = recipient.phoneNumber;
        break;
      case 'CHAT':
        address = schedule.chatUsers ? recipient.chatUser : schedule.chatRoom;
        break;
    }
    if (!address) {
      throw new ChannelError(channel, `Recipient ${recipient.id} has no ${channel.toLowerCase()} address`);
    }
    return address;
  }

  private async deliverChannel(
    schedule: ScheduleConfig,
    channel: ChannelKind,
    connectorId: string,
    audience: readonly ContextBundle[],
    contextual: ContextualTemplateConfig,
    compiled: CompiledContext,
    dispatchId: string
  ): Promise<ChannelOutcome> {
    const summary: ChannelSummary = { channel, attempted: 0, sent: 0 };

    let sender: ChannelSender;
    try {
      const connector = await this.store.findConnector(connectorId);
      if (!connector || !connector.isActive) {
        throw new ChannelError(channel, `Connector ${connectorId} is missing or inactive`);
      }
      sender = this.channels(connector);
    } catch (err) {
      console.error(`[Dispatcher] ${schedule.name}: ${channel} unavailable:`, err instanceof Error ? err.message : err);
      return { summary, failures: [toFailure(channel, err)] };
    }

    // A fixed chat room gets each distinct message once
    const roomPosts = channel === 'CHAT' && !schedule.chatUsers ? new RoomPosts() : null;
    const failures: DeliveryFailure[] = [];

    const settled = await settleWithConcurrency(audience, this.concurrency, async (bundle): Promise<DeliveryOutcome> => {
      const context = resolveContext(compiled, bundle);
      const message = await this.renderer.render(contextual.template, context);
      const address = this.recipientAddress(channel, schedule, bundle);

      let settleRoomPost: ((delivered: boolean) => void) | null = null;
      if (roomPosts) {
        settleRoomPost = await roomPosts.claim(message);
        if (!settleRoomPost) return 'duplicate';
      }

      const subject = channel === 'EMAIL' ? emailSubject(context, contextual.template.name) : null;

      try {
        await sender.send(address, message, { subject: subject ?? undefined, html: contextual.template.html });
      } catch (err) {
        settleRoomPost?.(false);
        throw err;
      }
      settleRoomPost?.(true);

      try {
        await this.store.recordNotification({
          dispatchId,
          contextualTemplateId: contextual.id,
          scheduleId: schedule.id,
          recipientId: bundle.recipient.id,
          connectorId: sender.connectorId,
          channel,
          address,
          subject,
          sentAt: this.clock.now(),
        });
      } catch (err) {
        // Delivered already; only the audit row is missing
        failures.push({ ...toFailure(channel, err, bundle), address, code: 'RECORD_FAILED' });
        console.error(`[Dispatcher] Failed to record ${channel} notification to ${address}:`, err);
      }
      return 'sent';
    });

    settled.forEach((outcome, index) => {
      if (outcome.status === 'fulfilled') {
        if (outcome.value === 'duplicate') return;
        summary.attempted++;
        summary.sent++;
        return;
      }
      summary.attempted++;
      const failure = toFailure(channel, outcome.reason, audience[index]);
      failures.push(failure);
      console.error(`[Dispatcher] ${schedule.name}: ${channel} to ${failure.recipientId}: ${failure.message}`);
    });

    if (summary.sent > 0) {
      try {
        await this.store.markSent(schedule.id, this.clock.now());
      } catch (err) {
        failures.push({ ...toFailure(channel, err), code: 'MARK_SENT_FAILED' });
        console.error(`[Dispatcher] ${schedule.name}: failed to update lastSentAt:`, err);
      }
    }
    console.log(`[Dispatcher] ${schedule.name}: ${channel} sent ${summary.sent}/${summary.attempted}`);
    return { summary, failures };
  }
}
