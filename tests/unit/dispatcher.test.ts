import path from 'path';
import { NotificationDispatcher, assertDelivered } from '../../src/services/dispatcher';
import { HandlebarsRenderer, type TemplateRenderer } from '../../src/services/templateEngine';
import type { RootEntity, ScheduleConfig } from '../../src/types/notification';
import { FixedClock } from '../../src/utils/clock';
import { ConfigurationError, DispatchError, NotFoundError, RenderError } from '../../src/utils/errors';
import {
  DAY,
  HOUR,
  NO_FILTERS,
  T0,
  at,
  makeConnector,
  makeContextualTemplate,
  makeEmployee,
  makeJob,
  makeSchedule,
  makeSubjectGroup,
  makeUser,
} from '../support/fixtures';
import { InMemoryRelationshipProvider } from '../support/inMemoryRelationshipProvider';
import { InMemoryScheduleStore } from '../support/inMemoryScheduleStore';
import { RecordingChannels } from '../support/recordingChannels';

describe('NotificationDispatcher', () => {
  const job = makeJob('j1');
  const jobRoot: RootEntity = { kind: 'job', job };

  let store: InMemoryScheduleStore;
  let provider: InMemoryRelationshipProvider;
  let channels: RecordingChannels;
  let clock: FixedClock;
  let dispatcher: NotificationDispatcher;

  const saveSchedule = (overrides: Partial<ScheduleConfig> = {}): ScheduleConfig => {
    const schedule = makeSchedule({
      startTrigger: 'after_job_saved',
      filters: { ...NO_FILTERS, employees: true },
      ...overrides,
    });
    store.schedules.set(schedule.id, schedule);
    return schedule;
  };

  beforeEach(() => {
    store = new InMemoryScheduleStore();
    store.contextualTemplates.set('contextual-1', makeContextualTemplate());
    store.connectors.set('email-1', makeConnector('email-1'));
    store.connectors.set('sms-1', makeConnector('sms-1', { channel: 'SMS', provider: 'twilio' }));
    store.connectors.set('chat-1', makeConnector('chat-1', { channel: 'CHAT', provider: 'slack' }));

    provider = new InMemoryRelationshipProvider().addJob(job);
    provider.jobEmployees.set('j1', [makeEmployee('e1', makeUser('u1')), makeEmployee('e2', makeUser('u2'))]);

    channels = new RecordingChannels();
    clock = new FixedClock(T0);
    dispatcher = buildDispatcher();
  });

  function buildDispatcher(
    renderer: TemplateRenderer = new HandlebarsRenderer(path.join(__dirname, '..', 'fixtures', 'templates')),
    concurrency = 1
  ): NotificationDispatcher {
    return new NotificationDispatcher({ store, provider, renderer, channels: channels.factory, clock, concurrency });
  }

  it('sends a one-shot job schedule to each employee, then retires it', async () => {
    saveSchedule();

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result).toMatchObject({
      scheduleId: 'schedule-1',
      status: 'dispatched',
      reason: 'open, one-shot',
      deactivated: true,
      recipients: 2,
      channels: [{ channel: 'EMAIL', attempted: 2, sent: 2 }],
      failures: [],
    });
    expect(channels.sent).toEqual([
      {
        channel: 'EMAIL',
        connectorId: 'email-1',
        to: 'u1@example.test',
        message: 'Hi Firstu1',
        metadata: { subject: 'Job reminder', html: false },
      },
      {
        channel: 'EMAIL',
        connectorId: 'email-1',
        to: 'u2@example.test',
        message: 'Hi Firstu2',
        metadata: { subject: 'Job reminder', html: false },
      },
    ]);
    expect(store.schedules.get('schedule-1')).toMatchObject({ active: false, lastSentAt: T0 });
    expect(store.notifications.map((n) => [n.recipientId, n.address, n.dispatchId])).toEqual([
      ['u1', 'u1@example.test', result.dispatchId],
      ['u2', 'u2@example.test', result.dispatchId],
    ]);
  });

  it('does not send again once retired', async () => {
    saveSchedule();
    await dispatcher.dispatch('schedule-1', jobRoot);

    const again = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(again).toMatchObject({ status: 'skipped', reason: 'inactive', deactivated: false });
    expect(channels.sent).toHaveLength(2);
  });

  it('takes the email subject from the resolved context', async () => {
    saveSchedule({ smsConnectorId: 'sms-1' });
    store.contextualTemplates.set(
      'contextual-1',
      makeContextualTemplate({ context: { first_name: '@User.first_name', email_subject: 'Your session' } })
    );

    await dispatcher.dispatch('schedule-1', jobRoot);

    expect(channels.sent.filter((m) => m.channel === 'EMAIL').map((m) => m.metadata?.subject)).toEqual([
      'Your session',
      'Your session',
    ]);
    expect(channels.sent.filter((m) => m.channel === 'SMS').map((m) => m.metadata)).toEqual([
      { subject: undefined, html: false },
      { subject: undefined, html: false },
    ]);
    expect(channels.to('SMS')).toEqual(['+15550000001', '+15550000002']);
  });

  it('reports a failing channel while the others deliver and still records the send', async () => {
    saveSchedule({ smsConnectorId: 'sms-1' });
    channels.failFor.add('+15550000001');
    channels.failFor.add('+15550000002');

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result.status).toBe('dispatched');
    expect(result.channels).toEqual([
      { channel: 'EMAIL', attempted: 2, sent: 2 },
      { channel: 'SMS', attempted: 2, sent: 0 },
    ]);
    expect(result.failures).toEqual([
      { channel: 'SMS', recipientId: 'u1', code: 'CHANNEL_ERROR', message: 'Connector sms-1 rejected +15550000001' },
      { channel: 'SMS', recipientId: 'u2', code: 'CHANNEL_ERROR', message: 'Connector sms-1 rejected +15550000002' },
    ]);
    expect(store.markSentCalls).toEqual([{ id: 'schedule-1', at: T0 }]);
    expect(() => assertDelivered(result)).toThrow(new DispatchError('schedule-1', result.failures));
  });

  it('reports an unusable connector once for the channel', async () => {
    saveSchedule({ smsConnectorId: 'sms-1', chatConnectorId: 'chat-1', chatRoom: '#studio' });
    store.connectors.set('sms-1', makeConnector('sms-1', { channel: 'SMS', provider: 'twilio', isActive: false }));
    channels.unavailable.add('CHAT');

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result.channels).toEqual([
      { channel: 'EMAIL', attempted: 2, sent: 2 },
      { channel: 'SMS', attempted: 0, sent: 0 },
      { channel: 'CHAT', attempted: 0, sent: 0 },
    ]);
    expect(result.failures).toEqual([
      { channel: 'SMS', code: 'CHANNEL_ERROR', message: 'Connector sms-1 is missing or inactive' },
      { channel: 'CHAT', code: 'CHANNEL_ERROR', message: 'Connector chat-1 is unreachable' },
    ]);
  });

  it('fails a recipient without an address for the channel', async () => {
    saveSchedule();
    provider.jobEmployees.set('j1', [makeEmployee('e1', makeUser('u1')), makeEmployee('e2', makeUser('u2', { email: null }))]);

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result.channels).toEqual([{ channel: 'EMAIL', attempted: 2, sent: 1 }]);
    expect(result.failures).toEqual([
      { channel: 'EMAIL', recipientId: 'u2', code: 'CHANNEL_ERROR', message: 'Recipient u2 has no email address' },
    ]);
  });

  it('posts each distinct message to a chat room once', async () => {
    saveSchedule({ emailConnectorId: null, chatConnectorId: 'chat-1', chatRoom: '#studio' });
    store.contextualTemplates.set(
      'contextual-1',
      makeContextualTemplate({
        template: { id: 'template-2', name: 'Job update', path: null, body: '{{job}} was updated', html: false },
        context: { job: '@Job.name' },
      })
    );

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(channels.sent.map((m) => [m.to, m.message])).toEqual([['#studio', 'Job j1 was updated']]);
    expect(result.channels).toEqual([{ channel: 'CHAT', attempted: 1, sent: 1 }]);
  });

  it.each([1, 2])('hands a failed room post to the next recipient (concurrency %p)', async (concurrency) => {
    saveSchedule({ emailConnectorId: null, chatConnectorId: 'chat-1', chatRoom: '#studio' });
    store.contextualTemplates.set(
      'contextual-1',
      makeContextualTemplate({
        template: { id: 'template-2', name: 'Job update', path: null, body: '{{job}} was updated', html: false },
        context: { job: '@Job.name' },
      })
    );
    channels.failOnceFor.add('#studio');

    const result = await buildDispatcher(undefined, concurrency).dispatch('schedule-1', jobRoot);

    expect(channels.sent.map((m) => [m.to, m.message])).toEqual([['#studio', 'Job j1 was updated']]);
    expect(result.channels).toEqual([{ channel: 'CHAT', attempted: 2, sent: 1 }]);
    expect(result.failures).toEqual([
      { channel: 'CHAT', recipientId: 'u1', code: 'CHANNEL_ERROR', message: 'Connector chat-1 rejected #studio' },
    ]);
    expect(store.markSentCalls).toEqual([{ id: 'schedule-1', at: T0 }]);
  });

  it('reports a recipient whose message fails to render while the others deliver', async () => {
    saveSchedule({ smsConnectorId: 'sms-1' });
    const renderer: TemplateRenderer = {
      render: async (_template, context) => {
        if (context.first_name === 'Firstu1') {
          throw new RenderError('Template Job reminder failed to render: bad value');
        }
        return `Hi ${String(context.first_name)}`;
      },
    };

    const result = await buildDispatcher(renderer).dispatch('schedule-1', jobRoot);

    expect(result.status).toBe('dispatched');
    expect(result.channels).toEqual([
      { channel: 'EMAIL', attempted: 2, sent: 1 },
      { channel: 'SMS', attempted: 2, sent: 1 },
    ]);
    expect(result.failures).toEqual([
      {
        channel: 'EMAIL',
        recipientId: 'u1',
        code: 'RENDER_ERROR',
        message: 'Template Job reminder failed to render: bad value',
      },
      {
        channel: 'SMS',
        recipientId: 'u1',
        code: 'RENDER_ERROR',
        message: 'Template Job reminder failed to render: bad value',
      },
    ]);
    expect(channels.to('EMAIL')).toEqual(['u2@example.test']);
    expect(channels.to('SMS')).toEqual(['+15550000002']);
    expect(store.notifications.map((n) => n.recipientId)).toEqual(['u2', 'u2']);
  });

  it('messages chat users directly when configured', async () => {
    saveSchedule({ emailConnectorId: null, chatConnectorId: 'chat-1', chatUsers: true });

    await dispatcher.dispatch('schedule-1', jobRoot);

    expect(channels.to('CHAT')).toEqual(['@u1', '@u2']);
  });

  it('counts a delivery whose audit record fails as sent', async () => {
    saveSchedule();
    store.failRecording = true;

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result.channels).toEqual([{ channel: 'EMAIL', attempted: 2, sent: 2 }]);
    expect(result.failures.map((f) => [f.code, f.address, f.message])).toEqual([
      ['RECORD_FAILED', 'u1@example.test', 'write conflict'],
      ['RECORD_FAILED', 'u2@example.test', 'write conflict'],
    ]);
    expect(store.schedules.get('schedule-1')?.lastSentAt).toEqual(T0);
  });

  it('does nothing for a schedule without connectors', async () => {
    saveSchedule({ emailConnectorId: null, endAt: at(-HOUR) });

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result).toMatchObject({ status: 'inert', reason: 'no connector configured', deactivated: false });
    expect(store.deactivations).toEqual([]);
  });

  it('skips when the window is closed', async () => {
    saveSchedule({ startTrigger: 'before_job_start' });
    clock.set(at(2 * DAY));

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result).toMatchObject({ status: 'skipped', reason: 'not started', recipients: 0 });
    expect(channels.sent).toEqual([]);
  });

  it('deactivates a schedule past its end date without sending', async () => {
    saveSchedule({ endAt: at(-HOUR) });

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result).toMatchObject({ status: 'skipped', reason: 'past end date', deactivated: true });
    expect(store.deactivations).toEqual(['schedule-1']);
    expect(store.markSentCalls).toEqual([]);
  });

  it('reports an empty audience', async () => {
    saveSchedule({ filters: NO_FILTERS });

    const result = await dispatcher.dispatch('schedule-1', jobRoot);

    expect(result).toMatchObject({ status: 'empty', reason: 'no recipients', recipients: 0 });
    expect(store.markSentCalls).toEqual([]);
  });

  it('rejects an unknown schedule', async () => {
    await expect(dispatcher.dispatch('nope', jobRoot)).rejects.toThrow(new NotFoundError('Schedule nope'));
  });

  it('rejects a schedule whose template is missing', async () => {
    saveSchedule({ contextualTemplateId: 'gone' });
    await expect(dispatcher.dispatch('schedule-1', jobRoot)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it('leaves a one-shot schedule active when its template is missing', async () => {
    saveSchedule({ contextualTemplateId: 'gone' });

    await expect(dispatcher.dispatch('schedule-1', jobRoot)).rejects.toThrow(
      new ConfigurationError('Schedule Reminder references a missing template')
    );

    expect(store.deactivations).toEqual([]);
    expect(store.schedules.get('schedule-1')?.active).toBe(true);
    expect(store.markSentCalls).toEqual([]);
    expect(channels.sent).toEqual([]);
  });

  it('sends a recurring schedule once when two triggers race', async () => {
    const group = makeSubjectGroup('g1');
    provider.addSubjectGroup(group).link(job, group);
    provider.jobEmployees.set('j1', [makeEmployee('e1', makeUser('u1'))]);
    saveSchedule({
      triggerType: 'subject_group',
      startTrigger: 'after_subject_group_start',
      recurring: true,
      recurrenceUnit: 'days',
      recurrenceCount: 1,
    });
    channels.delayMs = 5;
    const root: RootEntity = { kind: 'subject_group', subjectGroup: group };

    const [first, second] = await Promise.all([
      dispatcher.dispatch('schedule-1', root),
      dispatcher.dispatch('schedule-1', root),
    ]);

    expect(first.status).toBe('dispatched');
    expect(second).toMatchObject({ status: 'skipped', reason: 'recurrence spacing' });
    expect(channels.sent).toHaveLength(1);
  });
});
