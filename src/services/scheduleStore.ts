import { Types } from 'mongoose';
import { NotificationSchedule, INotificationSchedule } from '../models/NotificationSchedule';
import { ContextualTemplate } from '../models/ContextualTemplate';
import { NotificationTemplate } from '../models/NotificationTemplate';
import { Connector, ConnectorProvider } from '../models/Connector';
import { Notification } from '../models/Notification';
import type { ChannelKind, ContextualTemplateConfig, ScheduleConfig } from '../types/notification';
import { decryptCredential } from '../utils/crypto';

export interface ConnectorConfig {
  id: string;
  name: string;
  channel: ChannelKind;
  provider: ConnectorProvider;
  isActive: boolean;
  credentials: Record<string, unknown>;
}

export interface NotificationRecord {
  dispatchId: string;
  contextualTemplateId: string;
  scheduleId: string | null;
  recipientId: string | null;
  connectorId: string;
  channel: ChannelKind;
  address: string;
  subject: string | null;
  sentAt: Date;
}

/**
 * Everything the dispatcher reads or writes in its own database. The only
 * writes are `deactivate`, `markSent` and `recordNotification`, all idempotent.
 */
export interface ScheduleStore {
  findSchedule(id: string): Promise<ScheduleConfig | null>;
  /** Sets active=false; a no-op when already inactive. */
  deactivate(id: string): Promise<void>;
  /** Moves lastSentAt forward to `at`; never moves it back. */
  markSent(id: string, at: Date): Promise<void>;
  findContextualTemplate(id: string): Promise<ContextualTemplateConfig | null>;
  findConnector(id: string): Promise<ConnectorConfig | null>;
  recordNotification(record: NotificationRecord): Promise<void>;
}

const idOrNull = (value?: Types.ObjectId | null): string | null => (value ? value.toString() : null);

export function toScheduleConfig(doc: INotificationSchedule): ScheduleConfig {
  return {
    id: String(doc._id),
    name: doc.name,
    active: doc.active,
    recurring: doc.recurring,
    recurrenceUnit: doc.recurrenceUnit,
    recurrenceCount: doc.recurrenceCount,
    triggerType: doc.triggerType,
    startTrigger: doc.startTrigger,
    endTrigger: doc.endTrigger ?? null,
    endAt: doc.endAt ?? null,
    lastSentAt: doc.lastSentAt ?? null,
    filters: {
      employees: doc.employees,
      clientsPersons: doc.clientsPersons,
      clientsSchools: doc.clientsSchools,
      clientsCommercialOthers: doc.clientsCommercialOthers,
      subjectsBooked: doc.subjectsBooked,
      subjectsNotBooked: doc.subjectsNotBooked,
      subjectsParentsBooked: doc.subjectsParentsBooked,
      subjectsParentsNotBooked: doc.subjectsParentsNotBooked,
    },
    contextualTemplateId: doc.contextualTemplateId.toString(),
    emailConnectorId: idOrNull(doc.emailConnectorId),
    smsConnectorId: idOrNull(doc.smsConnectorId),
    chatConnectorId: idOrNull(doc.chatConnectorId),
    chatRoom: doc.chatRoom ?? null,
    chatUsers: doc.chatUsers,
  };
}

export class MongoScheduleStore implements ScheduleStore {
  async findSchedule(id: string): Promise<ScheduleConfig | null> {
    if (!Types.ObjectId.isValid(id)) return null;
    const doc = await NotificationSchedule.findById(id);
    return doc ? toScheduleConfig(doc) : null;
  }

  async deactivate(id: string): Promise<void> {
    await NotificationSchedule.updateOne({ _id: id, active: true }, { $set: { active: false } });
  }

  async markSent(id: string, at: Date): Promise<void> {
    await NotificationSchedule.updateOne({ _id: id }, { $max: { lastSentAt: at } });
  }

  async findContextualTemplate(id: string): Promise<ContextualTemplateConfig | null> {
    const contextual = await ContextualTemplate.findById(id);
    if (!contextual) return null;

    const template = await NotificationTemplate.findById(contextual.templateId);
    if (!template) return null;

    return {
      id: String(contextual._id),
      template: {
        id: String(template._id),
        name: template.name,
        path: template.path ?? null,
        body: template.body ?? null,
        html: template.html,
      },
      context: Object.fromEntries(contextual.context),
    };
  }

  async findConnector(id: string): Promise<ConnectorConfig | null> {
    const doc = await Connector.findById(id);
    if (!doc) return null;
    return {
      id: String(doc._id),
      name: doc.name,
      channel: doc.channel,
      provider: doc.provider,
      isActive: doc.isActive,
      credentials: decryptCredential(doc.config),
    };
  }

  async recordNotification(record: NotificationRecord): Promise<void> {
    const key = {
      dispatchId: record.dispatchId,
      channel: record.channel,
      connectorId: new Types.ObjectId(record.connectorId),
      recipientId: record.recipientId,
      address: record.address,
    };
    await Notification.updateOne(
      key,
      {
        $setOnInsert: {
          ...key,
          contextualTemplateId: new Types.ObjectId(record.contextualTemplateId),
          scheduleId: record.scheduleId ? new Types.ObjectId(record.scheduleId) : null,
          subject: record.subject,
          sentAt: record.sentAt,
        },
      },
      { upsert: true }
    );
  }
}
