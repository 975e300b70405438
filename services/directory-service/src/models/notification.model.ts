/**
 * Notification Model - PostgreSQL
 * Scheduling metadata only; delivery happens outside the portal
 */

import type { Pool } from 'pg';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

export type PushChannel = 'email' | 'telegram' | 'whatsapp' | 'web';
export type SentStatus = 'pending' | 'sent' | 'failed';

export const PUSH_CHANNELS: readonly PushChannel[] = ['email', 'telegram', 'whatsapp', 'web'];
export const SENT_STATUSES: readonly SentStatus[] = ['pending', 'sent', 'failed'];

interface NotificationRow {
  id: string;
  title: string;
  body: string;
  department_id: string | null;
  push_to: unknown;
  created_by: string;
  scheduled_for: Date | null;
  sent_status: SentStatus;
  created_at: Date;
}

export interface Notification {
  id: string;
  title: string;
  body: string;
  /** null targets every department */
  departmentId: string | null;
  pushTo: PushChannel[];
  createdBy: string;
  scheduledFor: Date | null;
  sentStatus: SentStatus;
  createdAt: Date;
}

export interface NotificationCreateInput {
  title: string;
  body: string;
  departmentId: string | null;
  pushTo: PushChannel[];
  createdBy: string;
  scheduledFor: Date | null;
}

export interface NotificationListQuery {
  departmentId?: string;
  status?: SentStatus;
}

export interface NotificationStore {
  create(input: NotificationCreateInput): Promise<Notification>;
  /** Newest first */
  list(query: NotificationListQuery): Promise<Notification[]>;
  /** Pending and either unscheduled or scheduled at or before `now`; earliest schedule first */
  listDue(now: Date): Promise<Notification[]>;
  /** Resolves null when the notification does not exist */
  updateStatus(id: string, status: SentStatus): Promise<Notification | null>;
}

function isPushChannel(value: unknown): value is PushChannel {
  return typeof value === 'string' && PUSH_CHANNELS.some((channel) => channel === value);
}

function rowToNotification(row: NotificationRow): Notification {
  return {
    id: row.id,
    title: row.title,
    body: row.body,
    departmentId: row.department_id,
    pushTo: Array.isArray(row.push_to) ? row.push_to.filter(isPushChannel) : [],
    createdBy: row.created_by,
    scheduledFor: row.scheduled_for,
    sentStatus: row.sent_status,
    createdAt: row.created_at,
  };
}

export class NotificationRepository implements NotificationStore {
  constructor(private pool: Pool) {}

  async create(input: NotificationCreateInput): Promise<Notification> {
    const result = await this.pool.query<NotificationRow>(
      `
        INSERT INTO notifications (title, body, department_id, push_to, created_by, scheduled_for)
        VALUES ($1, $2, $3, $4::jsonb, $5, $6)
        RETURNING *
      `,
      [
        input.title,
        input.body,
        input.departmentId,
        JSON.stringify(input.pushTo),
        input.createdBy,
        input.scheduledFor,
      ]
    );

    const notification = rowToNotification(result.rows[0]);
    logDatabaseOperation('insert', 'notifications', { notificationId: notification.id });
    return notification;
  }

  async list(query: NotificationListQuery): Promise<Notification[]> {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (query.departmentId) {
      values.push(query.departmentId);
      conditions.push(`department_id = $${values.length}`);
    }
    if (query.status) {
      values.push(query.status);
      conditions.push(`sent_status = $${values.length}`);
    }

    const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
    const result = await this.pool.query<NotificationRow>(
      `SELECT * FROM notifications ${where} ORDER BY created_at DESC`,
      values
    );
    return result.rows.map(rowToNotification);
  }

  async listDue(now: Date): Promise<Notification[]> {
    const result = await this.pool.query<NotificationRow>(
      `
        SELECT * FROM notifications
        WHERE sent_status = 'pending'
          AND (scheduled_for IS NULL OR scheduled_for <= $1)
        ORDER BY scheduled_for ASC NULLS FIRST, created_at ASC
      `,
      [now]
    );
    return result.rows.map(rowToNotification);
  }

  async updateStatus(id: string, status: SentStatus): Promise<Notification | null> {
    const result = await this.pool.query<NotificationRow>(
      'UPDATE notifications SET sent_status = $2 WHERE id = $1 RETURNING *',
      [id, status]
    );
    if (result.rows.length === 0) {
      return null;
    }

    logDatabaseOperation('update', 'notifications', { notificationId: id, sentStatus: status });
    return rowToNotification(result.rows[0]);
  }
}
