import { NotificationRepository } from './notification.model';
import { createPgMock, result } from '@campus-portal/shared/testing/pgMock';

const row = {
  id: 'n-1',
  title: 'Fee reminder',
  body: 'Due Friday',
  department_id: null,
  push_to: ['email', 'pager', 'web'],
  created_by: 'user-1',
  scheduled_for: null,
  sent_status: 'pending',
  created_at: new Date('2026-03-01T00:00:00.000Z'),
};

describe('NotificationRepository', () => {
  it('selects pending rows that are unscheduled or already due', async () => {
    const pg = createPgMock();
    pg.pool.query.mockResolvedValueOnce(result([row]));
    const repo = new NotificationRepository(pg.asPool());
    const now = new Date('2026-03-10T12:00:00.000Z');

    const due = await repo.listDue(now);

    const [sql, values] = pg.pool.query.mock.calls[0];
    expect(sql.replace(/\s+/g, ' ')).toContain(
      "WHERE sent_status = 'pending' AND (scheduled_for IS NULL OR scheduled_for <= $1)"
    );
    expect(values).toEqual([now]);
    expect(due[0].pushTo).toEqual(['email', 'web']);
  });

  it('resolves null when updating a missing notification', async () => {
    const pg = createPgMock();
    pg.pool.query.mockResolvedValueOnce(result([]));
    const repo = new NotificationRepository(pg.asPool());

    await expect(repo.updateStatus('missing', 'sent')).resolves.toBeNull();
    expect(pg.pool.query).toHaveBeenCalledWith('UPDATE notifications SET sent_status = $2 WHERE id = $1 RETURNING *', [
      'missing',
      'sent',
    ]);
  });
});
