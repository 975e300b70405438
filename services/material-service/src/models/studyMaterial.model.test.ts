import { StudyMaterialRepository, counterUpdateSql, rowToStudyMaterial } from './studyMaterial.model';
import { createPgMock, result } from '@campus-portal/shared/testing/pgMock';
import { materialRow } from '../testing/rows';

describe('StudyMaterialRepository', () => {
  it('maps rows and keeps only string tags', () => {
    const material = rowToStudyMaterial(materialRow());
    expect(material.department).toEqual({ id: 'dept-1', name: 'Computer Science', shortCode: 'CSE' });
    expect(material.subjectTags).toEqual(['tcp', 'ip']);
    expect(material.fileDriveId).toBe('drive-1');
  });

  describe('incrementCounter', () => {
    it('adds in a single arithmetic UPDATE', async () => {
      const pg = createPgMock();
      pg.pool.query.mockResolvedValueOnce(result([{ value: 8 }]));
      const repo = new StudyMaterialRepository(pg.asPool());

      await expect(repo.incrementCounter('mat-1', 'views', 1)).resolves.toBe(8);
      expect(pg.pool.query).toHaveBeenCalledWith(
        'UPDATE study_materials SET views_count = views_count + $2 WHERE id = $1 RETURNING views_count AS value',
        ['mat-1', 1]
      );
    });

    it('returns null when the material is gone', async () => {
      const pg = createPgMock();
      pg.pool.query.mockResolvedValueOnce(result([]));
      const repo = new StudyMaterialRepository(pg.asPool());

      await expect(repo.incrementCounter('missing', 'downloads', 1)).resolves.toBeNull();
    });

    it('maps every counter to its own column', () => {
      expect(counterUpdateSql('downloads')).toContain('SET downloads_count = downloads_count + $2');
      expect(counterUpdateSql('favorites')).toContain('SET favorites_count = favorites_count + $2');
    });
  });

  describe('applyDecision', () => {
    const decidedAt = new Date('2026-02-01T10:00:00.000Z');

    it('updates the material and appends the audit row inside one transaction', async () => {
      const pg = createPgMock();
      pg.client.query
        .mockResolvedValueOnce(result())
        .mockResolvedValueOnce(
          result([materialRow({ verification_status: 'approved', verifier_id: 'v1', verified_at: decidedAt })])
        )
        .mockResolvedValueOnce(
          result([
            {
              id: 'audit-1',
              material_id: 'mat-1',
              user_id: 'v1',
              action: 'edit',
              reason: 'Looks good',
              created_at: decidedAt,
            },
          ])
        )
        .mockResolvedValueOnce(result());
      const repo = new StudyMaterialRepository(pg.asPool());

      const updated = await repo.applyDecision(
        'mat-1',
        { status: 'approved', verifierId: 'v1', stampVerifiedAt: true },
        { reason: 'Looks good', decidedAt }
      );

      expect(updated?.verificationStatus).toBe('approved');
      expect(updated?.verifiedAt).toEqual(decidedAt);

      const statements = pg.clientStatements();
      expect(statements[0]).toBe('BEGIN');
      expect(statements[1]).toContain('UPDATE study_materials');
      expect(statements[2]).toContain('INSERT INTO upload_audits');
      expect(statements[3]).toBe('COMMIT');
      expect(pg.client.query.mock.calls[1][1]).toEqual(['mat-1', 'approved', 'v1', true, decidedAt]);
      expect(pg.client.query.mock.calls[2][1]).toEqual(['mat-1', 'v1', 'edit', 'Looks good', decidedAt]);
      expect(pg.client.release).toHaveBeenCalledTimes(1);
    });

    it('writes no audit row when the material does not exist', async () => {
      const pg = createPgMock();
      pg.client.query.mockResolvedValueOnce(result()).mockResolvedValueOnce(result([])).mockResolvedValueOnce(result());
      const repo = new StudyMaterialRepository(pg.asPool());

      const updated = await repo.applyDecision(
        'missing',
        { status: 'rejected', verifierId: 'v1', stampVerifiedAt: true },
        { reason: 'Moderation action: reject', decidedAt }
      );

      expect(updated).toBeNull();
      expect(pg.clientStatements()).toEqual(['BEGIN', expect.stringContaining('UPDATE study_materials'), 'COMMIT']);
    });

    it('rolls back when the audit insert fails', async () => {
      const pg = createPgMock();
      pg.client.query
        .mockResolvedValueOnce(result())
        .mockResolvedValueOnce(result([materialRow()]))
        .mockRejectedValueOnce(new Error('insert failed'))
        .mockResolvedValueOnce(result());
      const repo = new StudyMaterialRepository(pg.asPool());

      await expect(
        repo.applyDecision(
          'mat-1',
          { status: 'pending', verifierId: 'v1', stampVerifiedAt: false },
          { reason: 'Moderation action: request_changes', decidedAt }
        )
      ).rejects.toThrow('insert failed');
      expect(pg.clientStatements()[3]).toBe('ROLLBACK');
      expect(pg.client.release).toHaveBeenCalledTimes(1);
    });
  });

  it('create inserts the material as pending with an upload audit', async () => {
    const pg = createPgMock();
    pg.client.query
      .mockResolvedValueOnce(result())
      .mockResolvedValueOnce(result([materialRow()]))
      .mockResolvedValueOnce(
        result([
          {
            id: 'audit-1',
            material_id: 'mat-1',
            user_id: 'user-1',
            action: 'upload',
            reason: 'Initial upload',
            created_at: new Date('2026-01-10T12:00:00.000Z'),
          },
        ])
      )
      .mockResolvedValueOnce(result());
    const repo = new StudyMaterialRepository(pg.asPool());

    const material = await repo.create({
      departmentId: 'dept-1',
      uploaderId: 'user-1',
      title: 'Networks notes',
      fileType: 'pdf',
      fileDriveId: 'drive-1',
      subjectTags: ['tcp', 'ip'],
      semester: 4,
      year: 2025,
    });

    expect(material.id).toBe('mat-1');
    expect(pg.client.query.mock.calls[1][1]).toEqual([
      'dept-1',
      'user-1',
      'Networks notes',
      null,
      'drive-1',
      'pdf',
      '["tcp","ip"]',
      4,
      2025,
    ]);
    expect(pg.client.query.mock.calls[2][1]).toEqual(['mat-1', 'user-1', 'upload', 'Initial upload', null]);
    expect(pg.clientStatements()[3]).toBe('COMMIT');
  });

  it('list combines filters with positional parameters', async () => {
    const pg = createPgMock();
    pg.pool.query.mockResolvedValueOnce(result([materialRow({ verification_status: 'approved' })]));
    const repo = new StudyMaterialRepository(pg.asPool());

    const materials = await repo.list({ status: 'approved', semester: 3, year: 2024, limit: 50 });

    expect(materials).toHaveLength(1);
    const [sql, values] = pg.pool.query.mock.calls[0];
    expect(sql).toContain('WHERE m.verification_status = $1 AND m.semester = $2 AND m.year = $3');
    expect(sql).toContain('ORDER BY m.uploaded_at DESC LIMIT $4');
    expect(values).toEqual(['approved', 3, 2024, 50]);
  });
});
