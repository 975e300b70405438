import type { StudyMaterialRow } from '../models/studyMaterial.model';

export function materialRow(overrides: Partial<StudyMaterialRow> = {}): StudyMaterialRow {
  return {
    id: 'mat-1',
    department_id: 'dept-1',
    department_name: 'Computer Science',
    department_short_code: 'CSE',
    uploader_id: 'user-1',
    title: 'Networks notes',
    description: null,
    file_drive_id: 'drive-1',
    file_type: 'pdf',
    subject_tags: ['tcp', 42, 'ip'],
    semester: 4,
    year: 2025,
    verification_status: 'pending',
    verifier_id: null,
    uploaded_at: new Date('2026-01-10T12:00:00.000Z'),
    verified_at: null,
    downloads_count: 0,
    views_count: 0,
    thumbs_up_count: 0,
    favorites_count: 0,
    ...overrides,
  };
}
