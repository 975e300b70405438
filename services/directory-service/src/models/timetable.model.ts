/**
 * Timetable Model - PostgreSQL
 * Dates travel as YYYY-MM-DD and times as HH:MM:SS strings, never as JS Dates
 */

import type { Pool } from 'pg';
import { logDatabaseOperation } from '@campus-portal/shared/config/logger';

interface TimetableRow {
  id: string;
  department_id: string;
  semester: number;
  course_code: string;
  course_name: string;
  date: string;
  start_time: string;
  end_time: string;
  venue: string;
  instructor_id: string | null;
  instructor_name: string | null;
  description: string | null;
}

export interface TimetableEntry {
  id: string;
  departmentId: string;
  semester: number;
  courseCode: string;
  courseName: string;
  date: string;
  startTime: string;
  endTime: string;
  venue: string;
  instructorId: string | null;
  instructorName: string | null;
  description: string | null;
}

export type TimetableCreateInput = Omit<TimetableEntry, 'id' | 'instructorName'>;

export interface TimetableQuery {
  departmentId?: string;
  semester?: number;
  /** Inclusive */
  fromDate: string;
  /** Inclusive; omit for an open-ended window */
  toDate?: string;
}

export interface TimetableStore {
  /** Ordered by date, then start time */
  list(query: TimetableQuery): Promise<TimetableEntry[]>;
  create(input: TimetableCreateInput): Promise<TimetableEntry>;
}

const ENTRY_COLUMNS = `
  t.id, t.department_id, t.semester, t.course_code, t.course_name,
  to_char(t.date, 'YYYY-MM-DD') AS date,
  to_char(t.start_time, 'HH24:MI:SS') AS start_time,
  to_char(t.end_time, 'HH24:MI:SS') AS end_time,
  t.venue, t.instructor_id, f.name AS instructor_name, t.description
`;

function rowToEntry(row: TimetableRow): TimetableEntry {
  return {
    id: row.id,
    departmentId: row.department_id,
    semester: row.semester,
    courseCode: row.course_code,
    courseName: row.course_name,
    date: row.date,
    startTime: row.start_time,
    endTime: row.end_time,
    venue: row.venue,
    instructorId: row.instructor_id,
    instructorName: row.instructor_name,
    description: row.description,
  };
}

export class TimetableRepository implements TimetableStore {
  constructor(private pool: Pool) {}

  async list(query: TimetableQuery): Promise<TimetableEntry[]> {
    const values: unknown[] = [query.fromDate];
    const conditions = ['t.date >= $1'];

    if (query.toDate) {
      values.push(query.toDate);
      conditions.push(`t.date <= $${values.length}`);
    }
    if (query.departmentId) {
      values.push(query.departmentId);
      conditions.push(`t.department_id = $${values.length}`);
    }
    if (query.semester !== undefined) {
      values.push(query.semester);
      conditions.push(`t.semester = $${values.length}`);
    }

    const result = await this.pool.query<TimetableRow>(
      `
        SELECT ${ENTRY_COLUMNS}
        FROM timetable_entries t
        LEFT JOIN faculty f ON f.id = t.instructor_id
        WHERE ${conditions.join(' AND ')}
        ORDER BY t.date ASC, t.start_time ASC
      `,
      values
    );
    return result.rows.map(rowToEntry);
  }

  async create(input: TimetableCreateInput): Promise<TimetableEntry> {
    const result = await this.pool.query<TimetableRow>(
      `
        WITH t AS (
          INSERT INTO timetable_entries (
            department_id, semester, course_code, course_name, date,
            start_time, end_time, venue, instructor_id, description
          ) VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10)
          RETURNING *
        )
        SELECT ${ENTRY_COLUMNS}
        FROM t
        LEFT JOIN faculty f ON f.id = t.instructor_id
      `,
      [
        input.departmentId,
        input.semester,
        input.courseCode,
        input.courseName,
        input.date,
        input.startTime,
        input.endTime,
        input.venue,
        input.instructorId,
        input.description,
      ]
    );

    const entry = rowToEntry(result.rows[0]);
    logDatabaseOperation('insert', 'timetable_entries', { entryId: entry.id, departmentId: entry.departmentId });
    return entry;
  }
}
