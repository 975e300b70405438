/**
 * Timetable Service - Business Logic
 * Without an explicit date the listing covers today through the next two weeks
 */

import { AppError, isForeignKeyViolation } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { DepartmentStore } from '../models/department.model';
import type { TimetableEntry, TimetableStore } from '../models/timetable.model';
import type { CreateTimetableEntryBody } from '../schemas/directory.schema';
import { DEFAULT_TIMETABLE_WINDOW_DAYS, addDays, toIsoDate } from '../utils/calendar';
import { requireDepartment } from './department.service';

export interface TimetableFilters {
  department?: string;
  semester?: number;
  /** A single day; omitted means the default window */
  date?: string;
}

export interface TimetableListing {
  fromDate: string;
  toDate: string;
  entries: TimetableEntry[];
}

export class TimetableService {
  constructor(
    private readonly timetable: TimetableStore,
    private readonly departments: DepartmentStore,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async listEntries(filters: TimetableFilters): Promise<TimetableListing> {
    const fromDate = filters.date ?? toIsoDate(this.clock());
    const toDate = filters.date ?? addDays(fromDate, DEFAULT_TIMETABLE_WINDOW_DAYS);
    const department = filters.department ? await this.departments.resolve(filters.department) : null;

    const entries = await this.timetable.list({
      departmentId: department?.id,
      semester: filters.semester,
      fromDate,
      toDate,
    });
    return { fromDate, toDate, entries };
  }

  /**
   * Upcoming entries only (today onwards), no upper bound
   */
  async departmentTimetable(reference: string, semester?: number): Promise<TimetableEntry[]> {
    const department = await requireDepartment(this.departments, reference);
    return this.timetable.list({
      departmentId: department.id,
      semester,
      fromDate: toIsoDate(this.clock()),
    });
  }

  async createEntry(input: CreateTimetableEntryBody): Promise<TimetableEntry> {
    const department = await requireDepartment(this.departments, input.department);

    try {
      const entry = await this.timetable.create({
        departmentId: department.id,
        semester: input.semester,
        courseCode: input.courseCode,
        courseName: input.courseName,
        date: input.date,
        startTime: input.startTime,
        endTime: input.endTime,
        venue: input.venue,
        instructorId: input.instructorId ?? null,
        description: input.description ?? null,
      });

      logger.info('Timetable entry created', {
        service: 'directory-service',
        entryId: entry.id,
        departmentId: department.id,
        date: entry.date,
      });
      return entry;
    } catch (error) {
      if (isForeignKeyViolation(error)) {
        throw new AppError(ErrorMessages.FACULTY_NOT_FOUND, 404, 'NOT_FOUND');
      }
      throw error;
    }
  }
}
