import { AppError } from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { DepartmentStore } from '../models/department.model';
import type { Faculty, FacultyStore } from '../models/faculty.model';
import type { CreateFacultyBody } from '../schemas/directory.schema';
import { requireDepartment } from './department.service';

export class FacultyService {
  constructor(
    private readonly faculty: FacultyStore,
    private readonly departments: DepartmentStore
  ) {}

  /**
   * An unknown department filter is ignored and the full roster is returned
   */
  async listFaculty(departmentReference?: string): Promise<Faculty[]> {
    const department = departmentReference ? await this.departments.resolve(departmentReference) : null;
    return this.faculty.list(department?.id);
  }

  async facultyDetail(id: string): Promise<Faculty> {
    const member = await this.faculty.findById(id);
    if (!member) {
      throw new AppError(ErrorMessages.FACULTY_NOT_FOUND, 404, 'NOT_FOUND');
    }
    return member;
  }

  async createFaculty(input: CreateFacultyBody): Promise<Faculty> {
    const department = await requireDepartment(this.departments, input.department);

    const member = await this.faculty.create({
      departmentId: department.id,
      name: input.name,
      title: input.title ?? null,
      photoUrl: input.photoUrl ?? null,
      biography: input.biography ?? null,
      researchInterests: input.researchInterests ?? null,
      contactEmail: input.contactEmail ?? null,
      officeHours: input.officeHours ?? null,
      phone: input.phone ?? null,
      status: input.status,
    });

    logger.info('Faculty member added', {
      service: 'directory-service',
      facultyId: member.id,
      departmentId: department.id,
    });
    return member;
  }
}
