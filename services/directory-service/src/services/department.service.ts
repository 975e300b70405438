/**
 * Department Service - Business Logic
 * Departments, their faculty roster and coordinator assignments
 */

import {
  AppError,
  isForeignKeyViolation,
  isUniqueViolation,
} from '@campus-portal/shared/config/errorHandler';
import logger from '@campus-portal/shared/config/logger';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import type { Coordinator, CoordinatorStore } from '../models/coordinator.model';
import type { Department, DepartmentStore } from '../models/department.model';
import type { Faculty, FacultyStore } from '../models/faculty.model';
import type { AssignCoordinatorBody, CreateDepartmentBody } from '../schemas/directory.schema';

export interface DepartmentDetail {
  department: Department;
  /** Ordered by name */
  faculty: Faculty[];
}

/**
 * Resolves an id or short code, or answers 404
 */
export async function requireDepartment(departments: DepartmentStore, reference: string): Promise<Department> {
  const department = await departments.resolve(reference);
  if (!department) {
    throw new AppError(ErrorMessages.DEPARTMENT_NOT_FOUND, 404, 'NOT_FOUND');
  }
  return department;
}

export class DepartmentService {
  constructor(
    private readonly departments: DepartmentStore,
    private readonly faculty: FacultyStore,
    private readonly coordinators: CoordinatorStore
  ) {}

  async listDepartments(): Promise<Department[]> {
    return this.departments.list();
  }

  async departmentDetail(reference: string): Promise<DepartmentDetail> {
    const department = await requireDepartment(this.departments, reference);
    const faculty = await this.faculty.list(department.id);
    return { department, faculty };
  }

  async createDepartment(input: CreateDepartmentBody): Promise<Department> {
    try {
      const department = await this.departments.create(input);
      logger.info('Department created', {
        service: 'directory-service',
        departmentId: department.id,
        shortCode: department.shortCode,
      });
      return department;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(ErrorMessages.DEPARTMENT_CODE_TAKEN, 409, 'CONFLICT');
      }
      throw error;
    }
  }

  async listCoordinators(reference: string): Promise<Coordinator[]> {
    const department = await requireDepartment(this.departments, reference);
    return this.coordinators.listForDepartment(department.id);
  }

  async assignCoordinator(input: AssignCoordinatorBody): Promise<Coordinator> {
    const department = await requireDepartment(this.departments, input.department);

    try {
      const coordinator = await this.coordinators.create({
        userId: input.userId,
        departmentId: department.id,
        role: input.role,
        contactInfo: input.contactInfo,
      });
      logger.info('Coordinator assigned', {
        service: 'directory-service',
        userId: input.userId,
        departmentId: department.id,
        role: input.role,
      });
      return coordinator;
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new AppError(ErrorMessages.COORDINATOR_EXISTS, 409, 'CONFLICT');
      }
      if (isForeignKeyViolation(error)) {
        throw new AppError(ErrorMessages.USER_NOT_FOUND, 404, 'NOT_FOUND');
      }
      throw error;
    }
  }
}
