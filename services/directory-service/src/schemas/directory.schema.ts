import { z } from 'zod';
import { lenientInteger, optionalText } from '@campus-portal/shared/utils/querySchemas';
import { ErrorMessages } from '@campus-portal/shared/utils/errorMessages';
import { isValidIsoDate, normalizeTime } from '../utils/calendar';

const CLOCK_TIME = /^([01]?\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/;

const optionalField = (max: number) => z.string().trim().max(max).optional();

const isoDate = z.string().trim().refine(isValidIsoDate, 'Expected a calendar date formatted YYYY-MM-DD');

/** Query filters drop an unusable date, as they do other malformed filters */
const lenientIsoDate = z.preprocess(
  (value) => (typeof value === 'string' && isValidIsoDate(value.trim()) ? value.trim() : undefined),
  z.string().optional()
);

const clockTime = z.string().trim().regex(CLOCK_TIME, 'Expected a time formatted HH:MM').transform(normalizeTime);

/** Departments are addressed by id or short code */
export const departmentRefParamsSchema = z.object({
  id: z.string().trim().min(1),
});

export const uuidParamsSchema = z.object({
  id: z.string().uuid(),
});

export const createDepartmentSchema = z.object({
  name: z.string().trim().min(1).max(200),
  shortCode: z.string().trim().min(1).max(10),
  description: optionalField(5000),
  contactEmails: z.array(z.string().trim().email()).default([]),
});

export const facultyListQuerySchema = z.object({
  department: optionalText,
});

export const createFacultySchema = z.object({
  department: z.string().trim().min(1),
  name: z.string().trim().min(1).max(150),
  title: optionalField(100),
  photoUrl: z.string().trim().url().optional(),
  biography: optionalField(10000),
  researchInterests: optionalField(5000),
  contactEmail: z.string().trim().email().max(254).optional(),
  officeHours: optionalField(200),
  phone: optionalField(20),
  status: z.enum(['active', 'retired']).default('active'),
});

export const assignCoordinatorSchema = z.object({
  userId: z.string().uuid(),
  department: z.string().trim().min(1),
  role: z.enum(['cr', 'coordinator']),
  contactInfo: optionalField(1000),
});

export const timetableQuerySchema = z.object({
  department: optionalText,
  semester: lenientInteger,
  date: lenientIsoDate,
});

export const departmentTimetableQuerySchema = z.object({
  semester: lenientInteger,
});

export const createTimetableEntrySchema = z
  .object({
    department: z.string().trim().min(1),
    semester: z.coerce.number().int().min(1).max(12),
    courseCode: z.string().trim().min(1).max(20),
    courseName: z.string().trim().min(1).max(200),
    date: isoDate,
    startTime: clockTime,
    endTime: clockTime,
    venue: z.string().trim().min(1).max(100),
    instructorId: z.string().uuid().optional(),
    description: optionalField(5000),
  })
  // Normalized HH:MM:SS strings compare in clock order
  .refine((entry) => entry.endTime > entry.startTime, {
    message: ErrorMessages.TIMETABLE_TIME_ORDER,
    path: ['endTime'],
  });

export const notificationListQuerySchema = z.object({
  department: optionalText,
  status: z.enum(['pending', 'sent', 'failed']).optional(),
});

export const createNotificationSchema = z.object({
  title: z.string().trim().min(1).max(200),
  body: z.string().trim().min(1),
  department: optionalText,
  pushTo: z
    .array(z.enum(['email', 'telegram', 'whatsapp', 'web']))
    .default([])
    .transform((channels) => Array.from(new Set(channels))),
  scheduledFor: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value))
    .optional(),
});

export const notificationStatusSchema = z.object({
  status: z.enum(['sent', 'failed']),
});

export const createUserSchema = z.object({
  email: z.string().trim().toLowerCase().email().max(254),
  name: z.string().trim().min(1).max(150),
  role: z.enum(['student', 'cr', 'faculty', 'authority', 'moderator']).default('student'),
  phone: optionalField(20),
  telegramId: optionalField(100),
  whatsappNumber: optionalField(20),
  isStaff: z.boolean().default(false),
  isSuperuser: z.boolean().default(false),
});

export type CreateDepartmentBody = z.infer<typeof createDepartmentSchema>;
export type CreateFacultyBody = z.infer<typeof createFacultySchema>;
export type AssignCoordinatorBody = z.infer<typeof assignCoordinatorSchema>;
export type CreateTimetableEntryBody = z.infer<typeof createTimetableEntrySchema>;
export type CreateNotificationBody = z.infer<typeof createNotificationSchema>;
export type CreateUserBody = z.infer<typeof createUserSchema>;
