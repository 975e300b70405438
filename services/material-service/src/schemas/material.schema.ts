import { z } from 'zod';
import { lenientInteger, optionalText } from '@campus-portal/shared/utils/querySchemas';
import { MODERATION_ACTIONS } from '../services/moderation.service';

const CURRENT_YEAR = new Date().getFullYear();

/**
 * Accepts a list or a comma-separated string; trims and drops blanks
 */
export function parseSubjectTags(value: string | string[] | undefined): string[] {
  if (value === undefined) {
    return [];
  }
  const raw = Array.isArray(value) ? value : value.split(',');
  return raw.map((tag) => tag.trim()).filter((tag) => tag.length > 0);
}

export const materialIdParamsSchema = z.object({
  id: z.string().uuid(),
});

export const materialListQuerySchema = z.object({
  department: optionalText,
  semester: lenientInteger,
  year: lenientInteger,
  limit: z.coerce.number().int().min(1).max(100).default(50),
});

export const uploadMaterialSchema = z.object({
  title: z.string().trim().min(1).max(300),
  description: z.string().trim().max(5000).optional(),
  department: z.string().trim().min(1),
  fileType: z.enum(['pdf', 'video', 'link']),
  fileDriveId: z.string().trim().max(255).optional(),
  subjectTags: z
    .union([z.array(z.string()), z.string()])
    .optional()
    .transform(parseSubjectTags),
  semester: z.coerce.number().int().min(1).max(12),
  year: z.coerce.number().int().min(1990).max(CURRENT_YEAR + 1),
});

export const moderationQueueQuerySchema = z.object({
  status: z.enum(['pending', 'approved', 'rejected', 'all']).default('pending'),
  department: optionalText,
});

export const moderationActionSchema = z.object({
  action: z.enum(MODERATION_ACTIONS),
  reason: z.string().max(2000).optional(),
});

export type MaterialListQuery = z.infer<typeof materialListQuerySchema>;
export type UploadMaterialBody = z.infer<typeof uploadMaterialSchema>;
