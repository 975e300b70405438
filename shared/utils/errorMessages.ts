/**
 * Standardized Error Messages
 * Centralized error message constants for consistency
 */

export const ErrorMessages = {
	// Authentication
	AUTH_REQUIRED: 'Authentication required',
	AUTH_TOKEN_EXPIRED: 'Token expired. Please refresh your token.',
	AUTH_TOKEN_INVALID: 'Unauthorized: invalid token',
	FORBIDDEN: 'You do not have permission to access this page.',

	// Lookups
	MATERIAL_NOT_FOUND: 'Study material not found.',
	DEPARTMENT_NOT_FOUND: 'Department not found.',
	FACULTY_NOT_FOUND: 'Faculty member not found.',
	USER_NOT_FOUND: 'User not found.',
	NOTIFICATION_NOT_FOUND: 'Notification not found.',

	// Conflicts
	DEPARTMENT_CODE_TAKEN: 'A department with this short code already exists.',
	COORDINATOR_EXISTS: 'This user already holds that coordinator role for the department.',
	USER_EMAIL_TAKEN: 'A user with this email already exists.',

	// Validation
	VALIDATION_FAILED: 'Validation error',
	MALFORMED_REQUEST: 'Request body could not be parsed',
	TIMETABLE_TIME_ORDER: 'End time must be after start time.',

	// General
	GENERIC_ERROR: 'Something went wrong',
	REQUEST_TIMEOUT: 'The request took too long to complete',
} as const;

export type ErrorMessageKey = keyof typeof ErrorMessages;
