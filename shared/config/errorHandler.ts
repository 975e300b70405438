export type AppErrorCode =
    | "UNAUTHENTICATED"
    | "FORBIDDEN"
    | "VALIDATION_ERROR"
    | "NOT_FOUND"
    | "CONFLICT"
    | "TOKEN_EXPIRED"
    | "TOKEN_INVALID"
    | "SERVICE_UNAVAILABLE"
    | "INTERNAL_ERROR";

const DEFAULT_CODES: Record<number, AppErrorCode> = {
    400: "VALIDATION_ERROR",
    401: "UNAUTHENTICATED",
    403: "FORBIDDEN",
    404: "NOT_FOUND",
    409: "CONFLICT",
};

export class AppError extends Error {
    public statusCode: number;
    public code: AppErrorCode;
    public isOperational: boolean;

    constructor(message: string, statusCode: number, code?: AppErrorCode, isOperational = true) {
        super(message);
        this.name = "AppError";
        this.statusCode = statusCode;
        this.code = code ?? DEFAULT_CODES[statusCode] ?? "INTERNAL_ERROR";
        this.isOperational = isOperational;
        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Shape of the errors thrown by node-postgres for failed statements
 */
export interface PostgresError extends Error {
    code: string;
    constraint?: string;
    detail?: string;
}

export function isPostgresError(error: unknown): error is PostgresError {
    return error instanceof Error && "code" in error && typeof error.code === "string";
}

// 23505 = unique_violation
export function isUniqueViolation(error: unknown): error is PostgresError {
    return isPostgresError(error) && error.code === "23505";
}

// 23503 = foreign_key_violation
export function isForeignKeyViolation(error: unknown): error is PostgresError {
    return isPostgresError(error) && error.code === "23503";
}
