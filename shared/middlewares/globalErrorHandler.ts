import { Request, Response, NextFunction } from "express";
import { ZodError } from "zod";
import { AppError } from "../config/errorHandler";
import { logApiError } from "../config/logger";
import { ErrorMessages } from "../utils/errorMessages";

export function buildLoginUrl(req: Request): string {
    const base = process.env.LOGIN_URL || "/login";
    const sep = base.includes("?") ? "&" : "?";
    return `${base}${sep}next=${encodeURIComponent(req.originalUrl || req.url)}`;
}

/**
 * Errors raised by http-errors based middleware (body-parser, connect-timeout)
 * carry their own HTTP status. Client errors and the 503 timeout keep it.
 */
interface HttpStatusError extends Error {
    status?: number;
    statusCode?: number;
}

export function httpStatusOf(err: Error): number | undefined {
    const candidate: HttpStatusError = err;
    const status = candidate.status ?? candidate.statusCode;
    if (typeof status !== "number") return undefined;
    return (status >= 400 && status < 500) || status === 503 ? status : undefined;
}

export const globalErrorHandler = (
    err: Error,
    req: Request,
    res: Response,
    _next: NextFunction
) => {
    if (err instanceof ZodError) {
        logApiError(err, req, res, 400);
        return res.status(400).json({
            success: false,
            message: ErrorMessages.VALIDATION_FAILED,
            code: "VALIDATION_ERROR",
            errors: err.errors.map((e) => ({
                field: e.path.join("."),
                message: e.message,
            })),
        });
    }

    const httpStatus = err instanceof AppError ? undefined : httpStatusOf(err);
    if (httpStatus !== undefined) {
        logApiError(err, req, res, httpStatus);
        const timedOut = httpStatus === 503;
        return res.status(httpStatus).json({
            success: false,
            message: timedOut ? ErrorMessages.REQUEST_TIMEOUT : ErrorMessages.MALFORMED_REQUEST,
            code: timedOut ? "SERVICE_UNAVAILABLE" : "VALIDATION_ERROR",
        });
    }

    const statusCode = err instanceof AppError ? err.statusCode : 500;
    const message = err instanceof AppError ? err.message : ErrorMessages.GENERIC_ERROR;
    const code = err instanceof AppError ? err.code : "INTERNAL_ERROR";

    logApiError(err, req, res, statusCode);

    return res.status(statusCode).json({
        success: false,
        message,
        code,
        ...(code === "UNAUTHENTICATED" && { loginUrl: buildLoginUrl(req) }),
        ...(process.env.NODE_ENV === "development" && { stack: err.stack }),
    });
};
