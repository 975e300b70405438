/**
 * Portal Logger Configuration
 * Supports timestamps, ports, messages, errors, API handlers, and more
 */

import winston from "winston";
import { Request, Response } from "express";
import "../types/express";

// Custom log levels
const logLevels = {
    error: 0,
    warn: 1,
    info: 2,
    http: 3,
    debug: 4,
};

const logColors = {
    error: "red",
    warn: "yellow",
    info: "green",
    http: "magenta",
    debug: "cyan",
};

winston.addColors(logColors);

const RESERVED_KEYS = ["timestamp", "level", "message", "service", "port", "method", "url", "statusCode", "error"];

// Custom format for console output
const consoleFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.colorize({ all: true }),
    winston.format.printf(({ timestamp, level, message, service, port, method, url, statusCode, error, ...meta }) => {
        let logMessage = `[${timestamp}]`;

        if (service) {
            logMessage += ` [${service}]`;
        }

        if (port) {
            logMessage += ` [Port:${port}]`;
        }

        if (method && url) {
            logMessage += ` [${method} ${url}]`;
        }

        if (statusCode) {
            logMessage += ` [Status:${statusCode}]`;
        }

        logMessage += ` ${level}: ${message}`;

        if (error) {
            if (error instanceof Error) {
                logMessage += `\n  Error: ${error.message}`;
                if (error.stack && process.env.NODE_ENV === "development") {
                    logMessage += `\n  Stack: ${error.stack}`;
                }
            } else {
                logMessage += `\n  Error: ${JSON.stringify(error)}`;
            }
        }

        const metaKeys = Object.keys(meta).filter((key) => !RESERVED_KEYS.includes(key));
        if (metaKeys.length > 0) {
            logMessage += `\n  Meta: ${JSON.stringify(Object.fromEntries(metaKeys.map((k) => [k, meta[k]])))}`;
        }

        return logMessage;
    })
);

// File format (without colors, more detailed)
const fileFormat = winston.format.combine(
    winston.format.timestamp({ format: "YYYY-MM-DD HH:mm:ss" }),
    winston.format.errors({ stack: true }),
    winston.format.json()
);

const transportFormat = process.env.NODE_ENV === "production" ? fileFormat : consoleFormat;

const logger = winston.createLogger({
    levels: logLevels,
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === "production" ? "info" : "debug"),
    format: fileFormat,
    silent: process.env.NODE_ENV === "test",
    defaultMeta: {
        service: process.env.SERVICE_NAME || "campus-portal",
        environment: process.env.NODE_ENV || "development",
    },
    transports: [new winston.transports.Console({ format: transportFormat })],
    exceptionHandlers: [new winston.transports.Console({ format: transportFormat })],
    rejectionHandlers: [new winston.transports.Console({ format: transportFormat })],
});

/**
 * Log service startup
 */
export const logServiceStart = (serviceName: string, port: number) => {
    logger.info(`🚀 ${serviceName} started successfully`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log service shutdown
 */
export const logServiceStop = (serviceName: string, port: number) => {
    logger.info(`🛑 ${serviceName} stopped`, {
        service: serviceName,
        port,
        timestamp: new Date().toISOString(),
    });
};

/**
 * Log API request
 */
export const logApiRequest = (req: Request, res: Response, responseTime?: number) => {
    const logData: Record<string, unknown> = {
        method: req.method,
        url: req.originalUrl || req.url,
        ip: req.ip || req.socket.remoteAddress,
        userAgent: req.get("user-agent"),
        statusCode: res.statusCode,
        correlationId: req.correlationId,
    };

    if (responseTime !== undefined) {
        logData.responseTime = `${responseTime}ms`;
    }

    if (res.statusCode >= 400) {
        logger.warn(`API Request`, logData);
    } else {
        logger.http(`API Request`, logData);
    }
};

/**
 * Log API error
 * Client errors (4xx) are logged as warnings, server errors (5xx) as errors
 */
export const logApiError = (
    error: Error,
    req: Request,
    res: Response,
    statusCode: number = 500
) => {
    const logData = {
        method: req.method,
        url: req.originalUrl || req.url,
        statusCode,
        error: {
            name: error.name,
            message: error.message,
            stack: process.env.NODE_ENV === "development" ? error.stack : undefined,
        },
        ip: req.ip || req.socket.remoteAddress,
        userAgent: req.get("user-agent"),
        correlationId: req.correlationId,
    };

    if (statusCode >= 400 && statusCode < 500) {
        logger.warn(`API Error: ${error.message}`, logData);
    } else {
        logger.error(`API Error: ${error.message}`, logData);
    }
};

/**
 * Log database operation
 */
export const logDatabaseOperation = (
    operation: string,
    table?: string,
    details?: Record<string, unknown>
) => {
    logger.debug(`Database ${operation}`, {
        operation,
        table,
        ...details,
    });
};

/**
 * Log security event
 */
export const logSecurityEvent = (
    event: string,
    severity: "low" | "medium" | "high" | "critical",
    details?: Record<string, unknown>
) => {
    const level = severity === "critical" || severity === "high" ? "error" : "warn";
    logger[level](`Security Event: ${event}`, {
        event,
        severity,
        ...details,
    });
};

export default logger;
