import { Request, Response, NextFunction, RequestHandler } from "express";

/**
 * Forwards rejections from async controllers to the error middleware
 */
export const asyncHandler =
    (handler: (req: Request, res: Response, next: NextFunction) => Promise<unknown>): RequestHandler =>
        (req, res, next) => {
            handler(req, res, next).catch(next);
        };
