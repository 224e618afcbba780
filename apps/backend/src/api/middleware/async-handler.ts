import type { NextFunction, Request, RequestHandler, Response } from 'express';

/**
 * Wrap an async controller method so a rejected promise reaches the Express
 * error middleware instead of becoming an unhandled rejection.
 *
 * @example
 * router.get('/:hostId', asyncHandler(controller.getHost.bind(controller)));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
    return (req, res, next) => {
        fn(req, res, next).catch(next);
    };
}
