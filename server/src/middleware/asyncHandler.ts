import { Request, Response, NextFunction } from 'express';

export const asyncHandler = (fn: (req: Request, res: Response) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    void Promise.resolve(fn(req, res)).catch((err: unknown) => {
      next(err);
    });
  };
