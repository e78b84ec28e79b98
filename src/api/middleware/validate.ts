import { Request, Response, NextFunction, RequestHandler } from 'express';
import { validationResult, ValidationChain } from 'express-validator';

/** Runs the chains and answers 400 with per-field messages when any fails. */
export function validate(validations: ValidationChain[]): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    await Promise.all(validations.map((v) => v.run(req)));
    const errors = validationResult(req);
    if (errors.isEmpty()) {
      next();
      return;
    }
    const details = errors.array().map((e) => ({
      field: e.type === 'field' ? e.path : e.type,
      message: String(e.msg),
    }));
    res.status(400).json({ error: 'Validation failed', details });
  };
}
