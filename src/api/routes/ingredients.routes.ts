import { Router, Request, Response } from 'express';
import { body } from 'express-validator';
import { validate } from '../middleware/validate';
import { logger } from '../../config/logger';
import {
    AppError,
    ClassificationParseError,
    UpstreamParseError,
    UpstreamTransportError,
    statusForError,
} from '../../errors';
import type { IngredientService } from '../../services/ingredient.service';
import type { ClassificationRequest, ClassificationResult } from '../../types';

function logFailure(ingredient: string, error: unknown): void {
    if (error instanceof UpstreamParseError) {
        logger.error('Ingredient classification failed: bad upstream response', {
            ingredient,
            error: error.message,
            rawBody: error.rawBody,
        });
    } else if (error instanceof ClassificationParseError) {
        logger.error('Ingredient classification failed: unreadable classification', {
            ingredient,
            error: error.message,
            content: error.content,
        });
    } else if (error instanceof UpstreamTransportError) {
        logger.error('Ingredient classification failed: provider request error', {
            ingredient,
            error: error.detail,
            upstreamStatus: error.upstreamStatus,
        });
    } else {
        logger.error('Ingredient classification failed', {
            ingredient,
            error: error instanceof Error ? error.message : String(error),
        });
    }
}

export function createIngredientRoutes(ingredientService: IngredientService): Router {
    const router = Router();

    /** POST /ingredients - classify one ingredient as vegan, vegetarian or regular */
    router.post(
        '/',
        validate([
            body('ingredient')
                .isString()
                .withMessage('Ingredient must be a string')
                .bail()
                .notEmpty()
                .withMessage('Ingredient is required'),
        ]),
        async (req: Request, res: Response) => {
            const { ingredient }: ClassificationRequest = req.body;
            try {
                const classification = await ingredientService.categorize(ingredient);
                const result: ClassificationResult = { ingredient, classification };
                res.json(result);
            } catch (e) {
                logFailure(ingredient, e);
                const message = e instanceof AppError ? e.message : 'Failed to classify ingredient';
                res.status(statusForError(e)).json({ error: message });
            }
        }
    );

    return router;
}
