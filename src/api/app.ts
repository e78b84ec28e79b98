/**
 * Express app: CORS, JSON body, health check, ingredient routes, JSON errors.
 * Services are passed in so tests can wire their own.
 */

import express, { Express } from 'express';
import cors from 'cors';
import { createIngredientRoutes } from './routes/ingredients.routes';
import { errorHandler } from './middleware/errorHandler';
import type { IngredientService } from '../services/ingredient.service';

export interface AppDependencies {
  ingredientService: IngredientService;
}

export function createApp({ ingredientService }: AppDependencies): Express {
  const app = express();

  app.use(cors({ origin: true, credentials: true }));
  app.use(express.json({ limit: '100kb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', ts: new Date().toISOString() });
  });

  app.use('/ingredients', createIngredientRoutes(ingredientService));
  app.use(errorHandler);

  return app;
}
