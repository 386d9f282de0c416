import express from 'express';
import cors from 'cors';
import { errorHandler } from './errors.js';
import type { AppContext } from './types/context.js';
import authRoutes from './routes/auth.js';
import userRoutes from './routes/users.js';
import bookRoutes from './routes/books.js';

export function createApp(ctx: AppContext): express.Express {
  const app = express();

  // Middleware
  app.use(cors({ origin: true }));

  // Health check endpoint (no auth required)
  app.get('/health', (_req, res) => {
    res.json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  app.use(authRoutes(ctx));
  app.use('/user', userRoutes(ctx));
  app.use('/book', bookRoutes(ctx));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  app.use(errorHandler);

  return app;
}
