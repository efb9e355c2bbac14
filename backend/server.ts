import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import rateLimit from 'express-rate-limit';
import * as dotenv from 'dotenv';
import multer from 'multer';
import type { Server } from 'http';
import { loadConfig } from './config/appConfig.js';
import { createServiceContainer, type ServiceContainer } from './services/serviceContainer.js';
import { createQuestionRouter } from './routes/questionRouter.js';
import { createUploadRouter } from './routes/uploadRouter.js';
import { isRecord } from './services/ai/JsonUtils.js';
import { isAppError } from './utils/errors.js';

export const API_PREFIX = '/api/v1';

/**
 * Express error middleware: taxonomy errors keep their status, everything else is a 500.
 */
export function errorMiddleware(nodeEnv: string) {
  return (err: unknown, _req: Request, res: Response, _next: NextFunction): void => {
    if (isAppError(err)) {
      if (err.statusCode >= 500) {
        console.error(`❌ [SERVER] ${err.name}: ${err.message}`);
      }
      res.status(err.statusCode).json(err.toJSON());
      return;
    }

    if (err instanceof multer.MulterError) {
      res.status(400).json({ error: 'VALIDATION_ERROR', message: err.message });
      return;
    }

    if (isRecord(err) && err.type === 'entity.parse.failed') {
      res.status(400).json({ error: 'VALIDATION_ERROR', message: 'Request body is not valid JSON' });
      return;
    }

    console.error('❌ [SERVER] Unhandled error:', err instanceof Error ? err.stack : err);
    res.status(500).json({
      error: 'INTERNAL_ERROR',
      message: nodeEnv === 'development' && err instanceof Error ? err.message : 'Internal server error'
    });
  };
}

export function createApp(container: ServiceContainer): express.Express {
  const { config } = container;
  const app = express();

  // Trust proxy for rate limiting (needed for X-Forwarded-For header)
  app.set('trust proxy', 1);

  // Security middleware
  app.use(helmet());

  // Rate limiting
  app.use(rateLimit({
    windowMs: 15 * 60 * 1000, // 15 minutes
    max: config.rateLimitMax
  }));

  // CORS configuration
  app.use(cors({
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization']
  }));

  // Body parsing middleware
  app.use(express.json({ limit: '10mb' }));
  app.use(express.urlencoded({ extended: true, limit: '10mb' }));

  app.use(`${API_PREFIX}/upload`, createUploadRouter(container.pipeline, config.defaultTargetLanguage));
  app.use(`${API_PREFIX}/questions`, createQuestionRouter(container.questions));

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.status(200).json({ status: 'OK', timestamp: new Date().toISOString() });
  });

  app.get('/', (_req, res) => {
    res.json({ message: 'Welcome to the Thai Tutor API' });
  });

  app.use(errorMiddleware(config.nodeEnv));

  // 404 handler
  app.use((_req, res) => {
    res.status(404).json({ error: 'Route not found' });
  });

  return app;
}

export function startServer(): Server {
  // Load environment variables from .env.local, then .env
  dotenv.config({ path: '.env.local' });
  dotenv.config();

  const config = loadConfig(process.env);
  const app = createApp(createServiceContainer(config));

  const server = app.listen(config.port, () => {
    console.log(`🚀 [SERVER] Listening on port ${config.port} (${config.nodeEnv})`);
  });

  server.on('error', (err: NodeJS.ErrnoException) => {
    if (err.code === 'EADDRINUSE') {
      console.error(`❌ Port ${config.port} is already in use. Please free the port and try again.`);
      process.exit(1);
    }
    console.error('❌ Server error:', err);
    throw err;
  });

  return server;
}

// Start the server only when run directly
if (require.main === module) {
  startServer();
}
