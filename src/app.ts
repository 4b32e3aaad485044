import express from 'express';
import cors, { type CorsOptions } from 'cors';
import { pool } from './connections';
import type { Queryable } from './connections/db/connection';
import { appConfig } from './connections/config/app.config';
import { createRoutes } from './routes';
import { errorHandler, notFoundHandler } from './middlewares/error.middleware';
import type { CategoryAttributeService } from './modules/attributes/category-attributes.service';

const DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:3001',
  'http://localhost:5173',
  'http://localhost:5174',
];

// CORS Configuration
const corsOptions: CorsOptions = {
  origin: (origin, callback) => {
    // Allow requests with no origin (curl, server-to-server)
    if (!origin) {
      return callback(null, true);
    }

    const allowedOrigins = [
      ...(appConfig.frontendUrl ? [appConfig.frontendUrl] : []),
      ...appConfig.corsOrigins,
      ...(appConfig.nodeEnv === 'development' ? DEV_ORIGINS : []),
    ];

    if (allowedOrigins.includes(origin)) {
      callback(null, true);
    } else if (appConfig.nodeEnv === 'development' && appConfig.corsOrigins.length === 0) {
      // In development, allow all origins if CORS_ORIGINS is not set
      callback(null, true);
    } else {
      callback(new Error('Not allowed by CORS'));
    }
  },
  credentials: true,
  methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
  maxAge: 86400, // 24 hours
  optionsSuccessStatus: 200,
};

export const createApp = (service: CategoryAttributeService, healthDb: Queryable = pool) => {
  const app = express();

  // Middleware
  app.use(cors(corsOptions));
  app.use(express.json());
  app.use(express.urlencoded({ extended: true }));

  // Health check
  app.get('/health', async (_req, res) => {
    try {
      await healthDb.query('SELECT 1');
      res.json({ status: 'ok', database: 'connected' });
    } catch {
      res.status(500).json({ status: 'error', database: 'disconnected' });
    }
  });

  // API Routes
  app.use('/api', createRoutes(service));

  // Error handling
  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
};
