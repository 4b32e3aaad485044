import dotenv from 'dotenv';

dotenv.config();

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  // Split by comma or space, then trim and filter empty strings
  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv: process.env.NODE_ENV || 'development',
  jwtSecret: process.env.JWT_SECRET || 'secret',
  frontendUrl: process.env.FRONTEND_URL || 'http://localhost:5173',
  corsOrigins: parseCorsOrigins(),
};

export const logConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || './logs',
  // File transports are off under test so runs leave nothing behind
  toFile: process.env.LOG_TO_FILE !== 'false' && appConfig.nodeEnv !== 'test',
  rotation: '10MB',
  retention: '30d',
  compression: true,
};

export const cascadeConfig = {
  // Upper bound on tree depth walked by ancestor/descendant queries
  maxDepth: parseInt(process.env.CASCADE_MAX_DEPTH || '32'),
};
