import corsModule from 'cors';
import { getConfig } from '../config';
import { logger } from '../utils/logger';

const LOCALHOST_PATTERN = /^https?:\/\/(localhost|127\.0\.0\.1)(:\d+)?$/;

/**
 * Allowed: requests without Origin (CLI tools), FRONTEND_ORIGIN ('*' allows all),
 * CORS_ORIGIN entries, and localhost during development
 */
export function isAllowedOrigin(origin: string | undefined): boolean {
  if (!origin) {
    return true;
  }

  const { frontendOrigin, corsOrigins, nodeEnv } = getConfig();
  if (frontendOrigin === '*' || frontendOrigin === origin) {
    return true;
  }
  if (corsOrigins.includes(origin)) {
    return true;
  }
  return nodeEnv === 'development' && LOCALHOST_PATTERN.test(origin);
}

export default corsModule({
  origin: (origin, callback) => {
    if (isAllowedOrigin(origin)) {
      return callback(null, true);
    }

    logger.warn('CORS blocked origin', { origin });
    callback(new Error('Not allowed by CORS'));
  },
  credentials: false,
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization', 'X-Requested-With', 'Accept', 'Origin'],
});
