import express from 'express';
import helmet from 'helmet';
import cors from 'cors';
import morgan from 'morgan';
import cookieParser from 'cookie-parser';
import { config } from '@shared/config/index.js';
import { errorHandler, Errors } from '@shared/middleware/errorHandler.js';
import { apiLimiter } from '@shared/middleware/rateLimiter.js';
import { registerRoutes } from './routes/index.js';

interface CreateAppOptions {
  registerRoutes?: boolean;
  includeRateLimiting?: boolean;
  requestLogging?: boolean;
  registerFinalMiddleware?: boolean;
}

export function registerFinalMiddleware(app: express.Express): void {
  app.use('/api', (_req, _res, next) => {
    next(Errors.notFound('Route not found'));
  });

  // Error handling middleware (must be last)
  app.use(errorHandler);
}

export function createApp(options: CreateAppOptions = {}): express.Express {
  const app = express();
  const {
    registerRoutes: shouldRegisterRoutes = true,
    includeRateLimiting = true,
    requestLogging = config.nodeEnv !== 'test',
    registerFinalMiddleware: shouldRegisterFinalMiddleware = true,
  } = options;

  app.disable('x-powered-by');

  // Trust proxy for correct req.ip behind reverse proxies
  app.set('trust proxy', config.trustProxy);

  // Security headers
  app.use(helmet({
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'none'"],
        imgSrc: ["'self'", 'data:', 'https://www.gravatar.com'],
        frameAncestors: ["'none'"],
      },
    },
    hsts: {
      maxAge: 31536000,
      includeSubDomains: true,
    },
    frameguard: { action: 'deny' },
    referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
  }));

  // CORS configuration for cookie-based authentication
  app.use(cors({
    origin: config.frontendUrl,
    credentials: true,
  }));

  if (requestLogging) {
    app.use(morgan(config.nodeEnv === 'production' ? 'combined' : 'dev'));
  }
  app.use(express.json({ limit: '100kb' }));
  app.use(cookieParser());

  if (includeRateLimiting) {
    app.use('/api', apiLimiter);
  }

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  if (shouldRegisterRoutes) {
    registerRoutes(app);
  }

  if (shouldRegisterFinalMiddleware) {
    registerFinalMiddleware(app);
  }

  return app;
}
