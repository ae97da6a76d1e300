import { CORS_ORIGINS, MODE } from 'App/config/config';
import ExperimentRunsController from 'App/controllers/ExperimentRunsController';
import { CorsNotAllowedError } from 'App/errors/CustomError';
import cors, { CorsOptions } from 'cors';
import express from 'express';
import helmet from 'helmet';
import http from 'http';
import morgan from 'morgan';
import errorHandler from './middlewares/errorHandler';
import handleCorsError from './middlewares/handleCorsError';
import { generalLimiter, runStartLimiter } from './rateLimiters/generalRateLimiter';
import { createExperimentRoutes } from './routes/experimentRoutes';
// ------------------------------------------------------------------------------

const maxQuerySize = '0.5mb';

export const createApp = (controller = ExperimentRunsController) => {
  const app = express();

  // Parse JSON bodies (as sent by API clients)
  app.use(express.json({ limit: maxQuerySize }));

  if (MODE === 'production') {
    app.enable('trust proxy');

    app.disable('x-powered-by');

    app.use(helmet());
    app.use(
      helmet.frameguard({
        action: 'deny',
      }),
    );
    app.use(
      helmet.hsts({
        maxAge: 31536000,
        includeSubDomains: false,
      }),
    );
    app.use(helmet.noSniff());
    app.use(
      helmet.referrerPolicy({
        policy: ['origin', 'unsafe-url'],
      }),
    );
    app.use(helmet.crossOriginResourcePolicy({ policy: 'cross-origin' }));
    // adding morgan to log HTTP requests
    app.use(morgan('common'));
    app.use(generalLimiter);
    app.post('/api/experiments/run', runStartLimiter);
  }

  const corsOptions: CorsOptions = {
    methods: ['GET', 'POST'],
    origin: (origin, callback) => {
      if (!origin || !CORS_ORIGINS.length || CORS_ORIGINS.includes(origin)) {
        callback(null, true);
      } else {
        callback(new CorsNotAllowedError(origin));
      }
    },
  };

  app.use(cors(corsOptions));
  app.use(handleCorsError);

  app.use('/', createExperimentRoutes(controller));

  app.get('/health', (req, res) => {
    res.json({ status: 'ok' });
  });

  app.use(errorHandler);

  return app;
};

const server = http.createServer(createApp());

export default server;

// Graceful shutdown
const shutdown = (signal: string) => {
  console.log(`\n[Shutdown] Caught ${signal}, closing...`);
  server.close(() => {
    console.log('[Shutdown] HTTP server closed');
    process.exit(0);
  });
  // Force exit if hanging
  setTimeout(() => process.exit(1), 10000).unref();
};
['SIGINT', 'SIGTERM'].forEach(sig => process.once(sig, () => shutdown(sig)));
