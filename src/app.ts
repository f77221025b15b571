import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import compression from 'compression';
import morgan from 'morgan';
import './types/express';
import { AppConfig } from './config';
import { SubmissionController } from './controllers/submissionController';
import { errorLoggingMiddleware, initializeRequestContext, logRequestLifecycle } from './middleware/loggingMiddleware';
import { createMetricsHandler, createMetricsMiddleware } from './middleware/prometheusMiddleware';
import { createHealthRoutes } from './routes/healthRoutes';
import { createSubmissionRoutes } from './routes/submissions';
import { ImageUploader } from './services/imageUploadService';
import { PrometheusMetricsService } from './services/prometheusMetrics';
import { SubmissionWorkflow } from './services/submissionWorkflow';
import { RowStore } from './services/surveyStore';
import { ApiError } from './types/api';
import Logger from './utils/logger';

const logger = Logger.createServiceLogger('App');

export interface AppDependencies {
  config: AppConfig;
  store: RowStore;
  uploader: ImageUploader;
  workflow: SubmissionWorkflow;
  metrics: PrometheusMetricsService;
}

export function createApp(deps: AppDependencies): express.Express {
  const { config, metrics } = deps;
  const app = express();

  app.use(helmet());

  app.use(cors({
    origin: config.corsOrigin,
    credentials: false,
    optionsSuccessStatus: 200
  }));

  app.use(compression({ threshold: 1024 }));

  // Base64 images travel inside the JSON body; a third is encoding overhead
  const bodyLimit = Math.ceil(config.maxImageBytes * 1.4) + 64 * 1024;
  app.use(express.json({ limit: bodyLimit }));

  app.use(initializeRequestContext);
  app.use(logRequestLifecycle);

  if (config.environment !== 'test') {
    const morganFormat = config.environment === 'production'
      ? 'combined'
      : ':method :url :status :res[content-length] - :response-time ms';

    app.use(morgan(morganFormat, {
      stream: {
        write: (message: string) => {
          logger.info(message.trim());
        }
      }
    }));
  }

  app.use(createMetricsMiddleware(metrics));
  app.get('/metrics', createMetricsHandler(metrics));

  const submissionController = new SubmissionController(deps.workflow, metrics);

  app.use('/api/v1/submissions', createSubmissionRoutes(submissionController, config));
  app.use('/api/v1', createHealthRoutes(deps.store, deps.uploader));

  app.use('*', (req, res) => {
    const error: ApiError = {
      error: {
        code: 'ENDPOINT_NOT_FOUND',
        message: `The endpoint ${req.method} ${req.originalUrl} was not found.`,
        requestId: req.requestId ?? Logger.generateRequestId()
      }
    };
    res.status(404).json(error);
  });

  app.use(errorLoggingMiddleware);

  app.use((error: Error, req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const requestId = req.requestId ?? Logger.generateRequestId();

    // body-parser errors carry their own client status
    const status = 'status' in error && typeof error.status === 'number' && error.status < 500 ? error.status : 500;

    const apiError: ApiError = {
      error: {
        code: status === 500 ? 'INTERNAL_SERVER_ERROR' : 'BAD_REQUEST',
        message: config.environment === 'production' && status === 500
          ? 'An internal server error occurred.'
          : error.message,
        requestId
      }
    };

    res.status(status).json(apiError);
  });

  return app;
}
