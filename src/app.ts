import express, { Express } from 'express';
import cors from 'cors';
import morgan from 'morgan';
import { apiConfig, appConfig } from './config';
import { errorHandler, notFound } from './middleware/errorHandler';
import { httpLogger } from './utils/logger';
import { createRoutes } from './routes';
import { CardRepositoryService } from './services/repository/repository.service';

export const createApp = (service: CardRepositoryService): Express => {
  const app = express();

  // Middleware
  app.use(cors({ origin: apiConfig.cors.origin }));
  app.use(express.json());
  app.use(httpLogger);

  // Logging middleware in development
  if (appConfig.isDevelopment) {
    app.use(morgan('dev'));
  }

  app.use('/', createRoutes(service));

  app.use(notFound);
  // Error handling middleware (should be the last middleware)
  app.use(errorHandler);

  return app;
};

export default createApp;
