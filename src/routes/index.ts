import { Router } from 'express';
import { appConfig } from '../config';
import { CardRepositoryService } from '../services/repository/repository.service';
import { createRepositoryRoutes } from './repository.routes';

export const createRoutes = (service: CardRepositoryService): Router => {
  const router = Router();

  // API routes
  router.use('/api/repositories', createRepositoryRoutes(service));

  // Health check endpoint
  router.get('/health', (req, res) => {
    res.status(200).json({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // 404 handler for API routes
  router.use('/api/*', (req, res) => {
    res.status(404).json({
      success: false,
      error: 'API endpoint not found',
    });
  });

  // Default route
  router.get('/', (req, res) => {
    res.json({
      name: appConfig.name,
      version: appConfig.version,
    });
  });

  return router;
};

export default createRoutes;
