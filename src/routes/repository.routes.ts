import { Router } from 'express';
import { CardRepositoryService } from '../services/repository/repository.service';
import { createRepositoryController } from '../controllers/repository.controller';
import { createApiLimiter, createReloadLimiter } from '../middleware/rateLimiter';
import { Joi, messages, patterns, validateParams } from '../utils/validation';

const name = Joi.string().pattern(patterns.repositoryName).required();

const repositoryParams = Joi.object({ name }).messages(messages);

const setParams = Joi.object({
  name,
  setId: Joi.string().pattern(patterns.setId).required(),
}).messages(messages);

const cardParams = Joi.object({
  name,
  cardId: Joi.string()
    .pattern(/^[1-9]\d{0,14}$/)
    .required(),
}).messages(messages);

export const createRepositoryRoutes = (service: CardRepositoryService): Router => {
  const router = Router();
  const controller = createRepositoryController(service);

  router.use(createApiLimiter());

  router.get('/', controller.listRepositories);
  router.get('/:name', validateParams(repositoryParams), controller.getRepository);
  router.get('/:name/sets/:setId', validateParams(setParams), controller.getSet);
  router.get('/:name/cards/:cardId', validateParams(cardParams), controller.getCard);
  router.get('/:name/issues', validateParams(repositoryParams), controller.getIssues);

  // Reload runs the full load before answering
  router.post('/:name/reload', createReloadLimiter(), validateParams(repositoryParams), controller.reloadRepository);

  return router;
};

export default createRepositoryRoutes;
