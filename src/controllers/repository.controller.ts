import { Request, Response } from 'express';
import { ApiError } from '../middleware/errorHandler';
import { asyncHandler } from '../utils/asyncHandler';
import { successResponse } from '../utils/apiResponse';
import { logger } from '../utils/logger';
import { CardRepositoryService, RepositoryServiceError } from '../services/repository/repository.service';
import { LoadFailure } from '../services/repository/issues';

const serviceErrorStatus: Record<RepositoryServiceError['code'], number> = {
  UnknownRepository: 404,
  RepositoryDisabled: 409,
  RepositoryNotLoaded: 409,
};

const failureStatus: Record<LoadFailure['code'], number> = {
  MalformedIndex: 422,
  DuplicateSetId: 422,
  UnreachableSource: 502,
  LoadCancelled: 504,
};

const toApiError = (error: unknown): unknown =>
  error instanceof RepositoryServiceError ? new ApiError(serviceErrorStatus[error.code], error.message) : error;

const guard = <T>(fn: () => T): T => {
  try {
    return fn();
  } catch (error) {
    throw toApiError(error);
  }
};

export const createRepositoryController = (service: CardRepositoryService) => {
  const catalogFor = (req: Request) => guard(() => service.getCatalog(req.params.name));

  const listRepositories = asyncHandler(async (req: Request, res: Response) => {
    successResponse(res, service.listRepositories());
  });

  const getRepository = asyncHandler(async (req: Request, res: Response) => {
    const catalog = catalogFor(req);
    successResponse(res, {
      ...service.getSummary(req.params.name),
      repository: catalog.repository,
      sets: catalog.listSets().map((set) => ({
        id: set.reference.id,
        name: set.reference.name,
        code: set.set_info.code ?? null,
        release_date: set.set_info.release_date ?? set.reference.release_date ?? null,
        card_count: set.cards.length,
      })),
    });
  });

  const getSet = asyncHandler(async (req: Request, res: Response) => {
    const catalog = catalogFor(req);
    const set = catalog.getSet(req.params.setId);
    if (!set) {
      throw new ApiError(404, `Set ${req.params.setId} not found in repository ${req.params.name}`);
    }
    successResponse(res, { set_info: set.set_info, cards: set.cards });
  });

  const getCard = asyncHandler(async (req: Request, res: Response) => {
    const catalog = catalogFor(req);
    const location = catalog.getCard(Number(req.params.cardId));
    if (!location) {
      throw new ApiError(404, `Card ${req.params.cardId} not found in repository ${req.params.name}`);
    }
    successResponse(res, location);
  });

  const getIssues = asyncHandler(async (req: Request, res: Response) => {
    catalogFor(req);
    const state = service.getState(req.params.name);
    successResponse(res, { consistent: state.consistent ?? null, issues: state.issues });
  });

  const reloadRepository = asyncHandler(async (req: Request, res: Response) => {
    const { name } = req.params;
    logger.info(`Reload of repository ${name} requested`);

    const result = await service.reload(name).catch((error: unknown) => {
      throw toApiError(error);
    });

    if (!result.ok) {
      throw new ApiError(failureStatus[result.failure.code], result.failure.message, result.failure);
    }
    successResponse(
      res,
      { ...service.getSummary(name), issues: result.issues },
      `Repository ${name} reloaded`
    );
  });

  return { listRepositories, getRepository, getSet, getCard, getIssues, reloadRepository };
};

export type RepositoryController = ReturnType<typeof createRepositoryController>;
