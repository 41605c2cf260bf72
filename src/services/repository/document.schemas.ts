import Joi from 'joi';
import { Published, RepositoryIndex, RepositoryInfo, SetDocument, SetInfo, SetReference } from '../../models/CardSet';
import { ValidationDetail, toValidationDetails } from '../../utils/validation';

const releaseDate = Joi.any().description('Checked by the release-date lint, never rejected');

const setReferenceSchema = Joi.object<Published<SetReference>>({
  id: Joi.string().required(),
  name: Joi.string().required(),
  file: Joi.string().required(),
  card_count: Joi.number().integer().min(0).required(),
  release_date: releaseDate,
});

export const repositoryIndexSchema = Joi.object<RepositoryIndex>({
  repository_info: Joi.object<RepositoryInfo>({
    name: Joi.string().required(),
    version: Joi.string().required(),
    description: Joi.string().allow('').required(),
    last_updated: Joi.string().required(),
  }).required(),
  sets: Joi.array().items(setReferenceSchema).required(),
});

export const setDocumentSchema = Joi.object<SetDocument>({
  set_info: Joi.object<Published<SetInfo>>({
    id: Joi.string().required(),
    name: Joi.string().required(),
    code: Joi.string(),
    release_date: releaseDate,
    card_count: Joi.number().integer().min(0).required(),
  }).required(),
  // Cards are validated one at a time so a bad card only drops itself
  cards: Joi.array().required(),
});

export type ParseOutcome<T> = { ok: true; value: T } | { ok: false; reason: string; details: ValidationDetail[] };

const documentOptions: Joi.ValidationOptions = {
  abortEarly: false,
  convert: false,
  allowUnknown: true,
};

/**
 * Decode a JSON document and check it against `schema`. Unknown keys are kept
 * out of the result; the schema decides what is required.
 */
export const parseDocument = <T>(bytes: Buffer | string, schema: Joi.ObjectSchema<T>): ParseOutcome<T> => {
  let parsed: unknown;
  try {
    const text = typeof bytes === 'string' ? bytes : bytes.toString('utf-8');
    parsed = JSON.parse(text.replace(/^\uFEFF/, ''));
  } catch (error) {
    return {
      ok: false,
      reason: `invalid JSON: ${error instanceof Error ? error.message : String(error)}`,
      details: [],
    };
  }

  const { error, value } = schema.validate(parsed, { ...documentOptions, stripUnknown: true });
  if (error) {
    const details = toValidationDetails(error);
    return { ok: false, reason: details.map((detail) => detail.message).join('; '), details };
  }
  return { ok: true, value };
};
