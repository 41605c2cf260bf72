import Joi from 'joi';
import { Request, Response, NextFunction } from 'express';
import { ApiError } from '../middleware/errorHandler';
import { logger } from './logger';

// Common validation patterns
const patterns = {
  setId: /^[A-Za-z0-9][A-Za-z0-9_-]{0,31}$/,
  repositoryName: /^[A-Za-z0-9][A-Za-z0-9._-]{0,63}$/,
  isoDate: /^\d{4}-\d{2}-\d{2}$/,
  tag: /^[a-z0-9]+(?:_[a-z0-9]+)*$/,
};

// Common validation messages
const messages = {
  'string.empty': '{{#label}} is required',
  'any.required': '{{#label}} is required',
  'string.pattern.base': '{{#label}} does not match the required format',
  'number.base': '{{#label}} must be a number',
  'number.min': '{{#label}} must be at least {{#limit}}',
  'number.max': '{{#label}} must not exceed {{#limit}}',
  'array.base': '{{#label}} must be an array',
  'object.base': '{{#label}} must be an object',
  'any.only': '{{#label}} must be one of {{#valids}}',
};

export interface ValidationDetail {
  field: string;
  message: string;
  type: string;
}

/**
 * Flatten a joi error into field/message/type triples.
 */
const toValidationDetails = (error: Joi.ValidationError): ValidationDetail[] =>
  error.details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message,
    type: detail.type,
  }));

/**
 * Validate request data against a Joi schema
 */
const validate = (schema: Joi.ObjectSchema, source: 'body' | 'query' | 'params' = 'body') => {
  return (req: Request, res: Response, next: NextFunction) => {
    const { error } = schema.validate(req[source], {
      abortEarly: false,
      allowUnknown: false,
    });

    if (error) {
      const errors = toValidationDetails(error);
      logger.warn('Validation error:', { errors, source });
      return next(new ApiError(400, 'Validation failed', { errors }));
    }

    next();
  };
};

/**
 * Validate request URL parameters
 */
const validateParams = (schema: Joi.ObjectSchema) => validate(schema, 'params');

/**
 * Absolute http(s) URL check
 */
const isValidUrl = (value: string): boolean => {
  let parsed: URL;
  try {
    parsed = new URL(value);
  } catch {
    return false;
  }
  return parsed.protocol === 'http:' || parsed.protocol === 'https:';
};

export { Joi, patterns, messages, toValidationDetails, validate, validateParams, isValidUrl };
