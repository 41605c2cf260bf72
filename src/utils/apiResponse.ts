import { Response } from 'express';

/**
 * Standard API response format
 */
export interface ApiResponse<T> {
  success: true;
  message?: string;
  data: T;
}

/**
 * Send a successful API response
 */
export const successResponse = <T>(
  res: Response,
  data: T,
  message?: string,
  statusCode: number = 200
): Response => {
  const response: ApiResponse<T> = {
    success: true,
    ...(message !== undefined ? { message } : {}),
    data,
  };

  return res.status(statusCode).json(response);
};
