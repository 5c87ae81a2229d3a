/**
 * =============================================================================
 * API RESPONSE BUILDER
 * =============================================================================
 *
 * Standardized success envelope for all API endpoints.
 *
 * RESPONSE FORMAT:
 * ```json
 * {
 *   "success": true,
 *   "data": { ... },
 *   "message": "Optional success message",
 *   "meta": { "timestamp": "...", "requestId": "..." }
 * }
 * ```
 *
 * Errors never go through here; they are thrown as AppError and rendered
 * by the global error handler.
 *
 * =============================================================================
 */

import { Response } from 'express';
import { HTTP_STATUS } from '../constants';

/**
 * Success response format
 */
export interface SuccessResponse<T> {
  success: true;
  data: T;
  message?: string;
  meta?: ResponseMeta;
}

/**
 * Response metadata
 */
export interface ResponseMeta {
  timestamp?: string;
  requestId?: string;
  [key: string]: unknown;
}

/**
 * API Response Builder Class
 */
export class ApiResponse {
  /**
   * 200 OK - Generic success response
   */
  static success<T>(
    res: Response,
    data: T,
    message?: string,
    meta?: Omit<ResponseMeta, 'timestamp'>
  ): Response {
    const response: SuccessResponse<T> = {
      success: true,
      data,
      ...(message && { message }),
      meta: {
        timestamp: new Date().toISOString(),
        ...meta
      }
    };
    return res.status(HTTP_STATUS.OK).json(response);
  }
}
