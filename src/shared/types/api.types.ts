/**
 * =============================================================================
 * API TYPES
 * =============================================================================
 *
 *   { success: true,  data, meta? }
 *   { success: false, error: { code, message, details? } }
 * =============================================================================
 */

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

/** List endpoints report how many rows they returned */
export interface ApiMeta {
  total: number;
  /** Present when the listing is capped */
  limit?: number;
}

export type ApiResponse<T = unknown> =
  | { success: true; data: T; meta?: ApiMeta }
  | { success: false; error: ApiError };

export function successResponse<T>(data: T, meta?: ApiMeta): ApiResponse<T> {
  return meta ? { success: true, data, meta } : { success: true, data };
}

export function errorResponse(code: string, message: string, details?: Record<string, unknown>): ApiResponse<never> {
  return {
    success: false,
    error: details ? { code, message, details } : { code, message }
  };
}
