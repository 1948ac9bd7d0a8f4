import { Diagnostic } from '../../language/diagnostics';

export interface ApiError {
  title: string;
  /** A readable message, or the diagnostics for schema errors. */
  message: string | Diagnostic[] | object;
}

export interface ApiResponse<T = unknown> {
  success: boolean;
  data?: T;
  error?: ApiError;
  timestamp: string;
}

export const createApiResponse = <T>(
  success: boolean,
  data?: T,
  error?: ApiError,
): ApiResponse<T> => {
  return {
    success,
    data,
    error,
    timestamp: new Date().toISOString(),
  };
};
