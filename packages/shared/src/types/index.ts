// Centralized type exports for the application

export * from './album';
export * from './artist';
export * from './genre';
export * from './track';

// JSON API envelopes: a success carries `data`, a failure carries `error`
export interface ApiResponse<T> {
  data: T;
  meta?: Record<string, unknown>;
}

export interface ApiError {
  error: {
    message: string;
    code: string;
    details?: Record<string, unknown>;
  };
}
