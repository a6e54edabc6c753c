// External service endpoints and request limits

export const DEEZER_CONFIG = {
  apiBase: 'https://api.deezer.com',
  userAgent: 'Albumsmith/0.1',
  /** Candidates considered when matching a searched artist name */
  searchLimit: 5,
  /** Top tracks read per artist; their albums carry the genre data */
  topTracksLimit: 10,
  /** Fallback when an artist has no track durations */
  defaultTrackDuration: 180,
} as const;

export const RATE_LIMITS = {
  deezer: {
    requestsPerWindow: 50, // Deezer allows 50 requests per 5 seconds
    windowMs: 5000,
    maxRetries: 2,
    retryDelayMs: 1000,
    /** Error code Deezer returns in a 200 body when the quota is exceeded */
    quotaErrorCode: 4,
  },
} as const;
