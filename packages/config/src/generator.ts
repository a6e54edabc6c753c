// Album generation limits and track defaults

export const GENERATOR_LIMITS = {
  maxArtists: 15,
  minTracks: 1,
  maxTracks: 30,
  defaultTrackCount: 8,
} as const;

export const TRACK_DEFAULTS = {
  /** Generated track lengths, in seconds */
  duration: { min: 150, max: 300 },
  /** Artists whose songs average under this many seconds push tempos up */
  shortTrackSeconds: 150,
  shortTrackTempoBoost: 10,
} as const;
