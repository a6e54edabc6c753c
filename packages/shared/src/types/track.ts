// Types for generated tracks

import type { GenreTag } from './genre';

export interface Track {
  /** 1-based, contiguous within an album */
  readonly position: number;
  readonly title: string;
  readonly genre: GenreTag;
  readonly mood: string;
  /** Sub-theme from the language's pool; no repeats until the pool runs out */
  readonly theme: string;
  /** Beats per minute */
  readonly tempo: number;
  /** Seconds */
  readonly duration: number;
  /** Artist the track draws on, when the album has any */
  readonly artist: string | null;
  /** Provider page of that artist */
  readonly link: string | null;
}
