// Plain-text export, laid out for reading

import type { Album } from '@albumsmith/shared';

const RULE_WIDTH = 60;

export function formatDuration(seconds: number): string {
  const minutes = Math.floor(seconds / 60);
  return `${minutes}:${String(seconds % 60).padStart(2, '0')}`;
}

export interface AlbumStats {
  /** Whole minutes, rounded down */
  totalMinutes: number;
  /** Mean BPM, rounded down */
  averageTempo: number;
  trackCount: number;
}

export function albumStats(album: Album): AlbumStats {
  const trackCount = album.tracks.length;
  const seconds = album.tracks.reduce((sum, track) => sum + track.duration, 0);
  const beats = album.tracks.reduce((sum, track) => sum + track.tempo, 0);
  return {
    totalMinutes: Math.floor(seconds / 60),
    averageTempo: trackCount > 0 ? Math.floor(beats / trackCount) : 0,
    trackCount,
  };
}

export function formatStats({ totalMinutes, averageTempo, trackCount }: AlbumStats): string {
  const tracks = trackCount === 1 ? '1 track' : `${trackCount} tracks`;
  return `${totalMinutes} min  |  ${averageTempo} BPM average  |  ${tracks}`;
}

export function albumToText(album: Album): string {
  const artists = album.artists.map((credit) => (credit.resolved ? credit.name : `${credit.name} (not found)`));

  const lines = [
    album.title,
    '='.repeat(RULE_WIDTH),
    '',
    `Theme: ${album.theme}`,
    `Genres: ${album.genres.join(', ')}`,
    `Artists: ${artists.join(', ')}`,
    `Created: ${album.createdAt}`,
    '',
    album.narration,
    '',
    'TRACKLIST',
    '-'.repeat(RULE_WIDTH),
    '',
  ];

  for (const track of album.tracks) {
    lines.push(`${String(track.position).padStart(2, ' ')}. ${track.title}`);
    lines.push(`    ${formatDuration(track.duration)}  |  ${track.tempo} BPM  |  ${track.mood}  |  ${track.genre}`);
    lines.push(`    Theme: ${track.theme}`);
    if (track.artist) {
      lines.push(`    Inspired by ${track.artist}${track.link ? ` (${track.link})` : ''}`);
    }
    lines.push('');
  }
  lines.push(`Total: ${formatStats(albumStats(album))}`, '');

  return lines.join('\n');
}
