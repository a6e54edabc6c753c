// Tracklist for an album page: one row per track with its generated details

import type { Track } from '@albumsmith/shared';
import { formatDuration } from '@albumsmith/export';

interface TrackListProps {
  tracks: readonly Track[];
}

export function TrackList({ tracks }: TrackListProps) {
  return (
    <ol class="track-list">
      {tracks.map((track) => (
        <li class="track-item">
          <span class="track-position">{String(track.position).padStart(2, '0')}</span>
          <div class="track-item-content">
            <p>
              <strong>{track.title}</strong>
            </p>
            <p class="track-meta">
              {formatDuration(track.duration)} · {track.tempo} BPM · {track.mood} · {track.genre} · {track.theme}
            </p>
            {track.artist && (
              <p class="track-links">
                Inspired by{' '}
                {track.link ? (
                  <a href={track.link} target="_blank" rel="noopener noreferrer">
                    {track.artist} ↗
                  </a>
                ) : (
                  track.artist
                )}
              </p>
            )}
          </div>
        </li>
      ))}
    </ol>
  );
}

export default TrackList;
