// ABOUTME: Generator form page and the POST /generate handler behind it.
// ABOUTME: Presets pre-fill genres and theme; rejected input re-renders the form with a message.

import type { Context } from 'hono';
import { GENERATOR_LIMITS } from '@albumsmith/config';
import { InputError, UNKNOWN_GENRE, albumUrl, type Preset } from '@albumsmith/shared';
import type { GenreDefinition } from '@albumsmith/generator';
import { Layout } from '../../components/layout';
import { Button, Input } from '../../components/ui';
import { EMPTY_FORM, readGeneratorForm, toAlbumRequest, type GeneratorFormValues } from '../../utils/request';
import type { AppContext } from '../../types';

interface GeneratorPageProps {
  genres: GenreDefinition[];
  presets: Preset[];
  values: GeneratorFormValues;
  error?: string;
}

const LANGUAGE_OPTIONS = [
  { value: 'auto', label: 'Match the artists' },
  { value: 'en', label: 'English' },
  { value: 'fr', label: 'French' },
] as const;

export function GeneratorPage({ genres, presets, values, error }: GeneratorPageProps) {
  return (
    <Layout title="Generate" active="generate">
      <header>
        <h1>Build a concept album</h1>
      </header>

      <nav class="preset-links" aria-label="Presets">
        {presets.map((preset) => (
          <a href={`/?preset=${encodeURIComponent(preset.name)}`} class="genre-tag" title={preset.description}>
            {preset.name}
          </a>
        ))}
      </nav>

      <form method="post" action="/generate" class="generator-form">
        {error && <p class="error-message">{error}</p>}

        <div>
          <label for="artists">Artists</label>
          <textarea id="artists" name="artists" class="input" placeholder="Air, Daft Punk, Christine and the Queens">
            {values.artists}
          </textarea>
          <p class="field-hint">
            Separate names with commas or new lines (up to {GENERATOR_LIMITS.maxArtists}).
          </p>
        </div>

        <fieldset class="genre-options">
          <legend>
            <strong>Genres</strong>
          </legend>
          {genres.map((genre) => (
            <label>
              <input
                type="checkbox"
                name="genres"
                value={genre.tag}
                checked={values.genres.includes(genre.tag)}
              />
              {genre.label.en}
            </label>
          ))}
        </fieldset>

        <div>
          <label for="theme">Theme</label>
          <Input id="theme" name="theme" value={values.theme} placeholder="night, freedom, the sea..." />
        </div>

        <div>
          <label for="trackCount">Tracks</label>
          <Input
            type="number"
            id="trackCount"
            name="trackCount"
            value={values.trackCount}
            min={GENERATOR_LIMITS.minTracks}
            max={GENERATOR_LIMITS.maxTracks}
            style={{ maxWidth: '120px' }}
          />
        </div>

        <div>
          <label for="language">Language</label>
          <select id="language" name="language" class="input" style={{ maxWidth: '240px' }}>
            {LANGUAGE_OPTIONS.map((option) => (
              <option value={option.value} selected={values.language === option.value}>
                {option.label}
              </option>
            ))}
          </select>
        </div>

        <Button type="submit" size="large">
          Generate album
        </Button>
      </form>
    </Layout>
  );
}

function renderForm(c: Context<AppContext>, values: GeneratorFormValues, error?: string) {
  const catalog = c.get('catalog');
  const genres = [...catalog.genres.values()].filter((genre) => genre.tag !== UNKNOWN_GENRE);

  return <GeneratorPage genres={genres} presets={catalog.presets} values={values} error={error} />;
}

// GET / - the generator form, optionally pre-filled from ?preset=
export async function handleGenerator(c: Context<AppContext>) {
  const presetName = c.req.query('preset');
  if (!presetName) {
    return c.html(renderForm(c, EMPTY_FORM));
  }

  const preset = c
    .get('catalog')
    .presets.find((candidate) => candidate.name.toLowerCase() === presetName.toLowerCase());
  if (!preset) {
    return c.html(renderForm(c, EMPTY_FORM, `Unknown preset: ${presetName}`), 404);
  }

  return c.html(renderForm(c, { ...EMPTY_FORM, genres: [...preset.genres], theme: preset.theme }));
}

// POST /generate - assemble, record, then show the album
export async function handleGenerate(c: Context<AppContext>) {
  const body = await c.req.parseBody({ all: true });
  const { values, unknownGenres } = readGeneratorForm(body);

  try {
    if (unknownGenres.length > 0) {
      throw new InputError(`Unknown genre: ${unknownGenres.join(', ')}`, { genres: unknownGenres });
    }

    const album = await c.get('assembler').assemble(toAlbumRequest(values));
    await c.get('db').recordAlbum(album);

    return c.redirect(albumUrl(album.id), 303);
  } catch (error) {
    if (!(error instanceof InputError)) throw error;
    return c.html(renderForm(c, values, error.message), 400);
  }
}
