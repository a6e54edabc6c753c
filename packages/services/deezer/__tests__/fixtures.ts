// Deezer API payloads used across the service tests

export const searchResponse = {
  data: [
    {
      id: 5001,
      name: 'Freeze Corleone',
      link: 'https://www.deezer.com/artist/5001',
      picture_medium: 'https://cdn.example.test/artist/5001.jpg',
      nb_fan: 1200,
    },
  ],
  total: 1,
};

export const topTracksResponse = {
  data: [
    { id: 1, title: 'Track One', duration: 200, album: { id: 10 } },
    { id: 2, title: 'Track Two', duration: 180, album: { id: 10 } },
    { id: 3, title: 'Track Three', duration: 190, album: { id: 11 } },
  ],
};

export const albumTenResponse = {
  id: 10,
  genres: { data: [{ id: 116, name: 'Rap/Hip Hop' }] },
};

export const albumElevenResponse = {
  id: 11,
  genres: { data: [{ id: 116, name: 'Rap/Hip Hop' }, { id: 200, name: 'Drill' }] },
};

export const quotaErrorResponse = {
  error: { type: 'Exception', message: 'Quota limit exceeded', code: 4 },
};

export const dataErrorResponse = {
  error: { type: 'DataException', message: 'no data', code: 800 },
};
