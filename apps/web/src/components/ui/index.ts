// UI component exports

export { Button } from './Button';
export { ErrorPage, NotFoundPage } from './ErrorPage';
export { Input } from './Input';
export { TrackList } from './TrackList';
