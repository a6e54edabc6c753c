// Layout component exports

export { Layout } from './Layout';
export { NavBar } from './NavBar';
export type { NavSection } from './NavBar';
