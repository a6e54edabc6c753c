// Navigation bar component with links and theme toggle

import { SITE_CONFIG } from '@albumsmith/config';

export type NavSection = 'generate' | 'history';

interface NavBarProps {
  active?: NavSection;
}

export function NavBar({ active }: NavBarProps) {
  const linkClass = (section: NavSection) => (section === active ? 'nav-link active' : 'nav-link');

  return (
    <nav class="nav">
      <div class="nav-container">
        <a href="/" class="nav-link nav-brand">
          {SITE_CONFIG.name}
        </a>

        <div class="nav-links">
          <a href="/" class={linkClass('generate')}>
            Generate
          </a>
          <a href="/history" class={linkClass('history')}>
            History
          </a>
        </div>

        <button
          id="theme-toggle"
          class="theme-toggle"
          type="button"
          aria-label="Toggle theme"
        >
          🌙
        </button>
      </div>
    </nav>
  );
}

export default NavBar;
