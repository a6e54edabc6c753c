// Main layout component that wraps all pages
// Provides consistent structure, navigation, and styling

import type { Child } from 'hono/jsx';
import { SITE_CONFIG } from '@albumsmith/config';
import { globalStyles } from '../../styles/globals';
import { NavBar, type NavSection } from './NavBar';

interface LayoutProps {
  children: Child;
  title?: string;
  description?: string;
  active?: NavSection;
}

// Applied in <head> so a stored dark preference never flashes light first
const applyThemeScript = `
  (function() {
    try {
      var stored = localStorage.getItem('theme');
      var dark = stored ? stored === 'dark' : window.matchMedia('(prefers-color-scheme: dark)').matches;
      if (dark) document.documentElement.setAttribute('data-theme', 'dark');
    } catch (e) {}
  })();
`;

const toggleThemeScript = `
  (function() {
    var toggle = document.getElementById('theme-toggle');
    if (!toggle) return;
    var root = document.documentElement;

    function render() {
      var dark = root.getAttribute('data-theme') === 'dark';
      toggle.textContent = dark ? '☀️' : '🌙';
      toggle.setAttribute('aria-label', dark ? 'Switch to light mode' : 'Switch to dark mode');
    }

    toggle.addEventListener('click', function() {
      var dark = root.getAttribute('data-theme') !== 'dark';
      if (dark) root.setAttribute('data-theme', 'dark');
      else root.removeAttribute('data-theme');
      localStorage.setItem('theme', dark ? 'dark' : 'light');
      render();
    });

    render();
  })();
`;

export function Layout({ children, title, description, active }: LayoutProps) {
  const pageTitle = title ? `${title} | ${SITE_CONFIG.name}` : SITE_CONFIG.name;

  return (
    <html lang="en">
      <head>
        <meta charset="UTF-8" />
        <meta name="viewport" content="width=device-width, initial-scale=1.0" />
        <title>{pageTitle}</title>
        <meta name="description" content={description || SITE_CONFIG.description} />
        <style dangerouslySetInnerHTML={{ __html: globalStyles }} />
        <script dangerouslySetInnerHTML={{ __html: applyThemeScript }} />
      </head>
      <body>
        <NavBar active={active} />

        <main class="main-content">{children}</main>

        <footer class="footer">
          <p>
            {SITE_CONFIG.name} · artist data from{' '}
            <a href="https://www.deezer.com" target="_blank" rel="noopener noreferrer">
              Deezer
            </a>
          </p>
        </footer>

        <script dangerouslySetInnerHTML={{ __html: toggleThemeScript }} />
      </body>
    </html>
  );
}

export default Layout;
