// Global CSS styles, embedded in every page so the server needs no static files

export const globalStyles = `
:root {
  --c-bg: #f7f6f3;
  --c-bg-rgb: 247, 246, 243;
  --c-accent: #6b4fbb;
  --c-accent-rgb: 107, 79, 187;
  --c-base: #1a1a1a;
  --c-base-rgb: 26, 26, 26;
  --c-warn: #b3261e;
}

[data-theme='dark'] {
  --c-bg: #141318;
  --c-bg-rgb: 20, 19, 24;
  --c-accent: #b39ddb;
  --c-accent-rgb: 179, 157, 219;
  --c-base: #f2f2f2;
  --c-base-rgb: 242, 242, 242;
  --c-warn: #f28b82;
}

*, *::before, *::after { box-sizing: border-box; margin: 0; padding: 0; }

html {
  font-family: 'Iowan Old Style', 'Palatino Linotype', Georgia, serif;
  -webkit-font-smoothing: antialiased;
}

body {
  background-color: var(--c-bg);
  color: var(--c-base);
  min-height: 100vh;
  transition: background-color 0.3s, color 0.3s;
}

p { margin: 1em auto; line-height: 1.5em; max-width: 800px; font-size: 18px; }
a { color: var(--c-accent); text-decoration: none; }
a:hover { text-decoration: underline; }

h1 { color: var(--c-accent); text-align: center; margin: 0.5em 0 0.8em; font-size: 2rem; }
h2 { text-align: center; margin: 2em 0 1em; font-size: 1.5rem; }

.main-content { padding: 1rem; max-width: 900px; margin: 0 auto; }
.section { margin: 2rem auto; max-width: 800px; padding: 0 1rem; }

/* Navigation */
.nav {
  position: sticky;
  top: 0;
  z-index: 100;
  background-color: var(--c-bg);
  border-bottom: 1px solid rgba(var(--c-base-rgb), 0.1);
}

.nav-container {
  display: flex;
  justify-content: space-between;
  align-items: center;
  max-width: 900px;
  height: 56px;
  margin: 0 auto;
  padding: 0 1rem;
}

.nav-links { display: flex; gap: 0.5rem; }
.nav-link { padding: 0.4rem 0.75rem; border-radius: 4px; font-size: 15px; }
.nav-link:hover { background-color: rgba(var(--c-accent-rgb), 0.1); text-decoration: none; }
.nav-link.active, .nav-brand { font-weight: bold; }

.theme-toggle { background: none; border: none; cursor: pointer; font-size: 1.2rem; padding: 0.5rem; }

/* Controls */
.button {
  display: inline-block;
  padding: 0.6rem 1.2rem;
  border: 2px solid var(--c-accent);
  border-radius: 4px;
  background-color: var(--c-accent);
  color: var(--c-bg);
  font: inherit;
  cursor: pointer;
}

.button:hover { opacity: 0.85; text-decoration: none; }
.button--secondary { background-color: transparent; color: var(--c-accent); }
.button--small { padding: 0.3rem 0.7rem; font-size: 14px; }
.button--large { padding: 0.8rem 1.6rem; font-size: 18px; }

.input {
  width: 100%;
  padding: 0.6rem 0.8rem;
  border: 1px solid rgba(var(--c-base-rgb), 0.25);
  border-radius: 4px;
  background-color: var(--c-bg);
  color: var(--c-base);
  font: inherit;
}

.input:focus { outline: none; border-color: var(--c-accent); }

/* Generator form */
.generator-form { display: flex; flex-direction: column; gap: 1.25rem; max-width: 800px; margin: 2rem auto; padding: 0 1rem; }
.generator-form label { display: block; margin-bottom: 0.4rem; font-weight: bold; }
.generator-form textarea { min-height: 6rem; resize: vertical; }
.field-hint { margin: 0.3rem 0 0; font-size: 14px; opacity: 0.7; }

.genre-options {
  display: grid;
  grid-template-columns: repeat(auto-fill, minmax(150px, 1fr));
  gap: 0.4rem 1rem;
  border: none;
}

.genre-options label { display: flex; align-items: center; gap: 0.4rem; margin: 0; font-weight: normal; }

.preset-links, .genre-tags, .export-links { display: flex; flex-wrap: wrap; gap: 0.5rem; margin: 1rem 0; }
.preset-links, .export-links { justify-content: center; }

.genre-tag {
  padding: 4px 10px;
  border-radius: 20px;
  background-color: rgba(var(--c-accent-rgb), 0.15);
  color: var(--c-accent);
  font-size: 13px;
}

/* Messages */
.error-message, .warning-message { max-width: 800px; margin: 1rem auto; padding: 0.75rem 1rem; border-radius: 4px; text-align: center; }
.error-message { color: var(--c-warn); background-color: rgba(179, 38, 30, 0.1); }
.warning-message { background-color: rgba(var(--c-accent-rgb), 0.1); }

/* Tracklist */
.track-list { max-width: 800px; margin: 2rem auto; padding: 0 1rem; list-style: none; }
.track-item { display: flex; gap: 1rem; padding: 1rem 0; border-bottom: 1px solid rgba(var(--c-base-rgb), 0.1); }
.track-item:last-child { border-bottom: none; }
.track-item-content p { margin: 0 0 0.3em; max-width: none; }
.track-position { min-width: 2rem; color: var(--c-accent); font-weight: bold; }
.track-meta, .track-links { font-size: 14px; opacity: 0.8; }

/* History */
.history-table { width: 100%; max-width: 800px; margin: 1rem auto; border-collapse: collapse; }
.history-table th, .history-table td { padding: 0.5rem; text-align: left; border-bottom: 1px solid rgba(var(--c-base-rgb), 0.1); }
.pagination { display: flex; justify-content: center; gap: 1rem; margin: 2rem auto; }

.album-stats { font-size: 14px; }

.footer { padding: 2rem 1rem; text-align: center; font-size: 14px; opacity: 0.8; }

.text-center { text-align: center; }
.text-muted { opacity: 0.7; }
.mt-2 { margin-top: 1rem; }

@media (max-width: 600px) {
  .nav-container { height: auto; flex-wrap: wrap; padding: 0.5rem 1rem; }
  .track-item { flex-direction: column; gap: 0.25rem; }
}
`;

export default globalStyles;
