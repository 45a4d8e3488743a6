import fs from 'node:fs';
import { createRequire } from 'node:module';
import { AssetNotFoundError } from '../errors.js';

const localRequire = createRequire(import.meta.url);

/** Theme used when a template calls `highlight_css()` without one. */
export const DEFAULT_HIGHLIGHT_THEME = 'github';

const THEME_NAME_RE = /^[a-z0-9][a-z0-9.-]*(\/[a-z0-9][a-z0-9.-]*)?$/i;

const themes = new Map<string, string>();

/**
 * Stylesheet for the `hljs` classes that code highlighting emits, read from
 * a highlight.js theme (`github`, `github-dark`, `base16/dracula`, ...).
 */
export function highlightCss(theme: string = DEFAULT_HIGHLIGHT_THEME): string {
  const cached = themes.get(theme);
  if (cached !== undefined) return cached;

  const specifier = `highlight.js/styles/${theme}.css`;
  if (!THEME_NAME_RE.test(theme)) throw new AssetNotFoundError(theme, 'highlight theme', [specifier]);
  let file: string;
  try {
    file = localRequire.resolve(specifier);
  } catch {
    throw new AssetNotFoundError(theme, 'highlight theme', [specifier]);
  }
  const css = fs.readFileSync(file, 'utf8');
  themes.set(theme, css);
  return css;
}
