import fs from 'node:fs';
import path from 'node:path';
import { AssetNotFoundError } from '../errors.js';

/** Image extensions, in auto-detection order. */
export const IMAGE_EXTENSIONS = ['png', 'jpg', 'jpeg', 'gif', 'svg', 'webp'] as const;
/** Font extensions, in auto-detection order. */
export const FONT_EXTENSIONS = ['woff2', 'woff', 'ttf', 'otf', 'eot'] as const;

export type AssetKind = 'js' | 'css' | 'image' | 'font';

interface AssetKindInfo {
  /** Subdirectory of `assets/`. */
  dir: string;
  /** Name used in error messages. */
  label: string;
  /** Candidate extensions; a single entry is appended when missing. */
  extensions: readonly string[];
}

const KINDS: Record<AssetKind, AssetKindInfo> = {
  js: { dir: 'js', label: 'JavaScript', extensions: ['js'] },
  css: { dir: 'css', label: 'CSS', extensions: ['css'] },
  image: { dir: 'images', label: 'image', extensions: IMAGE_EXTENSIONS },
  font: { dir: 'fonts', label: 'font', extensions: FONT_EXTENSIONS }
};

/**
 * Maps asset names used in templates (`css_path('main')`) to URLs, checking
 * that the file exists under `assets/`.
 */
export class AssetPathResolver {
  readonly assetsDir: string;
  private readonly urlFor: (urlPath: string) => string;

  constructor(assetsDir: string, urlFor: (urlPath: string) => string = (urlPath) => urlPath) {
    this.assetsDir = assetsDir;
    this.urlFor = urlFor;
  }

  /**
   * Resolve `name` of the given kind. A name that already ends in a known
   * extension must exist as-is; otherwise each extension is tried in order.
   */
  resolve(name: string, kind: AssetKind): string {
    const info = KINDS[kind];
    const dir = path.join(this.assetsDir, info.dir);
    const hasExtension = info.extensions.some((ext) => name.endsWith(`.${ext}`));

    if (hasExtension || info.extensions.length === 1) {
      const filename = hasExtension ? name : `${name}.${info.extensions[0]}`;
      const filePath = path.join(dir, filename);
      if (!fs.existsSync(filePath)) {
        throw new AssetNotFoundError(filename, info.label, [filePath]);
      }
      return this.urlFor(`/assets/${info.dir}/${filename}`);
    }

    const searched: string[] = [];
    for (const ext of info.extensions) {
      const filePath = path.join(dir, `${name}.${ext}`);
      searched.push(filePath);
      if (fs.existsSync(filePath)) {
        return this.urlFor(`/assets/${info.dir}/${name}.${ext}`);
      }
    }
    throw new AssetNotFoundError(name, info.label, searched);
  }

  jsPath(name: string): string {
    return this.resolve(name, 'js');
  }

  cssPath(name: string): string {
    return this.resolve(name, 'css');
  }

  imgPath(name: string): string {
    return this.resolve(name, 'image');
  }

  fontPath(name: string): string {
    return this.resolve(name, 'font');
  }
}
