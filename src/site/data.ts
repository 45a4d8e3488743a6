import fs from 'node:fs';
import path from 'node:path';
import yaml from 'js-yaml';
import type { Logger } from '../logger.js';
import type { SiteData } from '../types.js';
import { isRecord, stemOf } from '../utils.js';

/**
 * Load `data/*.yaml` into one object. `site.yaml` is merged at the top
 * level, every other file lands under its stem (`nav.yaml` → `data.nav`).
 * Documents that are neither a mapping nor a list are skipped.
 */
export function loadData(projectRoot: string, logger?: Logger): SiteData {
  const dataDir = path.join(projectRoot, 'data');
  const data: SiteData = {};
  if (!fs.existsSync(dataDir)) return data;

  const files = fs
    .readdirSync(dataDir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && /\.ya?ml$/i.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const name of files) {
    const filePath = path.join(dataDir, name);
    const loaded = yaml.load(fs.readFileSync(filePath, 'utf8'));
    const stem = stemOf(name);
    if (isRecord(loaded)) {
      if (stem === 'site') Object.assign(data, loaded);
      else data[stem] = loaded;
    } else if (Array.isArray(loaded)) {
      data[stem] = loaded;
    } else {
      logger?.debug({ file: name }, 'Skipping data file without a mapping or list');
    }
  }
  return data;
}
