import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

/** Starter project copied by `inkwell new`. */
export const SCAFFOLD_DIR = fileURLToPath(new URL('../../templates/default/', import.meta.url));

/**
 * Create a new project at `target` from the bundled starter. Refuses to write
 * into a directory that already has entries.
 */
export function scaffoldProject(target: string, templateDir: string = SCAFFOLD_DIR): string {
  const root = path.resolve(target);
  if (fs.existsSync(root) && fs.readdirSync(root).length > 0) {
    throw new Error(`Refusing to initialize into non-empty directory: ${root}`);
  }
  fs.mkdirSync(root, { recursive: true });
  fs.cpSync(templateDir, root, { recursive: true });
  return root;
}
