/**
 * Fatal failure while building one source file. Aborts the whole build.
 */
export class BuildError extends Error {
  /** Source file that caused the failure. */
  readonly sourcePath: string;
  /** Message without the path prefix. */
  readonly detail: string;

  constructor(sourcePath: string, detail: string, options?: { cause?: unknown }) {
    super(`${sourcePath}: ${detail}`, options);
    this.name = 'BuildError';
    this.sourcePath = sourcePath;
    this.detail = detail;
  }
}

/**
 * Raised by the template asset helpers (`img_path`, `css_path`, ...) when the
 * referenced file does not exist.
 */
export class AssetNotFoundError extends Error {
  readonly assetName: string;
  readonly assetType: string;
  readonly searchedPaths: string[];

  constructor(assetName: string, assetType: string, searchedPaths: string[]) {
    super(`${assetType} asset '${assetName}' not found. Searched: ${searchedPaths.join(', ')}`);
    this.name = 'AssetNotFoundError';
    this.assetName = assetName;
    this.assetType = assetType;
    this.searchedPaths = searchedPaths;
  }
}

/**
 * Invalid value in `inkwell.yaml` or the environment.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * Describe a template failure for the page author.
 */
export function formatErrorMessage(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  const lineno = 'lineno' in err && typeof err.lineno === 'number' ? err.lineno : undefined;
  // Template errors carry "(file) [Line n, Column m]" noise on the first line.
  const message = err.message
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line && !/^\(.*\)( \[Line \d+(, Column \d+)?\])?$/.test(line))
    .join(' ');
  if (/^Template render error/.test(err.name) && lineno !== undefined) {
    return `Template error on line ${lineno}: ${message}`;
  }
  return `${err.name}: ${message}`;
}
