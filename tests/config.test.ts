import path from 'node:path';
import { afterEach, describe, expect, it } from 'vitest';
import { loadConfig } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import { makeProject, removeProject } from './helpers/project.js';

describe('loadConfig', () => {
  let root = '';

  afterEach(() => {
    if (root) removeProject(root);
    root = '';
  });

  it('applies defaults without a config file', () => {
    root = makeProject();
    const config = loadConfig(root, {});
    expect(config.outputDir).toBe(path.join(root, 'output'));
    expect(config.port).toBe(4000);
    expect(config.wsPort).toBe(4001);
    expect(config.rootUrl).toBe('');
    expect(config.extra).toEqual({});
  });

  it('reads inkwell.yaml and keeps unknown keys', () => {
    root = makeProject({
      'inkwell.yaml': 'output_dir: public\nport: 5000\nroot_url: https://example.com\nauthor: Sam\n'
    });
    const config = loadConfig(root, {});
    expect(config.outputDir).toBe(path.join(root, 'public'));
    expect(config.port).toBe(5000);
    expect(config.wsPort).toBe(5001);
    expect(config.rootUrl).toBe('https://example.com');
    expect(config.extra).toEqual({ author: 'Sam' });
  });

  it('lets the environment override the file', () => {
    root = makeProject({ 'inkwell.yaml': 'port: 5000\nws_port: 5100\n' });
    const config = loadConfig(root, { INKWELL_PORT: '6000', INKWELL_OUTPUT_DIR: 'dist-site' });
    expect(config.port).toBe(6000);
    expect(config.wsPort).toBe(5100);
    expect(config.outputDir).toBe(path.join(root, 'dist-site'));
  });

  it('ignores documents that are not mappings', () => {
    root = makeProject({ 'inkwell.yaml': '- one\n- two\n' });
    expect(loadConfig(root, {}).port).toBe(4000);
  });

  it('rejects invalid values with the key name', () => {
    root = makeProject({ 'inkwell.yaml': 'port: abc\n' });
    expect(() => loadConfig(root, {})).toThrow(ConfigError);
    expect(() => loadConfig(root, {})).toThrow(/Invalid inkwell\.yaml value for "port"/);
  });
});
