import path from 'node:path';
import { Command, InvalidArgumentError } from 'commander';
import { BuildError, ConfigError } from './errors.js';
import { logger } from './logger.js';
import { buildSite } from './site/build.js';
import { scaffoldProject } from './site/scaffold.js';
import { DevServer } from './server/dev-server.js';

/** Writes user-facing CLI output. */
export type Output = (line: string) => void;

function parsePort(value: string): number {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Resolve once the process is asked to stop.
 */
function waitForShutdown(): Promise<void> {
  return new Promise((resolve) => {
    process.once('SIGINT', () => resolve());
    process.once('SIGTERM', () => resolve());
  });
}

/**
 * Build the `inkwell` command tree. `cwd` is the project root used by
 * `build` and `serve`.
 */
export function createProgram(cwd: string = process.cwd(), out: Output = console.log): Command {
  const program = new Command();
  program.name('inkwell').description('Static site generator for Markdown and templates').version('0.1.0');

  program
    .command('new')
    .description('Scaffold a new project')
    .argument('<name>', 'Directory to create')
    .action((name: string) => {
      const root = scaffoldProject(path.resolve(cwd, name));
      out(`New Inkwell site created at ${root}`);
    });

  program
    .command('build')
    .description('Build the site into the output directory')
    .option('--drafts', 'Include draft content', false)
    .option('--root-url <url>', 'Base URL to absolutize links with')
    .action(async (options: { drafts: boolean; rootUrl?: string }) => {
      const result = await buildSite(cwd, { includeDrafts: options.drafts, rootUrl: options.rootUrl });
      out(`Built ${result.pages.length} pages into ${result.outputDir}`);
    });

  program
    .command('serve')
    .description('Run the dev server with live reload')
    .option('--drafts', 'Include draft content', false)
    .option('-p, --port <port>', 'HTTP port', parsePort)
    .option('--ws-port <port>', 'Live-reload WebSocket port', parsePort)
    .action(async (options: { drafts: boolean; port?: number; wsPort?: number }) => {
      const server = new DevServer({
        projectRoot: cwd,
        includeDrafts: options.drafts,
        port: options.port,
        wsPort: options.wsPort
      });
      await server.start();
      out(`Serving at ${server.rootUrl} (Ctrl+C to stop)`);
      await waitForShutdown();
      await server.stop();
    });

  return program;
}

/**
 * Run the CLI. Build and configuration errors are reported on stderr and
 * set a non-zero exit code.
 */
export async function runCli(argv: string[] = process.argv): Promise<void> {
  try {
    await createProgram().parseAsync(argv);
  } catch (err) {
    if (!(err instanceof BuildError || err instanceof ConfigError)) {
      logger.debug({ err }, 'Command failed');
    }
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
