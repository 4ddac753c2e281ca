/**
 * Application wiring: configuration, logger, store, prompter, inspector,
 * step tree and runner.
 */

import { resolve } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig, type Config, type EnvRecord } from '../config/index.js';
import { buildInstallRegistry, loadPackageCatalog, type InstallSettings } from '../install/index.js';
import {
  Prompter,
  ShellCommandExecutor,
  createReadlineReader,
  defaultOutputWriter,
  type CommandExecutor,
  type InputReader,
  type OutputWriter,
} from '../prompt/index.js';
import { StepRunner } from '../runner/index.js';
import type { EngineContext, StepRegistry } from '../steps/index.js';
import { PersistentStore } from '../store/index.js';
import { NodeSystemInspector, type SystemInspector } from '../system/index.js';
import { Logger } from '../utils/logger.js';

/** Package root, from `src/cli` or `dist/cli` alike. */
export const PACKAGE_ROOT = resolve(fileURLToPath(new URL('../..', import.meta.url)));

/**
 * Options for creating the application. Every I/O seam may be replaced.
 */
export interface CliAppOptions {
  /** Working directory. @defaultValue process.cwd() */
  readonly cwd?: string;
  /** Environment. @defaultValue process.env */
  readonly env?: EnvRecord;
  /** Run every leaf regardless of status. @defaultValue false */
  readonly forceRun?: boolean;
  readonly reader?: InputReader;
  readonly writer?: OutputWriter;
  readonly executor?: CommandExecutor;
  readonly system?: SystemInspector;
  /** Path of the package suggestion catalog. */
  readonly catalogPath?: string;
}

/**
 * A wired application.
 */
export interface CliApp {
  readonly config: Config;
  /** Config file that was read, if any. */
  readonly configSource: string | undefined;
  readonly context: EngineContext;
  readonly registry: StepRegistry;
  readonly runner: StepRunner;
  /** Releases the terminal. */
  close(): void;
}

/**
 * Creates and initializes the application.
 *
 * Configuration problems are shown as warnings and never stop the program.
 *
 * @param options - Overrides for the working directory, environment and I/O.
 */
export async function createCliApp(options: CliAppOptions = {}): Promise<CliApp> {
  const cwd = options.cwd ?? process.cwd();
  const { config, source, warnings } = await loadConfig({
    cwd,
    ...(options.env !== undefined ? { env: options.env } : {}),
  });

  const logger = new Logger({ component: 'stepstone', debugMode: config.logging.debug });
  const reader = options.reader ?? createReadlineReader();
  const prompter = new Prompter({
    reader,
    writer: options.writer ?? defaultOutputWriter,
    executor: options.executor ?? new ShellCommandExecutor({ shell: config.shell.program }),
    colors: config.display.colors,
    maxLineWidth: config.display.max_line_width,
    logger: logger.child('Prompter'),
  });
  for (const warning of warnings) {
    prompter.warn(warning);
  }

  const store = await PersistentStore.open(resolve(cwd, config.paths.persist_dir), {
    logger: logger.child('PersistentStore'),
  });
  const settings: InstallSettings = {
    mountRoot: config.paths.mount_root,
    mirrorlist: config.paths.mirrorlist,
    workDir: cwd,
    programDir: PACKAGE_ROOT,
    catalog: await loadPackageCatalog(options.catalogPath),
  };

  const context: EngineContext = {
    store,
    prompter,
    system: options.system ?? new NodeSystemInspector(),
    logger,
    forceRun: options.forceRun ?? false,
  };
  const registry = buildInstallRegistry(settings);
  logger.debug('app_created', { cwd, configSource: source, storeEnabled: store.isEnabled() });

  return {
    config,
    configSource: source,
    context,
    registry,
    runner: new StepRunner(context, registry),
    close: () => {
      reader.close();
    },
  };
}
