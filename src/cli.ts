#!/usr/bin/env node
import { loadConfig } from './config.js';
import { awaitSpawnOutcome, launchStack } from './launcher.js';
import { ExecaSpawner } from './process/spawner.js';
import type { ProcessSpawner } from './process/types.js';
import { createLogger, status } from './shared/logger.js';
import type { Logger } from './shared/logger.js';
import { buildStackDescriptors, resolveBaseDir } from './stack.js';

export interface MainDeps {
  env?: NodeJS.ProcessEnv;
  moduleDir?: string;
  platform?: NodeJS.Platform;
  announce?: (message: string) => void;
  createLogger?: typeof createLogger;
  createSpawner?: (logger: Logger, platform: NodeJS.Platform) => ProcessSpawner;
}

/** Starts the stack and resolves to the process exit code. */
export async function main(deps: MainDeps = {}): Promise<number> {
  const config = loadConfig(deps.env);
  const logger = (deps.createLogger ?? createLogger)(config);
  const platform = deps.platform ?? process.platform;

  const baseDir = resolveBaseDir(deps.moduleDir ?? __dirname);
  logger.debug({ baseDir, platform }, 'Resolved stack root');

  const spawner = deps.createSpawner
    ? deps.createSpawner(logger, platform)
    : new ExecaSpawner(logger, platform);
  const report = launchStack(buildStackDescriptors(baseDir, platform), {
    spawner,
    logger,
    announce: deps.announce ?? status,
  });

  const failures = await awaitSpawnOutcome(report, logger);
  if (failures.length > 0) {
    logger.warn({ failed: failures.map(f => f.service) }, 'Some services did not start');
    return 1;
  }
  return 0;
}

if (require.main === module) {
  main()
    .then(code => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      process.stderr.write(`dev-stack: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    });
}
