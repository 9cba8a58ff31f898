// Issues one spawn per descriptor, in order, without waiting on any child.
// A spawn that throws is recorded and the remaining services are still started.
import { LauncherError } from './shared/errors.js';
import type { Logger } from './shared/logger.js';
import type { LaunchDescriptor, ProcessSpawner, ServiceName, SpawnedProcess } from './process/types.js';

export interface LaunchedService {
  descriptor: LaunchDescriptor;
  process: SpawnedProcess;
}

export interface LaunchFailure {
  service: ServiceName;
  error: LauncherError;
}

export interface LaunchReport {
  launched: LaunchedService[];
  failures: LaunchFailure[];
}

export interface LaunchOptions {
  spawner: ProcessSpawner;
  logger: Logger;
  announce: (message: string) => void;
}

function toLauncherError(descriptor: LaunchDescriptor, err: unknown): LauncherError {
  if (err instanceof LauncherError) return err;
  return LauncherError.spawnFailed(descriptor, descriptor.command, descriptor.cwd, err);
}

export function launchStack(
  descriptors: readonly LaunchDescriptor[],
  { spawner, logger, announce }: LaunchOptions
): LaunchReport {
  const report: LaunchReport = { launched: [], failures: [] };

  for (const descriptor of descriptors) {
    announce(`Starting ${descriptor.label}...`);
    try {
      const spawned = spawner.spawn(descriptor);
      report.launched.push({ descriptor, process: spawned });
    } catch (err) {
      const error = toLauncherError(descriptor, err);
      logger.error({ err: error, context: error.context }, error.message);
      report.failures.push({ service: descriptor.name, error });
    }
  }

  return report;
}

/**
 * Waits for the OS to acknowledge each spawn, then releases detached children
 * so the launcher can exit. Returns every failure, immediate or reported late.
 */
export async function awaitSpawnOutcome(report: LaunchReport, logger: Logger): Promise<LaunchFailure[]> {
  const failures = [...report.failures];
  const outcomes = await Promise.allSettled(report.launched.map(s => s.process.ready));

  outcomes.forEach((outcome, i) => {
    const { descriptor, process: child } = report.launched[i];
    if (outcome.status === 'fulfilled') {
      logger.info({ service: descriptor.name, pid: child.pid, cwd: descriptor.cwd }, `${descriptor.label} started`);
      if (descriptor.detached) child.release();
      return;
    }
    const error = toLauncherError(descriptor, outcome.reason);
    logger.error({ err: error, context: error.context }, error.message);
    failures.push({ service: descriptor.name, error });
  });

  return failures;
}
