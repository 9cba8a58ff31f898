import execa from 'execa';
import { LauncherError } from '../shared/errors.js';
import type { Logger } from '../shared/logger.js';
import { toInvocation } from './invocation.js';
import type { LaunchDescriptor, ProcessSpawner, SpawnedProcess } from './types.js';

/**
 * Starts children through execa with stdout and stderr on the shared console.
 * stdin follows the invocation: closed on POSIX, where a child reading the
 * terminal after the launcher exits would be stopped. A detached descriptor turns off execa's cleanup, so the child is
 * not killed when the launcher exits. reject is off so a child's exit code
 * never surfaces here; only a failure to create the process rejects `ready`.
 */
export class ExecaSpawner implements ProcessSpawner {
  constructor(
    private readonly logger: Logger,
    private readonly platform: NodeJS.Platform = process.platform
  ) {}

  spawn(descriptor: LaunchDescriptor): SpawnedProcess {
    const invocation = toInvocation(descriptor, this.platform);
    this.logger.debug({ service: descriptor.name, invocation }, 'Spawning service');

    const child = execa(invocation.file, [...invocation.args], {
      cwd: invocation.cwd,
      stdio: [invocation.stdin, 'inherit', 'inherit'],
      windowsVerbatimArguments: invocation.windowsVerbatimArguments,
      cleanup: !descriptor.detached,
      reject: false,
    });

    const ready = new Promise<void>((resolve, reject) => {
      const fail = (cause: unknown): void => {
        reject(LauncherError.spawnFailed(descriptor, invocation.file, invocation.cwd, cause));
      };
      child.once('spawn', () => resolve());
      child.once('error', fail);
      // execa rejects without emitting 'error' when spawn() itself throws
      void child.catch(fail);
    });

    return {
      pid: child.pid,
      ready,
      release: () => {
        child.unref();
      },
    };
  }
}
