export type ServiceName = 'livekit' | 'backend' | 'frontend';

/** How to start one child process. Built once per run, never mutated. */
export interface LaunchDescriptor {
  readonly name: ServiceName;
  readonly label: string;
  readonly command: string;
  readonly args: readonly string[];
  readonly cwd: string;
  /** Run inside an interactive shell that stays open after the command exits. */
  readonly keepShellOpen: boolean;
  /** The launcher neither waits for nor cleans up the child. */
  readonly detached: boolean;
}

/** A descriptor resolved for one platform, ready to hand to the OS. */
export interface Invocation {
  readonly file: string;
  readonly args: readonly string[];
  readonly cwd: string;
  readonly stdin: 'inherit' | 'ignore';
  readonly windowsVerbatimArguments: boolean;
}

export interface SpawnedProcess {
  readonly pid: number | undefined;
  /** Settles when the OS reports the child as started (or not); never waits for exit. */
  readonly ready: Promise<void>;
  /** Lets the launcher exit while the child keeps running. */
  release(): void;
}

export interface ProcessSpawner {
  spawn(descriptor: LaunchDescriptor): SpawnedProcess;
}
