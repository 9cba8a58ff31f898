// Turns a LaunchDescriptor into the file/args pair the OS is asked to run.
// keepShellOpen wraps the command: cmd.exe /k on Windows. Elsewhere no shell
// may read the shared terminal (the launcher's process group loses the
// foreground when it exits), so sh runs the command with stdin closed and
// reports its exit status.
import type { Invocation, LaunchDescriptor } from './types.js';

const POSIX_SAFE = /^[A-Za-z0-9_/.,:=@%+-]+$/;
const CMD_UNSAFE = /[\s"&|<>^()%!]/;

export function quotePosix(word: string): string {
  if (POSIX_SAFE.test(word)) return word;
  return `'${word.replace(/'/g, `'\\''`)}'`;
}

export function quoteCmd(word: string): string {
  if (word !== '' && !CMD_UNSAFE.test(word)) return word;
  return `"${word.replace(/"/g, '""')}"`;
}

export function commandLine(descriptor: LaunchDescriptor, platform: NodeJS.Platform): string {
  const quote = platform === 'win32' ? quoteCmd : quotePosix;
  return [descriptor.command, ...descriptor.args].map(quote).join(' ');
}

export function toInvocation(descriptor: LaunchDescriptor, platform: NodeJS.Platform): Invocation {
  const stdin = platform === 'win32' ? 'inherit' : 'ignore';

  if (!descriptor.keepShellOpen) {
    return {
      file: descriptor.command,
      args: [...descriptor.args],
      cwd: descriptor.cwd,
      stdin,
      windowsVerbatimArguments: false,
    };
  }

  const line = commandLine(descriptor, platform);
  if (platform === 'win32') {
    return {
      file: 'cmd.exe',
      args: ['/d', '/k', line],
      cwd: descriptor.cwd,
      stdin,
      windowsVerbatimArguments: true,
    };
  }
  return {
    file: '/bin/sh',
    // $0 carries the label so it needs no quoting inside the script
    args: ['-c', `${line}; echo "$0 exited with status $?"`, descriptor.label],
    cwd: descriptor.cwd,
    stdin,
    windowsVerbatimArguments: false,
  };
}
