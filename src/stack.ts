import path from 'path';
import type { LaunchDescriptor } from './process/types.js';

/**
 * The launcher project sits in the stack root; its entry module lives one
 * level down (src/ from sources, dist/ once built).
 */
export function resolveBaseDir(moduleDir: string): string {
  return path.resolve(moduleDir, '..');
}

export function buildStackDescriptors(
  baseDir: string,
  platform: NodeJS.Platform = process.platform
): readonly LaunchDescriptor[] {
  const livekitBinary = platform === 'win32' ? 'livekit-server.exe' : 'livekit-server';

  return Object.freeze([
    {
      name: 'livekit',
      label: 'LiveKit Server',
      command: path.join(baseDir, livekitBinary),
      args: ['--dev'],
      cwd: baseDir,
      keepShellOpen: false,
      detached: true,
    },
    {
      name: 'backend',
      label: 'Backend Agent',
      command: 'uv',
      args: ['run', 'python', 'src/agent.py', 'dev'],
      cwd: path.join(baseDir, 'backend'),
      keepShellOpen: true,
      detached: true,
    },
    {
      name: 'frontend',
      label: 'Frontend',
      command: 'npx',
      args: ['pnpm', 'dev'],
      cwd: path.join(baseDir, 'frontend'),
      keepShellOpen: true,
      detached: true,
    },
  ] satisfies LaunchDescriptor[]);
}
