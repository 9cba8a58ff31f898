import path from 'path';
import { buildStackDescriptors, resolveBaseDir } from '../../src/stack.js';

describe('resolveBaseDir', () => {
  it('returns the parent of the entry module directory', () => {
    expect(resolveBaseDir(path.join('/home/dev/voice-stack', 'dist'))).toBe(path.resolve('/home/dev/voice-stack'));
  });

  it('resolves relative module directories to absolute paths', () => {
    expect(resolveBaseDir('src')).toBe(process.cwd());
  });
});

describe('buildStackDescriptors', () => {
  const baseDir = path.resolve('/home/dev/voice-stack');

  it('builds the three services in launch order', () => {
    const descriptors = buildStackDescriptors(baseDir, 'linux');
    expect(descriptors.map(d => d.name)).toEqual(['livekit', 'backend', 'frontend']);
    expect(descriptors.map(d => d.label)).toEqual(['LiveKit Server', 'Backend Agent', 'Frontend']);
  });

  it('runs livekit-server from baseDir in dev mode', () => {
    const [livekit] = buildStackDescriptors(baseDir, 'linux');
    expect(livekit.command).toBe(path.join(baseDir, 'livekit-server'));
    expect(livekit.args).toEqual(['--dev']);
    expect(livekit.cwd).toBe(baseDir);
    expect(livekit.keepShellOpen).toBe(false);
  });

  it('uses the .exe binary on windows', () => {
    const [livekit] = buildStackDescriptors(baseDir, 'win32');
    expect(livekit.command).toBe(path.join(baseDir, 'livekit-server.exe'));
  });

  it('runs the backend agent through uv in baseDir/backend', () => {
    const backend = buildStackDescriptors(baseDir, 'linux')[1];
    expect(backend.command).toBe('uv');
    expect(backend.args).toEqual(['run', 'python', 'src/agent.py', 'dev']);
    expect(backend.cwd).toBe(path.join(baseDir, 'backend'));
    expect(backend.keepShellOpen).toBe(true);
  });

  it('runs the frontend dev server through npx pnpm in baseDir/frontend', () => {
    const frontend = buildStackDescriptors(baseDir, 'linux')[2];
    expect(frontend.command).toBe('npx');
    expect(frontend.args).toEqual(['pnpm', 'dev']);
    expect(frontend.cwd).toBe(path.join(baseDir, 'frontend'));
    expect(frontend.keepShellOpen).toBe(true);
  });

  it('marks every service detached and freezes the list', () => {
    const descriptors = buildStackDescriptors(baseDir, 'linux');
    expect(descriptors.every(d => d.detached)).toBe(true);
    expect(Object.isFrozen(descriptors)).toBe(true);
  });
});
