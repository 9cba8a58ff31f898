import path from 'path';
import { main } from '../../src/cli.js';
import { LauncherErrorCode } from '../../src/shared/errors.js';
import { RecordingSpawner, silentLogger } from '../helpers/fake-spawner.js';

const stackRoot = path.resolve('/home/dev/voice-stack');

function runMain(spawner: RecordingSpawner, env: NodeJS.ProcessEnv = {}) {
  const lines: string[] = [];
  const result = main({
    env,
    moduleDir: path.join(stackRoot, 'dist'),
    platform: 'linux',
    announce: line => lines.push(line),
    createLogger: () => silentLogger,
    createSpawner: () => spawner,
  });
  return { lines, result };
}

describe('main', () => {
  it('launches the stack rooted beside the entry module and exits 0', async () => {
    const spawner = new RecordingSpawner();
    const { lines, result } = runMain(spawner);

    await expect(result).resolves.toBe(0);
    expect(spawner.calls.map(d => d.cwd)).toEqual([
      stackRoot,
      path.join(stackRoot, 'backend'),
      path.join(stackRoot, 'frontend'),
    ]);
    expect(lines).toEqual(['Starting LiveKit Server...', 'Starting Backend Agent...', 'Starting Frontend...']);
  });

  it('exits 1 when any service fails to start, after trying all of them', async () => {
    const spawner = new RecordingSpawner({ rejectReady: ['backend'] });
    const { result } = runMain(spawner);

    await expect(result).resolves.toBe(1);
    expect(spawner.calls).toHaveLength(3);
  });

  it('rejects on invalid configuration before launching anything', async () => {
    const spawner = new RecordingSpawner();
    const { result } = runMain(spawner, { LOG_LEVEL: 'loud' });

    await expect(result).rejects.toMatchObject({ code: LauncherErrorCode.INVALID_CONFIG });
    expect(spawner.calls).toEqual([]);
  });
});
