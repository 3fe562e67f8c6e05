/**
 * Terminal Reloader Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { execFileSync } from 'node:child_process';
import { SignalReloader, findProcessIds } from '../reloader.js';
import { RecordingLogger } from '../../test-utils/index.js';

vi.mock('node:child_process', () => ({
  execFileSync: vi.fn(),
}));

const mockExecFileSync = vi.mocked(execFileSync);

describe('findProcessIds', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  it('parses pidof output', () => {
    mockExecFileSync.mockReturnValueOnce('4321 1234\n');

    expect(findProcessIds('kitty')).toEqual([4321, 1234]);
    expect(mockExecFileSync).toHaveBeenCalledWith(
      'pidof',
      ['kitty'],
      expect.objectContaining({ encoding: 'utf8' })
    );
  });

  it('returns no pids when pidof fails', () => {
    mockExecFileSync.mockImplementationOnce(() => {
      throw new Error('Command failed: pidof kitty');
    });

    expect(findProcessIds('kitty')).toEqual([]);
  });
});

describe('SignalReloader', () => {
  let logger: RecordingLogger;
  let reloader: SignalReloader;

  beforeEach(() => {
    vi.clearAllMocks();
    logger = new RecordingLogger();
    reloader = new SignalReloader({ getProcessName: () => 'kitty', logger });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('sends SIGUSR1 to every running process', () => {
    mockExecFileSync.mockReturnValueOnce('4321 1234\n');
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true);

    expect(reloader.reload()).toBe(2);
    expect(kill).toHaveBeenCalledWith(4321, 'SIGUSR1');
    expect(kill).toHaveBeenCalledWith(1234, 'SIGUSR1');
    expect(logger.messages('debug')).toEqual(['Sent SIGUSR1 to 2 kitty process(es)']);
  });

  it('does nothing when the terminal is not running', () => {
    mockExecFileSync.mockImplementationOnce(() => {
      throw new Error('Command failed: pidof kitty');
    });
    const kill = vi.spyOn(process, 'kill').mockImplementation(() => true);

    expect(reloader.reload()).toBe(0);
    expect(kill).not.toHaveBeenCalled();
    expect(logger.messages('debug')).toEqual(['No running kitty process, skipped reload']);
    expect(logger.messages('warn')).toEqual([]);
  });

  it('warns when a signal cannot be delivered', () => {
    mockExecFileSync.mockReturnValueOnce('4321 1234\n');
    vi.spyOn(process, 'kill').mockImplementation((pid) => {
      if (pid === 4321) throw new Error('kill ESRCH');
      return true;
    });

    expect(reloader.reload()).toBe(1);
    expect(logger.messages('warn')).toEqual(['Could not signal kitty (pid 4321): kill ESRCH']);
  });

  it('reads the process name on every reload', () => {
    let name = 'kitty';
    const dynamic = new SignalReloader({ getProcessName: () => name });
    mockExecFileSync.mockReturnValue('');

    dynamic.reload();
    name = 'kitty-dev';
    dynamic.reload();

    expect(mockExecFileSync.mock.calls.map((call) => call[1])).toEqual([['kitty'], ['kitty-dev']]);
  });
});
