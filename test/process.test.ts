import { afterEach, describe, expect, it, vi } from 'vitest';
import { ErrorCode } from '../src/utils/errors';
import { handleInterrupt, installInterruptHandler, runCommand, signalExitCode } from '../src/utils/process';

afterEach(() => {
  vi.restoreAllMocks();
});

describe('signalExitCode', () => {
  it('follows the shell convention of 128 plus the signal number', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGKILL')).toBe(137);
  });
});

describe('runCommand', () => {
  it('refuses an empty command', async () => {
    await expect(runCommand([])).rejects.toThrow('Cannot run an empty command');
  });

  it('resolves with the exit status of the child', async () => {
    expect(await runCommand(['sh', '-c', 'exit 0'])).toBe(0);
    expect(await runCommand(['sh', '-c', 'exit 7'])).toBe(7);
  });

  it('maps a death by signal to 128 plus the signal number', async () => {
    expect(await runCommand(['sh', '-c', 'kill -TERM $$'])).toBe(143);
  });

  it('rejects with a CommandError when the program cannot be started', async () => {
    await expect(runCommand(['shorthop-no-such-program'])).rejects.toMatchObject({
      name: 'CommandError',
      code: ErrorCode.COMMAND_FAILED,
      suggestion: 'Check that shorthop-no-such-program is installed and on your PATH',
    });
  });
});

describe('handleInterrupt', () => {
  function mockExit() {
    return vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit ${code}`);
    });
  }

  it('exits quietly with code 2 before a child is started', () => {
    const exit = mockExit();
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(() => handleInterrupt()).toThrow('exit 2');
    expect(exit).toHaveBeenCalledWith(ErrorCode.INTERRUPTED);
    expect(errorLog).not.toHaveBeenCalled();
    expect(log).not.toHaveBeenCalled();
  });

  it('leaves the interrupt to a running child', async () => {
    const exit = mockExit();
    const running = runCommand(['sh', '-c', 'sleep 0.2; exit 5']);

    handleInterrupt();
    expect(await running).toBe(5);
    expect(exit).not.toHaveBeenCalled();
  });

  it('exits again once the child has finished', async () => {
    mockExit();
    vi.spyOn(console, 'error').mockImplementation(() => {});
    vi.spyOn(console, 'log').mockImplementation(() => {});

    expect(await runCommand(['sh', '-c', 'exit 0'])).toBe(0);
    expect(() => handleInterrupt()).toThrow('exit 2');
  });
});

describe('installInterruptHandler', () => {
  it('stops listening once uninstalled', () => {
    const before = process.listenerCount('SIGINT');
    const uninstall = installInterruptHandler();
    expect(process.listenerCount('SIGINT')).toBe(before + 1);
    uninstall();
    expect(process.listenerCount('SIGINT')).toBe(before);
  });
});
