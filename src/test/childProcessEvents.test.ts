import { fork } from 'child_process';
import { describe, expect, it, vi } from 'vitest';
import { ChildProcessRunner } from '../lib/jobs/childProcessRunner.js';

vi.mock('child_process', async () => {
  const { EventEmitter } = await import('events');
  return {
    fork: vi.fn(() =>
      Object.assign(new EventEmitter(), { pid: 4242, kill: vi.fn(() => true) }),
    ),
  };
});

describe('ChildProcessRunner process events', () => {
  it('keeps handling errors emitted repeatedly by a running worker', async () => {
    const errorSpy = vi
      .spyOn(console, 'error')
      .mockImplementation(() => undefined);
    const runner = new ChildProcessRunner({
      destinationRoot: 'out',
      workerPath: 'conversionWorker.js',
    });

    const pending = runner.run('https://a.example/', 15000);
    await vi.waitFor(() => {
      expect(vi.mocked(fork)).toHaveBeenCalledTimes(1);
    });
    const child = vi.mocked(fork).mock.results[0].value;

    child.emit('error', new Error('channel closed'));
    child.emit('error', new Error('channel closed again'));
    child.emit('exit', 1, null);

    const outcome = await pending;
    expect(outcome.status).toBe('error');
    expect(outcome.error).toBe(
      'Conversion worker exited with code 1 before reporting a result',
    );
    expect(errorSpy).toHaveBeenCalledTimes(2);
    expect(vi.mocked(fork)).toHaveBeenCalledWith(
      'conversionWorker.js',
      ['https://a.example/', 'out'],
      {
        execArgv: [],
        stdio: ['ignore', 'inherit', 'inherit', 'ipc'],
      },
    );
    errorSpy.mockRestore();
  });
});
