import { describe, expect, it } from 'vitest';

import { createTmuxBackend, shellQuote } from '../tmux-backend.js';
import { createMockExecutor, fail, ok } from './helpers.js';

describe('shellQuote', () => {
  it('wraps values in single quotes', () => {
    expect(shellQuote('/tmp/auto test.log')).toBe(`'/tmp/auto test.log'`);
  });

  it('escapes embedded single quotes', () => {
    expect(shellQuote("it's")).toBe(`'it'\\''s'`);
  });
});

describe('createTmuxBackend', () => {
  it('creates a detached session, pipes its pane and types the command', async () => {
    const executor = createMockExecutor(() => ok());
    const backend = createTmuxBackend(executor);

    await backend.create('mininet_test', 'python3 topo.py', '/media/sf_shared', '/tmp/logs/network.log');

    expect(executor.calls).toEqual([
      { file: 'tmux', args: ['new-session', '-d', '-s', 'mininet_test', '-c', '/media/sf_shared'] },
      { file: 'tmux', args: ['pipe-pane', '-o', '-t', 'mininet_test', `cat >> '/tmp/logs/network.log'`] },
      { file: 'tmux', args: ['send-keys', '-t', 'mininet_test', '-l', 'exec python3 topo.py'] },
      { file: 'tmux', args: ['send-keys', '-t', 'mininet_test', 'C-m'] },
    ]);
  });

  it('throws when the session cannot be created', async () => {
    const executor = createMockExecutor(() => fail(1, 'duplicate session: mininet_test\n'));
    const backend = createTmuxBackend(executor);

    await expect(backend.create('mininet_test', 'python3 topo.py', '/', '/tmp/n.log')).rejects.toThrow(
      'tmux new-session mininet_test failed: duplicate session: mininet_test',
    );
  });

  it('runs every call through sudo when a session user is set', async () => {
    const executor = createMockExecutor(() => ok());
    const backend = createTmuxBackend(executor, { sessionUser: 'mininet' });

    expect(await backend.exists('mininet_test')).toBe(true);
    expect(executor.calls).toEqual([
      { file: 'sudo', args: ['-u', 'mininet', 'tmux', 'has-session', '-t', 'mininet_test'] },
    ]);
  });

  it('reports a missing session', async () => {
    const backend = createTmuxBackend(createMockExecutor(() => fail(1)));
    expect(await backend.exists('gone')).toBe(false);
    expect(await backend.leaderPid('gone')).toBeNull();
    expect(await backend.capture('gone')).toBe('');
  });

  it('parses the pane pid', async () => {
    const backend = createTmuxBackend(createMockExecutor(() => ok('4242\n')));
    expect(await backend.leaderPid('mininet_test')).toBe(4242);
  });

  it('sends literal text followed by Enter', async () => {
    const executor = createMockExecutor(() => ok());
    const backend = createTmuxBackend(executor);

    await backend.send('mininet_test', 'victim python3 -m http.server 8080 &');
    await backend.send('mininet_test', '');

    expect(executor.calls.map((c) => c.args)).toEqual([
      ['send-keys', '-t', 'mininet_test', '-l', 'victim python3 -m http.server 8080 &'],
      ['send-keys', '-t', 'mininet_test', 'C-m'],
      ['send-keys', '-t', 'mininet_test', 'C-m'],
    ]);
  });

  it('captures recent pane history', async () => {
    const executor = createMockExecutor(() => ok('mininet> \n'));
    const backend = createTmuxBackend(executor);

    expect(await backend.capture('mininet_test')).toBe('mininet> \n');
    expect(executor.calls[0]?.args).toEqual(['capture-pane', '-p', '-t', 'mininet_test', '-S', '-200']);
  });
});
