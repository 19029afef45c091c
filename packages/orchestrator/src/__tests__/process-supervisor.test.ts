import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { ProcessStartError } from '@idslab/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { ProcessSupervisor } from '../process-supervisor.js';
import { FakeSessionBackend, createMockExecutor, ok, silentLogger } from './helpers.js';

const SESSIONS = { network: 'mininet_test', controller: 'controller_test', detector: 'suricata_test' };

describe('ProcessSupervisor', () => {
  let dir: string;
  let backend: FakeSessionBackend;
  let executor: ReturnType<typeof createMockExecutor>;
  let supervisor: ProcessSupervisor;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'idslab-supervisor-'));
    backend = new FakeSessionBackend();
    executor = createMockExecutor((file) => (file === 'pkill' ? ok() : undefined));
    supervisor = new ProcessSupervisor({
      backend,
      executor,
      sessions: SESSIONS,
      danglingPatterns: ['pox.py', 'suricata'],
      log: silentLogger,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('starts a process in its configured session', async () => {
    const log = path.join(dir, 'logs', 'controller.log');
    const handle = await supervisor.start('controller', './start_pox.sh', '/shared', log);

    expect(handle.logicalName).toBe('controller');
    expect(handle.sessionId).toBe('controller_test');
    expect(handle.logPath).toBe(log);
    expect(backend.sessions.get('controller_test')).toMatchObject({ command: './start_pox.sh', cwd: '/shared', logPath: log });
    expect(await supervisor.isAlive('controller')).toBe(true);
    expect(supervisor.handle('controller')).toBe(handle);
  });

  it('uses the logical name as session id when none is configured', async () => {
    const handle = await supervisor.start('extra', 'sleep 10', dir, path.join(dir, 'extra.log'));
    expect(handle.sessionId).toBe('extra');
  });

  it('stops the previous process and truncates its log when starting the same name again', async () => {
    const log = path.join(dir, 'detector.log');
    await supervisor.start('detector', 'run.sh eth0', dir, log);
    const firstPid = backend.sessions.get('suricata_test')?.pid;
    await writeFile(log, 'stale output from the previous run\n');

    await supervisor.start('detector', 'run.sh eth1', dir, log);

    expect(backend.killed).toEqual(['suricata_test']);
    expect(executor.calls).toContainEqual({ file: 'pkill', args: ['-KILL', '-s', String(firstPid)] });
    expect(backend.sessions.get('suricata_test')?.command).toBe('run.sh eth1');
    expect(await readFile(log, 'utf-8')).toBe('');
  });

  it('stop is a no-op for a session that does not exist', async () => {
    await supervisor.stop('network');
    await supervisor.stop('network');

    expect(backend.killed).toEqual([]);
    expect(executor.calls).toEqual([]);
  });

  it('stop kills the session and its process session', async () => {
    await supervisor.start('network', 'python3 topo.py', dir, path.join(dir, 'network.log'));
    const pid = backend.sessions.get('mininet_test')?.pid;

    await supervisor.stop('network');

    expect(await supervisor.isAlive('network')).toBe(false);
    expect(supervisor.handle('network')).toBeUndefined();
    expect(executor.calls).toEqual([{ file: 'pkill', args: ['-KILL', '-s', String(pid)] }]);
  });

  it('stopAll stops every configured session and kills dangling patterns', async () => {
    await supervisor.start('network', 'python3 topo.py', dir, path.join(dir, 'network.log'));
    await supervisor.start('detector', 'run.sh eth0', dir, path.join(dir, 'detector.log'));

    await supervisor.stopAll();

    expect(backend.sessions.size).toBe(0);
    expect(backend.killed.sort()).toEqual(['mininet_test', 'suricata_test']);
    const patternKills = executor.calls.filter((c) => c.args[0] === '-9').map((c) => c.args);
    expect(patternKills).toEqual([
      ['-9', '-f', 'pox.py'],
      ['-9', '-f', 'suricata'],
    ]);
  });

  it('stopAll is safe to call repeatedly with nothing running', async () => {
    await expect(supervisor.stopAll()).resolves.toBeUndefined();
    await expect(supervisor.stopAll()).resolves.toBeUndefined();
    expect(backend.killed).toEqual([]);
  });

  it('stop swallows backend failures', async () => {
    await supervisor.start('network', 'python3 topo.py', dir, path.join(dir, 'network.log'));
    backend.kill = async () => {
      throw new Error('tmux server crashed');
    };

    await expect(supervisor.stop('network')).resolves.toBeUndefined();
  });

  it('wraps session creation failures in ProcessStartError', async () => {
    backend.onCreate = () => {
      throw new Error('no server running');
    };

    await expect(supervisor.start('network', 'python3 topo.py', dir, path.join(dir, 'network.log'))).rejects.toThrow(
      ProcessStartError,
    );
    expect(supervisor.handle('network')).toBeUndefined();
  });

  it('sends text and captures output through the session', async () => {
    await supervisor.start('network', 'python3 topo.py', dir, path.join(dir, 'network.log'));

    await supervisor.send('network', 'pingall');

    expect(backend.sessions.get('mininet_test')?.sent).toEqual(['pingall']);
    expect(await supervisor.capture('network')).toBe('pingall\n');
    expect(await supervisor.capture('controller')).toBe('');
  });
});
