import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import * as path from 'node:path';

import { componentLogPaths, createSilentRunLogs, loadConfig, parseConfig } from '@idslab/core';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import { createOrchestrator, resolveSessionUser } from '../orchestrator.js';
import { VirtualClock, createMockExecutor, labConfig, ok } from './helpers.js';

const SAMPLE_CONFIG = path.join(import.meta.dirname, '..', '..', '..', '..', 'config', 'experiment.json');

describe('resolveSessionUser', () => {
  it('prefers the configured session user', () => {
    const config = parseConfig({ sessionUser: 'mininet' });
    expect(resolveSessionUser(config, { SUDO_USER: 'alice', USER: 'root' })).toBe('mininet');
  });

  it('falls back to the user who invoked sudo', () => {
    const config = parseConfig({});
    expect(resolveSessionUser(config, { SUDO_USER: 'alice', USER: 'root' })).toBe('alice');
    expect(resolveSessionUser(config, { USER: 'root' })).toBe('root');
    expect(resolveSessionUser(config, {})).toBeUndefined();
  });
});

describe('createOrchestrator', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(tmpdir(), 'idslab-orchestrator-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('launches the sample topology as root inside the session user tmux session', async () => {
    const sample = await loadConfig(SAMPLE_CONFIG);
    const config = parseConfig({ ...sample, paths: labConfig(root).paths });
    const executor = createMockExecutor(() => ok());
    const orchestrator = createOrchestrator({
      config,
      logs: createSilentRunLogs(componentLogPaths(config)),
      executor,
      clock: new VirtualClock(),
    });

    // the pane never shows the emulator prompt, so the trial stops at NETWORK
    const outcome = await orchestrator.runner.run('traditional', 1);

    expect(outcome.failedState).toBe('NETWORK');
    const launches = executor.calls.filter((call) => call.args.some((arg) => arg.startsWith('exec ')));
    const topology = path.join(config.paths.sharedDir, 'three_tier_traditional_simple.py');
    expect(launches).toEqual([
      {
        file: 'sudo',
        args: ['-u', 'mininet', 'tmux', 'send-keys', '-t', 'mininet_test', '-l', `exec sudo python3 '${topology}'`],
      },
    ]);
  });
});
