import type { CommandExecutor, SessionBackend } from './types.js';

/** Lines of pane history returned by `capture`. */
const CAPTURE_HISTORY_LINES = 200;

/** Single-quote `value` for /bin/sh. */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

export interface TmuxBackendOptions {
  /** Run every tmux call as this user through `sudo -u`. */
  sessionUser?: string;
  /** Name of the tmux binary (default: `tmux`). */
  binary?: string;
}

/**
 * SessionBackend over tmux. Each session runs its command in a detached
 * pane whose output is piped to the supplied log file.
 */
export function createTmuxBackend(executor: CommandExecutor, opts: TmuxBackendOptions = {}): SessionBackend {
  const binary = opts.binary ?? 'tmux';

  function tmux(...args: string[]) {
    if (opts.sessionUser) {
      return executor.exec('sudo', ['-u', opts.sessionUser, binary, ...args]);
    }
    return executor.exec(binary, args);
  }

  return {
    async create(session, command, cwd, logPath) {
      const created = await tmux('new-session', '-d', '-s', session, '-c', cwd);
      if (created.exitCode !== 0) {
        throw new Error(`tmux new-session ${session} failed: ${created.stderr.trim()}`);
      }
      await tmux('pipe-pane', '-o', '-t', session, `cat >> ${shellQuote(logPath)}`);
      await tmux('send-keys', '-t', session, '-l', `exec ${command}`);
      await tmux('send-keys', '-t', session, 'C-m');
    },

    async exists(session) {
      const result = await tmux('has-session', '-t', session);
      return result.exitCode === 0;
    },

    async leaderPid(session) {
      const result = await tmux('list-panes', '-t', session, '-F', '#{pane_pid}');
      if (result.exitCode !== 0) return null;
      const pid = Number.parseInt(result.stdout.trim().split('\n')[0] ?? '', 10);
      return Number.isNaN(pid) ? null : pid;
    },

    async kill(session) {
      await tmux('kill-session', '-t', session);
    },

    async send(session, text) {
      if (text.length > 0) {
        await tmux('send-keys', '-t', session, '-l', text);
      }
      await tmux('send-keys', '-t', session, 'C-m');
    },

    async capture(session) {
      const result = await tmux('capture-pane', '-p', '-t', session, '-S', `-${CAPTURE_HISTORY_LINES}`);
      return result.exitCode === 0 ? result.stdout : '';
    },
  };
}
