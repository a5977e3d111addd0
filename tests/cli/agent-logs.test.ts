import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { agentLog, clearAgentLogs, getAgentLogs, setLogLevel } from '@/lib/agent-logs';

describe('agentLog', () => {
  beforeEach(() => {
    clearAgentLogs();
    vi.stubEnv('LOG_LEVEL', 'info');
  });

  afterEach(() => {
    setLogLevel(null);
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
  });

  it('buffers entries and echoes them with the agent prefix', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    agentLog('Discovery', 'Query 1/2', { detail: 'data engineer' });
    agentLog('Discovery', 'Search failed', { level: 'warn' });

    expect(log).toHaveBeenCalledWith('[Discovery] Query 1/2 (data engineer)');
    expect(warn).toHaveBeenCalledWith('[Discovery] Search failed');
    expect(getAgentLogs().map((e) => [e.level, e.message])).toEqual([
      ['info', 'Query 1/2'],
      ['warn', 'Search failed'],
    ]);
  });

  it('echoes debug lines only at debug level', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    agentLog('Scoring', 'hidden', { level: 'debug' });
    vi.stubEnv('LOG_LEVEL', 'debug');
    agentLog('Scoring', 'shown', { level: 'debug' });

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[Scoring] shown');
    expect(getAgentLogs()).toHaveLength(2);
  });

  it('keeps only errors on the console when silent', () => {
    vi.stubEnv('LOG_LEVEL', 'silent');
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});

    agentLog('Scoring', 'quiet', { level: 'success' });
    agentLog('Scoring', 'loud', { level: 'error' });

    expect(log).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledWith('[Scoring] loud');
  });

  it('prefers the configured level over LOG_LEVEL', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});

    setLogLevel('debug');
    agentLog('Scoring', 'verbose', { level: 'debug' });
    setLogLevel('silent');
    agentLog('Scoring', 'muted');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[Scoring] verbose');
  });

  it('returns entries after a given id', () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const first = agentLog('Tasks', 'one');
    agentLog('Tasks', 'two');

    expect(getAgentLogs(first.id).map((e) => e.message)).toEqual(['two']);
    expect(getAgentLogs('unknown').map((e) => e.message)).toEqual(['one', 'two']);
  });
});
