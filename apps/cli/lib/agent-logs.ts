/**
 * In-memory agent log buffer. Every line is also echoed to the console as
 * `[Agent] message`; debug lines only at debug level. The level comes from
 * `setLogLevel`, or LOG_LEVEL when none was set.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'success';

export interface AgentLogEntry {
  id: string;
  ts: number;
  agent: string;
  level: LogLevel;
  message: string;
  detail?: string;
}

const MAX_LOGS = 500;
const logs: AgentLogEntry[] = [];
let nextId = 1;
let consoleLevel: ConsoleLevel | null = null;

export type ConsoleLevel = 'debug' | 'info' | 'silent';

/** Pass null to fall back to LOG_LEVEL. */
export function setLogLevel(level: ConsoleLevel | null): void {
  consoleLevel = level;
}

function echo(entry: AgentLogEntry): void {
  const level = consoleLevel ?? process.env.LOG_LEVEL;
  if (entry.level === 'debug' && level !== 'debug') return;
  if (level === 'silent' && entry.level !== 'error') return;
  const line = `[${entry.agent}] ${entry.message}${entry.detail ? ` (${entry.detail})` : ''}`;
  if (entry.level === 'error') console.error(line);
  else if (entry.level === 'warn') console.warn(line);
  else console.log(line);
}

export function agentLog(
  agent: string,
  message: string,
  options?: { level?: LogLevel; detail?: string },
) {
  const entry: AgentLogEntry = {
    id: `log-${nextId++}`,
    ts: Date.now(),
    agent,
    level: options?.level ?? 'info',
    message,
    detail: options?.detail,
  };
  logs.push(entry);
  if (logs.length > MAX_LOGS) logs.shift();
  echo(entry);
  return entry;
}

export function getAgentLogs(afterId?: string): AgentLogEntry[] {
  if (!afterId) return [...logs];
  const idx = logs.findIndex((l) => l.id === afterId);
  if (idx < 0) return [...logs];
  return logs.slice(idx + 1);
}

export function clearAgentLogs(): void {
  logs.length = 0;
}
