import * as fs from 'node:fs/promises';
import path from 'node:path';

const REDACTED = '[REDACTED]';
const SENSITIVE_ENV_NAME = /(KEY|SECRET|TOKEN|PASSWORD|CREDENTIAL)/i;
const MIN_SENSITIVE_VALUE_LENGTH = 8;
const KEY_VALUE_SECRET =
  /\b([A-Za-z0-9_-]*(?:api[_-]?key|secret|token|password)[A-Za-z0-9_-]*)\s*([=:])\s*("[^"]*"|'[^']*'|[^\s,;]+)/gi;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Redact credentials before text reaches the log file.
 *
 * Handles `key=value` / `key: value` pairs whose key looks secret, and the raw
 * values of secret-like environment variables wherever they appear.
 */
export function scrubSensitiveText(text: string): string {
  let scrubbed = text.replace(KEY_VALUE_SECRET, (_match, key: string, separator: string) => {
    return `${key}${separator}${REDACTED}`;
  });

  for (const [name, value] of Object.entries(process.env)) {
    if (!value || value.length < MIN_SENSITIVE_VALUE_LENGTH || !SENSITIVE_ENV_NAME.test(name)) {
      continue;
    }
    scrubbed = scrubbed.replace(new RegExp(escapeRegExp(value), 'g'), REDACTED);
  }

  return scrubbed;
}

export function getLogDirectory(): string {
  const configured = process.env.ORCHESTRATOR_LOG_DIR?.trim();
  return path.resolve(configured ? configured : 'logs');
}

export function getLogFilePath(date: Date = new Date()): string {
  return path.join(getLogDirectory(), `${date.toISOString().slice(0, 10)}.md`);
}

/**
 * Append one line to today's Markdown activity log.
 *
 * Never rejects: a failed write is reported on stderr so callers can use
 * `void logThought(...)` from synchronous code.
 */
export async function logThought(text: string): Promise<void> {
  const now = new Date();
  const line = `- [${now.toISOString().slice(11, 19)}] ${scrubSensitiveText(text)}\n`;
  const filePath = getLogFilePath(now);

  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.appendFile(filePath, line, 'utf8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(`[Logger] Failed to write ${filePath}: ${message}`);
  }
}
