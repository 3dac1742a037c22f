// Namespaced debug logging.
//
// Enabled through the DEBUG environment variable, the same way npm's debug
// package is: `DEBUG=serbuf:*`, `DEBUG=*`, or `DEBUG=*,-serbuf:decode`.

export interface DebugLogger {
  readonly namespace: string;
  readonly enabled: boolean;
  log(message: string, data?: Record<string, unknown>): void;
}

function readDebugEnv(): string | undefined {
  if (typeof process === 'undefined') return undefined;
  return process.env.DEBUG;
}

/**
 * Check if a namespace is enabled by the DEBUG patterns.
 * Supports wildcards (*) and exclusions (-prefix).
 */
export function isEnabled(namespace: string, debug = readDebugEnv()): boolean {
  if (!debug) return false;

  const patterns = debug.split(/[\s,]+/).filter(Boolean);
  let enabled = false;

  for (const pattern of patterns) {
    if (pattern.startsWith('-')) {
      if (matchPattern(namespace, pattern.slice(1))) {
        enabled = false;
      }
    } else if (matchPattern(namespace, pattern)) {
      enabled = true;
    }
  }

  return enabled;
}

function matchPattern(namespace: string, pattern: string): boolean {
  if (pattern === '*') return true;

  const regexStr = pattern
    .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
    .replace(/\*/g, '.*');

  return new RegExp(`^${regexStr}$`).test(namespace);
}

/**
 * Create a logger for `namespace`. The DEBUG variable is consulted on every
 * call, so enabling it at runtime takes effect immediately.
 *
 * @example
 * ```typescript
 * const debug = createDebug('serbuf:decode');
 * debug.log('decode failed', { offset: 12 });
 * // console: [serbuf:decode] decode failed { offset: 12 }
 * ```
 */
export function createDebug(namespace: string): DebugLogger {
  return {
    namespace,

    get enabled() {
      return isEnabled(namespace);
    },

    log(message, data) {
      if (!isEnabled(namespace)) return;
      if (data === undefined) {
        console.debug(`[${namespace}] ${message}`);
      } else {
        console.debug(`[${namespace}] ${message}`, data);
      }
    },
  };
}
