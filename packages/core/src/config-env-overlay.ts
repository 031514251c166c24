import { isRecord } from './utils.js';

const PREFIX = 'TOOLPILOT_';
const SEPARATOR = '__';

function coerce(value: string): string | number | boolean {
  if (value === 'true') return true;
  if (value === 'false') return false;

  if (/^-?\d+(\.\d+)?$/.test(value)) {
    const num = Number(value);
    if (Number.isFinite(num)) return num;
  }

  return value;
}

/** `MAX_STEPS` → `maxSteps` */
function toCamelCase(segment: string): string {
  return segment
    .toLowerCase()
    .replace(/_([a-z0-9])/g, (_match, ch: string) => ch.toUpperCase());
}

/**
 * Apply environment variable overrides to a config object.
 *
 * Variables must be prefixed with `TOOLPILOT_`. Nesting is expressed
 * with double-underscore (`__`) and each segment is converted from
 * SNAKE_CASE to camelCase. Values are coerced to numbers/booleans
 * where possible.
 *
 * Example: `TOOLPILOT_AGENT__MAX_STEPS=5` → `config.agent.maxSteps = 5`
 *
 * @param config The config object to mutate in-place.
 * @param env    Optional env map (defaults to `process.env`).
 * @returns The mutated config (same reference).
 */
export function applyEnvOverrides(
  config: Record<string, unknown>,
  env: Record<string, string | undefined> = process.env,
): Record<string, unknown> {
  for (const [key, rawValue] of Object.entries(env)) {
    if (!key.startsWith(PREFIX) || rawValue === undefined) continue;

    const path = key.slice(PREFIX.length).split(SEPARATOR).map(toCamelCase);
    if (path.length === 0 || path.some((segment) => segment === '')) continue;

    setNested(config, path, coerce(rawValue));
  }

  return config;
}

function setNested(obj: Record<string, unknown>, path: string[], value: unknown): void {
  const last = path[path.length - 1];
  if (last === undefined) return;

  let current = obj;
  for (const segment of path.slice(0, -1)) {
    const next = current[segment];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[segment] = created;
      current = created;
    }
  }

  current[last] = value;
}
