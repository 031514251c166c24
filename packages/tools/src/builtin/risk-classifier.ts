import type { RiskLevel } from '@toolpilot/core';

export interface RiskAssessment {
  /** `blocked` commands never run; `confirm` ones ask again each time. */
  level: RiskLevel;
  reason: string;
}

/** Whole-command patterns that are refused outright. */
const BLOCKED: ReadonlyArray<[RegExp, string]> = [
  [/\brm\s+-\w*(rf|fr)\w*\s+(\/|~\/?)(\s|$)/, 'recursive delete of / or ~'],
  [/:\(\)\s*\{\s*:\s*\|\s*:\s*&\s*\}\s*;\s*:/, 'fork bomb'],
  [/\bmkfs(\.\w+)?\b/, 'filesystem format'],
  [/\bdd\s+if=|>\s*\/dev\/sd[a-z]/, 'raw disk write'],
  [/\b(shutdown|reboot|halt|poweroff)\b/, 'host power control'],
];

/** Programs that delete, escalate, or reach the network. */
const CONFIRM_PROGRAMS = new Set(['rm', 'rmdir', 'mv', 'sudo', 'su', 'chmod', 'chown', 'kill', 'pkill', 'curl', 'wget', 'ssh', 'scp']);

/** Subcommands that publish or discard work. */
const CONFIRM_PREFIXES = ['git push', 'git reset --hard', 'git clean', 'npm publish', 'pip install'];

/** `FOO=1 /usr/bin/rm -r x` → `rm -r x` */
function normalizeSegment(segment: string): string {
  const words = segment.trim().split(/\s+/);
  while (words.length > 1 && /^\w+=/.test(words[0] ?? '')) words.shift();
  const program = words[0] ?? '';
  words[0] = program.slice(program.lastIndexOf('/') + 1);
  return words.join(' ');
}

/**
 * Classify a shell command line. Blocked patterns are matched against the
 * whole line, since some contain separators; the rest is checked per
 * segment of `&&`, `||`, `;`, `|` and newlines.
 */
export function classifyCommandRisk(command: string): RiskAssessment {
  for (const [pattern, label] of BLOCKED) {
    if (pattern.test(command)) return { level: 'blocked', reason: label };
  }

  for (const raw of command.split(/&&|\|\||;|\||\n/)) {
    const segment = normalizeSegment(raw);
    if (segment === '') continue;
    const prefix = CONFIRM_PREFIXES.find((p) => segment === p || segment.startsWith(`${p} `));
    if (prefix) return { level: 'confirm', reason: prefix };
    const program = segment.split(' ')[0] ?? '';
    if (CONFIRM_PROGRAMS.has(program)) return { level: 'confirm', reason: program };
  }
  return { level: 'routine', reason: 'no high-risk program' };
}
