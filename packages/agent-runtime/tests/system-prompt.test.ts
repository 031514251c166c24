import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, realpath, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { findAgentsMd, loadAgentsMd } from '../src/agents-md.js';
import { buildSystemPrompt } from '../src/system-prompt.js';
import { collectRuntimeInfo, formatRuntimeInfo } from '../src/runtime-info.js';

let base: string;

beforeEach(async () => {
  base = await realpath(await mkdtemp(join(tmpdir(), 'toolpilot-prompt-')));
});

afterEach(async () => {
  await rm(base, { recursive: true, force: true });
});

/** Only files under the temp dir; ancestors of tmpdir are not ours to assert on. */
function ours(paths: readonly string[]): string[] {
  return paths.filter((p) => p.startsWith(base));
}

// ── AGENTS.md discovery ───────────────────────────────────────────────

describe('findAgentsMd', () => {
  it('collects files from the workspace up, outermost first', async () => {
    const workspace = join(base, 'repo', 'pkg');
    await mkdir(workspace, { recursive: true });
    await writeFile(join(base, 'AGENTS.md'), 'outer');
    await writeFile(join(base, 'repo', 'agents.md'), 'middle');
    await writeFile(join(workspace, 'AGENTS.md'), 'inner');

    expect(ours(await findAgentsMd(workspace))).toEqual([
      join(base, 'AGENTS.md'),
      join(base, 'repo', 'agents.md'),
      join(workspace, 'AGENTS.md'),
    ]);
  });

  it('ignores directories named like the instruction file', async () => {
    await mkdir(join(base, 'AGENTS.md'));
    expect(ours(await findAgentsMd(base))).toEqual([]);
  });
});

describe('loadAgentsMd', () => {
  it('trims content and keeps small files whole', async () => {
    await writeFile(join(base, 'AGENTS.md'), '\n  Run the tests.  \n');
    const files = (await loadAgentsMd(base)).filter((f) => f.path.startsWith(base));
    expect(files).toEqual([
      { path: join(base, 'AGENTS.md'), content: 'Run the tests.', originalLength: 14, truncated: false },
    ]);
  });

  it('truncates files over the per-file budget', async () => {
    await writeFile(join(base, 'AGENTS.md'), 'abcdefghij');
    const files = (await loadAgentsMd(base, { maxCharsPerFile: 4, maxTotalChars: 100 })).filter((f) =>
      f.path.startsWith(base),
    );
    expect(files).toEqual([{ path: join(base, 'AGENTS.md'), content: 'abcd', originalLength: 10, truncated: true }]);
  });

  it('charges the total budget to the innermost file first', async () => {
    const workspace = join(base, 'inner');
    await mkdir(workspace);
    await writeFile(join(base, 'AGENTS.md'), 'outer-instructions');
    await writeFile(join(workspace, 'AGENTS.md'), 'inner-text');

    const files = await loadAgentsMd(workspace, { maxCharsPerFile: 100, maxTotalChars: 15 });
    expect(files.map((f) => [f.path, f.content, f.truncated])).toEqual([
      [join(base, 'AGENTS.md'), 'outer', true],
      [join(workspace, 'AGENTS.md'), 'inner-text', false],
    ]);
  });
});

// ── Runtime info ──────────────────────────────────────────────────────

describe('formatRuntimeInfo', () => {
  it('lists the session facts', () => {
    const info = collectRuntimeInfo({
      workspaceRoot: '/work',
      now: new Date('2025-01-02T03:04:05.000Z'),
      model: 'test-model',
      sandboxMode: 'read-only',
      approvalPolicy: 'never',
    });
    expect(formatRuntimeInfo({ ...info, os: 'linux' })).toBe(
      '<runtime-info>\n' +
        'os: linux\n' +
        'workspace-root: /work\n' +
        'current-time-utc: 2025-01-02T03:04:05.000Z\n' +
        'model: test-model\n' +
        'sandbox-mode: read-only\n' +
        'approval-policy: never\n' +
        '</runtime-info>',
    );
  });

  it('omits unset optional facts', () => {
    const text = formatRuntimeInfo({ os: 'darwin', workspaceRoot: '/w', time: 't' });
    expect(text).toBe('<runtime-info>\nos: darwin\nworkspace-root: /w\ncurrent-time-utc: t\n</runtime-info>');
  });
});

// ── System prompt ─────────────────────────────────────────────────────

describe('buildSystemPrompt', () => {
  it('orders the sections and reports no AGENTS.md as (none)', () => {
    const prompt = buildSystemPrompt({
      workspaceRoot: '/work',
      agentsMd: [],
      now: new Date('2025-01-02T03:04:05.000Z'),
      tools: [{ name: 'read_file', description: 'Read a file', inputSchema: {} }],
    });

    expect(prompt.startsWith("You are Toolpilot, a coding agent working in the user's workspace")).toBe(true);
    const order = ['<tool-strategy>', '<runtime-info>', '<available-tools>', '<agents-md>'].map((tag) =>
      prompt.indexOf(tag),
    );
    expect(order.every((index) => index > 0)).toBe(true);
    expect([...order].sort((a, b) => a - b)).toEqual(order);
    expect(prompt).toContain('- read_file: Read a file');
    expect(prompt.endsWith('\n\n(none)\n</agents-md>')).toBe(true);
  });

  it('omits the tool list when no tools are given', () => {
    const prompt = buildSystemPrompt({ workspaceRoot: '/work', agentsMd: [] });
    expect(prompt).not.toContain('<available-tools>');
  });

  it('embeds AGENTS.md content', () => {
    const prompt = buildSystemPrompt({
      workspaceRoot: '/work',
      agentsMd: [{ path: '/work/AGENTS.md', content: 'Always run lint.', originalLength: 16, truncated: false }],
    });
    expect(prompt).toContain('## /work/AGENTS.md\nAlways run lint.\n</agents-md>');
  });
});
