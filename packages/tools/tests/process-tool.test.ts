import { describe, it, expect } from 'vitest';
import { tmpdir } from 'node:os';
import type { ProcessToolConfig, ToolContext } from '@toolpilot/core';
import { noopLogger } from '@toolpilot/core';
import { createProcessToolSpec, interpretProcessOutput, registerProcessTools } from '../src/process-tool.js';
import { ToolRegistry } from '../src/registry.js';
import { MemoryPlanStore } from '../src/plan-store.js';

const READ_STDIN = "let s='';process.stdin.on('data',(d)=>{s+=d;}).on('end',()=>{";

function nodeTool(name: string, body: string, extra: Partial<ProcessToolConfig> = {}): ProcessToolConfig {
  return {
    plugin: 'local',
    name,
    argv: [process.execPath, '-e', `${READ_STDIN}${body}});`],
    ...extra,
  };
}

function makeContext(): ToolContext {
  const root = tmpdir();
  return {
    workspaceRoot: root,
    sandboxMode: 'workspace-write',
    signal: new AbortController().signal,
    plan: new MemoryPlanStore(),
    logger: noopLogger,
    resolvePath: async (raw) => raw,
  };
}

// ── Spec construction ─────────────────────────────────────────────────

describe('createProcessToolSpec', () => {
  it('namespaces and sanitizes the tool name', () => {
    const spec = createProcessToolSpec({ plugin: 'My Plugin', name: 'Word-Count', command: 'true' }, tmpdir());
    expect(spec.name).toBe('my_plugin__word_count');
    expect(spec.description).toBe('[plugin:My Plugin] Plugin tool `Word-Count`');
    expect(spec.inputSchema).toEqual({ type: 'object', properties: {} });
    expect(spec.mutating).toBe(false);
    expect(spec.timeoutMs).toBe(120_000);
  });

  it('carries configured metadata', () => {
    const spec = createProcessToolSpec(
      {
        plugin: 'p',
        name: 't',
        description: 'Does things',
        mutating: true,
        timeoutSec: 5,
        parameters: { type: 'object', properties: { x: { type: 'string' } } },
        command: 'true',
      },
      tmpdir(),
    );
    expect(spec.description).toBe('[plugin:p] Does things');
    expect(spec.mutating).toBe(true);
    expect(spec.timeoutMs).toBe(5_000);
    expect(spec.inputSchema).toEqual({ type: 'object', properties: { x: { type: 'string' } } });
  });
});

// ── Output protocol ───────────────────────────────────────────────────

describe('interpretProcessOutput', () => {
  it('accepts a JSON string or an output field', () => {
    expect(interpretProcessOutput('tool', '"plain"\n')).toBe('plain');
    expect(interpretProcessOutput('tool', '{"output":"from field"}')).toBe('from field');
  });

  it('maps an error field to a failure', () => {
    expect(interpretProcessOutput('tool', '{"error":"bad input"}')).toEqual({ error: 'tool failed: bad input' });
  });

  it('pretty prints other JSON', () => {
    expect(interpretProcessOutput('tool', '{"a":1}')).toBe('{\n  "a": 1\n}');
  });

  it('fails on empty or malformed output', () => {
    expect(interpretProcessOutput('tool', '  ')).toEqual({
      error: 'tool produced no output (expected a JSON payload)',
    });
    expect(interpretProcessOutput('tool', 'not json')).toEqual({
      error: 'tool returned malformed output (expected JSON): not json',
    });
  });
});

// ── Running processes ─────────────────────────────────────────────────

describe('process tool handler', () => {
  it('sends arguments on stdin and reads the JSON reply', async () => {
    const spec = createProcessToolSpec(
      nodeTool('count', "const a=JSON.parse(s);process.stdout.write(JSON.stringify({output:'count='+a.text.length}));"),
      tmpdir(),
    );
    expect(await spec.handler({ text: 'hello' }, makeContext())).toBe('count=5');
  });

  it('reports a non-zero exit with stderr', async () => {
    const spec = createProcessToolSpec(
      nodeTool('fail', "process.stderr.write('bad things');process.exit(2);"),
      tmpdir(),
    );
    expect(await spec.handler({}, makeContext())).toEqual({
      error: 'plugin `local` tool `fail` failed: bad things',
    });
  });

  it('reports malformed stdout', async () => {
    const spec = createProcessToolSpec(nodeTool('garbled', "console.log('not json');"), tmpdir());
    expect(await spec.handler({}, makeContext())).toEqual({
      error: 'plugin `local` tool `garbled` returned malformed output (expected JSON): not json',
    });
  });
});

// ── Registration ──────────────────────────────────────────────────────

describe('registerProcessTools', () => {
  it('registers tools and reports duplicates', () => {
    const registry = new ToolRegistry();
    const result = registerProcessTools(
      registry,
      [
        { plugin: 'local', name: 'wc', command: 'true' },
        { plugin: 'Local', name: 'WC', command: 'true' },
      ],
      { baseDir: tmpdir() },
    );
    expect(result).toEqual({
      toolNames: ['local__wc'],
      errors: ['duplicate plugin tool ignored: local__wc'],
    });
    expect(registry.get('local__wc')?.source).toBe('plugin');
  });
});
