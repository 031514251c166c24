import { describe, it, expect } from 'vitest';
import type { SubagentProfile } from '@toolpilot/core';
import { DEFAULT_SUBAGENT_PROFILES, effectiveSandboxMode, mergeProfiles } from '../src/profiles.js';

function profile(name: string, overrides: Partial<SubagentProfile> = {}): SubagentProfile {
  return { name, description: '', prompt: `${name} prompt`, allowedTools: ['read_file'], maxSteps: 3, ...overrides };
}

describe('DEFAULT_SUBAGENT_PROFILES', () => {
  it('ships general, reviewer and researcher with read-only tools', () => {
    expect(DEFAULT_SUBAGENT_PROFILES.map((p) => p.name)).toEqual(['general', 'reviewer', 'researcher']);
    const reviewer = DEFAULT_SUBAGENT_PROFILES.find((p) => p.name === 'reviewer');
    expect(reviewer?.allowedTools).toEqual(['list_files', 'read_file', 'grep_files']);
    expect(reviewer?.maxSteps).toBe(8);
    expect(DEFAULT_SUBAGENT_PROFILES.every((p) => p.sandboxMode === undefined)).toBe(true);
  });
});

describe('mergeProfiles', () => {
  it('replaces defaults by name and appends new profiles', () => {
    const merged = mergeProfiles(
      [profile('general'), profile('reviewer')],
      [profile('reviewer', { maxSteps: 2 }), profile('tester')],
    );
    expect(merged.map((p) => [p.name, p.maxSteps])).toEqual([
      ['general', 3],
      ['reviewer', 2],
      ['tester', 3],
    ]);
  });
});

describe('effectiveSandboxMode', () => {
  it('defaults to read-only', () => {
    expect(effectiveSandboxMode(profile('a'), 'danger-full-access')).toBe('read-only');
  });

  it('grants the requested mode when the parent allows it', () => {
    expect(effectiveSandboxMode(profile('a', { sandboxMode: 'workspace-write' }), 'workspace-write')).toBe(
      'workspace-write',
    );
  });

  it('caps the requested mode at the parent mode', () => {
    expect(effectiveSandboxMode(profile('a', { sandboxMode: 'danger-full-access' }), 'workspace-write')).toBe(
      'workspace-write',
    );
    expect(effectiveSandboxMode(profile('a', { sandboxMode: 'workspace-write' }), 'read-only')).toBe('read-only');
  });
});
