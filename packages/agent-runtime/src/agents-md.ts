import { readdir, readFile, stat } from 'node:fs/promises';
import { dirname, join, resolve } from 'node:path';

/** Instruction file names looked for in each directory, in this order. */
export const AGENTS_MD_NAMES = ['AGENTS.md', 'agents.md'] as const;

export interface AgentsMdBudget {
  maxCharsPerFile: number;
  maxTotalChars: number;
}

export const DEFAULT_AGENTS_MD_BUDGET: AgentsMdBudget = {
  maxCharsPerFile: 20_000,
  maxTotalChars: 60_000,
};

/** A loaded instruction file with truncation metadata. */
export interface AgentsMdFile {
  path: string;
  content: string;
  originalLength: number;
  truncated: boolean;
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

async function listNames(dir: string): Promise<string[]> {
  try {
    return await readdir(dir);
  } catch {
    // Unreadable directories contribute no instructions.
    return [];
  }
}

/**
 * Find AGENTS.md files from `workspaceRoot` up to the filesystem root.
 * Returned outermost first, so the workspace's own file comes last.
 */
export async function findAgentsMd(workspaceRoot: string): Promise<string[]> {
  const perDirectory: string[][] = [];
  let current = resolve(workspaceRoot);
  for (;;) {
    const names = await listNames(current);
    const found: string[] = [];
    for (const name of AGENTS_MD_NAMES) {
      const candidate = join(current, name);
      if (names.includes(name) && (await isFile(candidate))) found.push(candidate);
    }
    perDirectory.unshift(found);

    const parent = dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return perDirectory.flat();
}

/**
 * Read the AGENTS.md chain within a character budget. Files closest to the
 * workspace are charged first, so distant ones are the ones cut.
 */
export async function loadAgentsMd(
  workspaceRoot: string,
  budget: AgentsMdBudget = DEFAULT_AGENTS_MD_BUDGET,
): Promise<AgentsMdFile[]> {
  const paths = await findAgentsMd(workspaceRoot);
  const loaded: AgentsMdFile[] = [];
  let totalChars = 0;

  for (const path of [...paths].reverse()) {
    const remaining = budget.maxTotalChars - totalChars;
    if (remaining <= 0) break;

    const raw = (await readFile(path, 'utf-8')).trim();
    const maxForFile = Math.min(budget.maxCharsPerFile, remaining);
    const truncated = raw.length > maxForFile;
    const content = truncated ? raw.slice(0, maxForFile) : raw;

    totalChars += content.length;
    loaded.unshift({ path, content, originalLength: raw.length, truncated });
  }
  return loaded;
}
