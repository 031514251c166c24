import { appendFile, mkdir, readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname, join, relative } from 'node:path';
import type { ToolContext, ToolDefinition, ToolHandler } from '@toolpilot/core';
import { errorMessage } from '@toolpilot/core';
import { matchesGlob } from './glob.js';

// ---------------------------------------------------------------------------
// Tool Definitions
// ---------------------------------------------------------------------------

export const listFilesToolDefinition: ToolDefinition = {
  name: 'list_files',
  description:
    'List files and directories under a path, one entry per line; directories end with a slash. ' +
    'Lists recursively up to 200 entries by default. Use recursive=false for a shallow listing.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: "Path to list, relative to the workspace root. Defaults to '.'.",
      },
      recursive: {
        type: 'boolean',
        description: 'List all files recursively (default true).',
      },
      max_entries: {
        type: 'integer',
        description: 'Maximum number of entries to return. Defaults to 200. Range: 1-2000.',
      },
    },
    required: [],
    additionalProperties: false,
  },
};

export const readFileToolDefinition: ToolDefinition = {
  name: 'read_file',
  description:
    'Read a file with line numbers (6-character padded number, a tab, then the line). ' +
    'Reads up to 200 lines from line 1 by default; use start_line and num_lines for other sections.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Path to the file to read.',
      },
      start_line: {
        type: 'integer',
        description: '1-based line number to start reading from. Defaults to 1.',
      },
      num_lines: {
        type: 'integer',
        description: 'Number of lines to read. Defaults to 200. Maximum: 2000.',
      },
    },
    required: ['path'],
    additionalProperties: false,
  },
};

export const grepFilesToolDefinition: ToolDefinition = {
  name: 'grep_files',
  description:
    'Search file contents for a regular expression. Output lines look like path:line_number:text. ' +
    "Use glob to restrict the files searched (e.g. '*.ts', 'src/**/*.{ts,tsx}').",
  inputSchema: {
    type: 'object',
    properties: {
      pattern: {
        type: 'string',
        description: 'Regular expression to search for.',
      },
      path: {
        type: 'string',
        description: "Directory or file to search. Defaults to '.'.",
      },
      glob: {
        type: 'string',
        description: 'Glob filtering which files are searched.',
      },
      max_results: {
        type: 'integer',
        description: 'Maximum number of matching lines. Defaults to 200. Range: 1-2000.',
      },
    },
    required: ['pattern'],
    additionalProperties: false,
  },
};

export const writeFileToolDefinition: ToolDefinition = {
  name: 'write_file',
  description:
    'Write content to a file, creating parent directories as needed. Mutating. ' +
    'Prefer replace_in_file for targeted edits to existing files.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Path to the file to write.',
      },
      content: {
        type: 'string',
        description: 'Full text content to write.',
      },
      mode: {
        type: 'string',
        enum: ['overwrite', 'append'],
        description: "'overwrite' (default) replaces the file; 'append' adds to the end.",
      },
    },
    required: ['path', 'content'],
    additionalProperties: false,
  },
};

export const replaceInFileToolDefinition: ToolDefinition = {
  name: 'replace_in_file',
  description:
    'Replace exact text in an existing file. Mutating. Read the file first; old must match exactly, ' +
    'including whitespace. Nothing changes when there is no match.',
  inputSchema: {
    type: 'object',
    properties: {
      path: {
        type: 'string',
        description: 'Path to the file to edit.',
      },
      old: {
        type: 'string',
        description: 'Exact text to find.',
      },
      new: {
        type: 'string',
        description: 'Replacement text. May be empty to delete the match.',
      },
      count: {
        type: 'integer',
        description: 'Maximum number of occurrences to replace. Defaults to 1.',
      },
    },
    required: ['path', 'old', 'new'],
    additionalProperties: false,
  },
};

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function clamp(value: unknown, fallback: number, min: number, max: number): number {
  const n = typeof value === 'number' && Number.isFinite(value) ? Math.floor(value) : fallback;
  return Math.max(min, Math.min(n, max));
}

function stringArg(args: Record<string, unknown>, name: string, fallback: string): string {
  const value = args[name];
  return typeof value === 'string' ? value : fallback;
}

/** Path as shown to the model: relative to the workspace when inside it. */
function display(ctx: ToolContext, absPath: string): string {
  return relative(ctx.workspaceRoot, absPath) || '.';
}

async function statOrUndefined(absPath: string) {
  try {
    return await stat(absPath);
  } catch {
    return undefined;
  }
}

/** Directory names never descended into when searching. */
const SKIPPED_DIRS = new Set(['.git', 'node_modules']);

/** Depth-first walk in name order; yields absolute paths. */
async function* walk(
  dir: string,
  recursive: boolean,
  skipDirs: ReadonlySet<string> = new Set(),
): AsyncGenerator<{ path: string; isDir: boolean }> {
  const entries = await readdir(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  for (const entry of entries) {
    const full = join(dir, entry.name);
    const isDir = entry.isDirectory();
    if (isDir && skipDirs.has(entry.name)) continue;
    yield { path: full, isDir };
    if (isDir && recursive) {
      yield* walk(full, recursive, skipDirs);
    }
  }
}

function splitLines(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines.length > 0 && lines[lines.length - 1] === '') lines.pop();
  return lines;
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

export const listFilesHandler: ToolHandler = async (args, ctx) => {
  const rawPath = stringArg(args, 'path', '.');
  const recursive = typeof args.recursive === 'boolean' ? args.recursive : true;
  const maxEntries = clamp(args.max_entries, 200, 1, 2000);

  const root = await ctx.resolvePath(rawPath);
  const info = await statOrUndefined(root);
  if (!info) {
    return { error: `path does not exist: ${rawPath}` };
  }
  if (info.isFile()) {
    return display(ctx, root);
  }

  const entries: string[] = [];
  for await (const item of walk(root, recursive)) {
    const rel = display(ctx, item.path);
    entries.push(item.isDir ? `${rel}/` : rel);
    if (entries.length >= maxEntries) {
      entries.push(`... truncated at ${maxEntries} entries`);
      break;
    }
  }
  return entries.length > 0 ? entries.join('\n') : '(empty directory)';
};

export const readFileHandler: ToolHandler = async (args, ctx) => {
  const rawPath = stringArg(args, 'path', '');
  const startLine = clamp(args.start_line, 1, 1, Number.MAX_SAFE_INTEGER);
  const numLines = clamp(args.num_lines, 200, 1, 2000);

  const target = await ctx.resolvePath(rawPath);
  const info = await statOrUndefined(target);
  if (!info || !info.isFile()) {
    return { error: `file not found: ${rawPath}` };
  }

  const lines = splitLines(await readFile(target, 'utf-8'));
  const chunk = lines.slice(startLine - 1, startLine - 1 + numLines);
  if (chunk.length === 0) {
    return '(no content)';
  }
  return chunk
    .map((line, index) => `${String(startLine + index).padStart(6)}\t${line}`)
    .join('\n');
};

export const grepFilesHandler: ToolHandler = async (args, ctx) => {
  const pattern = stringArg(args, 'pattern', '');
  const rawPath = stringArg(args, 'path', '.');
  const glob = typeof args.glob === 'string' && args.glob !== '' ? args.glob : undefined;
  const maxResults = clamp(args.max_results, 200, 1, 2000);

  let regex: RegExp;
  try {
    regex = new RegExp(pattern);
  } catch (err) {
    return { error: `invalid pattern: ${errorMessage(err)}` };
  }

  const root = await ctx.resolvePath(rawPath);
  const info = await statOrUndefined(root);
  if (!info) {
    return { error: `path does not exist: ${rawPath}` };
  }

  const files: string[] = [];
  if (info.isFile()) {
    files.push(root);
  } else {
    for await (const item of walk(root, true, SKIPPED_DIRS)) {
      if (item.isDir) continue;
      if (glob && !matchesGlob(relative(root, item.path), glob)) continue;
      files.push(item.path);
    }
  }

  const matches: string[] = [];
  for (const file of files) {
    ctx.signal.throwIfAborted();
    let text: string;
    try {
      text = await readFile(file, 'utf-8');
    } catch {
      continue;
    }
    if (text.includes('\u0000')) continue;
    const lines = splitLines(text);
    for (let i = 0; i < lines.length; i++) {
      const line = lines[i] ?? '';
      if (regex.test(line)) {
        matches.push(`${display(ctx, file)}:${i + 1}:${line}`);
        if (matches.length >= maxResults) return matches.join('\n');
      }
    }
  }
  return matches.length > 0 ? matches.join('\n') : '(no matches)';
};

export const writeFileHandler: ToolHandler = async (args, ctx) => {
  const rawPath = stringArg(args, 'path', '');
  const content = stringArg(args, 'content', '');
  const mode = stringArg(args, 'mode', 'overwrite');
  if (mode !== 'overwrite' && mode !== 'append') {
    return { error: 'mode must be one of: overwrite, append' };
  }

  const target = await ctx.resolvePath(rawPath);
  await mkdir(dirname(target), { recursive: true });
  if (mode === 'overwrite') {
    await writeFile(target, content, 'utf-8');
  } else {
    await appendFile(target, content, 'utf-8');
  }
  return `wrote ${Buffer.byteLength(content, 'utf-8')} bytes to ${display(ctx, target)} (${mode})`;
};

export const replaceInFileHandler: ToolHandler = async (args, ctx) => {
  const rawPath = stringArg(args, 'path', '');
  const oldText = stringArg(args, 'old', '');
  const newText = stringArg(args, 'new', '');
  const count = clamp(args.count, 1, 1, Number.MAX_SAFE_INTEGER);
  if (oldText === '') {
    return { error: 'old must not be empty' };
  }

  const target = await ctx.resolvePath(rawPath);
  const info = await statOrUndefined(target);
  if (!info || !info.isFile()) {
    return { error: `file not found: ${rawPath}` };
  }

  const content = await readFile(target, 'utf-8');
  const parts = content.split(oldText);
  const found = parts.length - 1;
  if (found === 0) {
    return { error: `no replacements made: text not found in ${display(ctx, target)}` };
  }

  const replaced = Math.min(found, count);
  const updated =
    parts.slice(0, replaced + 1).join(newText) +
    (replaced < found ? oldText + parts.slice(replaced + 1).join(oldText) : '');
  await writeFile(target, updated, 'utf-8');
  return `applied ${replaced} replacement(s) in ${display(ctx, target)}`;
};
