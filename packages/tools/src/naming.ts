/** Lower-case a name and collapse anything outside `[A-Za-z0-9_]` to `_`. */
export function sanitizeToolName(value: string, fallback = 'tool'): string {
  const cleaned = value
    .replace(/[^A-Za-z0-9_]+/g, '_')
    .replace(/^_+|_+$/g, '')
    .toLowerCase();
  return cleaned || fallback;
}
