// Simple glob matching: `*` stays within a path segment, `**/` spans any
// number of directories (including none).
export function globToRegExp(pattern: string): RegExp {
  const regexStr = pattern
    .replace(/[.+^${}()|[\]\\]/g, '\\$&')
    .replace(/\*\*\//g, '{{GLOBSTAR_DIR}}')
    .replace(/\*\*/g, '{{GLOBSTAR}}')
    .replace(/\*/g, '[^/]*')
    .replace(/\?/g, '[^/]')
    .replace(/\{\{GLOBSTAR_DIR\}\}/g, '(?:.*/)?')
    .replace(/\{\{GLOBSTAR\}\}/g, '.*');
  return new RegExp(`^${regexStr}$`);
}

export function matchGlob(pattern: string, filepath: string): boolean {
  return globToRegExp(pattern).test(filepath);
}
