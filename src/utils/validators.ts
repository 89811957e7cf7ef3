/** Project name: starts with a lowercase letter, then lowercase letters, digits and hyphens */
export const PROJECT_NAME_RE = /^[a-z][a-z0-9-]*$/;

/** Dotted numeric version, optionally prefixed with "v" (e.g. v20.11.1) */
export const VERSION_RE = /v?(\d+(?:\.\d+)*)/;

/** Extract the dotted version from tool output such as "v20.11.1\n" */
export function parseVersion(output: string): string | null {
  const match = VERSION_RE.exec(output.trim());
  return match ? match[1] : null;
}

export function compareVersions(a: string, b: string): number {
  const pa = a.split('.').map(Number);
  const pb = b.split('.').map(Number);
  for (let i = 0; i < Math.max(pa.length, pb.length); i++) {
    const na = pa[i] || 0;
    const nb = pb[i] || 0;
    if (na > nb) return 1;
    if (na < nb) return -1;
  }
  return 0;
}
