/**
 * Splits a secret path into secrets-engine mount and in-mount path.
 *
 * - `secret/data/myapp` → `secret` + `myapp` (KV v2 convention)
 * - `kv/data/a/b` → `kv` + `a/b`
 * - `secret/myapp` → `secret` + `myapp`
 * - `simple` → `''` + `simple` (mount is filled in from options later)
 */
export function splitSecretPath(fullPath: string): { mountPoint: string; path: string } {
  const parts = fullPath.split('/').filter((part) => part !== '');

  if (parts.length < 2) {
    return { mountPoint: '', path: fullPath };
  }

  if (parts.length >= 3 && parts[1].toLowerCase() === 'data') {
    return { mountPoint: parts[0], path: parts.slice(2).join('/') };
  }

  return { mountPoint: parts[0], path: parts.slice(1).join('/') };
}
