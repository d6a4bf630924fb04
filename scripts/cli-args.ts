import { resolve } from 'path';
import { fileURLToPath } from 'url';

export function getArgValue(args: string[], name: string): string | null {
  const idx = args.indexOf(name);
  if (idx === -1) return null;
  const v = args[idx + 1];
  if (!v || v.startsWith('--')) return null;
  return v;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

/** True when the module at `metaUrl` is the script node was started with. */
export function isMainModule(metaUrl: string): boolean {
  const entry = process.argv[1];
  return entry !== undefined && resolve(entry) === fileURLToPath(metaUrl);
}

export function errorMessage(err: unknown): string {
  return (err instanceof Error ? err.message : String(err)) || 'Unknown error';
}
