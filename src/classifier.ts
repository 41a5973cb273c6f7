import * as path from 'node:path';
import { getUiKitRegistry } from './registry.js';
import type { ImportClass, MatchStrategy } from './types.js';

export function isPackageImport(specifier: string): boolean {
  return !specifier.startsWith('.') && !specifier.startsWith('/');
}

// Longest identifier wins so that "./ui/alert-dialog" reports "alert-dialog"
// rather than "alert" or "dialog".
function matchSubstring(specifier: string, registry: ReadonlySet<string>): string | undefined {
  let best: string | undefined;
  for (const id of registry) {
    if (!specifier.includes(id)) continue;
    if (
      best === undefined ||
      id.length > best.length ||
      (id.length === best.length && id < best)
    ) {
      best = id;
    }
  }
  return best;
}

function matchSegment(specifier: string, registry: ReadonlySet<string>): string | undefined {
  const segments = specifier.split('/');
  for (let i = segments.length - 1; i >= 0; i--) {
    const seg = segments[i];
    const stem = seg.slice(0, seg.length - path.extname(seg).length) || seg;
    if (registry.has(stem)) return stem;
  }
  return undefined;
}

// `substring` accepts any relative path containing a registry name
// (`./utils-helper` counts as `utils`); `segment` needs a whole path segment.
export function classifyImport(specifier: string, match: MatchStrategy = 'substring'): ImportClass {
  if (isPackageImport(specifier)) return { kind: 'package' };

  const registry = getUiKitRegistry();
  const name = match === 'segment'
    ? matchSegment(specifier, registry)
    : matchSubstring(specifier, registry);

  return name ? { kind: 'component', name } : { kind: 'ignored' };
}
