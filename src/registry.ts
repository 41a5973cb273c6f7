import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

const RegistrySchema = z.array(z.string().min(1));

let registry: ReadonlySet<string> | null = null;

/**
 * Component families shipped with the Figma Make UI kit (`components/ui/*`).
 * Read once from `data/ui-kit-components.json` and shared for the process.
 */
export function getUiKitRegistry(): ReadonlySet<string> {
  if (!registry) {
    const candidates = [
      path.join(__dirname, '../data/ui-kit-components.json'),
      path.join(__dirname, '../../data/ui-kit-components.json'),
    ];
    let raw: string | null = null;
    for (const candidate of candidates) {
      try {
        raw = readFileSync(candidate, 'utf-8');
        break;
      } catch {
        // try the next layout (sources vs. dist/)
      }
    }
    if (raw === null) {
      throw new Error(`UI kit registry not found (looked in ${candidates.join(', ')})`);
    }
    registry = new Set(RegistrySchema.parse(JSON.parse(raw)));
  }
  return registry;
}
