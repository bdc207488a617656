/**
 * CI Guardrail: Clean Exports
 *
 * Validates that the entry points follow the split between implementations:
 * - memory.ts: NO filesystem or subprocess dependencies (embeddable)
 * - fs.ts: CAN have filesystem dependencies (expected)
 *
 * Walks the runtime import graph of the TypeScript sources; `import type`
 * and `export type` are erased at compile time and are not followed.
 */

import * as fs from 'fs';
import * as path from 'path';

const PROHIBITED_MODULES = ['fs', 'path', 'child_process'];

const IMPORT_PATTERN =
  /(?:^|\n)\s*(?:import|export)\s+(type\s+)?(?:\{[^}]*\}|\*\s+as\s+\w+|\*|\w+(?:\s*,\s*\{[^}]*\})?)\s+from\s+['"]([^'"]+)['"]/g;

const SRC_DIR = path.join(__dirname, '..', '..');

function resolveSource(fromFile: string, specifier: string): string {
  const base = path.resolve(path.dirname(fromFile), specifier);
  const candidates = [`${base}.ts`, path.join(base, 'index.ts')];
  const found = candidates.find(candidate => fs.existsSync(candidate));
  if (!found) {
    throw new Error(`Cannot resolve ${specifier} from ${fromFile}`);
  }
  return found;
}

/**
 * Collects every package or builtin reachable at runtime from an entry file.
 */
function externalImportsOf(entry: string): string[] {
  const externals = new Set<string>();
  const visited = new Set<string>();
  const queue = [path.join(SRC_DIR, entry)];

  while (queue.length > 0) {
    const file = queue.shift();
    if (file === undefined || visited.has(file)) continue;
    visited.add(file);

    const content = fs.readFileSync(file, 'utf-8');
    for (const match of content.matchAll(IMPORT_PATTERN)) {
      const [, typeOnly, specifier] = match;
      if (typeOnly || specifier === undefined) continue;
      if (specifier.startsWith('.')) {
        queue.push(resolveSource(file, specifier));
      } else {
        externals.add(specifier.replace(/^node:/, ''));
      }
    }
  }

  return [...externals].sort();
}

describe('CI Guardrail: Clean Exports', () => {
  describe('memory entry point', () => {
    it('should NOT import fs, path or child_process', () => {
      const externals = externalImportsOf('memory.ts');

      const prohibited = externals.filter(name => PROHIBITED_MODULES.includes(name));
      expect(prohibited).toEqual([]);
    });

    it('should only depend on crypto for object hashing', () => {
      expect(externalImportsOf('memory.ts')).toEqual(['crypto']);
    });
  });

  describe('fs entry point', () => {
    it('should import fs, path and child_process (expected)', () => {
      const externals = externalImportsOf('fs.ts');

      expect(externals).toEqual(expect.arrayContaining(['child_process', 'fs', 'path']));
    });
  });
});
