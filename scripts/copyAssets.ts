/**
 * Copy the files core reads at run time next to its compiled output, so
 * dist/core/src resolves ../data and ../schema the same way src does.
 */

import { cpSync } from 'node:fs';
import { join } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

export const CORE_ASSETS = ['data', 'schema'] as const;

export function copyCoreAssets(packageDir: string, outDir: string): string[] {
  return CORE_ASSETS.map((dir) => {
    const target = join(outDir, dir);
    cpSync(join(packageDir, dir), target, { recursive: true });
    return target;
  });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  const root = fileURLToPath(new URL('..', import.meta.url));
  for (const target of copyCoreAssets(join(root, 'packages', 'core'), join(root, 'dist', 'core'))) {
    console.error(`[orgsim] [build] Copied ${target}`);
  }
}
