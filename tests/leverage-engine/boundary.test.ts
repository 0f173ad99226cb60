import { describe, it, expect } from 'vitest';
import { readFileSync, readdirSync, statSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../..');
const srcDir = path.join(root, 'src');
const engineDir = path.join(srcDir, 'leverage-engine');

function sourceFiles(dir: string): string[] {
  return readdirSync(dir).flatMap((name) => {
    const full = path.join(dir, name);
    if (statSync(full).isDirectory()) return sourceFiles(full);
    return /\.tsx?$/.test(name) ? [full] : [];
  });
}

const IMPORT_PATTERN = /(?:import|export)[^'"]*?from\s+['"]([^'"]+)['"]|import\(\s*['"]([^'"]+)['"]\s*\)/g;

function importSpecifiers(file: string): string[] {
  const text = readFileSync(file, 'utf8');
  return [...text.matchAll(IMPORT_PATTERN)].map((m) => m[1] ?? m[2] ?? '');
}

describe('engine boundary', () => {
  it('is imported only through the @engine barrel outside the engine', () => {
    const violations: string[] = [];
    for (const file of sourceFiles(srcDir)) {
      if (file.startsWith(engineDir + path.sep)) continue;
      for (const specifier of importSpecifiers(file)) {
        const deep = specifier.startsWith('@engine/') || specifier.includes('leverage-engine');
        if (deep) violations.push(`${path.relative(root, file)} -> ${specifier}`);
      }
    }
    expect(violations).toEqual([]);
  });

  it('keeps the engine free of I/O and collaborator imports', () => {
    const forbidden = /^(fs|path|http|net|pg|express|ws|drizzle-orm|@desk|@api|@db|@ui)(\/|$)/;
    const offenders = sourceFiles(engineDir).flatMap((file) =>
      importSpecifiers(file)
        .filter((specifier) => forbidden.test(specifier.replace(/^node:/, '')))
        .map((specifier) => `${path.relative(root, file)} -> ${specifier}`),
    );
    expect(offenders).toEqual([]);
  });
});
