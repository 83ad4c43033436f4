import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import {
  detectLanguageId,
  getLanguageId,
  PLAINTEXT_LANGUAGE_ID,
} from '../src/service/language-map.js';

const knownMappings: ReadonlyArray<readonly [string, string]> = [
  ['/src/main.rs', 'rust'],
  ['/project/Cargo.toml', 'toml'],
  ['/project/tool.py', 'python'],
  ['/web/app.ts', 'typescript'],
  ['/web/view.tsx', 'typescriptreact'],
  ['/web/view.jsx', 'javascriptreact'],
  ['/svc/main.go', 'go'],
  ['/scripts/run.sh', 'shellscript'],
  ['/scripts/run.zsh', 'shellscript'],
  ['/flake.nix', 'nix'],
  ['/ci/build.yml', 'yaml'],
  ['/ci/build.yaml', 'yaml'],
  ['/data/config.json', 'json'],
  ['/docs/README.md', 'markdown'],
  ['/native/lib.c', 'c'],
  ['/native/lib.h', 'cpp'],
  ['/native/lib.hpp', 'cpp'],
  ['/native/lib.cc', 'cpp'],
  ['/site/index.htm', 'html'],
  ['/db/schema.sql', 'sql'],
];

describe('language-map', () => {
  it('returns the expected language id for common paths', () => {
    for (const [filePath, expected] of knownMappings) {
      expect(detectLanguageId(filePath)).toBe(expected);
    }
  });

  it('falls back to plaintext for unknown or missing extensions', () => {
    expect(detectLanguageId('/foo/bar.xyz')).toBe(PLAINTEXT_LANGUAGE_ID);
    expect(detectLanguageId('/foo/LICENSE')).toBe('plaintext');
    expect(detectLanguageId('/foo/.bashrc')).toBe('plaintext');
  });

  it('matches extensions case-insensitively', () => {
    expect(detectLanguageId('/foo/BAR.RS')).toBe('rust');
    expect(detectLanguageId('/foo/Notes.Md')).toBe('markdown');
  });

  it('recognises Dockerfile and Makefile by name', () => {
    expect(detectLanguageId('/repo/Dockerfile')).toBe('dockerfile');
    expect(detectLanguageId('/repo/Makefile')).toBe('makefile');
  });

  it('handles extensions with and without a dot', () => {
    expect(getLanguageId('.rs')).toBe('rust');
    expect(getLanguageId('rs')).toBe('rust');
    expect(getLanguageId('.TOML')).toBe('toml');
  });

  it('returns undefined for an empty or unknown extension', () => {
    expect(getLanguageId('')).toBeUndefined();
    expect(getLanguageId('.unknown')).toBeUndefined();
  });

  it('property-based: never returns an empty label', () => {
    fc.assert(
      fc.property(fc.string(), (name) => {
        expect(detectLanguageId(`/tmp/${name}`).length).toBeGreaterThan(0);
      }),
    );
  });
});
