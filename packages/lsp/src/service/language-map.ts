import { basename, extname } from 'node:path';

export const PLAINTEXT_LANGUAGE_ID = 'plaintext';

const extensionToLanguageId: ReadonlyMap<string, string> = new Map<
  string,
  string
>([
  ['.rs', 'rust'],
  ['.toml', 'toml'],
  ['.json', 'json'],
  ['.yaml', 'yaml'],
  ['.yml', 'yaml'],
  ['.md', 'markdown'],
  ['.markdown', 'markdown'],
  ['.py', 'python'],
  ['.js', 'javascript'],
  ['.ts', 'typescript'],
  ['.jsx', 'javascriptreact'],
  ['.tsx', 'typescriptreact'],
  ['.c', 'c'],
  ['.cpp', 'cpp'],
  ['.cc', 'cpp'],
  ['.cxx', 'cpp'],
  ['.h', 'cpp'],
  ['.hpp', 'cpp'],
  ['.go', 'go'],
  ['.rb', 'ruby'],
  ['.sh', 'shellscript'],
  ['.bash', 'shellscript'],
  ['.zsh', 'shellscript'],
  ['.css', 'css'],
  ['.html', 'html'],
  ['.htm', 'html'],
  ['.xml', 'xml'],
  ['.sql', 'sql'],
  ['.nix', 'nix'],
]);

const basenameToLanguageId: ReadonlyMap<string, string> = new Map<
  string,
  string
>([
  ['dockerfile', 'dockerfile'],
  ['makefile', 'makefile'],
]);

export function getLanguageId(extension: string): string | undefined {
  if (!extension) {
    return undefined;
  }

  const normalized = extension.toLowerCase();
  return extensionToLanguageId.get(
    normalized.startsWith('.') ? normalized : `.${normalized}`,
  );
}

/**
 * Content-kind label sent with `textDocument/didOpen`.
 */
export function detectLanguageId(filePath: string): string {
  return (
    getLanguageId(extname(filePath)) ??
    basenameToLanguageId.get(basename(filePath).toLowerCase()) ??
    PLAINTEXT_LANGUAGE_ID
  );
}
