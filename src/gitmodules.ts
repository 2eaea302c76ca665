import { GitModulesParseError } from './errors.js';
import type { GitSubmodule } from './types.js';

const SECTION_HEADER = /^\[\s*submodule\s+"(.*)"\s*\]$/;

/** Parse the contents of a .gitmodules file */
export function parseGitModules(text: string): GitSubmodule[] {
  const submodules: GitSubmodule[] = [];
  let current: GitSubmodule | undefined;

  const lines = text.split(/\r?\n/);
  for (let i = 0; i < lines.length; i++) {
    const lineNo = i + 1;
    const line = lines[i].trim();

    if (line === '' || line.startsWith('#') || line.startsWith(';')) {
      continue;
    }

    if (line.startsWith('[')) {
      current = { name: parseSectionName(line, lineNo), path: '', url: '' };
      submodules.push(current);
      continue;
    }

    if (!current) {
      throw new GitModulesParseError(lineNo, 'expected a [submodule "<name>"] section');
    }

    const { key, value } = parseEntry(line, lineNo);

    switch (key) {
      case 'path':
        current.path = value;
        break;
      case 'url':
        current.url = value;
        break;
      case 'branch':
        current.branch = value;
        break;
      default:
        // update, shallow, fetchRecurseSubmodules... are irrelevant here
        break;
    }
  }

  return submodules;
}

const KEY = /^[A-Za-z][A-Za-z0-9-]*$/;

/**
 * Split a `key = value` line. A key on its own is a boolean set to true.
 * Values follow git-config rules: double quotes group, backslash escapes,
 * and an unquoted `;` or `#` starts a comment.
 */
function parseEntry(line: string, lineNo: number): { key: string; value: string } {
  const end = line.search(/[=;#]/);
  if (end === -1 || line[end] !== '=') {
    const key = (end === -1 ? line : line.slice(0, end)).trim();
    return { key: checkKey(key, lineNo), value: 'true' };
  }
  return {
    key: checkKey(line.slice(0, end).trim(), lineNo),
    value: parseValue(line.slice(end + 1).trim(), lineNo),
  };
}

function checkKey(key: string, lineNo: number): string {
  if (!KEY.test(key)) {
    throw new GitModulesParseError(lineNo, `invalid key "${key}"`);
  }
  return key;
}

const ESCAPES: Readonly<Record<string, string | undefined>> = { '"': '"', '\\': '\\', n: '\n', t: '\t', b: '\b' };

function parseValue(raw: string, lineNo: number): string {
  let value = '';
  // length of `value` without unquoted trailing whitespace
  let kept = 0;
  let quoted = false;

  for (let i = 0; i < raw.length; i++) {
    const ch = raw[i];
    if (ch === '\\') {
      const escaped = ESCAPES[raw[i + 1] ?? ''];
      if (escaped === undefined) {
        throw new GitModulesParseError(lineNo, 'invalid escape sequence in value');
      }
      value += escaped;
      kept = value.length;
      i++;
    } else if (ch === '"') {
      quoted = !quoted;
      kept = value.length;
    } else if (!quoted && (ch === ';' || ch === '#')) {
      break;
    } else {
      value += ch;
      if (quoted || !/\s/.test(ch)) {
        kept = value.length;
      }
    }
  }

  if (quoted) {
    throw new GitModulesParseError(lineNo, 'unterminated quoted value');
  }
  return value.slice(0, kept);
}

function parseSectionName(line: string, lineNo: number): string {
  if (!/^\[\s*submodule\b/.test(line)) {
    throw new GitModulesParseError(lineNo, `unexpected section ${line}`);
  }
  const match = SECTION_HEADER.exec(line);
  if (!match) {
    throw new GitModulesParseError(lineNo, 'expected submodule name to be a quoted string');
  }
  return match[1];
}

/** Normalise a submodule path so it compares equal to a directory entry name */
export function normalizeSubmodulePath(path: string): string {
  return path.replace(/^(\.\/)+/, '').replace(/\/+$/, '');
}
