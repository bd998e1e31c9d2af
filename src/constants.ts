export const SYMBOLS = {
  BRANCH: '├── ',
  LAST_BRANCH: '└── ',
  INDENT: '│   ',
  INDENT_EMPTY: '    ',
  EXPANDED: '[-]',
  COLLAPSED: '[+]',
};

export const DEFAULT_ICONS = {
  SELECTED: '◉',
  PARTIAL: '◐',
  UNSELECTED: '◯',
};

export const DEFAULT_COLORS = {
  SELECTED: 'green',
  UNSELECTED: 'gray',
};

export const DEFAULT_EXCLUDES = [
  '.git',
  'node_modules',
  '__pycache__',
  '.venv',
  '.mypy_cache',
];

export const DEFAULT_OUTPUT_FILE = 'FILETREE.md';
export const DEFAULT_MAX_BYTES = 300_000;
export const IGNORE_FILE = '.filetreeignore';

// Only this much of a file is inspected when deciding whether it is binary.
export const SNIFF_BYTES = 8192;

export const OutputSymbols = {
  TITLE: '# File Tree for ',
  SEPARATOR: '---',
  CONTENTS_HEADING: '## Selected files',
  FILE_HEADING: '### ',
  FENCE: '```',
  BINARY_NOTICE: '_Binary file, content not embedded._',
};

export const EXT_LANG: Record<string, string> = {
  '.py': 'python',
  '.js': 'javascript',
  '.mjs': 'javascript',
  '.cjs': 'javascript',
  '.jsx': 'jsx',
  '.ts': 'typescript',
  '.tsx': 'tsx',
  '.json': 'json',
  '.yml': 'yaml',
  '.yaml': 'yaml',
  '.toml': 'toml',
  '.ini': 'ini',
  '.sh': 'bash',
  '.md': 'markdown',
  '.html': 'html',
  '.css': 'css',
  '.go': 'go',
  '.rs': 'rust',
  '.java': 'java',
  '.c': 'c',
  '.h': 'c',
  '.cpp': 'cpp',
  '.hpp': 'cpp',
  '.rb': 'ruby',
  '.php': 'php',
  '.sql': 'sql',
};
