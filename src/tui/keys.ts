export type InputMode =
  | { kind: 'normal' }
  | { kind: 'tag-entry'; buffer: string }
  | { kind: 'feed-entry'; buffer: string }
  | { kind: 'opml-import'; buffer: string }
  | { kind: 'opml-export'; buffer: string }
  | { kind: 'bookmark-prefix' };

export type TextEntryMode = Extract<InputMode, { buffer: string }>;

export const NORMAL_MODE: InputMode = { kind: 'normal' };

export function isTextEntry(mode: InputMode): mode is TextEntryMode {
  return 'buffer' in mode;
}

export type AppAction =
  | { type: 'quit' }
  | { type: 'move-up' }
  | { type: 'move-down' }
  | { type: 'move-top' }
  | { type: 'move-bottom' }
  | { type: 'select' }
  | { type: 'refresh' }
  | { type: 'open' }
  | { type: 'email' }
  | { type: 'bookmark' }
  | { type: 'bookmark-prefix' }
  | { type: 'quick-bookmark'; tag: string }
  | { type: 'cancel-prefix' }
  | { type: 'regenerate' }
  | { type: 'delete-article' }
  | { type: 'delete-feed' }
  | { type: 'undelete' }
  | { type: 'add-feed' }
  | { type: 'import-opml' }
  | { type: 'export-opml' }
  | { type: 'show-help' }
  | { type: 'hide-help' }
  | { type: 'input-char'; char: string }
  | { type: 'input-backspace' }
  | { type: 'input-confirm' }
  | { type: 'input-cancel' };

/** The subset of a readline keypress the shell looks at. */
export interface KeyPress {
  /** Printable text the key produced, if any. */
  input?: string;
  name?: string;
  ctrl?: boolean;
  meta?: boolean;
}

// Space, then one of these, bookmarks with a preset tag
export const QUICK_TAGS: Record<string, string> = {
  t: 'twit',
  i: 'im',
  m: 'mbw',
};

const NORMAL_KEYS: Record<string, AppAction> = {
  q: { type: 'quit' },
  j: { type: 'move-down' },
  k: { type: 'move-up' },
  '<': { type: 'move-top' },
  '>': { type: 'move-bottom' },
  r: { type: 'refresh' },
  o: { type: 'open' },
  e: { type: 'email' },
  b: { type: 'bookmark' },
  ' ': { type: 'bookmark-prefix' },
  g: { type: 'regenerate' },
  d: { type: 'delete-article' },
  D: { type: 'delete-feed' },
  u: { type: 'undelete' },
  a: { type: 'add-feed' },
  i: { type: 'import-opml' },
  w: { type: 'export-opml' },
  '?': { type: 'show-help' },
};

function isEnter(key: KeyPress): boolean {
  return key.name === 'return' || key.name === 'enter';
}

function printable(key: KeyPress): string | null {
  if (key.ctrl || key.meta || !key.input || key.input.length !== 1) return null;
  return key.input >= ' ' && key.input !== '\x7f' ? key.input : null;
}

export function resolveAction(key: KeyPress, mode: InputMode, showHelp: boolean): AppAction | null {
  if (key.ctrl && key.name === 'c') {
    return { type: 'quit' };
  }

  if (showHelp) {
    return { type: 'hide-help' };
  }

  if (mode.kind === 'bookmark-prefix') {
    const tag = key.input ? QUICK_TAGS[key.input] : undefined;
    return tag ? { type: 'quick-bookmark', tag } : { type: 'cancel-prefix' };
  }

  if (isTextEntry(mode)) {
    if (isEnter(key)) return { type: 'input-confirm' };
    if (key.name === 'escape') return { type: 'input-cancel' };
    if (key.name === 'backspace') return { type: 'input-backspace' };
    const char = printable(key);
    return char ? { type: 'input-char', char } : null;
  }

  if (isEnter(key)) return { type: 'select' };
  if (key.name === 'down') return { type: 'move-down' };
  if (key.name === 'up') return { type: 'move-up' };
  if (key.name === 'backspace') return { type: 'delete-article' };

  const char = printable(key);
  return char ? (NORMAL_KEYS[char] ?? null) : null;
}
