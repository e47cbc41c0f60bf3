import chalk from 'chalk';
import type { Article, Bookmark, Summary } from '../models/article.js';
import type { InputMode } from './keys.js';

export interface StatusMessage {
  text: string;
  level: 'info' | 'error';
  expiresAt: number;
}

export interface ScreenView {
  articles: Article[];
  selected: number;
  summary: Summary | null;
  bookmark: Bookmark | null;
  mode: InputMode;
  showHelp: boolean;
  status: StatusMessage | null;
  summarizingId: number | null;
  busy: { refresh: boolean; summarize: boolean; discover: boolean; bookmark: boolean };
  spinnerFrame: number;
}

const SPINNER = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FEED_COLUMN = 16;

const HELP_LINES = [
  'Navigation',
  '  j / ↓        next article',
  '  k / ↑        previous article',
  '  < / >        first / last article',
  '',
  'Articles',
  '  Enter        summarize (when no summary is stored)',
  '  g            regenerate summary',
  '  o            open in browser',
  '  e            email link',
  '  b            bookmark with tags',
  '  Space t/i/m  quick bookmark tagged twit / im / mbw',
  '  d / ⌫        delete article',
  '  u            undelete last deleted article',
  '',
  'Feeds',
  '  r            refresh all feeds',
  '  a            add feed (site or feed URL)',
  '  D            remove the selected article\'s feed',
  '  i / w        import / export OPML',
  '',
  '  q            quit',
  '',
  'Press any key to close',
];

/** Cuts or pads `text` to exactly `width` columns. */
export function fit(text: string, width: number): string {
  if (width <= 0) return '';
  const flat = text.replace(/\s+/g, ' ');
  if (flat.length > width) {
    return width === 1 ? '…' : `${flat.slice(0, width - 1)}…`;
  }
  return flat.padEnd(width);
}

/** Greedy word wrap; words longer than `width` are split. */
export function wrap(text: string, width: number): string[] {
  const lines: string[] = [];
  for (const paragraph of text.split('\n')) {
    let line = '';
    for (const word of paragraph.split(/\s+/).filter(Boolean)) {
      let rest = word;
      while (rest.length > width) {
        if (line) {
          lines.push(line);
          line = '';
        }
        lines.push(rest.slice(0, width));
        rest = rest.slice(width);
      }
      if (!rest) continue;
      if (!line) {
        line = rest;
      } else if (line.length + 1 + rest.length <= width) {
        line += ` ${rest}`;
      } else {
        lines.push(line);
        line = rest;
      }
    }
    lines.push(line);
  }
  return lines;
}

function formatDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

function articleDate(article: Article): Date {
  return article.published_at ?? article.fetched_at;
}

function header(view: ScreenView, width: number): string {
  const spinner = SPINNER[view.spinnerFrame % SPINNER.length];
  const activity = [
    view.busy.refresh ? 'refreshing' : null,
    view.busy.summarize ? 'summarizing' : null,
    view.busy.discover ? 'discovering' : null,
    view.busy.bookmark ? 'bookmarking' : null,
  ].filter((label): label is string => label !== null);

  const title = ` rss-triage  ${view.articles.length} articles `;
  const busy = activity.length > 0 ? ` ${spinner} ${activity.join(', ')}` : '';
  return chalk.inverse(fit(`${title}${busy}`, width));
}

function listLines(view: ScreenView, width: number, height: number): string[] {
  if (view.articles.length === 0) {
    return [chalk.dim(fit(' No articles. Press r to refresh, a to add a feed, ? for help.', width))];
  }

  const start = Math.max(0, Math.min(view.selected - Math.floor(height / 2), view.articles.length - height));
  return view.articles.slice(start, start + height).map((article, offset) => {
    const index = start + offset;
    const marker = view.summarizingId === article.id ? SPINNER[view.spinnerFrame % SPINNER.length] : ' ';
    const prefix = `${marker} ${formatDate(articleDate(article))} ${fit(article.feed_title, FEED_COLUMN)} `;
    const line = `${prefix}${fit(article.title, width - prefix.length)}`;
    return index === view.selected ? chalk.inverse(line) : line;
  });
}

function detailLines(view: ScreenView, width: number): string[] {
  const article = view.articles[view.selected];
  if (!article) return [];

  const meta = [article.feed_title, article.author, formatDate(articleDate(article))]
    .filter((part): part is string => Boolean(part))
    .join(' · ');
  const lines = [chalk.bold(fit(article.title, width)), chalk.cyan(fit(meta, width))];
  if (article.url) lines.push(chalk.dim(fit(article.url, width)));
  if (view.bookmark) {
    const tags = view.bookmark.tags.length > 0 ? ` [${view.bookmark.tags.join(', ')}]` : '';
    lines.push(chalk.yellow(fit(`★ Bookmarked${tags}`, width)));
  }
  lines.push('');

  if (view.summarizingId === article.id) {
    lines.push(chalk.dim(`${SPINNER[view.spinnerFrame % SPINNER.length]} Summarizing...`));
  } else if (view.summary) {
    lines.push(...wrap(view.summary.content, width));
    lines.push(chalk.dim(fit(`${view.summary.model_version}, ${formatDate(view.summary.generated_at)}`, width)));
  } else {
    lines.push(chalk.dim('Press Enter to summarize'));
  }
  return lines;
}

function footer(view: ScreenView, width: number): string {
  switch (view.mode.kind) {
    case 'tag-entry':
      return fit(`Tags (comma separated): ${view.mode.buffer}▏`, width);
    case 'feed-entry':
      return fit(`Site or feed URL: ${view.mode.buffer}▏`, width);
    case 'opml-import':
      return fit(`Import OPML from: ${view.mode.buffer}▏`, width);
    case 'opml-export':
      return fit(`Export OPML to: ${view.mode.buffer}▏`, width);
    case 'bookmark-prefix':
      return fit('Quick bookmark: t twit · i im · m mbw · any other key cancels', width);
    case 'normal':
      break;
  }

  if (view.status) {
    const text = fit(view.status.text, width);
    return view.status.level === 'error' ? chalk.red(text) : chalk.green(text);
  }
  return chalk.dim(fit('? help · q quit', width));
}

/** Renders one full frame as exactly `rows` lines. */
export function renderScreen(view: ScreenView, columns: number, rows: number): string[] {
  const width = Math.max(20, columns);
  const bodyHeight = Math.max(4, rows - 2);

  let body: string[];
  if (view.showHelp) {
    body = HELP_LINES.map((line) => fit(line, width));
  } else {
    const listHeight = Math.max(3, Math.floor(bodyHeight / 2) - 1);
    const list = listLines(view, width, listHeight);
    while (list.length < listHeight) list.push('');
    body = [...list, chalk.dim('─'.repeat(width)), ...detailLines(view, width)];
  }

  body = body.slice(0, bodyHeight);
  while (body.length < bodyHeight) body.push('');
  return [header(view, width), ...body, footer(view, width)];
}
