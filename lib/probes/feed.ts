import type { HttpClient } from '../deps';
import type { Color, Drawable } from '../drawables';
import { BaseProbe, type Size } from '../probe';

export interface FeedAccount {
  /** As configured, `user@instance` */
  handle: string;
  user: string;
  instance: string;
}

export interface FeedState {
  text: string;
}

export const NO_DATA = '(no data)';
const MIN_HEIGHT = 7;
const FALLBACK_WRAP = 30;

export function parseFeedAccount(raw: string): FeedAccount | null {
  const handle = raw.trim().replace(/^@/, '');
  const at = handle.indexOf('@');
  if (at <= 0 || at === handle.length - 1) return null;

  const user = handle.slice(0, at);
  const instance = handle.slice(at + 1);
  if (instance.includes('@') || instance.includes('/')) return null;

  return { handle, user, instance };
}

export function feedUrl(account: FeedAccount) {
  return `https://${account.instance}/@${encodeURIComponent(account.user)}.rss`;
}

const NAMED_ENTITIES: Record<string, string> = {
  amp: '&',
  lt: '<',
  gt: '>',
  quot: '"',
  apos: '\'',
  nbsp: ' ',
};

export function decodeEntities(text: string) {
  return text.replace(/&(#x[0-9a-f]+|#\d+|[a-z]+);/gi, (match, body: string) => {
    if (body.startsWith('#x') || body.startsWith('#X')) {
      return String.fromCodePoint(Number.parseInt(body.slice(2), 16));
    }
    if (body.startsWith('#')) {
      return String.fromCodePoint(Number.parseInt(body.slice(1), 10));
    }
    return NAMED_ENTITIES[body.toLowerCase()] ?? match;
  });
}

function stripTags(html: string) {
  return html
    .replace(/<br\s*\/?>|<\/p>/gi, ' ')
    .replace(/<[^>]*>/g, '');
}

/**
 * Plain text of the first item's description. Null when the feed has no items.
 */
export function firstItemText(xml: string): string | null {
  const item = /<item[\s>][\s\S]*?<\/item>/i.exec(xml);
  if (item === null) return null;

  const description = /<description>([\s\S]*?)<\/description>/i.exec(item[0]);
  let body = description?.[1] ?? '';

  const cdata = /^\s*<!\[CDATA\[([\s\S]*)\]\]>\s*$/.exec(body);
  if (cdata?.[1] !== undefined) {
    body = cdata[1];
  } else {
    // Escaped HTML inside plain XML text
    body = decodeEntities(body);
  }

  const text = decodeEntities(stripTags(body)).replace(/\s+/g, ' ').trim();
  return text.length > 0 ? text : null;
}

export function wrapWidth(width: number) {
  const wrap = width - 2;
  return wrap > 0 ? wrap : FALLBACK_WRAP;
}

export function feedHeight(text: string, width: number) {
  return Math.max(MIN_HEIGHT, 3 + Math.floor(text.length / wrapWidth(width)));
}

/**
 * Latest public post of one account
 */
export class FeedProbe extends BaseProbe<FeedState> {
  constructor(
    private readonly http: HttpClient,
    private readonly account: FeedAccount,
    private readonly textColor: Color,
    intervalMs: number,
  ) {
    super(`feed:${account.handle}`, { text: NO_DATA }, intervalMs);
  }

  protected async sample(): Promise<FeedState | null> {
    const url = feedUrl(this.account);
    const result = await this.http.get(url);

    if (!result.ok) {
      this.log.warn({ url, status: result.status, err: result.err }, 'Failed to load feed');
      return null;
    }

    const text = firstItemText(result.out);
    if (text === null) {
      this.log.info({ url }, 'Feed has no items');
      return null;
    }

    return { text };
  }

  protected view(state: FeedState, size: Size): Drawable {
    return {
      kind: 'text',
      height: feedHeight(state.text, size.width),
      border: true,
      title: [{ text: `@${this.account.handle}`, color: 'green' }],
      lines: [[{ text: state.text, color: this.textColor }]],
      wrap: wrapWidth(size.width),
    };
  }
}
