/**
 * Org to HTML rendering
 *
 * unified pipeline: uniorg-parse -> uniorg-rehype -> note link rewriting -> rehype-stringify.
 * `[[id:X][T]]` renders as `<a href="{basePath}/X">T</a>`; links leaving the
 * site get an external marker in front of their text.
 */

import type { Element, Root, Text } from 'hast';
import rehypeStringify from 'rehype-stringify';
import { unified, type Plugin } from 'unified';
import uniorgParse from 'uniorg-parse';
import uniorg2rehype from 'uniorg-rehype';
import { visit } from 'unist-util-visit';
import { RenderError, describeCause } from './errors.js';

/** Base path used for id links when none is given */
export const DEFAULT_BASE_PATH = '/zk';

/** Marker put in front of external link text */
export const EXTERNAL_LINK_PREFIX = '🗗 ';

export interface RenderOptions {
  /** Path prefix for id links, e.g. `/zk` or `/note` */
  basePath?: string;
  /** Public base URL of the site; links under it are not external */
  siteBaseUrl?: string;
}

/** Trim whitespace and trailing slashes; empty becomes the default base path */
export function normalizeBasePath(basePath?: string): string {
  const trimmed = (basePath ?? '').trim().replace(/\/+$/, '');
  return trimmed || DEFAULT_BASE_PATH;
}

function parseAbsoluteUrl(raw: string): URL | undefined {
  for (const candidate of [raw, `https://${raw}`]) {
    try {
      const parsed = new URL(candidate);
      if (parsed.host) return parsed;
    } catch {
      // try the next form
    }
  }
  return undefined;
}

function isSiteLink(href: string, siteBaseUrl?: string): boolean {
  const base = siteBaseUrl?.trim().replace(/\/+$/, '');
  if (!base) return false;
  if (href.startsWith(base)) return true;

  const parsedBase = parseAbsoluteUrl(base);
  if (!parsedBase || !/^[a-z][a-z0-9+.-]*:\/\//i.test(href)) return false;
  const parsedHref = parseAbsoluteUrl(href);
  if (!parsedHref || parsedHref.host.toLowerCase() !== parsedBase.host.toLowerCase()) {
    return false;
  }

  const basePath = parsedBase.pathname.replace(/\/+$/, '');
  if (!basePath) return true;
  return parsedHref.pathname === basePath || parsedHref.pathname.startsWith(`${basePath}/`);
}

export function isExternalLink(href: string, siteBaseUrl?: string): boolean {
  const trimmed = href.trim();
  if (!trimmed || trimmed.startsWith('#')) return false;
  // root-relative paths are served by the site itself
  if (trimmed.startsWith('/') && !trimmed.startsWith('//')) return false;
  return !isSiteLink(trimmed, siteBaseUrl);
}

function hasExternalPrefix(link: Element): boolean {
  const first = link.children[0];
  return first?.type === 'text' && first.value.startsWith(EXTERNAL_LINK_PREFIX.trim());
}

interface NoteLinkOptions {
  basePath: string;
  siteBaseUrl?: string;
}

const rehypeNoteLinks: Plugin<[NoteLinkOptions], Root> = function (options) {
  return (tree) => {
    visit(tree, 'element', (node: Element) => {
      if (node.tagName !== 'a') return;
      const href = node.properties.href;
      if (typeof href !== 'string') return;

      if (/^id:/i.test(href)) {
        node.properties.href = `${options.basePath}/${href.slice(3)}`;
        return;
      }

      if (isExternalLink(href, options.siteBaseUrl) && !hasExternalPrefix(node)) {
        const marker: Text = { type: 'text', value: EXTERNAL_LINK_PREFIX };
        node.children.unshift(marker);
      }
    });
  };
};

/**
 * Render an Org body to HTML.
 * @throws RenderError when the pipeline fails
 */
export function renderOrgToHtml(body: string, options: RenderOptions = {}): string {
  try {
    const file = unified()
      .use(uniorgParse)
      .use(uniorg2rehype)
      .use(rehypeNoteLinks, {
        basePath: normalizeBasePath(options.basePath),
        siteBaseUrl: options.siteBaseUrl,
      })
      .use(rehypeStringify)
      .processSync(body);
    return String(file);
  } catch (err) {
    throw new RenderError(`failed to render org-mode content: ${describeCause(err)}`, { cause: err });
  }
}
