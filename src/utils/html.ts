/**
 * HTML Cleaning
 *
 * Post bodies arrive as HTML from the rich-text editor. Only the editor's
 * tag set survives; links must be absolute http(s) URLs and inline images
 * must be served by our own API.
 */

import sanitizeHtml from 'sanitize-html';
import { getApiBaseUrl } from '@/utils/config';
import { logger } from '@/utils/logger';

export const ALLOWED_HTML_TAGS = [
  'a', 'b', 'br', 'center', 'div', 'em', 'font', 'h1', 'h2', 'h3', 'h4',
  'h5', 'h6', 'header', 'i', 'img', 'li', 'ol', 'p', 'small', 'span',
  'strong', 'u', 'ul',
];

const ALLOWED_ATTRIBUTES: Record<string, string[]> = {
  a: ['href', 'hreflang'],
  img: ['alt', 'height', 'src', 'width'],
  font: ['face', 'size'],
};

export function isHttpUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return (url.protocol === 'http:' || url.protocol === 'https:') && url.hostname.length > 0;
  } catch {
    return false;
  }
}

function filterUrlAttribute(attribute: 'href' | 'src'): sanitizeHtml.Transformer {
  return (tagName, attribs) => {
    const value = attribs[attribute];
    if (value === undefined) {
      return { tagName, attribs };
    }

    const { [attribute]: _dropped, ...rest } = attribs;

    if (!isHttpUrl(value)) {
      logger.warn('Dropped invalid URL from post HTML', { tag: tagName, value });
      return { tagName, attribs: rest };
    }

    if (tagName === 'img' && !value.startsWith(getApiBaseUrl())) {
      logger.warn('Dropped foreign image source from post HTML', { value });
      return { tagName, attribs: rest };
    }

    return { tagName, attribs };
  };
}

export function cleanHtml(html: string): string {
  return sanitizeHtml(html, {
    allowedTags: ALLOWED_HTML_TAGS,
    allowedAttributes: ALLOWED_ATTRIBUTES,
    allowedSchemes: ['http', 'https'],
    allowProtocolRelative: false,
    disallowedTagsMode: 'discard',
    transformTags: {
      a: filterUrlAttribute('href'),
      img: filterUrlAttribute('src'),
    },
  });
}
