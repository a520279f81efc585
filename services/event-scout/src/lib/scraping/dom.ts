import { JSDOM } from 'jsdom';
import { HTMLSanitizer } from './sanitizer.js';
import { errorMessage } from '../errors.js';

export function parseHtml(html: string, url?: string): Document {
  return new JSDOM(html, { url }).window.document;
}

export function splitSelectors(selectors: string): string[] {
  return selectors
    .split(', ')
    .map(selector => selector.trim())
    .filter(Boolean);
}

/** First element matching the selectors, tried in priority order. */
export function queryFirst(root: ParentNode, selectors: string): Element | null {
  for (const selector of splitSelectors(selectors)) {
    try {
      const element = root.querySelector(selector);
      if (element) {
        return element;
      }
    } catch (error) {
      console.warn(`[DOM] Unsupported selector "${selector}":`, errorMessage(error));
    }
  }
  return null;
}

/** The first selector of the list that matches something under `root`. */
export function firstMatchingSelector(root: ParentNode, selectors: string): string | null {
  for (const selector of splitSelectors(selectors)) {
    try {
      if (root.querySelector(selector)) {
        return selector;
      }
    } catch (error) {
      console.warn(`[DOM] Unsupported selector "${selector}":`, errorMessage(error));
    }
  }
  return null;
}

export function queryAll(root: ParentNode, selectors: string): Element[] {
  try {
    return Array.from(root.querySelectorAll(selectors));
  } catch (error) {
    console.warn(`[DOM] Unsupported selector list "${selectors}":`, errorMessage(error));
    return [];
  }
}

export function textOf(element: Element | null): string | null {
  if (!element) {
    return null;
  }
  const text = HTMLSanitizer.cleanWhitespace(element.textContent || '');
  return text || null;
}

/** Text of the first selector in the list that yields non-empty text. */
export function extractText(root: ParentNode, selectors: string): string | null {
  for (const selector of splitSelectors(selectors)) {
    const text = textOf(queryFirst(root, selector));
    if (text) {
      return text;
    }
  }
  return null;
}

/** Like extractText, but a `datetime` attribute wins over element text. */
export function extractDate(root: ParentNode, selectors: string): string | null {
  for (const selector of splitSelectors(selectors)) {
    const element = queryFirst(root, selector);
    if (!element) {
      continue;
    }
    const datetime = element.getAttribute('datetime');
    if (datetime && datetime.trim()) {
      return datetime.trim();
    }
    const text = textOf(element);
    if (text) {
      return text;
    }
  }
  return null;
}

export function extractAttribute(root: ParentNode, selectors: string, attribute: string): string | null {
  for (const selector of splitSelectors(selectors)) {
    const value = queryFirst(root, selector)?.getAttribute(attribute);
    if (value && value.trim()) {
      return value.trim();
    }
  }
  return null;
}
