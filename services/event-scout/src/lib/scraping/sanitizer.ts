import { JSDOM } from 'jsdom';
import DOMPurify from 'dompurify';
import type { Profile } from '../../types/events.js';

type Purifier = ReturnType<typeof DOMPurify>;

export class HTMLSanitizer {
  private static purifier: Purifier | null = null;

  private static getPurifier(): Purifier {
    if (!this.purifier) {
      const window = new JSDOM('').window;
      this.purifier = DOMPurify(window);
    }
    return this.purifier;
  }

  /**
   * Strip all markup and return the visible text. Script and style bodies are
   * dropped; element boundaries become single spaces.
   */
  static extractText(html: string): string {
    try {
      return this.cleanWhitespace(this.stripTags(html.replace(/</g, ' <')));
    } catch (error) {
      console.error('Error extracting text from HTML:', error);
      return '';
    }
  }

  /** Remove every tag and attribute, keeping text content as plain characters. */
  static stripTags(input: string): string {
    const sanitized = this.getPurifier().sanitize(input, {
      ALLOWED_TAGS: [],
      ALLOWED_ATTR: [],
      KEEP_CONTENT: true
    });
    return decodeEntities(sanitized);
  }

  static extractMetadata(document: Document): Record<string, string> {
    const metadata: Record<string, string> = {};

    document.querySelectorAll('meta').forEach(meta => {
      const name = meta.getAttribute('name') || meta.getAttribute('property');
      const content = meta.getAttribute('content');

      if (name && content) {
        metadata[name] = content.trim();
      }
    });

    const title = document.querySelector('title');
    if (title) {
      metadata.title = this.cleanWhitespace(title.textContent || '');
    }

    const canonical = document.querySelector('link[rel="canonical"]');
    if (canonical) {
      metadata.canonical = canonical.getAttribute('href') || '';
    }

    return metadata;
  }

  static cleanWhitespace(text: string): string {
    return text.replace(/\s+/g, ' ').trim();
  }
}

const ENTITIES: Record<string, string> = {
  '&amp;': '&',
  '&lt;': '<',
  '&gt;': '>',
  '&quot;': '"',
  '&#39;': "'",
  '&nbsp;': ' '
};

function decodeEntities(text: string): string {
  return text.replace(/&(?:amp|lt|gt|quot|#39|nbsp);/g, entity => ENTITIES[entity] ?? entity);
}

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

export interface EventDraft {
  title?: string;
  url?: string;
  date?: string;
  location?: string;
  description?: string;
  speakers: Profile[];
  sponsors: Profile[];
}

export class ContentValidator {
  static validateEventDraft(draft: EventDraft): ValidationResult {
    const result: ValidationResult = {
      isValid: true,
      errors: [],
      warnings: []
    };

    // Required fields
    if (!draft.title || draft.title.trim().length === 0) {
      result.errors.push('Event title is required');
      result.isValid = false;
    }

    if (!draft.url) {
      result.errors.push('Event URL is required');
      result.isValid = false;
    } else if (!this.isValidUrl(draft.url)) {
      result.errors.push('Invalid event URL format');
      result.isValid = false;
    }

    if (!draft.date) {
      result.warnings.push('Event date is missing');
    } else if (!this.isValidDate(draft.date)) {
      result.warnings.push('Event date is not machine readable');
    }

    if (draft.title && draft.title.length > 500) {
      result.warnings.push('Event title is unusually long');
    }

    if (draft.description && draft.description.length > 10000) {
      result.warnings.push('Event description is very long');
    }

    return result;
  }

  static isValidUrl(url: string): boolean {
    try {
      const parsed = new URL(url);
      return parsed.protocol === 'http:' || parsed.protocol === 'https:';
    } catch {
      return false;
    }
  }

  private static isValidDate(date: string): boolean {
    return !isNaN(Date.parse(date));
  }
}
