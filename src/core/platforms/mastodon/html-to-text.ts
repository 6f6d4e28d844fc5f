// src/core/platforms/mastodon/html-to-text.ts
import * as cheerio from 'cheerio';
import { isTag, isText, type AnyNode } from 'domhandler';

export class MastodonHtmlToText {
  /**
   * Convert status HTML to plain text: one blank line between paragraphs,
   * `<br>` as a newline, links reduced to their full text.
   */
  convert(html: string): string {
    const $ = cheerio.load(html, null, false);
    const paragraphs: string[] = [];
    let loose = '';

    $.root().contents().each((_, node) => {
      if (isTag(node) && node.tagName.toLowerCase() === 'p') {
        if (loose.trim()) {
          paragraphs.push(loose);
          loose = '';
        }
        paragraphs.push(this.inlineText(node));
      } else {
        loose += this.inlineText(node);
      }
    });

    if (loose.trim()) {
      paragraphs.push(loose);
    }

    return paragraphs
      .map(paragraph => this.cleanText(paragraph))
      .filter(paragraph => paragraph.length > 0)
      .join('\n\n');
  }

  private inlineText(node: AnyNode): string {
    if (isText(node)) {
      return node.data;
    }

    if (!isTag(node)) {
      return '';
    }

    if (node.tagName.toLowerCase() === 'br') {
      return '\n';
    }

    return node.children.map(child => this.inlineText(child)).join('');
  }

  private cleanText(text: string): string {
    return text
      .replace(/[ \t]+/g, ' ')
      .replace(/^ | $/gm, '')
      .trim();
  }
}

export const htmlToText = (html: string): string => new MastodonHtmlToText().convert(html);
