import { load } from 'cheerio';
import { hasChildren, isText, type AnyNode } from 'domhandler';

const HIDDEN = 'script, style, noscript, template';

function collectText(nodes: AnyNode[], out: string[]): void {
  for (const node of nodes) {
    if (isText(node)) {
      const text = node.data.trim();
      if (text) out.push(text);
    } else if (hasChildren(node)) {
      collectText(node.children, out);
    }
  }
}

/**
 * Visible text of an HTML document: every text node in document order,
 * trimmed, joined with a single space. Script and style contents are dropped.
 */
export function extractHtmlText(html: string): string {
  const $ = load(html);
  $(HIDDEN).remove();
  const chunks: string[] = [];
  collectText($.root().toArray(), chunks);
  return chunks.join(' ');
}
