import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { hasChildren, isComment, isTag, isText } from 'domhandler';

import { BLOCK_TAGS } from './extractor/body.js';
import { isVideoUrl } from './extractor/media.js';

const STRUCTURAL_TAGS = [
  'script',
  'style',
  'noscript',
  'template',
  'svg',
  'canvas',
  'button',
  'input',
  'select',
  'textarea',
] as const;

const INLINE_TAGS = [
  'em',
  'i',
  'b',
  'strong',
  'span',
  'font',
  'u',
  'small',
  'mark',
  'abbr',
  'cite',
] as const;

const CONTAINER_TAGS = new Set(['div', 'section', 'article', 'main']);

const PROTECTED_TAGS = new Set(['html', 'head', 'body']);

const MEDIA_SELECTOR = 'img, video, iframe, embed, object, picture';
const MEDIA_TAGS = new Set([
  'img',
  'video',
  'iframe',
  'embed',
  'object',
  'picture',
  'source',
  'br',
  'hr',
]);

const NOISE_ROLES = new Set([
  'navigation',
  'banner',
  'contentinfo',
  'complementary',
  'dialog',
  'alertdialog',
  'menu',
  'menubar',
  'search',
]);

const NOISE_TOKENS = [
  'ad',
  'ads',
  'advert',
  'advertisement',
  'banner',
  'promo',
  'sponsor',
  'sponsored',
  'newsletter',
  'subscribe',
  'cookie',
  'consent',
  'popup',
  'modal',
  'share',
  'sharing',
  'social',
  'related',
  'recommend',
  'recommended',
  'comment',
  'comments',
  'breadcrumb',
  'breadcrumbs',
  'pagination',
  'pager',
  'sidebar',
  'widget',
  'footer',
  'navbar',
  'menu',
  'masthead',
  'outbrain',
  'taboola',
] as const;

const HIDDEN_STYLE = /\bdisplay\s*:\s*none\b/i;

class NoiseClassifier {
  private readonly tokens: ReadonlySet<string> = new Set(NOISE_TOKENS);

  isNoise(element: Element): boolean {
    const tagName = element.tagName.toLowerCase();
    if (PROTECTED_TAGS.has(tagName)) return false;

    return (
      this.isHidden(element) ||
      this.hasNoiseRole(element) ||
      this.hasNoiseToken(element)
    );
  }

  private isHidden(element: Element): boolean {
    const { attribs } = element;
    return (
      attribs.hidden !== undefined ||
      attribs['aria-hidden'] === 'true' ||
      HIDDEN_STYLE.test(attribs.style ?? '')
    );
  }

  private hasNoiseRole(element: Element): boolean {
    const role = element.attribs.role?.trim().toLowerCase();
    return role !== undefined && NOISE_ROLES.has(role);
  }

  private hasNoiseToken(element: Element): boolean {
    const { attribs } = element;
    const combined = [attribs.class, attribs.id, attribs.name]
      .filter((value): value is string => value !== undefined)
      .join(' ')
      .toLowerCase();
    if (!combined) return false;

    return combined
      .split(/[^a-z0-9]+/)
      .some((token) => this.tokens.has(token));
  }
}

function collectComments(node: AnyNode, found: AnyNode[]): void {
  if (isComment(node)) {
    found.push(node);
    return;
  }
  if (!hasChildren(node)) return;
  for (const child of node.children) {
    collectComments(child, found);
  }
}

function hasDirectText(element: Element): boolean {
  return element.children.some(
    (child) => isText(child) && child.data.trim().length > 0
  );
}

/**
 * Strips non-content markup from a private copy of the document so the body
 * extractor only sees text-bearing structure. The caller's tree is never
 * touched.
 */
export class DocumentCleaner {
  private readonly classifier = new NoiseClassifier();

  clean(html: string): CheerioAPI {
    const $ = cheerio.load(html);

    this.removeComments($);
    this.removeStructural($);
    this.removeNoise($);
    this.unwrapInline($);
    this.wrapLooseText($);
    this.removeEmpty($);
    this.collapseContainers($);

    return $;
  }

  private removeComments($: CheerioAPI): void {
    const comments: AnyNode[] = [];
    for (const node of $.root().toArray()) {
      collectComments(node, comments);
    }
    for (const comment of comments) {
      $(comment).remove();
    }
  }

  private removeStructural($: CheerioAPI): void {
    $(STRUCTURAL_TAGS.join(', ')).remove();

    for (const iframe of $('iframe').toArray()) {
      if (!isVideoUrl($(iframe).attr('src') ?? '')) $(iframe).remove();
    }
  }

  private removeNoise($: CheerioAPI): void {
    for (const element of $('body *').toArray()) {
      if (this.classifier.isNoise(element)) $(element).remove();
    }
  }

  private unwrapInline($: CheerioAPI): void {
    for (const element of $(INLINE_TAGS.join(', ')).toArray()) {
      const $element = $(element);
      $element.replaceWith($element.contents());
    }
  }

  /** Runs of text and inline nodes sitting directly in `<body>` become paragraphs. */
  private wrapLooseText($: CheerioAPI): void {
    const body = $('body').get(0);
    if (!body) return;

    let run: AnyNode[] = [];
    const wrap = (): void => {
      const first = run[0];
      if (first && run.some((node) => $(node).text().trim().length > 0)) {
        const $paragraph = $('<p></p>');
        $(first).before($paragraph);
        $paragraph.append(run);
      }
      run = [];
    };

    for (const child of [...body.children]) {
      if (isTag(child) && BLOCK_TAGS.has(child.tagName.toLowerCase())) {
        wrap();
      } else {
        run.push(child);
      }
    }
    wrap();
  }

  private removeEmpty($: CheerioAPI): void {
    const elements = $('body *').toArray().reverse();
    for (const element of elements) {
      if (MEDIA_TAGS.has(element.tagName.toLowerCase())) continue;
      const $element = $(element);
      if ($element.text().trim().length > 0) continue;
      if ($element.find(MEDIA_SELECTOR).length > 0) continue;
      $element.remove();
    }
  }

  private collapseContainers($: CheerioAPI): void {
    const elements = $('body *').toArray().reverse();
    for (const element of elements) {
      if (!CONTAINER_TAGS.has(element.tagName.toLowerCase())) continue;
      if (hasDirectText(element)) continue;

      const childElements = element.children.filter(isTag);
      const onlyChild = childElements[0];
      if (childElements.length !== 1 || !onlyChild) continue;
      if (!CONTAINER_TAGS.has(onlyChild.tagName.toLowerCase())) continue;

      $(element).replaceWith(onlyChild);
    }
  }
}

const defaultCleaner = new DocumentCleaner();

export function cleanDocument(html: string): CheerioAPI {
  return defaultCleaner.clean(html);
}
