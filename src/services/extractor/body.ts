import type { CheerioAPI } from 'cheerio';
import type { AnyNode, Element } from 'domhandler';
import { isTag, isText } from 'domhandler';

import { DENSITY } from '../../config/constants.js';

import { clampText, sanitizeText } from '../../utils/sanitizer.js';
import { countWords } from '../../utils/text.js';

const POSITIVE_TAGS = new Set(['p', 'pre', 'blockquote', 'td']);
const BOILERPLATE_TAGS = new Set(['nav', 'footer', 'header', 'aside', 'form']);
const EXCEPTION_TAGS = new Set(['blockquote', 'figcaption', 'caption']);

export const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'address',
  'article',
  'aside',
  'blockquote',
  'caption',
  'dd',
  'div',
  'dl',
  'dt',
  'figcaption',
  'figure',
  'footer',
  'form',
  'h1',
  'h2',
  'h3',
  'h4',
  'h5',
  'h6',
  'header',
  'hr',
  'li',
  'main',
  'nav',
  'ol',
  'p',
  'pre',
  'section',
  'table',
  'tbody',
  'td',
  'tfoot',
  'th',
  'thead',
  'tr',
  'ul',
]);

const SKIPPED_TAGS = new Set(['script', 'style', 'noscript', 'template']);

export interface BodyOptions {
  densityDecay: number;
  minBodyScore: number;
  minWordsPerBlock: number;
  maxText: number;
  keepArticleHtml: boolean;
}

export interface BodyResult {
  root: Element | null;
  score: number;
  text: string;
  articleHtml: string;
}

function directText(element: Element): string {
  return element.children
    .filter(isText)
    .map((child) => child.data)
    .join(' ');
}

function tagWeight(tagName: string, inBoilerplate: boolean): number {
  if (inBoilerplate) return DENSITY.BOILERPLATE_WEIGHT;
  return POSITIVE_TAGS.has(tagName)
    ? DENSITY.POSITIVE_TAG_WEIGHT
    : DENSITY.NEUTRAL_TAG_WEIGHT;
}

/**
 * Accumulated density score per element. Each text-bearing element outside
 * a link scores words x tag weight; its parent receives the full score and
 * every further ancestor up to `<body>` one more factor of `decay`.
 */
export function scoreElements(
  body: Element,
  decay: number
): Map<Element, number> {
  const scores = new Map<Element, number>();
  const ancestors: Element[] = [];

  const propagate = (score: number): void => {
    for (let level = 0; level < ancestors.length; level++) {
      const ancestor = ancestors[ancestors.length - 1 - level];
      if (!ancestor) continue;
      const current = scores.get(ancestor) ?? 0;
      scores.set(ancestor, current + score * decay ** level);
    }
  };

  const visit = (element: Element, inBoilerplate: boolean): void => {
    const tagName = element.tagName.toLowerCase();
    if (tagName === 'a' || SKIPPED_TAGS.has(tagName)) return;

    const boilerplate = inBoilerplate || BOILERPLATE_TAGS.has(tagName);
    const words = countWords(directText(element));
    if (words > 0) propagate(words * tagWeight(tagName, boilerplate));

    ancestors.push(element);
    for (const child of element.children) {
      if (isTag(child)) visit(child, boilerplate);
    }
    ancestors.pop();
  };

  visit(body, false);
  return scores;
}

function selectRoot(
  candidates: readonly Element[],
  scores: ReadonlyMap<Element, number>
): { root: Element | null; score: number } {
  let root: Element | null = null;
  let best = Number.NEGATIVE_INFINITY;
  for (const candidate of candidates) {
    const score = scores.get(candidate);
    if (score !== undefined && score > best) {
      root = candidate;
      best = score;
    }
  }
  return { root, score: root ? best : 0 };
}

interface Paragraph {
  text: string[];
  linkText: string[];
  exception: boolean;
  boilerplate: boolean;
}

interface WalkContext {
  inLink: boolean;
  exception: boolean;
  boilerplate: boolean;
}

function emptyParagraph(): Paragraph {
  return { text: [], linkText: [], exception: false, boilerplate: false };
}

class TextAssembler {
  private readonly paragraphs: string[] = [];
  private current: Paragraph = emptyParagraph();

  constructor(private readonly minWordsPerBlock: number) {}

  assemble(root: Element): string {
    this.walk(root, { inLink: false, exception: false, boilerplate: false });
    this.flush();
    return this.paragraphs.join('\n');
  }

  private walk(node: AnyNode, context: WalkContext): void {
    if (isText(node)) {
      this.append(node.data, context);
      return;
    }
    if (!isTag(node)) return;

    const tagName = node.tagName.toLowerCase();
    if (SKIPPED_TAGS.has(tagName)) return;
    if (tagName === 'br') {
      this.flush();
      return;
    }

    const childContext: WalkContext = {
      inLink: context.inLink || tagName === 'a',
      exception: context.exception || EXCEPTION_TAGS.has(tagName),
      boilerplate: context.boilerplate || BOILERPLATE_TAGS.has(tagName),
    };
    const isBlock = BLOCK_TAGS.has(tagName);

    if (isBlock) this.flush();
    for (const child of node.children) {
      this.walk(child, childContext);
    }
    if (isBlock) this.flush();
  }

  private append(data: string, context: WalkContext): void {
    this.current.text.push(data);
    if (!data.trim()) return;
    if (context.inLink) this.current.linkText.push(data);
    this.current.exception ||= context.exception;
    this.current.boilerplate ||= context.boilerplate;
  }

  private flush(): void {
    const paragraph = this.current;
    this.current = emptyParagraph();

    const text = sanitizeText(paragraph.text.join(''));
    if (!text || paragraph.boilerplate) return;

    const words = countWords(text);
    const linkWords = countWords(paragraph.linkText.join(' '));
    if (words > 0 && linkWords / words > DENSITY.MAX_LINK_DENSITY) return;

    if (paragraph.exception || words >= this.minWordsPerBlock) {
      this.paragraphs.push(text);
    }
  }
}

/**
 * Locates the densest subtree of a cleaned document and assembles its
 * paragraphs. A document whose best score stays under `minBodyScore`
 * yields empty text rather than a guess.
 */
export function extractBody($: CheerioAPI, options: BodyOptions): BodyResult {
  const body = $('body').first().get(0);
  if (!body) return { root: null, score: 0, text: '', articleHtml: '' };

  const scores = scoreElements(body, options.densityDecay);
  const candidates = [body, ...$(body).find('*').toArray()];
  const { root, score } = selectRoot(candidates, scores);

  if (!root || score < options.minBodyScore) {
    return { root: null, score, text: '', articleHtml: '' };
  }

  const text = new TextAssembler(options.minWordsPerBlock).assemble(root);
  return {
    root,
    score,
    text: clampText(text, options.maxText),
    articleHtml: options.keepArticleHtml ? $.html(root) : '',
  };
}
