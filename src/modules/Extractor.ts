import { load } from 'cheerio';
import type { AnyNode } from 'domhandler';
import { logger, RuleSetChoice } from '../config';
import { FieldValue, RecordFields, RecordInput } from '../types';
import { MalformedDocumentError, errorMessage } from '../utils/errors';
import { canonicalizeUrl } from '../utils/url';
import { FieldRule, KeyRule, LinkFallback, Locator, RuleSet, detectRuleSet, ruleSets } from './ruleSets';

type CheerioRoot = ReturnType<typeof load>;
type CheerioNode = AnyNode;

export type ExtractedRecord = RecordInput;

export interface ExtractOptions {
  /** Address of the captured page, used to resolve relative links */
  baseUrl?: string;
  onDrop?: (reason: string, index: number) => void;
}

const MARKUP = /<[a-zA-Z!?/]/;

export function resolveRuleSet(choice: RuleSetChoice, html: string, urlHint?: string): RuleSet {
  return choice === 'auto' ? detectRuleSet(html, urlHint) : ruleSets[choice];
}

/**
 * Parses `html` with `ruleSet` and returns a single-pass sequence of candidate records.
 * Only a document without any markup is rejected, and that happens before the first
 * record is requested. Missing fields fall back to their defaults; candidates whose
 * key cannot be built are dropped and reported through `onDrop`.
 */
export function extractRecords(
  html: string,
  ruleSet: RuleSet,
  options: ExtractOptions = {}
): Generator<ExtractedRecord> {
  if (!MARKUP.test(html)) {
    throw new MalformedDocumentError('Document contains no markup');
  }

  const $ = load(html);
  const base = documentBase($, options.baseUrl ?? ruleSet.baseUrl);
  const items = selectItems($, ruleSet);

  logger.debug({ ruleSet: ruleSet.name, items: items.length }, 'Selected candidate elements');

  return generateRecords($, items, ruleSet, base, options.onDrop);
}

function* generateRecords(
  $: CheerioRoot,
  items: CheerioNode[],
  ruleSet: RuleSet,
  base: string | undefined,
  onDrop?: (reason: string, index: number) => void
): Generator<ExtractedRecord> {
  for (const [index, item] of items.entries()) {
    const values = new Map<string, FieldValue>();
    for (const rule of ruleSet.fields) {
      const value = extractField($, item, rule, base);
      if (value !== undefined) {
        values.set(rule.field, value);
      }
    }

    const naturalKey = buildKey(ruleSet.key, values);
    if (!naturalKey) {
      const reason = `missing key field (${ruleSet.key.from.join(', ')})`;
      logger.warn({ ruleSet: ruleSet.name, index, reason }, 'Dropped candidate record');
      onDrop?.(reason, index);
      continue;
    }

    yield toRecord(naturalKey, ruleSet, values);
  }
}

function toRecord(naturalKey: string, ruleSet: RuleSet, values: Map<string, FieldValue>): ExtractedRecord {
  const fields: RecordFields = {};
  for (const [name, value] of values) {
    if (name !== 'title' && name !== 'description' && name !== 'url') {
      fields[name] = value;
    }
  }

  const url = values.get('url');
  const title = asText(values.get('title'));

  return {
    naturalKey,
    kind: ruleSet.recordKind,
    title: title || fillTemplate(ruleSet.titleTemplate, values),
    description: asText(values.get('description')),
    sourceUrl: typeof url === 'string' && url ? url : null,
    fields,
  };
}

function asText(value: FieldValue | undefined): string {
  if (value === undefined) {
    return '';
  }
  return Array.isArray(value) ? value.join(', ') : value;
}

function fillTemplate(template: string | undefined, values: Map<string, FieldValue>): string {
  if (!template) {
    return '';
  }
  return template.replace(/\{(\w+)\}/g, (_placeholder, field: string) => asText(values.get(field)));
}

function buildKey(rule: KeyRule, values: Map<string, FieldValue>): string | null {
  const parts: string[] = [];

  for (const field of rule.from) {
    const text = asText(values.get(field)).trim();
    if (!text) {
      return null;
    }
    parts.push(text);
  }

  if (rule.canonicalUrl) {
    const canonical = canonicalizeUrl(parts.join(''));
    if (!canonical) {
      return null;
    }
    parts.splice(0, parts.length, canonical);
  }

  return rule.prefix ? [rule.prefix, ...parts].join(':') : parts.join(':');
}

function selectItems($: CheerioRoot, ruleSet: RuleSet): CheerioNode[] {
  for (const selector of ruleSet.items) {
    const matched = select(() => $(selector).toArray(), selector);
    if (matched.length > 0) {
      logger.debug({ ruleSet: ruleSet.name, selector, count: matched.length }, 'Item selector matched');
      return matched;
    }
  }

  if (ruleSet.linkFallback) {
    const links = keywordLinks($, ruleSet.linkFallback);
    logger.debug({ ruleSet: ruleSet.name, count: links.length }, 'Using keyword link fallback');
    return links;
  }

  return [];
}

function keywordLinks($: CheerioRoot, fallback: LinkFallback): CheerioNode[] {
  return $('a[href]')
    .toArray()
    .filter((node: CheerioNode) => {
      const text = $(node).text().trim().toLowerCase();
      const href = ($(node).attr('href') ?? '').toLowerCase();
      const relevant = fallback.keywords.some((keyword) => text.includes(keyword) || href.includes(keyword));
      return relevant && !fallback.exclude.some((word) => text.includes(word));
    })
    .slice(0, fallback.limit);
}

function extractField($: CheerioRoot, item: CheerioNode, rule: FieldRule, base?: string): FieldValue | undefined {
  for (const locator of rule.locators) {
    const nodes = locate($, item, locator);

    if (rule.multiple) {
      const values = nodes
        .flatMap((node) => splitValue(readValue($, node, locator, rule), rule.split))
        .map((value) => refineValue(value, rule, base))
        .filter((value): value is string => value !== undefined)
        .filter((value) => !rule.exclude?.test(value));
      if (values.length > 0) {
        return values;
      }
      continue;
    }

    for (const node of nodes) {
      const value = refineValue(readValue($, node, locator, rule), rule, base);
      if (value !== undefined && !rule.exclude?.test(value)) {
        return value;
      }
    }
  }

  return rule.default;
}

function locate($: CheerioRoot, item: CheerioNode, locator: Locator): CheerioNode[] {
  const { selector } = locator;
  if (!selector) {
    return [item];
  }
  if (locator.document) {
    return select(() => $(selector).toArray(), selector);
  }
  return select(() => $(item).find(selector).toArray(), selector);
}

function select(query: () => CheerioNode[], selector: string): CheerioNode[] {
  try {
    return query();
  } catch (error) {
    logger.debug({ selector, error: errorMessage(error) }, 'Invalid selector');
    return [];
  }
}

function readValue($: CheerioRoot, node: CheerioNode, locator: Locator, rule: FieldRule): string {
  if (locator.attr) {
    return $(node).attr(locator.attr) ?? '';
  }

  if (rule.ownText) {
    return $(node)
      .contents()
      .toArray()
      .filter((child: CheerioNode) => child.nodeType === 3)
      .map((child: CheerioNode) => $(child).text())
      .join(' ');
  }

  return $(node).text();
}

function splitValue(value: string, separator?: string): string[] {
  return separator ? value.split(separator) : [value];
}

function refineValue(raw: string, rule: FieldRule, base?: string): string | undefined {
  let value = raw.replace(/\s+/g, ' ').trim();

  if (rule.pattern) {
    const match = rule.pattern.exec(value);
    if (!match) {
      return undefined;
    }
    value = (match[1] ?? match[0]).trim();
  }

  if (rule.lowercase) {
    value = value.toLowerCase();
  }

  if (rule.absolute) {
    const resolved = canonicalizeUrl(value, base);
    if (!resolved) {
      return undefined;
    }
    value = resolved;
  }

  if (!value) {
    return undefined;
  }

  // The ellipsis counts towards the limit
  if (rule.maxLength !== undefined && value.length > rule.maxLength) {
    value = `${value.slice(0, Math.max(rule.maxLength - 3, 0))}...`;
  }

  return value;
}

// A <base href> in the document overrides the page address
function documentBase($: CheerioRoot, fallback?: string): string | undefined {
  const href = $('base[href]').first().attr('href');
  if (!href) {
    return fallback;
  }

  try {
    return new URL(href, fallback).toString();
  } catch (error) {
    logger.debug({ href, error: errorMessage(error) }, 'Ignoring unusable <base href>');
    return fallback;
  }
}
