import { FieldValue, RecordKind } from '../types';

export type RuleSetName = 'upwork' | 'python-org' | 'generic' | 'chat';

// Element lookup relative to an item; no selector means the item element itself
export interface Locator {
  selector?: string;
  attr?: string;
  /** Searches the whole document instead of the item */
  document?: boolean;
}

export interface FieldRule {
  field: string;
  /** Tried in order; the first locator that yields a value wins */
  locators: Locator[];
  multiple?: boolean;
  /** Splits each matched text into several values (multiple fields only) */
  split?: string;
  /** Keeps the first capture group, or the whole match when the pattern has none */
  pattern?: RegExp;
  /** Values matching this are skipped; single-valued fields move on to the next match */
  exclude?: RegExp;
  lowercase?: boolean;
  ownText?: boolean;
  /** Resolves the value as a URL against the document base */
  absolute?: boolean;
  maxLength?: number;
  default?: FieldValue;
}

export interface KeyRule {
  from: string[];
  prefix?: string;
  canonicalUrl?: boolean;
}

export interface LinkFallback {
  keywords: string[];
  exclude: string[];
  limit: number;
}

export interface RuleSet {
  name: string;
  recordKind: RecordKind;
  items: string[];
  linkFallback?: LinkFallback;
  key: KeyRule;
  fields: FieldRule[];
  baseUrl?: string;
  /** Title used when no title field was found, with `{field}` placeholders */
  titleTemplate?: string;
  detect?: {
    urlIncludes: string[];
    markers: string[];
  };
}

const JOB_INFO = 'ul[data-test="JobInfo"] li';

export const upwork: RuleSet = {
  name: 'upwork',
  recordKind: 'job',
  baseUrl: 'https://www.upwork.com',
  items: ['article[data-test="JobTile"]', 'section[data-qa="job-tile"]', '[data-qa="job-tile"]'],
  key: { from: ['url'], canonicalUrl: true },
  detect: {
    urlIncludes: ['upwork.com'],
    markers: ['data-test="jobtile"', 'data-qa="job-tile"', 'job-tile-title'],
  },
  fields: [
    {
      field: 'title',
      locators: [
        { selector: 'h2.job-tile-title a[data-test="job-tile-title-link"]' },
        { selector: 'h2 a[data-qa="job-title"]' },
        { selector: 'h2 a' },
        { selector: 'a[data-test="job-tile-title-link"]' },
        { selector: 'a[data-qa="job-title"]' },
      ],
    },
    {
      field: 'url',
      absolute: true,
      locators: [
        { selector: 'h2.job-tile-title a[data-test="job-tile-title-link"]', attr: 'href' },
        { selector: 'h2 a[data-qa="job-title"]', attr: 'href' },
        { selector: 'h2 a', attr: 'href' },
        { selector: 'a[data-test="job-tile-title-link"]', attr: 'href' },
        { selector: 'a[data-qa="job-title"]', attr: 'href' },
      ],
    },
    {
      field: 'postedTime',
      locators: [{ selector: 'small[data-test="job-pubilshed-date"]' }, { selector: 'small' }],
    },
    {
      field: 'jobType',
      locators: [{ selector: JOB_INFO }],
      pattern: /(Fixed price|Hourly)/,
    },
    {
      field: 'hourlyRateMin',
      locators: [{ selector: JOB_INFO }],
      pattern: /Hourly:\s*\$([0-9,.]+)/,
    },
    {
      field: 'hourlyRateMax',
      locators: [{ selector: JOB_INFO }],
      pattern: /Hourly:\s*\$[0-9,.]+\s*-\s*\$([0-9,.]+)/,
    },
    {
      field: 'budget',
      locators: [{ selector: JOB_INFO }],
      pattern: /Est\. budget:\s*\$([0-9,.]+)/,
      default: 'Not specified',
    },
    {
      field: 'experienceLevel',
      locators: [{ selector: JOB_INFO }],
      pattern: /(Entry Level|Intermediate|Expert)/,
      default: 'Not specified',
    },
    {
      field: 'duration',
      locators: [{ selector: JOB_INFO }],
      pattern: /Est\. time:\s*(.+)/,
    },
    {
      field: 'description',
      locators: [
        { selector: '[data-test="UpCLineClamp JobDescription"] .air3-line-clamp p' },
        { selector: '.air3-line-clamp p' },
        { selector: 'p' },
      ],
    },
    {
      field: 'skills',
      multiple: true,
      locators: [
        { selector: '[data-test="TokenClamp JobAttrs"] .air3-token span' },
        { selector: '.air3-token span' },
      ],
      // "+3" style overflow counters
      exclude: /^\+\d+$/,
      default: [],
    },
  ],
};

export const pythonOrg: RuleSet = {
  name: 'python-org',
  recordKind: 'job',
  baseUrl: 'https://www.python.org',
  items: ['ol.list-recent-jobs li'],
  key: { from: ['url'], canonicalUrl: true },
  detect: {
    urlIncludes: ['python.org'],
    markers: ['python.org', 'python job board', 'python software foundation'],
  },
  fields: [
    { field: 'title', locators: [{ selector: 'h2.listing-company a' }] },
    { field: 'url', absolute: true, locators: [{ selector: 'h2.listing-company a', attr: 'href' }] },
    {
      field: 'company',
      locators: [{ selector: '.listing-company-name' }],
      ownText: true,
      default: 'Company not specified',
    },
    {
      field: 'location',
      locators: [{ selector: '.listing-location a' }],
      default: 'Location not specified',
    },
    {
      field: 'skills',
      multiple: true,
      split: ',',
      locators: [{ selector: '.listing-job-type' }],
      default: [],
    },
    {
      field: 'postedTime',
      locators: [{ selector: '.listing-posted time' }],
      default: 'Date not specified',
    },
    {
      field: 'category',
      locators: [{ selector: '.listing-company-category a' }],
      default: 'Category not specified',
    },
  ],
};

export const generic: RuleSet = {
  name: 'generic',
  recordKind: 'job',
  items: [
    '.job-listing',
    '.job-item',
    '.job-post',
    '.position',
    'article.job',
    '.opening',
    '.vacancy',
    'li.job',
    '[class*="job"]',
    '[class*="position"]',
    '[class*="opening"]',
  ],
  linkFallback: {
    keywords: ['job', 'position', 'career', 'opening', 'vacancy', 'work'],
    exclude: ['filter', 'search', 'sort', 'page', 'next', 'prev'],
    limit: 20,
  },
  key: { from: ['url'], canonicalUrl: true },
  fields: [
    {
      field: 'title',
      locators: [{ selector: 'h1, h2, h3, h4, h5, h6' }, { selector: 'a' }, {}],
      maxLength: 200,
    },
    {
      field: 'url',
      absolute: true,
      locators: [{ attr: 'href' }, { selector: 'a[href]', attr: 'href' }],
    },
    { field: 'description', locators: [{}], maxLength: 500 },
  ],
};

// One conversation per page and participant, so later passes update the same session
export const chat: RuleSet = {
  name: 'chat',
  recordKind: 'chat',
  items: [
    '.msg-s-message-list',
    '[data-test="conversation"]',
    '[data-list-id*="chat-messages"]',
    '.conversation',
    'main',
    'body',
  ],
  key: { from: ['platform', 'participant'], prefix: 'chat' },
  titleTemplate: '{platform} chat with {participant}',
  fields: [
    {
      field: 'platform',
      locators: [
        { selector: 'meta[property="og:site_name"]', attr: 'content', document: true },
        { selector: 'meta[property="og:url"]', attr: 'content', document: true },
        { selector: 'title', document: true },
        { selector: 'body', document: true },
      ],
      pattern: /\b(upwork|linkedin|discord|teams|slack)\b/i,
      lowercase: true,
      default: 'web',
    },
    {
      field: 'participant',
      locators: [
        { selector: '[data-test*="author"]' },
        { selector: '[data-test*="sender"]' },
        { selector: '.message-author' },
        { selector: '.sender-name' },
        { selector: '.username' },
      ],
      // The local user's own messages, and names too long to be a sender label
      exclude: /^(me|you|user|unknown)$|^.{50,}$/i,
      default: 'Unknown participant',
    },
    {
      field: 'startedAt',
      locators: [
        { selector: 'time[datetime]', attr: 'datetime' },
        { selector: '[data-time]', attr: 'data-time' },
      ],
    },
    {
      field: 'messages',
      multiple: true,
      locators: [
        { selector: '[data-test*="message-text"]' },
        { selector: '.msg-s-event-listitem__body' },
        { selector: '.message-content' },
        { selector: '.message-item' },
      ],
      default: [],
    },
  ],
};

export const ruleSets: Record<RuleSetName, RuleSet> = {
  upwork,
  'python-org': pythonOrg,
  generic,
  chat,
};

// Site detection order: python.org markers are checked before Upwork ones
const DETECTABLE: RuleSet[] = [pythonOrg, upwork];

/**
 * Picks the job rule set for a document: URL hint first, then markup markers,
 * falling back to the generic rule set.
 */
export function detectRuleSet(html: string, urlHint?: string): RuleSet {
  const hint = urlHint?.toLowerCase();
  if (hint) {
    const byUrl = DETECTABLE.find((ruleSet) =>
      ruleSet.detect?.urlIncludes.some((fragment) => hint.includes(fragment))
    );
    if (byUrl) {
      return byUrl;
    }
  }

  const text = html.toLowerCase();
  const byMarker = DETECTABLE.find((ruleSet) =>
    ruleSet.detect?.markers.some((marker) => text.includes(marker))
  );

  return byMarker ?? generic;
}
