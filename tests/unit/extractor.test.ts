import { extractRecords, resolveRuleSet } from '../../src/modules/Extractor';
import { RuleSet, chat, detectRuleSet, generic, pythonOrg, upwork } from '../../src/modules/ruleSets';
import { MalformedDocumentError } from '../../src/utils/errors';
import { logger } from '../../src/config';

const UPWORK_PAGE = `
<html><body>
  <article data-test="JobTile">
    <h2 class="job-tile-title"><a data-test="job-tile-title-link" href="/jobs/~01abc/?referrer_url_path=find">TypeScript scraper</a></h2>
    <small data-test="job-pubilshed-date">Posted 2 hours ago</small>
    <ul data-test="JobInfo">
      <li>Hourly: $30.00 - $50.00</li>
      <li>Intermediate</li>
      <li>Est. time: 1 to 3 months</li>
    </ul>
    <div data-test="UpCLineClamp JobDescription"><div class="air3-line-clamp"><p>Build a   crawler.</p></div></div>
    <div data-test="TokenClamp JobAttrs">
      <span class="air3-token"><span>Node.js</span></span>
      <span class="air3-token"><span>Playwright</span></span>
      <span class="air3-token"><span>+2</span></span>
    </div>
  </article>
  <article data-test="JobTile">
    <h2 class="job-tile-title"><a data-test="job-tile-title-link" href="https://www.upwork.com/jobs/~02def">Data entry</a></h2>
    <ul data-test="JobInfo"><li>Fixed price</li><li>Est. budget: $250</li></ul>
  </article>
</body></html>`;

const PYTHON_ORG_PAGE = `
<ol class="list-recent-jobs">
  <li>
    <h2 class="listing-company"><span class="listing-company-name"><a href="/jobs/7648/">Senior Python Engineer</a><br/>
      Acme Analytics</span><span class="listing-location"><a href="/jobs/location/berlin/">Berlin, Germany</a></span></h2>
    <span class="listing-job-type">Back end, Django, Testing</span>
    <span class="listing-posted">Posted: <time datetime="2024-05-01T10:00:00Z">01 May 2024</time></span>
    <span class="listing-company-category"><a href="/jobs/type/developer/">Developer / Engineer</a></span>
  </li>
  <li><h2 class="listing-company"><span class="listing-company-name">No link here</span></h2></li>
</ol>`;

describe('extractRecords', () => {
  it('should extract Upwork job tiles with defaults for missing fields', () => {
    const records = [...extractRecords(UPWORK_PAGE, upwork)];

    expect(records).toEqual([
      {
        naturalKey: 'https://www.upwork.com/jobs/~01abc',
        kind: 'job',
        title: 'TypeScript scraper',
        description: 'Build a crawler.',
        sourceUrl: 'https://www.upwork.com/jobs/~01abc',
        fields: {
          postedTime: 'Posted 2 hours ago',
          jobType: 'Hourly',
          hourlyRateMin: '30.00',
          hourlyRateMax: '50.00',
          budget: 'Not specified',
          experienceLevel: 'Intermediate',
          duration: '1 to 3 months',
          skills: ['Node.js', 'Playwright'],
        },
      },
      {
        naturalKey: 'https://www.upwork.com/jobs/~02def',
        kind: 'job',
        title: 'Data entry',
        description: '',
        sourceUrl: 'https://www.upwork.com/jobs/~02def',
        fields: {
          jobType: 'Fixed price',
          budget: '250',
          experienceLevel: 'Not specified',
          skills: [],
        },
      },
    ]);
  });

  it('should read python.org listings and drop candidates without a link', () => {
    const onDrop = jest.fn();

    const records = [
      ...extractRecords(PYTHON_ORG_PAGE, pythonOrg, { baseUrl: 'https://www.python.org/jobs/', onDrop }),
    ];

    expect(records).toHaveLength(1);
    expect(records[0]).toEqual({
      naturalKey: 'https://www.python.org/jobs/7648',
      kind: 'job',
      title: 'Senior Python Engineer',
      description: '',
      sourceUrl: 'https://www.python.org/jobs/7648',
      fields: {
        company: 'Acme Analytics',
        location: 'Berlin, Germany',
        skills: ['Back end', 'Django', 'Testing'],
        postedTime: '01 May 2024',
        category: 'Developer / Engineer',
      },
    });
    expect(onDrop).toHaveBeenCalledTimes(1);
    expect(onDrop).toHaveBeenCalledWith('missing key field (url)', 1);
  });

  it('should resolve generic links against the document base', () => {
    const html = `
<html><head><base href="https://careers.example.org/"></head><body>
  <div class="job-listing">
    <h3>Backend Developer</h3>
    <a href="openings/backend?utm_campaign=spring">Apply</a>
  </div>
  <div class="job-listing">
    <h3>Frontend Developer</h3>
    <a href="/openings/frontend">Apply</a>
  </div>
  <div class="job-listing"><h3>No link role</h3></div>
</body></html>`;
    const onDrop = jest.fn();

    const records = [...extractRecords(html, generic, { onDrop })];

    expect(records.map((record) => [record.naturalKey, record.title])).toEqual([
      ['https://careers.example.org/openings/backend', 'Backend Developer'],
      ['https://careers.example.org/openings/frontend', 'Frontend Developer'],
    ]);
    expect(records[0].description).toBe('Backend Developer Apply');
    expect(onDrop).toHaveBeenCalledTimes(1);
  });

  it('should fall back to keyword links when no listing container matches', () => {
    const html = `
<body>
  <nav><a href="/search?q=python">Search jobs</a> <a href="/about">About us</a></nav>
  <a href="https://example.net/careers/data-engineer">Data Engineer</a>
  <a href="https://example.net/vacancy/42">Open vacancy: QA</a>
</body>`;

    const records = [...extractRecords(html, generic)];

    expect(records.map((record) => [record.naturalKey, record.title])).toEqual([
      ['https://example.net/careers/data-engineer', 'Data Engineer'],
      ['https://example.net/vacancy/42', 'Open vacancy: QA'],
    ]);
  });

  it('should key chat sessions by platform and participant', () => {
    const html = `
<html><head><meta property="og:site_name" content="Upwork"></head><body>
  <div class="conversation">
    <div class="message-item"><span class="sender-name">Jane Doe</span><time datetime="2024-05-01T09:00:00Z">9:00</time><p class="message-content">Hello there</p></div>
    <div class="message-item"><span class="sender-name">Me</span><p class="message-content">Hi Jane</p></div>
  </div>
</body></html>`;

    const records = [...extractRecords(html, chat)];

    expect(records).toEqual([
      {
        naturalKey: 'chat:upwork:Jane Doe',
        kind: 'chat',
        title: 'upwork chat with Jane Doe',
        description: '',
        sourceUrl: null,
        fields: {
          platform: 'upwork',
          participant: 'Jane Doe',
          startedAt: '2024-05-01T09:00:00Z',
          messages: ['Hello there', 'Hi Jane'],
        },
      },
    ]);
  });

  it('should skip the local user and detect the platform from the page title', () => {
    const html = `
<html><head><title>Messaging | LinkedIn</title></head><body>
  <ul class="msg-s-message-list">
    <li><span class="message-author">Me</span><p class="msg-s-event-listitem__body">Thanks for the call</p></li>
    <li><span class="message-author">Sam Lee</span><p class="msg-s-event-listitem__body">Talk soon</p></li>
  </ul>
</body></html>`;

    const [record] = [...extractRecords(html, chat)];

    expect(record.naturalKey).toBe('chat:linkedin:Sam Lee');
    expect(record.title).toBe('linkedin chat with Sam Lee');
    expect(record.fields).toEqual({
      platform: 'linkedin',
      participant: 'Sam Lee',
      messages: ['Thanks for the call', 'Talk soon'],
    });
  });

  it('should still key a chat page without senders or timestamps', () => {
    const html = `
<html><body>
  <div class="conversation">
    <div class="message-item"><span class="username">you</span><p class="message-content">Any update on the invoice?</p></div>
  </div>
</body></html>`;

    const [record] = [...extractRecords(html, chat)];

    expect(record.naturalKey).toBe('chat:web:Unknown participant');
    expect(record.fields.messages).toEqual(['Any update on the invoice?']);
  });

  it('should cut long values to the maximum length including the ellipsis', () => {
    const ruleSet: RuleSet = {
      name: 'notes',
      recordKind: 'job',
      items: ['li'],
      key: { from: ['title'] },
      fields: [{ field: 'title', locators: [{}], maxLength: 10 }],
    };

    const records = [...extractRecords('<ul><li>abcdefghij</li><li>abcdefghijk</li></ul>', ruleSet)];

    expect(records.map((record) => record.title)).toEqual(['abcdefghij', 'abcdefg...']);
    expect(records[1].title).toHaveLength(10);
  });

  it('should return nothing for a document without matching items', () => {
    expect([...extractRecords('<html><body><p>Nothing here</p></body></html>', upwork)]).toEqual([]);
  });

  it('should reject input without markup before iteration starts', () => {
    expect(() => extractRecords('plain text, no tags at all', generic)).toThrow(MalformedDocumentError);
    expect(() => extractRecords('', generic)).toThrow('Document contains no markup');
  });

  it('should use the field default when a selector is invalid', () => {
    const ruleSet: RuleSet = {
      name: 'cards',
      recordKind: 'job',
      items: ['div.card'],
      key: { from: ['url'], canonicalUrl: true },
      fields: [
        { field: 'title', locators: [{ selector: 'h2[data-x' }], default: 'Untitled' },
        { field: 'url', absolute: true, locators: [{ selector: 'a', attr: 'href' }] },
      ],
    };

    const records = [
      ...extractRecords('<div class="card"><h2>Ignored</h2><a href="https://example.com/c/1">x</a></div>', ruleSet),
    ];

    expect(records[0].title).toBe('Untitled');
    expect(records[0].naturalKey).toBe('https://example.com/c/1');
    expect(logger.debug).toHaveBeenCalledWith(expect.objectContaining({ selector: 'h2[data-x' }), 'Invalid selector');
  });
});

describe('detectRuleSet', () => {
  it('should prefer the URL hint', () => {
    expect(detectRuleSet('<footer>Python Software Foundation</footer>', 'https://www.upwork.com/nx/search/jobs').name).toBe(
      'upwork'
    );
  });

  it('should recognise markup markers', () => {
    expect(detectRuleSet('<section data-qa="job-tile"></section>').name).toBe('upwork');
    expect(detectRuleSet('<footer>Python Software Foundation</footer>').name).toBe('python-org');
  });

  it('should default to the generic rule set', () => {
    expect(detectRuleSet('<ul class="jobs"></ul>', 'https://example.com/careers').name).toBe('generic');
  });
});

describe('resolveRuleSet', () => {
  it('should honour an explicit choice over detection', () => {
    expect(resolveRuleSet('chat', UPWORK_PAGE).name).toBe('chat');
    expect(resolveRuleSet('auto', UPWORK_PAGE).name).toBe('upwork');
  });
});
