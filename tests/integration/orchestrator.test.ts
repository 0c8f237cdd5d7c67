import { Orchestrator } from '../../src/modules/Orchestrator';
import { DatabaseService } from '../../src/database/DatabaseService';
import { loadConfig } from '../../src/config';
import { StoreUnavailableError } from '../../src/utils/errors';
import { fakeBrowser, padDocument } from '../helpers/fakeBrowser';

const PAGE = padDocument(`<html><body>
  <article data-test="JobTile">
    <h2 class="job-tile-title"><a data-test="job-tile-title-link" href="/jobs/~0123/">Scraper maintenance</a></h2>
    <ul data-test="JobInfo"><li>Fixed price</li><li>Est. budget: $400</li></ul>
  </article>
</body></html>`);

describe('Orchestrator', () => {
  const config = loadConfig({
    NODE_ENV: 'test',
    API_KEYS: 'test-key',
    BROWSER_SETTLE_DELAY_MS: '0',
  });

  let store: DatabaseService;
  let orchestrator: Orchestrator;

  beforeEach(async () => {
    store = new DatabaseService({ path: ':memory:' });
    const browser = fakeBrowser([{ url: 'https://www.upwork.com/nx/search/jobs/', content: PAGE }]);
    orchestrator = new Orchestrator(config, { database: store, connector: browser.connector });
    await orchestrator.initialize();
  });

  afterEach(async () => {
    await orchestrator.stop();
  });

  it('should run an ingestion pass against the injected store', async () => {
    const report = await orchestrator.runIngestion();

    expect(report.status).toBe('completed');
    expect(report.ruleSet).toBe('upwork');
    expect(report.created).toBe(1);

    const record = await orchestrator.store.getRecordByKey('https://www.upwork.com/jobs/~0123');
    expect(record?.title).toBe('Scraper maintenance');
    expect(record?.fields).toMatchObject({ jobType: 'Fixed price', budget: '400' });
  });

  it('should run maintenance after ingestion', async () => {
    await orchestrator.runIngestion();

    const report = await orchestrator.runMaintenance();

    expect(report.status).toBe('completed');
    expect(report.duplicates).toEqual({ totalRecords: 1, duplicateGroups: 0, potentialDuplicates: 0 });
    expect(report.health?.snapshots).toBe(1);
  });

  it('should close the store once on shutdown', async () => {
    await orchestrator.stop();
    await orchestrator.stop();

    await expect(store.ping()).rejects.toBeInstanceOf(StoreUnavailableError);
  });

  it('should build an HTTP app without listening', () => {
    expect(typeof orchestrator.httpApp).toBe('function');
  });
});
