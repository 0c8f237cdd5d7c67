import { chromium, Browser, Page } from 'playwright-core';
import { BrowserSettings, logger } from '../config';
import { CapturedDocument } from '../types';
import { metrics } from '../utils/metrics';
import { traced, addSpanAttributes } from '../utils/tracing';
import { delay, withTimeout } from '../utils/delay';
import {
  ConnectionUnavailableError,
  ContentTooSmallError,
  NoPagesOpenError,
  errorMessage,
  isPipelineError,
} from '../utils/errors';

export const MAX_SETTLE_DELAY_MS = 60_000;

export interface PageRef {
  id: string;
  url: string;
  title: string;
}

// What the session client needs from a remote browser
export interface BrowserControl {
  listPages(): Promise<PageRef[]>;
  getContent(page: PageRef): Promise<string>;
  disconnect(): Promise<void>;
}

export type BrowserConnector = (endpoint: string, timeoutMs: number) => Promise<BrowserControl>;

export interface CaptureOptions {
  settleDelayMs?: number;
  pagePredicate?: (page: PageRef) => boolean;
}

class CdpBrowserControl implements BrowserControl {
  private pages = new Map<string, Page>();

  constructor(
    private readonly browser: Browser,
    private readonly readTimeoutMs: number
  ) {}

  async listPages(): Promise<PageRef[]> {
    this.pages.clear();
    const refs: PageRef[] = [];

    for (const [contextIndex, context] of this.browser.contexts().entries()) {
      for (const [pageIndex, page] of context.pages().entries()) {
        if (page.isClosed()) {
          continue;
        }

        const id = `${contextIndex}:${pageIndex}`;
        this.pages.set(id, page);
        refs.push({ id, url: page.url(), title: await this.readTitle(page) });
      }
    }

    return refs;
  }

  async getContent(ref: PageRef): Promise<string> {
    const page = this.pages.get(ref.id);
    if (!page || page.isClosed()) {
      throw new NoPagesOpenError(`Page ${ref.url} was closed before its content was read`);
    }
    return withTimeout(
      page.content(),
      this.readTimeoutMs,
      `Page ${ref.url} did not return its content within ${this.readTimeoutMs} ms`
    );
  }

  // Drops the CDP connection only; the remote browser and its tabs stay open
  async disconnect(): Promise<void> {
    await this.browser.close();
  }

  private async readTitle(page: Page): Promise<string> {
    try {
      return await withTimeout(page.title(), this.readTimeoutMs, `Title lookup timed out after ${this.readTimeoutMs} ms`);
    } catch (error) {
      // Title lookups fail or hang while a page is mid-navigation
      logger.debug({ url: page.url(), error: errorMessage(error) }, 'Could not read page title');
      return '';
    }
  }
}

export const connectOverCdp: BrowserConnector = async (endpoint, timeoutMs) => {
  const browser = await chromium.connectOverCDP(endpoint, { timeout: timeoutMs });
  return new CdpBrowserControl(browser, timeoutMs);
};

export function urlPatternPredicate(pattern?: string): ((page: PageRef) => boolean) | undefined {
  if (!pattern) {
    return undefined;
  }
  return (page) => page.url.includes(pattern);
}

/**
 * Reads the rendered document of one tab in an already-running browser.
 * Never launches, navigates or closes the browser.
 */
export class BrowserSessionClient {
  private settings: BrowserSettings;
  private connector: BrowserConnector;

  constructor(settings: BrowserSettings, connector: BrowserConnector = connectOverCdp) {
    this.settings = settings;
    this.connector = connector;
  }

  @traced('BrowserSession.capture')
  async capture(options: CaptureOptions = {}): Promise<CapturedDocument> {
    const settleDelayMs = options.settleDelayMs ?? this.settings.settleDelayMs;
    if (!Number.isInteger(settleDelayMs) || settleDelayMs < 0 || settleDelayMs > MAX_SETTLE_DELAY_MS) {
      throw new RangeError(`Settle delay must be an integer between 0 and ${MAX_SETTLE_DELAY_MS} ms`);
    }

    const predicate = options.pagePredicate ?? urlPatternPredicate(this.settings.pageUrlPattern);
    const { endpoint } = this.settings;

    try {
      const control = await this.connect();

      try {
        const document = await this.readPage(control, settleDelayMs, predicate);
        addSpanAttributes({ 'page.url': document.url, 'page.content_length': document.content.length });
        return document;
      } finally {
        await this.disconnect(control);
      }
    } catch (error) {
      const failure = isPipelineError(error) ? error : new ConnectionUnavailableError(endpoint, error);
      metrics.captureFailures.labels({ reason: failure.code }).inc();
      logger.warn({ endpoint, reason: failure.code, error: failure.message }, 'Page capture failed');
      throw failure;
    }
  }

  private async connect(): Promise<BrowserControl> {
    const { endpoint, connectTimeoutMs } = this.settings;

    try {
      const control = await this.connector(endpoint, connectTimeoutMs);
      logger.debug({ endpoint }, 'Attached to browser');
      return control;
    } catch (error) {
      throw new ConnectionUnavailableError(endpoint, error);
    }
  }

  private async readPage(
    control: BrowserControl,
    settleDelayMs: number,
    predicate?: (page: PageRef) => boolean
  ): Promise<CapturedDocument> {
    const pages = await control.listPages();
    if (pages.length === 0) {
      throw new NoPagesOpenError();
    }

    const page = predicate ? pages.find(predicate) : pages[0];
    if (!page) {
      throw new NoPagesOpenError(`None of the ${pages.length} open pages matches the page filter`);
    }

    if (settleDelayMs > 0) {
      await delay(settleDelayMs);
    }

    const content = await control.getContent(page);
    metrics.capturedContentLength.observe(content.length);

    if (content.length < this.settings.minContentLength) {
      throw new ContentTooSmallError(content.length, this.settings.minContentLength);
    }

    logger.info({ url: page.url, title: page.title, contentLength: content.length }, 'Captured page');

    return {
      content,
      url: page.url,
      title: page.title,
      capturedAt: new Date(),
    };
  }

  private async disconnect(control: BrowserControl): Promise<void> {
    try {
      await control.disconnect();
    } catch (error) {
      logger.warn({ error: errorMessage(error) }, 'Failed to detach from browser');
    }
  }
}
