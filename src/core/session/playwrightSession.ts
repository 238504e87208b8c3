import { chromium, Browser, BrowserContext, Page, ElementHandle } from 'playwright';
import logger from '../../utils/logger.js';
import { ExtractorConfig, loadConfig } from '../../config.js';
import { ElementNotFoundError, SessionClosedError, describeError } from '../errors.js';
import {
  BrowserSession,
  Locator,
  SessionElement,
  SessionFactory,
  describeLocator
} from './types.js';

export const DEFAULT_NAVIGATION_TIMEOUT = 30000;
export const DEFAULT_REMOTE_ENDPOINT = 'http://127.0.0.1:9222';

export interface LocalChromiumOptions {
  headless?: boolean;
  javaScriptEnabled?: boolean;
  navigationTimeout?: number;
}

export interface RemoteChromiumOptions {
  endpoint?: string;
  javaScriptEnabled?: boolean;
  navigationTimeout?: number;
}

// Playwright selector engines share the locator strategy names
export function toSelector(locator: Locator): string {
  return describeLocator(locator);
}

class PlaywrightElement implements SessionElement {
  constructor(private readonly handle: ElementHandle<SVGElement | HTMLElement>) {}

  async getAttribute(name: string): Promise<string | null> {
    return this.handle.evaluate((el, attr) => {
      const property: unknown = Reflect.get(el, attr);
      // A false boolean property means the attribute is absent
      if (property === false) {
        return null;
      }
      if (typeof property === 'string' || typeof property === 'number' || typeof property === 'boolean') {
        return String(property);
      }
      return el.getAttribute(attr);
    }, name);
  }
}

export class PlaywrightSession implements BrowserSession {
  private closed = false;

  constructor(
    private readonly browser: Browser,
    private readonly context: BrowserContext,
    private readonly page: Page,
    private readonly navigationTimeout: number = DEFAULT_NAVIGATION_TIMEOUT
  ) {}

  static async open(browser: Browser, options: { javaScriptEnabled?: boolean; navigationTimeout?: number } = {}): Promise<PlaywrightSession> {
    try {
      const context = await browser.newContext({
        javaScriptEnabled: options.javaScriptEnabled ?? true
      });
      const page = await context.newPage();
      return new PlaywrightSession(browser, context, page, options.navigationTimeout);
    } catch (error) {
      logger.browser.error('open page', error);
      try {
        await browser.close();
      } catch (closeError) {
        logger.browser.error('close after failed open', closeError);
      }
      throw error;
    }
  }

  async navigate(address: string): Promise<void> {
    this.assertOpen('navigate');
    logger.browser.action('navigate', { url: address, timeout: this.navigationTimeout });
    await this.page.goto(address, {
      timeout: this.navigationTimeout,
      waitUntil: 'domcontentloaded'
    });
  }

  async findElement(locator: Locator): Promise<SessionElement> {
    this.assertOpen('find element');
    const handle = await this.page.$(toSelector(locator));
    if (!handle) {
      throw new ElementNotFoundError(describeLocator(locator));
    }
    return new PlaywrightElement(handle);
  }

  currentUrl(): string {
    return this.closed ? '' : this.page.url();
  }

  isOpen(): boolean {
    return !this.closed && !this.page.isClosed();
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    try {
      await this.context.close();
    } finally {
      await this.browser.close();
    }
    logger.browser.action('close');
  }

  private assertOpen(operation: string): void {
    if (!this.isOpen()) {
      throw new SessionClosedError(operation);
    }
  }
}

/**
 * Launches a private Chromium for each session.
 */
export function localChromium(options: LocalChromiumOptions = {}): SessionFactory {
  return async () => {
    const headless = options.headless ?? true;
    logger.browser.action('launch', { headless, javaScriptEnabled: options.javaScriptEnabled ?? true });
    let browser: Browser;
    try {
      browser = await chromium.launch({ headless });
    } catch (error) {
      logger.browser.error('launch', error);
      throw error;
    }
    return PlaywrightSession.open(browser, options);
  };
}

/**
 * Attaches to an already running Chromium through its DevTools endpoint.
 */
export function remoteChromium(options: RemoteChromiumOptions = {}): SessionFactory {
  return async () => {
    const endpoint = options.endpoint ?? DEFAULT_REMOTE_ENDPOINT;
    logger.browser.action('connect', { endpoint });
    let browser: Browser;
    try {
      browser = await chromium.connectOverCDP(endpoint);
    } catch (error) {
      logger.browser.error('connect', `${endpoint}: ${describeError(error)}`);
      throw error;
    }
    return PlaywrightSession.open(browser, options);
  };
}

export function sessionFactoryFromConfig(config: ExtractorConfig): SessionFactory {
  if (config.sessionMode === 'remote') {
    return remoteChromium({
      endpoint: config.remoteEndpoint,
      javaScriptEnabled: config.javaScriptEnabled,
      navigationTimeout: config.navigationTimeout
    });
  }
  return localChromium({
    headless: config.headless,
    javaScriptEnabled: config.javaScriptEnabled,
    navigationTimeout: config.navigationTimeout
  });
}

/**
 * Session factory used when an extractor is given none; reads the environment
 * each time it is called.
 */
export const defaultSessionFactory: SessionFactory = () => sessionFactoryFromConfig(loadConfig())();
