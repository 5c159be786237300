import { setTimeout as sleep } from 'node:timers/promises';
import { chromium, errors } from 'playwright-core';
import type { BrowserContext, ElementHandle, Frame, Locator, Page } from 'playwright-core';
import type { Logger } from 'winston';
import type { AccountRecord } from '../types/index.js';
import type {
  BrowserCookie,
  ElementTarget,
  HttpRequest,
  HttpResponse,
  LoadState,
  LocateOptions,
  PageDriver,
  PageElement,
} from './page-driver.js';
import { DriverError, DriverTimeoutError } from '../exception/errors.js';
import { extractMessage } from '../exception/classifier.js';
import { stringifyVariable } from '../scenario/template.js';
import { BROWSER } from '../config/defaults.js';

export interface ProxySettings {
  server: string;
  username?: string;
  password?: string;
}

export interface PlaywrightDriverOptions {
  profileName: string;
  userDataDir: string;
  logger: Logger;
  headless?: boolean;
  /** `close()` without `force` leaves the window open. */
  keepOpen?: boolean;
  proxy?: ProxySettings | null;
  /** Installed browser to drive, e.g. `chrome` or `msedge`. */
  channel?: string | null;
  executablePath?: string | null;
  defaultTimeoutMs?: number;
}

/** Proxy from the account's `proxy_*` fields, or null when host or port is missing. */
export function proxyFromAccount(account: AccountRecord): ProxySettings | null {
  const host = stringifyVariable(account.proxy_host).trim();
  const port = stringifyVariable(account.proxy_port).trim();
  if (!host || !port) return null;
  const scheme = stringifyVariable(account.proxy_scheme).trim() || 'http';
  const proxy: ProxySettings = { server: `${scheme}://${host}:${port}` };
  const user = stringifyVariable(account.proxy_user).trim();
  const password = stringifyVariable(account.proxy_password).trim();
  if (user && password) {
    proxy.username = user;
    proxy.password = password;
  }
  return proxy;
}

class PlaywrightElement implements PageElement {
  constructor(
    readonly locator: Locator,
    readonly description: string,
  ) {}
}

function buildLocator(root: Page | Frame, target: ElementTarget): Locator {
  const { selector } = target;
  let locator: Locator;
  switch (target.kind) {
    case 'text':
      locator = root.getByText(selector, { exact: target.exact });
      break;
    case 'xpath': {
      const cleaned = selector.toLowerCase().startsWith('xpath=') ? selector.slice('xpath='.length) : selector;
      locator = root.locator(`xpath=${cleaned}`);
      break;
    }
    case 'id':
      locator = root.locator(`#${selector.replace(/^#+/, '')}`);
      break;
    case 'name':
      locator = root.locator(`[name="${selector.replace(/"/g, '\\"')}"]`);
      break;
    case 'test_id':
      locator = root.getByTestId(selector);
      break;
    default:
      locator = root.locator(selector);
  }
  return target.ordinal === null ? locator : locator.nth(target.ordinal);
}

function toMouseButton(button: string | null): 'left' | 'right' | 'middle' | undefined {
  if (button === 'left' || button === 'right' || button === 'middle') return button;
  return undefined;
}

function randomDelay(): number {
  const { TYPE_DELAY_MIN_MS: min, TYPE_DELAY_MAX_MS: max } = BROWSER;
  return min + Math.random() * (max - min);
}

function optionalTimeout(timeoutMs: number | null): number | undefined {
  return timeoutMs === null ? undefined : timeoutMs;
}

/**
 * Page driver over a Playwright persistent context, one user-data directory
 * per profile.
 */
export class PlaywrightPageDriver implements PageDriver {
  readonly profileName: string;
  private context: BrowserContext | null = null;
  private page: Page | null = null;
  private closeCallbacks: Array<() => void> = [];
  private exitCallbacks: Array<() => void> = [];
  private closedNotified = false;
  private exitNotified = false;
  private watchdog: NodeJS.Timeout | null = null;
  private logger: Logger;

  constructor(private options: PlaywrightDriverOptions) {
    this.profileName = options.profileName;
    this.logger = options.logger;
  }

  async start(): Promise<void> {
    this.closedNotified = false;
    this.exitNotified = false;
    const { proxy, channel, executablePath } = this.options;
    this.logger.info(`Launching browser for ${this.profileName}`);

    const context = await this.guard('start', () =>
      chromium.launchPersistentContext(this.options.userDataDir, {
        headless: this.options.headless ?? BROWSER.HEADLESS,
        ...(proxy ? { proxy } : {}),
        ...(channel ? { channel } : {}),
        ...(executablePath ? { executablePath } : {}),
      }),
    );
    this.context = context;
    this.page = context.pages()[0] ?? (await context.newPage());
    const timeout = this.options.defaultTimeoutMs ?? BROWSER.DEFAULT_TIMEOUT_MS;
    this.page.setDefaultTimeout(timeout);
    this.page.setDefaultNavigationTimeout(timeout);
    context.on('close', () => this.handleExit());
    this.startWatchdog();
  }

  async close(options: { force?: boolean } = {}): Promise<void> {
    if (!this.context) return;
    if ((this.options.keepOpen ?? BROWSER.KEEP_OPEN) && !options.force) {
      this.logger.info(`Keeping browser for ${this.profileName} open; force close when finished.`);
      return;
    }

    this.logger.info(`Closing browser for ${this.profileName}`);
    const context = this.context;
    try {
      await context.close();
    } finally {
      this.context = null;
      this.page = null;
      this.handleExit();
    }
  }

  async open(url: string, options: { waitUntil: LoadState; timeoutMs: number | null }): Promise<void> {
    const page = this.requirePage('open');
    await this.guard('goto', () =>
      page.goto(url, { waitUntil: options.waitUntil, timeout: optionalTimeout(options.timeoutMs) }),
    );
  }

  async waitForLoadState(state: LoadState, timeoutMs: number | null): Promise<void> {
    const page = this.requirePage('wait_for_load_state');
    const loadState = state === 'commit' ? 'load' : state;
    await this.guard('wait_for_load_state', () =>
      page.waitForLoadState(loadState, { timeout: optionalTimeout(timeoutMs) }),
    );
  }

  async locate(target: ElementTarget, options: LocateOptions): Promise<PageElement | null> {
    const page = this.requirePage('locate');
    const attempts = target.frames.length > 0 ? 2 : 1;
    for (let attempt = 0; attempt < attempts; attempt++) {
      const root = await this.resolveFrame(page, target);
      const locator = buildLocator(root, target);
      if (!options.wait) return new PlaywrightElement(locator, target.selector);
      try {
        await locator.waitFor({ state: options.state, timeout: optionalTimeout(options.timeoutMs) });
        return new PlaywrightElement(locator, target.selector);
      } catch (error) {
        if (error instanceof errors.TimeoutError) return null;
        if (/frame was detached/i.test(extractMessage(error)) && attempt + 1 < attempts) {
          await sleep(BROWSER.FRAME_RETRY_DELAY_MS);
          continue;
        }
        throw this.wrap('locate', error);
      }
    }
    return null;
  }

  async click(element: PageElement, options: { button: string | null; delayMs: number | null }): Promise<void> {
    const { locator } = this.unwrap(element);
    const button = toMouseButton(options.button);
    await this.guard('click', () =>
      locator.click({
        ...(button ? { button } : {}),
        ...(options.delayMs !== null ? { delay: options.delayMs } : {}),
      }),
    );
  }

  async type(element: PageElement, text: string, options: { clear: boolean }): Promise<void> {
    const { locator } = this.unwrap(element);
    if (options.clear) {
      try {
        await locator.fill('');
      } catch (error) {
        this.logger.debug(`Could not clear ${element.description}: ${extractMessage(error)}`);
      }
    }
    for (const ch of text) {
      await this.guard('type', () => locator.pressSequentially(ch));
      await sleep(randomDelay());
    }
  }

  async getAttribute(element: PageElement, name: string): Promise<string | null> {
    const { locator } = this.unwrap(element);
    return this.guard('get_attribute', () => locator.getAttribute(name));
  }

  async getText(element: PageElement): Promise<string | null> {
    const { locator } = this.unwrap(element);
    return this.guard('get_text', () => locator.textContent());
  }

  async newTab(url: string | null, options: { waitUntil: LoadState; timeoutMs: number | null }): Promise<void> {
    const context = this.requireContext('new_tab');
    const page = await this.guard('new_tab', () => context.newPage());
    this.page = page;
    if (url) {
      await this.guard('new_tab', () =>
        page.goto(url, { waitUntil: options.waitUntil, timeout: optionalTimeout(options.timeoutMs) }),
      );
    }
  }

  async switchTab(index: number): Promise<boolean> {
    const pages = this.context?.pages() ?? [];
    if (index < 0 || index >= pages.length) return false;
    const page = pages[index];
    this.page = page;
    await this.guard('switch_tab', () => page.bringToFront());
    return true;
  }

  async closeTab(index: number | null): Promise<void> {
    const context = this.requireContext('close_tab');
    const pages = context.pages();
    const target = index !== null && index >= 0 && index < pages.length ? pages[index] : this.page;
    if (target) await this.guard('close_tab', () => target.close());
    this.page = context.pages()[0] ?? null;
  }

  tabCount(): number {
    return this.context?.pages().length ?? 0;
  }

  async http(request: HttpRequest): Promise<HttpResponse> {
    const context = this.requireContext('http_request');
    const multipart = request.multipart
      ? Object.fromEntries(Object.entries(request.multipart).map(([k, v]) => [k, stringifyVariable(v)]))
      : undefined;
    const params = typeof request.params === 'string' ? new URLSearchParams(request.params) : request.params;

    const response = await this.guard('http_request', () =>
      context.request.fetch(request.url, {
        method: request.method,
        ...(request.headers ? { headers: request.headers } : {}),
        ...(params ? { params } : {}),
        ...(request.data !== null && request.data !== undefined ? { data: request.data } : {}),
        ...(request.form ? { form: request.form } : {}),
        ...(multipart ? { multipart } : {}),
        ...(request.timeoutMs !== null ? { timeout: request.timeoutMs } : {}),
        ...(request.failOnStatusCode !== null ? { failOnStatusCode: request.failOnStatusCode } : {}),
        ...(request.ignoreHttpsErrors !== null ? { ignoreHTTPSErrors: request.ignoreHttpsErrors } : {}),
        ...(request.maxRedirects !== null ? { maxRedirects: request.maxRedirects } : {}),
        ...(request.maxRetries !== null ? { maxRetries: request.maxRetries } : {}),
      }),
    );

    const status = response.status();
    const body = (await this.guard('http_request', () => response.body())).toString('utf-8');
    let json: unknown;
    try {
      json = JSON.parse(body);
    } catch {
      json = undefined;
    }
    return {
      status,
      ok: status >= 200 && status <= 299,
      headers: response.headers(),
      body,
      json,
    };
  }

  async cookies(): Promise<BrowserCookie[]> {
    if (!this.context) return [];
    const context = this.context;
    return this.guard('cookies', () => context.cookies());
  }

  onClosed(callback: () => void): void {
    if (this.closedNotified) {
      this.invoke(callback, 'close');
      return;
    }
    this.closeCallbacks.push(callback);
  }

  onProcessExit(callback: () => void): void {
    if (this.exitNotified) {
      this.invoke(callback, 'process exit');
      return;
    }
    this.exitCallbacks.push(callback);
  }

  /** Fires exit callbacks once every window of the context is gone. */
  private startWatchdog(): void {
    if (this.watchdog) return;
    this.watchdog = setInterval(() => {
      if (this.context && this.context.pages().length === 0) this.handleExit();
    }, BROWSER.CLOSE_WATCH_INTERVAL_MS);
    this.watchdog.unref();
  }

  private handleExit(): void {
    if (this.watchdog) {
      clearInterval(this.watchdog);
      this.watchdog = null;
    }
    if (!this.closedNotified) {
      this.closedNotified = true;
      for (const callback of this.closeCallbacks) this.invoke(callback, 'close');
    }
    if (!this.exitNotified) {
      this.exitNotified = true;
      for (const callback of this.exitCallbacks) this.invoke(callback, 'process exit');
    }
  }

  private invoke(callback: () => void, kind: string): void {
    try {
      callback();
    } catch (error) {
      this.logger.warn(`Browser ${kind} callback failed: ${extractMessage(error)}`);
    }
  }

  private async resolveFrame(page: Page, target: ElementTarget): Promise<Page | Frame> {
    let current: Page | Frame = page;
    for (const frameSelector of target.frames) {
      const scope: Page | Frame = current;
      const handle: ElementHandle = await this.guard('frame', () =>
        scope.waitForSelector(frameSelector, { timeout: optionalTimeout(target.frameTimeoutMs) }),
      );
      const frame = handle ? await this.guard('frame', () => handle.contentFrame()) : null;
      if (!frame) throw new DriverError(`Failed to resolve iframe by selector ${frameSelector}`, 'frame');
      current = frame;
    }
    return current;
  }

  private unwrap(element: PageElement): PlaywrightElement {
    if (element instanceof PlaywrightElement) return element;
    throw new DriverError(`Element ${element.description} does not belong to this driver`, 'element');
  }

  private requireContext(operation: string): BrowserContext {
    if (!this.context) throw new DriverError('Browser context is not initialized', operation);
    return this.context;
  }

  private requirePage(operation: string): Page {
    if (!this.page) throw new DriverError('No open page in the browser context', operation);
    return this.page;
  }

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      throw this.wrap(operation, error);
    }
  }

  private wrap(operation: string, error: unknown): DriverError {
    if (error instanceof DriverError) return error;
    const message = extractMessage(error);
    if (error instanceof errors.TimeoutError) {
      return new DriverTimeoutError(message, operation, { cause: error });
    }
    return new DriverError(message, operation, { cause: error });
  }
}
