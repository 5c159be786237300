export type LoadState = 'load' | 'domcontentloaded' | 'networkidle' | 'commit';
export type ElementState = 'attached' | 'detached' | 'visible' | 'hidden';
export type SelectorKind = 'css' | 'text' | 'xpath' | 'id' | 'name' | 'test_id';

/** Where an element lives: selector, how to read it, and the iframe chain to enter first. */
export interface ElementTarget {
  selector: string;
  kind: SelectorKind;
  exact: boolean;
  ordinal: number | null;
  frames: string[];
  frameTimeoutMs: number | null;
}

export interface LocateOptions {
  state: ElementState;
  timeoutMs: number | null;
  /** Wait for `state` before returning; a timeout then yields null. */
  wait: boolean;
}

/** Opaque element reference; only the driver that produced it can act on it. */
export interface PageElement {
  readonly description: string;
}

export interface HttpRequest {
  url: string;
  method: string;
  headers: Record<string, string> | null;
  params: Record<string, string> | string | null;
  data: unknown;
  form: Record<string, string> | null;
  multipart: Record<string, unknown> | null;
  timeoutMs: number | null;
  failOnStatusCode: boolean | null;
  ignoreHttpsErrors: boolean | null;
  maxRedirects: number | null;
  maxRetries: number | null;
}

export interface HttpResponse {
  status: number;
  ok: boolean;
  headers: Record<string, string>;
  body: string;
  /** Parsed body, or undefined when it is not JSON. */
  json: unknown;
}

export interface BrowserCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: string;
}

/**
 * Browser session used by step handlers. Timeouts surface as
 * DriverTimeoutError, other automation failures as DriverError.
 */
export interface PageDriver {
  readonly profileName: string;
  start(): Promise<void>;
  close(options?: { force?: boolean }): Promise<void>;
  open(url: string, options: { waitUntil: LoadState; timeoutMs: number | null }): Promise<void>;
  waitForLoadState(state: LoadState, timeoutMs: number | null): Promise<void>;
  locate(target: ElementTarget, options: LocateOptions): Promise<PageElement | null>;
  click(element: PageElement, options: { button: string | null; delayMs: number | null }): Promise<void>;
  type(element: PageElement, text: string, options: { clear: boolean }): Promise<void>;
  getAttribute(element: PageElement, name: string): Promise<string | null>;
  getText(element: PageElement): Promise<string | null>;
  newTab(url: string | null, options: { waitUntil: LoadState; timeoutMs: number | null }): Promise<void>;
  /** False when the index is out of range. */
  switchTab(index: number): Promise<boolean>;
  closeTab(index: number | null): Promise<void>;
  tabCount(): number;
  http(request: HttpRequest): Promise<HttpResponse>;
  cookies(): Promise<BrowserCookie[]>;
  /** Fires once when the browser context closes, whether or not `close()` asked for it. */
  onClosed(callback: () => void): void;
  /** Fires once when the browser's context closes or its last window is gone. */
  onProcessExit(callback: () => void): void;
}

const LOAD_STATES: ReadonlySet<string> = new Set(['load', 'domcontentloaded', 'networkidle', 'commit']);

export function toLoadState(value: unknown, fallback: LoadState = 'load'): LoadState {
  const text = typeof value === 'string' ? value.trim().toLowerCase() : '';
  return isLoadState(text) ? text : fallback;
}

function isLoadState(value: string): value is LoadState {
  return LOAD_STATES.has(value);
}
