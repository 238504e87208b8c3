// Contract between extractors and whatever drives the browser.

export type LocatorStrategy = 'css' | 'xpath' | 'text';

export interface Locator {
  using: LocatorStrategy;
  value: string;
}

export const byCss = (value: string): Locator => ({ using: 'css', value });
export const byXPath = (value: string): Locator => ({ using: 'xpath', value });
export const byText = (value: string): Locator => ({ using: 'text', value });

export function describeLocator(locator: Locator): string {
  return `${locator.using}=${locator.value}`;
}

export interface SessionElement {
  /**
   * Reads the element's DOM property of that name when it holds a primitive,
   * otherwise its markup attribute. `null` when neither exists.
   */
  getAttribute(name: string): Promise<string | null>;
}

export interface BrowserSession {
  navigate(address: string): Promise<void>;
  /** Rejects with ElementNotFoundError when the locator matches nothing. */
  findElement(locator: Locator): Promise<SessionElement>;
  currentUrl(): string;
  isOpen(): boolean;
  close(): Promise<void>;
}

export type SessionFactory = () => Promise<BrowserSession>;
