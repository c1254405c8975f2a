import { chromium, Browser, BrowserContext, ElementHandle, Page } from "playwright";
import {
  AutomationElement,
  AutomationPage,
  AutomationSession,
  ClickOutcome,
  LaunchOptions,
  SessionCookie,
  SessionLauncher,
} from "./session";
import { firstNonNull } from "./timing";

export interface PlaywrightOptions extends LaunchOptions {
  slowMoMs: number;
  navigationTimeoutMs?: number;
}

const USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/124.0.0.0 Safari/537.36";

export async function createPlaywrightSession(options: PlaywrightOptions): Promise<AutomationSession> {
  const browserOverride = (process.env.JOBSCOUT_BROWSER || "").toLowerCase();
  const useChromium = browserOverride === "chromium";
  const chromiumPath = process.env.JOBSCOUT_CHROMIUM_PATH;
  const executablePath = useChromium
    ? chromiumPath && chromiumPath.length > 0
      ? chromiumPath
      : undefined
    : process.env.JOBSCOUT_CHROME_PATH;
  const extraArgs = [
    "--disable-crashpad",
    "--disable-crash-reporter",
    "--no-crashpad",
    "--disable-blink-features=AutomationControlled",
  ];

  const browser = await chromium.launch({
    headless: options.headless,
    slowMo: options.slowMoMs,
    executablePath: executablePath && executablePath.length > 0 ? executablePath : undefined,
    args: extraArgs,
  });
  const context = await browser.newContext({
    viewport: { width: 1366, height: 768 },
    userAgent: USER_AGENT,
  });
  if (options.navigationTimeoutMs) {
    context.setDefaultNavigationTimeout(options.navigationTimeoutMs);
  }
  if (options.cookies && options.cookies.length > 0) {
    await context.addCookies(options.cookies);
  }
  return new PlaywrightAutomationSession(browser, context);
}

export function createPlaywrightLauncher(base: Omit<PlaywrightOptions, keyof LaunchOptions>): SessionLauncher {
  return (options) => createPlaywrightSession({ ...base, ...options });
}

class PlaywrightAutomationSession implements AutomationSession {
  private browser: Browser;
  private context: BrowserContext;

  constructor(browser: Browser, context: BrowserContext) {
    this.browser = browser;
    this.context = context;
  }

  async newPage(): Promise<AutomationPage> {
    const page = await this.context.newPage();
    return new PlaywrightAutomationPage(page);
  }

  async cookies(): Promise<SessionCookie[]> {
    const cookies = await this.context.cookies();
    return cookies.map((cookie) => ({
      name: cookie.name,
      value: cookie.value,
      domain: cookie.domain,
      path: cookie.path,
      expires: cookie.expires,
      httpOnly: cookie.httpOnly,
      secure: cookie.secure,
      sameSite: cookie.sameSite,
    }));
  }

  async addCookies(cookies: SessionCookie[]): Promise<void> {
    await this.context.addCookies(cookies);
  }

  openPageCount(): number {
    return this.context.pages().length;
  }

  async closeOtherPages(keep: AutomationPage): Promise<number> {
    let closed = 0;
    for (const page of this.context.pages()) {
      if (keep instanceof PlaywrightAutomationPage && keep.wraps(page)) {
        continue;
      }
      if (!page.isClosed()) {
        await page.close();
        closed += 1;
      }
    }
    return closed;
  }

  async close(): Promise<void> {
    await this.context.close();
    await this.browser.close();
  }
}

class PlaywrightAutomationPage implements AutomationPage {
  private page: Page;

  constructor(page: Page) {
    this.page = page;
  }

  wraps(page: Page): boolean {
    return this.page === page;
  }

  async goto(url: string, timeoutMs?: number): Promise<void> {
    await this.page.goto(url, { waitUntil: "domcontentloaded", timeout: timeoutMs });
  }

  url(): string {
    return this.page.url();
  }

  async title(): Promise<string> {
    return this.page.title();
  }

  async bodyText(): Promise<string> {
    return this.page.innerText("body", { timeout: 5000 });
  }

  async isVisible(selector: string): Promise<boolean> {
    return this.page.locator(selector).first().isVisible();
  }

  async queryAll(selector: string): Promise<AutomationElement[]> {
    const handles = await this.page.$$(selector);
    return handles.map((handle) => new PlaywrightAutomationElement(handle));
  }

  async clickWithOutcome(element: AutomationElement, timeoutMs = 8000): Promise<ClickOutcome> {
    if (!(element instanceof PlaywrightAutomationElement)) {
      throw new Error("Element was not produced by a Playwright page");
    }
    const beforeUrl = this.page.url();
    const popupPromise = this.page
      .context()
      .waitForEvent("page", { timeout: timeoutMs })
      .then((popup): ClickOutcome => ({ path: "new-tab", page: new PlaywrightAutomationPage(popup) }))
      .catch(() => null);
    const navPromise = this.page
      .waitForURL((url) => url.href !== beforeUrl, { timeout: timeoutMs, waitUntil: "commit" })
      .then((): ClickOutcome => ({ path: "same-page-navigation" }))
      .catch(() => null);

    await element.click(timeoutMs);
    const outcome = await firstNonNull([popupPromise, navPromise]);
    return outcome ?? { path: "timeout" };
  }

  isClosed(): boolean {
    return this.page.isClosed();
  }

  async close(): Promise<void> {
    await this.page.close();
  }
}

class PlaywrightAutomationElement implements AutomationElement {
  private handle: ElementHandle<SVGElement | HTMLElement>;

  constructor(handle: ElementHandle<SVGElement | HTMLElement>) {
    this.handle = handle;
  }

  async innerText(): Promise<string> {
    return this.handle.innerText();
  }

  async getAttribute(name: string): Promise<string | null> {
    return this.handle.getAttribute(name);
  }

  async queryAll(selector: string): Promise<AutomationElement[]> {
    const handles = await this.handle.$$(selector);
    return handles.map((handle) => new PlaywrightAutomationElement(handle));
  }

  async scrollIntoView(): Promise<void> {
    await this.handle.scrollIntoViewIfNeeded({ timeout: 5000 });
  }

  async hover(): Promise<void> {
    await this.handle.hover({ timeout: 5000 });
  }

  async click(timeoutMs: number): Promise<void> {
    await this.handle.click({ timeout: timeoutMs });
  }
}
