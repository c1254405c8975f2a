export interface SessionCookie {
  name: string;
  value: string;
  domain: string;
  path: string;
  expires?: number;
  httpOnly?: boolean;
  secure?: boolean;
  sameSite?: "Strict" | "Lax" | "None";
}

export interface LaunchOptions {
  headless: boolean;
  cookies?: SessionCookie[];
}

export type SessionLauncher = (options: LaunchOptions) => Promise<AutomationSession>;

export type ClickOutcome =
  | { path: "new-tab"; page: AutomationPage }
  | { path: "same-page-navigation" }
  | { path: "timeout" };

export interface AutomationSession {
  newPage(): Promise<AutomationPage>;
  cookies(): Promise<SessionCookie[]>;
  addCookies(cookies: SessionCookie[]): Promise<void>;
  openPageCount(): number;
  closeOtherPages(keep: AutomationPage): Promise<number>;
  close(): Promise<void>;
}

export interface AutomationPage {
  goto(url: string, timeoutMs?: number): Promise<void>;
  url(): string;
  title(): Promise<string>;
  bodyText(): Promise<string>;
  isVisible(selector: string): Promise<boolean>;
  queryAll(selector: string): Promise<AutomationElement[]>;
  clickWithOutcome(element: AutomationElement, timeoutMs?: number): Promise<ClickOutcome>;
  isClosed(): boolean;
  close(): Promise<void>;
}

export interface AutomationElement {
  innerText(): Promise<string>;
  getAttribute(name: string): Promise<string | null>;
  queryAll(selector: string): Promise<AutomationElement[]>;
  scrollIntoView(): Promise<void>;
  hover(): Promise<void>;
}

export class NullAutomationSession implements AutomationSession {
  async newPage(): Promise<AutomationPage> {
    return new NullAutomationPage();
  }

  async cookies(): Promise<SessionCookie[]> {
    return [];
  }

  async addCookies(_cookies: SessionCookie[]): Promise<void> {
    return;
  }

  openPageCount(): number {
    return 0;
  }

  async closeOtherPages(_keep: AutomationPage): Promise<number> {
    return 0;
  }

  async close(): Promise<void> {
    return;
  }
}

class NullAutomationPage implements AutomationPage {
  private currentUrl = "about:blank";

  async goto(url: string, _timeoutMs?: number): Promise<void> {
    this.currentUrl = url;
  }

  url(): string {
    return this.currentUrl;
  }

  async title(): Promise<string> {
    return "";
  }

  async bodyText(): Promise<string> {
    return "";
  }

  async isVisible(_selector: string): Promise<boolean> {
    return false;
  }

  async queryAll(_selector: string): Promise<AutomationElement[]> {
    return [];
  }

  async clickWithOutcome(_element: AutomationElement, _timeoutMs?: number): Promise<ClickOutcome> {
    return { path: "timeout" };
  }

  isClosed(): boolean {
    return false;
  }

  async close(): Promise<void> {
    return;
  }
}
