import { describe, expect, it } from "vitest";
import { detectVerification } from "../../src/antibot/detector";
import { TimeoutError } from "../../src/core/errors";
import { createTestAdapter, FakeBrowser, FakePage, FakePageContent, FakeSession, TEST_HOST } from "../support/fakeBrowser";

const LISTING_URL = `https://${TEST_HOST}/search?q=x&page=1`;
const markers = createTestAdapter().verification;

async function pageWith(content: FakePageContent): Promise<FakePage> {
  const browser = new FakeBrowser();
  browser.setPage(LISTING_URL, content);
  const page = new FakeSession(browser, []).openPage("about:blank");
  await page.goto(LISTING_URL);
  return page;
}

class HangingPage extends FakePage {
  async title(): Promise<string> {
    return new Promise<string>(() => undefined);
  }
}

describe("detectVerification", () => {
  it("reports a visible challenge selector first", async () => {
    const page = await pageWith({ visibleSelectors: ["#captcha"], title: "Captcha" });
    expect(await detectVerification(page, markers)).toEqual({ detected: true, source: "selector", marker: "#captcha" });
  });

  it("matches title keywords as whole words", async () => {
    expect(await detectVerification(await pageWith({ title: "Quick captcha check" }), markers)).toEqual({
      detected: true,
      source: "title",
      marker: "captcha",
    });
    expect(await detectVerification(await pageWith({ title: "Captchas explained" }), markers)).toEqual({
      detected: false,
    });
  });

  it("matches body phrases case-insensitively", async () => {
    const page = await pageWith({ body: "Please VERIFY you are human to continue." });
    expect(await detectVerification(page, markers)).toEqual({
      detected: true,
      source: "body",
      marker: "verify you are human",
    });
  });

  it("passes an ordinary results page", async () => {
    const page = await pageWith({ title: "Data analyst jobs", body: "24 results" });
    expect(await detectVerification(page, markers)).toEqual({ detected: false });
  });

  it("gives up after the timeout", async () => {
    const page = new HangingPage(new FakeSession(new FakeBrowser(), []), LISTING_URL);
    await expect(detectVerification(page, markers, 20)).rejects.toThrow(TimeoutError);
  });
});
