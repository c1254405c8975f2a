import { AutomationPage } from "../automation/session";
import { withTimeout } from "../automation/timing";
import { containsKeyword } from "../discovery/normalize";
import { VerificationMarkers } from "../types/site";

export type VerificationSignal =
  | { detected: false }
  | { detected: true; source: "selector" | "title" | "body"; marker: string };

export const DEFAULT_DETECTION_TIMEOUT_MS = 5000;

export async function detectVerification(
  page: AutomationPage,
  markers: VerificationMarkers,
  timeoutMs = DEFAULT_DETECTION_TIMEOUT_MS
): Promise<VerificationSignal> {
  return withTimeout(inspectPage(page, markers), timeoutMs, "verification check");
}

async function inspectPage(page: AutomationPage, markers: VerificationMarkers): Promise<VerificationSignal> {
  for (const selector of markers.selectors) {
    if (await page.isVisible(selector)) {
      return { detected: true, source: "selector", marker: selector };
    }
  }

  const title = await page.title();
  const titleHit = markers.titleKeywords.find((keyword) => containsKeyword(title, keyword));
  if (titleHit) {
    return { detected: true, source: "title", marker: titleHit };
  }

  const body = (await page.bodyText()).toLowerCase();
  const phrase = markers.bodyPhrases.find((value) => body.includes(value.toLowerCase()));
  if (phrase) {
    return { detected: true, source: "body", marker: phrase };
  }

  return { detected: false };
}
