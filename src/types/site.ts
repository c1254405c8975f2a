import { AtsVendor } from "./jobs";

export interface VerificationMarkers {
  selectors: string[];
  titleKeywords: string[];
  bodyPhrases: string[];
}

export interface AtsVendorRule {
  match: string;
  vendor: AtsVendor;
}

export interface SiteAdapter {
  name: string;
  listingHost: string;
  buildSearchUrl(keyword: string, page: number): string;
  containerSelectors: string[];
  jobLinkPatterns: RegExp[];
  excludedLinkPatterns: RegExp[];
  badgeTokens: string[];
  verification: VerificationMarkers;
  atsVendors: AtsVendorRule[];
}
