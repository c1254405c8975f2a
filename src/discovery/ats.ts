import { AtsVendor } from "../types/jobs";
import { AtsVendorRule } from "../types/site";

export const DEFAULT_ATS_VENDORS: AtsVendorRule[] = [
  { match: "myworkdayjobs", vendor: "Workday" },
  { match: "myworkday", vendor: "Workday" },
  { match: "workday", vendor: "Workday" },
  { match: "greenhouse.io", vendor: "Greenhouse" },
  { match: "greenhouse", vendor: "Greenhouse" },
  { match: "lever.co", vendor: "Lever" },
  { match: "icims", vendor: "ICIMS" },
  { match: "bamboohr", vendor: "BambooHR" },
  { match: "smartrecruiters", vendor: "SmartRecruiters" },
  { match: "jobvite", vendor: "Jobvite" },
  { match: "taleo", vendor: "Taleo" },
  { match: "successfactors", vendor: "SuccessFactors" },
];

export function classifyAtsVendor(url: string, rules: AtsVendorRule[] = DEFAULT_ATS_VENDORS): AtsVendor {
  const value = url.toLowerCase();
  for (const rule of rules) {
    if (value.includes(rule.match.toLowerCase())) {
      return rule.vendor;
    }
  }
  return "Unknown";
}
