import { describe, expect, it } from "vitest";
import { classifyAtsVendor } from "../../src/discovery/ats";

describe("classifyAtsVendor", () => {
  it("matches vendor hosts by substring", () => {
    expect(classifyAtsVendor("https://acme.wd3.myworkdayjobs.com/en-US/careers/job/1")).toBe("Workday");
    expect(classifyAtsVendor("https://boards.greenhouse.io/acme/jobs/123")).toBe("Greenhouse");
    expect(classifyAtsVendor("https://jobs.lever.co/acme/abc")).toBe("Lever");
    expect(classifyAtsVendor("https://careers-acme.icims.com/jobs/1/job")).toBe("ICIMS");
    expect(classifyAtsVendor("https://acme.bamboohr.com/careers/12")).toBe("BambooHR");
    expect(classifyAtsVendor("https://jobs.smartrecruiters.com/Acme/1")).toBe("SmartRecruiters");
    expect(classifyAtsVendor("https://jobs.jobvite.com/acme/job/1")).toBe("Jobvite");
    expect(classifyAtsVendor("https://acme.taleo.net/careersection/1")).toBe("Taleo");
    expect(classifyAtsVendor("https://career5.successfactors.eu/career?company=acme")).toBe("SuccessFactors");
  });

  it("returns Unknown otherwise", () => {
    expect(classifyAtsVendor("https://careers.acme.test/jobs/1")).toBe("Unknown");
  });

  it("uses the rules it is given", () => {
    expect(classifyAtsVendor("https://hire.acme.test/1", [{ match: "hire.acme", vendor: "Lever" }])).toBe("Lever");
  });
});
