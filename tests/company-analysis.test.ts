import { beforeEach, describe, expect, it } from "vitest";
import { CacheStore } from "../src/lib/cache-store.js";
import { CompanyAnalysisService, domainFromWebsite } from "../src/lib/company-analysis.js";
import { NotFoundError, ValidationError } from "../src/lib/errors.js";
import type { EngineeringTeam } from "../src/lib/types.js";
import { FakeSource, makeCompany } from "./helpers/fake-source.js";
import { MemoryStore } from "../src/lib/store.js";

const team: EngineeringTeam = {
  domain: "acme.io",
  engineering_headcount: 40,
  total_employees: 200,
  engineering_percentage: 20,
  engineering_leaders: [
    { name: "dana smith", title: "VP of Engineering", linkedin_url: null, location: "united states" },
  ],
};

describe("domainFromWebsite", () => {
  it("reduces a website to its bare host", () => {
    expect(domainFromWebsite("https://www.Acme.io/about?x=1")).toBe("acme.io");
    expect(domainFromWebsite("acme.io:8080")).toBe("acme.io");
    expect(domainFromWebsite("localhost")).toBeNull();
    expect(domainFromWebsite(null)).toBeNull();
  });
});

describe("CompanyAnalysisService", () => {
  let source: FakeSource;
  let analysis: CompanyAnalysisService;

  beforeEach(() => {
    source = new FakeSource([makeCompany(1, { name: "Acme", website: "https://acme.io", employee_count: 200 })]);
    source.teams.set("acme.io", team);
    analysis = new CompanyAnalysisService(new CacheStore(new MemoryStore()), source, 86400);
  });

  it("combines the profile, engineering team and outreach drafts", async () => {
    const result = await analysis.analyzeCompany("  acme ");

    expect(result.company.name).toBe("Acme");
    expect(result.engineering).toEqual(team);
    expect(result.personalized_messages).toHaveLength(1);
    expect(result.personalized_messages[0]?.message).toBe(
      "Hi Dana,\n\nI noticed engineers make up about 20% of Acme. Scaling a team like that as VP of Engineering " +
        "usually means hiring is never far from your mind. Would you be open to a short call about how we help " +
        "engineering leaders find strong candidates faster?",
    );
  });

  it("reports an unknown company as not found", async () => {
    await expect(analysis.analyzeCompany("Nobody")).rejects.toThrow("Could not find company data for: Nobody");
    await expect(analysis.analyzeCompany("Nobody")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("rejects an empty name", async () => {
    await expect(analysis.analyzeCompany("   ")).rejects.toBeInstanceOf(ValidationError);
  });

  it("keeps the profile when the engineering lookup fails", async () => {
    source.teamError = new Error("timeout");
    const result = await analysis.analyzeCompany("Acme");

    expect(result.company.name).toBe("Acme");
    expect(result.engineering).toEqual({ error: "Could not retrieve engineering data" });
    expect(result.personalized_messages).toEqual([]);
  });

  it("reports a company without a usable website", async () => {
    source.companies = [makeCompany(2, { name: "Nosite", website: null })];
    const result = await analysis.analyzeCompany("Nosite");

    expect(result.engineering).toEqual({ error: "Could not determine company domain" });
  });

  it("caches the company lookup", async () => {
    await analysis.analyzeCompany("Acme");
    source.companies = [];
    expect((await analysis.analyzeCompany("ACME")).company.name).toBe("Acme");
  });
});
