import { describe, it, expect } from "vitest";
import { canonicalSkill, createSkillMatcher, normalizeSkills, splitSkillText } from "./skills";
import { normalizeDepartment, normalizeOrganization } from "./organizations";

describe("skills", () => {
  it("folds synonyms onto canonical tokens", () => {
    expect(canonicalSkill("JS")).toBe("javascript");
    expect(canonicalSkill("  Golang ")).toBe("go");
    expect(canonicalSkill("MS Excel")).toBe("excel");
    expect(canonicalSkill("  -  ")).toBeNull();
  });

  it("accepts caller-supplied synonyms", () => {
    expect(canonicalSkill("pg", { pg: "postgresql" })).toBe("postgresql");
  });

  it("splits a skills section on separators and labels", () => {
    expect(splitSkillText("Languages: Python, Go | SQL\n- Docker; k8s")).toEqual(["Python", "Go", "SQL", "Docker", "k8s"]);
  });

  it("normalizes to a sorted, de-duplicated set", () => {
    expect(normalizeSkills(["Python", "python3", "JS", "javascript", "SQL"])).toEqual(["javascript", "python", "sql"]);
  });

  it("extracts skills from prose in order of first mention", () => {
    const m = createSkillMatcher();
    expect(m.extract("Built services in TypeScript on Node.js, deployed with Docker and K8s")).toEqual([
      "typescript",
      "nodejs",
      "docker",
      "kubernetes",
    ]);
  });

  it("does not lift ambiguous words out of prose", () => {
    const m = createSkillMatcher();
    expect(m.extract("Led the go to market plan and the rest of the launch")).toEqual([]);
  });

  it("keeps symbol-bearing skills whole", () => {
    const m = createSkillMatcher();
    expect(m.extract("Wrote C++ and C# tooling")).toEqual(["c++", "c#"]);
  });
});

describe("organizations", () => {
  it("strips articles, punctuation and legal suffixes", () => {
    expect(normalizeOrganization("The Acme Corp., Inc.")).toBe("acme");
    expect(normalizeOrganization("ACME Corporation")).toBe("acme");
    expect(normalizeOrganization("Globex GmbH")).toBe("globex");
  });

  it("folds diacritics and ampersands", () => {
    expect(normalizeOrganization("Crème & Co")).toBe("creme and");
    expect(normalizeOrganization("Société Générale")).toBe("societe generale");
  });

  it("never strips a name down to nothing", () => {
    expect(normalizeOrganization("Company")).toBe("company");
  });

  it("maps department aliases", () => {
    expect(normalizeDepartment("Eng")).toBe("engineering");
    expect(normalizeDepartment("R&D")).toBe("research and development");
    expect(normalizeDepartment("Platform Engineering")).toBe("platform engineering");
  });
});
