// core/domain/organizations.ts
// Same normalization for ingestion and for query text, so keys compare directly.

const LEGAL_SUFFIXES = new Set([
  "inc", "incorporated", "llc", "llp", "lp", "ltd", "limited", "corp", "corporation",
  "co", "company", "plc", "gmbh", "ag", "sa", "sas", "bv", "nv", "pty", "pvt", "srl", "oy", "ab",
]);

const DEPARTMENT_ALIASES: Record<string, string> = {
  eng: "engineering",
  engg: "engineering",
  "r d": "research and development",
  rnd: "research and development",
  hr: "human resources",
  people: "human resources",
  mktg: "marketing",
  ops: "operations",
  bizdev: "business development",
  bd: "business development",
  it: "information technology",
  qa: "quality assurance",
  cs: "customer success",
  fin: "finance",
};

function fold(s: string): string {
  return s
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "")
    .toLowerCase()
    .replace(/&/g, " and ")
    .replace(/[^a-z0-9]+/g, " ")
    .trim();
}

/** "The Acme Corp., Inc." → "acme" */
export function normalizeOrganization(name: string): string {
  const words = fold(name).split(" ").filter(Boolean);
  if (words[0] === "the" && words.length > 1) words.shift();
  while (words.length > 1 && LEGAL_SUFFIXES.has(words[words.length - 1])) words.pop();
  return words.join(" ");
}

export function normalizeDepartment(label: string): string {
  const key = fold(label.replace(/&/g, " "));
  return DEPARTMENT_ALIASES[key] ?? key;
}
