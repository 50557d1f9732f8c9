import { readFile } from "node:fs/promises"

/** Where raw resume records come from at boot. The normalizer validates each record. */
export interface CandidateSource {
  load(): Promise<unknown[]>
}

export class EmptyCandidateSource implements CandidateSource {
  async load(): Promise<unknown[]> {
    return []
  }
}

/**
 * JSON seed file: either an array of raw resumes or `{ "resumes": [...] }`.
 */
export class JsonFileCandidateSource implements CandidateSource {
  constructor(private readonly path: string) {}

  async load(): Promise<unknown[]> {
    const text = await readFile(this.path, "utf8")
    let parsed: unknown
    try {
      parsed = JSON.parse(text)
    } catch (e: unknown) {
      throw new Error(`SEED_NON_JSON: ${this.path}`, { cause: e })
    }
    return resumesFrom(parsed, this.path)
  }
}

export function resumesFrom(parsed: unknown, origin: string): unknown[] {
  if (Array.isArray(parsed)) return parsed
  if (typeof parsed === "object" && parsed !== null && "resumes" in parsed && Array.isArray(parsed.resumes)) {
    return parsed.resumes
  }
  throw new Error(`SEED_INVALID_SHAPE: ${origin} must hold an array or { "resumes": [] }`)
}

export function candidateSourceFor(seedPath: string | null): CandidateSource {
  return seedPath ? new JsonFileCandidateSource(seedPath) : new EmptyCandidateSource()
}
