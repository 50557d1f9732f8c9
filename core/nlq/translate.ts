// core/nlq/translate.ts
import type { QueryOracle, VocabularyHints } from "../llm/adapter";
import { postProcessInterpretation } from "../llm/postprocess";
import { errorMessage, OracleUnavailable, ValidationError } from "../domain/errors";
import type { StructuredQuery } from "../domain/query";
import { validateStructuredQuery } from "../domain/query";
import type { SkillMatcher } from "../domain/skills";
import { createSkillMatcher } from "../domain/skills";
import { PROMPT_TRANSLATE_VERSION, QUERY_SCHEMA_VERSION } from "../versioning/versions";
import { fallbackTranslate } from "./fallback";
import type { QueryVocabulary } from "./vocabulary";

export type TranslationProvenance = "oracle" | "fallback";

export type Translation = {
  query: StructuredQuery;
  provenance: TranslationProvenance;
  warnings: string[];
  oracleError?: string;
  modelUsed?: string;
  latencyMs?: number;
};

export type TranslateDeps = {
  oracle?: QueryOracle | null;
  vocabulary: QueryVocabulary;
  timeoutMs: number;
  promptVersion?: string;
  skillMatcher?: SkillMatcher;
  hintLimit?: number;
};

export const MAX_QUERY_TEXT_LENGTH = 2000;

function hintsFrom(v: QueryVocabulary, limit: number): VocabularyHints {
  return {
    organizations: [...v.organizations.values()].slice(0, limit),
    departments: [...v.departments.values()].slice(0, limit),
    skills: [...v.skills].sort().slice(0, limit),
  };
}

async function askOracle(oracle: QueryOracle, text: string, deps: TranslateDeps, matcher: SkillMatcher) {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      controller.abort();
      reject(new OracleUnavailable(`Oracle timed out after ${deps.timeoutMs}ms`));
    }, deps.timeoutMs);
  });

  try {
    const out = await Promise.race([
      oracle.interpretQuery({
        text,
        schemaVersion: QUERY_SCHEMA_VERSION,
        promptVersion: deps.promptVersion ?? PROMPT_TRANSLATE_VERSION,
        hints: hintsFrom(deps.vocabulary, deps.hintLimit ?? 50),
        signal: controller.signal,
      }),
      timeout,
    ]);
    const query = validateStructuredQuery(postProcessInterpretation(out.interpretation), matcher.synonyms);
    return { query, modelUsed: out.modelUsed, latencyMs: out.latencyMs };
  } catch (err) {
    if (err instanceof OracleUnavailable) throw err;
    if (err instanceof ValidationError) {
      throw new OracleUnavailable(`Oracle response rejected (${err.field}): ${err.message}`, { cause: err });
    }
    throw new OracleUnavailable(`Oracle call failed: ${errorMessage(err)}`, { cause: err });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Free text → StructuredQuery. Never executes the query. The oracle is untrusted:
 * any failure, timeout or invalid answer degrades to the keyword translator.
 */
export async function translate(text: string, deps: TranslateDeps): Promise<Translation> {
  const trimmed = text.trim();
  if (!trimmed) throw new ValidationError("text", "Search text must not be empty");
  if (trimmed.length > MAX_QUERY_TEXT_LENGTH) {
    throw new ValidationError("text", `Search text exceeds ${MAX_QUERY_TEXT_LENGTH} characters`);
  }

  const matcher = deps.skillMatcher ?? createSkillMatcher(undefined, deps.vocabulary.skills);
  let oracleError: string;

  if (deps.oracle) {
    try {
      const out = await askOracle(deps.oracle, trimmed, deps, matcher);
      return { query: out.query, provenance: "oracle", warnings: [], modelUsed: out.modelUsed, latencyMs: out.latencyMs };
    } catch (err) {
      if (!(err instanceof OracleUnavailable)) throw err;
      oracleError = err.message;
    }
  } else {
    oracleError = "No oracle configured";
  }

  const fallback = fallbackTranslate(trimmed, deps.vocabulary, matcher);
  return { query: fallback.query, provenance: "fallback", warnings: fallback.warnings, oracleError };
}
