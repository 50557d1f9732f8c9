// Strict mode needs every key listed in `required`; absent values come back as null.
export const structuredQuerySchema = {
    name: "StructuredQuery",
    schema: {
      type: "object",
      additionalProperties: false,
      properties: {
        organization: { type: ["string", "null"] },
        department: { type: ["string", "null"] },
        skills: { type: ["array", "null"], items: { type: "string" } },
        skillMode: { type: ["string", "null"], enum: ["all", "any", null] },
        dateRange: {
          type: ["object", "null"],
          additionalProperties: false,
          properties: {
            from: { type: ["string", "null"] },
            to: { type: ["string", "null"] }
          },
          required: ["from", "to"]
        },
        seniority: { type: ["string", "null"], enum: ["junior", "mid", "senior", "lead", null] },
        terms: { type: ["array", "null"], items: { type: "string" } }
      },
      required: ["organization", "department", "skills", "skillMode", "dateRange", "seniority", "terms"]
    }
  } as const
