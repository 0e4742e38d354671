/**
 * Lenient option parsing on top of zod schemas.
 *
 * Public option objects are validated against a schema. Fields that fail
 * validation are dropped (so the schema default applies) and reported as
 * warnings instead of aborting the call.
 */

import type { z } from "zod";

import type { WarningHandler } from "./types";

/**
 * Parse `input` with `schema`, replacing invalid top-level fields by their
 * defaults.
 *
 * @param schema - Object schema whose fields all have defaults or are optional
 * @param input - Caller-supplied options
 * @param label - Prefix for warning messages ("table options")
 * @param onWarning - Receives one message per dropped field
 */
export function parseLenient<T extends z.ZodTypeAny>(
  schema: T,
  input: Record<string, unknown>,
  label: string,
  onWarning?: WarningHandler,
): z.output<T> {
  let candidate: Record<string, unknown> = { ...input };

  // Each pass drops at least one offending key, so this terminates
  for (let attempt = 0; attempt <= Object.keys(input).length; attempt++) {
    const result = schema.safeParse(candidate);

    if (result.success) {
      return result.data;
    }

    const next: Record<string, unknown> = { ...candidate };

    for (const issue of result.error.issues) {
      const key = issue.path[0];

      if (typeof key === "string" && key in next) {
        onWarning?.(`Invalid ${label} "${key}": ${issue.message}, using default`);
        delete next[key];
      }
    }

    if (Object.keys(next).length === Object.keys(candidate).length) {
      break;
    }

    candidate = next;
  }

  return schema.parse({});
}
