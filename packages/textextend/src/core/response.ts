import { z } from "zod";

/**
 * What a payload from the inference service turned out to be.
 */
export type CompletionOutcome =
  | { type: "success"; text: string }
  | { type: "service-error"; messages: readonly unknown[] }
  | { type: "malformed"; response: unknown };

// Exactly one result object; its other fields are ignored.
const successSchema = z.tuple([z.object({ generated_text: z.string() })]);

const serviceErrorSchema = z.object({ error: z.array(z.unknown()) });

/**
 * Classifies a raw payload by shape. Success is checked first, then a
 * service error report; anything else is malformed.
 *
 * @example
 * ```typescript
 * interpretResponse([{ generated_text: "Hello world" }]);
 * // { type: "success", text: "Hello world" }
 *
 * interpretResponse({ error: ["rate limited"] });
 * // { type: "service-error", messages: ["rate limited"] }
 *
 * interpretResponse({ error: "Model is loading" });
 * // { type: "malformed", response: { error: "Model is loading" } }
 * ```
 */
export function interpretResponse(response: unknown): CompletionOutcome {
  const success = successSchema.safeParse(response);
  if (success.success) {
    return { type: "success", text: success.data[0].generated_text };
  }

  const serviceError = serviceErrorSchema.safeParse(response);
  if (serviceError.success) {
    return { type: "service-error", messages: serviceError.data.error };
  }

  return { type: "malformed", response };
}
