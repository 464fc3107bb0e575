// =============================================================================
// requestJson — fetch + status check + zod validation for collaborator calls
// =============================================================================

import type { z } from "zod";
import { CollaboratorError } from "../../errors.js";

export interface JsonResponse<T> {
  body: T;
  elapsedMs: number;
}

export async function requestJson<S extends z.ZodTypeAny>(
  collaborator: string,
  url: string,
  init: RequestInit,
  schema: S,
): Promise<JsonResponse<z.output<S>>> {
  const startedAt = Date.now();
  let response: Response;
  try {
    response = await fetch(url, init);
  } catch (error) {
    throw new CollaboratorError(
      collaborator,
      `request failed: ${error instanceof Error ? error.message : String(error)}`,
    );
  }

  if (!response.ok) {
    throw new CollaboratorError(
      collaborator,
      `HTTP ${response.status}${response.statusText ? ` ${response.statusText}` : ""}`,
      response.status,
    );
  }

  let raw: unknown;
  try {
    raw = await response.json();
  } catch {
    throw new CollaboratorError(collaborator, "response body is not valid JSON", response.status);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new CollaboratorError(collaborator, "unexpected response shape", response.status);
  }
  return { body: parsed.data, elapsedMs: Date.now() - startedAt };
}
