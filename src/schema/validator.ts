/**
 * Schema Validation
 * Validates configuration and provider responses against JSON schemas
 */

import Ajv, { type ErrorObject } from "ajv";
import {
  configJsonSchema,
  embeddingJsonSchema,
  searchResultsJsonSchema,
} from "./json-schema";
import type {
  EngineConfig,
  Embedding,
  SearchHit,
  ValidationError,
} from "./types";

// Configuration arrives as environment strings; coerce them in place
const configAjv = new Ajv({ allErrors: true, coerceTypes: true });

// Provider responses are checked as-is
const responseAjv = new Ajv({ allErrors: true });

const validateConfigSchema = configAjv.compile<EngineConfig>(configJsonSchema);
const validateSearchSchema = responseAjv.compile<SearchHit[]>(
  searchResultsJsonSchema,
);
const validateEmbeddingSchema = responseAjv.compile<Embedding>(embeddingJsonSchema);

function toValidationErrors(
  errors: ErrorObject[] | null | undefined,
): ValidationError[] {
  return (errors ?? []).map((err) => ({
    path: err.instancePath || "/",
    message: err.message ?? "Unknown validation error",
  }));
}

/**
 * Render validation errors as one line each: `path message`
 */
export function formatValidationErrors(errors: ValidationError[]): string {
  return errors.map((e) => `${e.path} ${e.message}`).join("; ");
}

/**
 * Validate a raw configuration object, coercing string values in place
 */
export function parseConfig(
  raw: unknown,
): { config: EngineConfig } | { errors: ValidationError[] } {
  if (!validateConfigSchema(raw)) {
    return { errors: toValidationErrors(validateConfigSchema.errors) };
  }
  return { config: raw };
}

/**
 * Check a search provider's response, keeping only the known fields.
 * Fields the provider left out stay absent.
 */
export function parseSearchResults(
  value: unknown,
): { results: SearchHit[] } | { errors: ValidationError[] } {
  if (!validateSearchSchema(value)) {
    return { errors: toValidationErrors(validateSearchSchema.errors) };
  }
  return {
    results: value.map(({ title, snippet, url }) => {
      const hit: SearchHit = {};
      if (title !== undefined) hit.title = title;
      if (snippet !== undefined) hit.snippet = snippet;
      if (url !== undefined) hit.url = url;
      return hit;
    }),
  };
}

export function parseEmbedding(
  value: unknown,
): { embedding: Embedding } | { errors: ValidationError[] } {
  if (!validateEmbeddingSchema(value)) {
    return { errors: toValidationErrors(validateEmbeddingSchema.errors) };
  }
  return { embedding: [...value] };
}
