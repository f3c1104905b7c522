/**
 * JSON Schemas
 * Used for validation with AJV
 */

import { LOG_LEVELS } from "../logging/logger";

const providerName = {
  type: "string",
  minLength: 1,
  pattern: "^[^\\s/]+$",
  description: "Registered provider name (no whitespace, no '/')",
};

export const configJsonSchema = {
  $schema: "http://json-schema.org/draft-07/schema#",
  $id: "nodeloom://config.schema.json",
  title: "Engine configuration",
  type: "object",
  required: ["logLevel", "retry", "providers"],
  additionalProperties: false,
  properties: {
    logLevel: {
      type: "string",
      enum: [...LOG_LEVELS],
    },
    retry: {
      type: "object",
      required: ["maxRetries", "wait"],
      additionalProperties: false,
      properties: {
        maxRetries: {
          type: "integer",
          minimum: 1,
          description: "Attempts for exec, including the first",
        },
        wait: {
          type: "number",
          minimum: 0,
          description: "Seconds between attempts",
        },
      },
    },
    providers: {
      type: "object",
      additionalProperties: false,
      properties: {
        llm: providerName,
        search: providerName,
        embedding: providerName,
      },
    },
  },
};

// Providers may omit fields; absent fields stay absent
export const searchResultsJsonSchema = {
  $id: "nodeloom://search-results.schema.json",
  type: "array",
  items: {
    type: "object",
    additionalProperties: true,
    properties: {
      title: { type: "string" },
      snippet: { type: "string" },
      url: { type: "string" },
    },
  },
};

export const embeddingJsonSchema = {
  $id: "nodeloom://embedding.schema.json",
  type: "array",
  items: { type: "number" },
};
