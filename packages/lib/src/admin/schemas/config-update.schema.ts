import type { ConfigUpdateValue } from "../../types.ts";

/** Body of `POST /api/envfile`: a flat KEY -> scalar mapping. */
export const configUpdateSchema = {
  type: "object",
  additionalProperties: {
    type: ["string", "number", "boolean", "null"],
  },
} as const;

export type ConfigUpdatePayload = Record<string, ConfigUpdateValue>;
