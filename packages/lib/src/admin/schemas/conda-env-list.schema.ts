/**
 * JSON Schema (draft-07) for the parts of `conda env list --json` we read.
 */
export const condaEnvListSchema = {
  type: "object",
  required: ["envs"],
  properties: {
    envs: {
      type: "array",
      items: { type: "string", minLength: 1 },
    },
  },
} as const;

export type CondaEnvList = {
  envs: string[];
};
