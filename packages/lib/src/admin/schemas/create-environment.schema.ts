/**
 * Body of `POST /api/conda/envs`. `packages` is left open here and checked by
 * the provisioner so a bad list gets its own message.
 */
export const createEnvironmentSchema = {
  type: "object",
  properties: {
    name: { type: "string" },
    python: { type: "string" },
    packages: {},
  },
} as const;

export type CreateEnvironmentPayload = {
  name?: string;
  python?: string;
  packages?: unknown;
};
