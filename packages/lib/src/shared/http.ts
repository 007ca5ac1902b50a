export function json(status: number, data: unknown): Response {
  return new Response(JSON.stringify(data), {
    status,
    headers: { "content-type": "application/json" },
  });
}

export function errorJson(status: number, error: string, details?: unknown): Response {
  const payload: Record<string, unknown> = { error };
  if (details !== undefined) payload.details = details;
  return json(status, payload);
}
