/**
 * API client for the support desk server
 */

const BASE_URL = process.env.SUPPORTDESK_API_URL || 'http://127.0.0.1:3001';

export type ApiResponse<T> =
  | { ok: true; status: number; data: T }
  | { ok: false; status: number; error: string };

type QueryValue = string | number | boolean | undefined;

/**
 * Query string from optional filters; unset values are left out.
 *
 * @example
 * buildQuery({ status: 'open', priority: undefined }) // "?status=open"
 */
export function buildQuery(params: Record<string, QueryValue>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    if (value !== undefined && value !== '') search.set(key, String(value));
  }
  const query = search.toString();
  return query ? `?${query}` : '';
}

function errorFrom(body: unknown, status: number): string {
  if (typeof body === 'object' && body !== null && 'error' in body && typeof body.error === 'string') {
    return body.error;
  }
  return `HTTP ${status}`;
}

export async function api<T = unknown>(
  path: string,
  options: { method?: 'GET' | 'POST' | 'PATCH'; body?: unknown } = {}
): Promise<ApiResponse<T>> {
  let res: Response;
  try {
    res = await fetch(`${BASE_URL}${path}`, {
      method: options.method || 'GET',
      headers: { 'Content-Type': 'application/json' },
      ...(options.body !== undefined ? { body: JSON.stringify(options.body) } : {}),
    });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(`Connection failed: ${msg}`);
    console.error(`Is the server running at ${BASE_URL}?`);
    process.exit(1);
  }

  const contentType = res.headers.get('content-type') || '';
  if (!contentType.includes('application/json')) {
    return { ok: false, status: res.status, error: `Non-JSON response (${res.status}): ${contentType}` };
  }

  const body: unknown = await res.json();
  if (!res.ok) {
    return { ok: false, status: res.status, error: errorFrom(body, res.status) };
  }
  // The server's response shapes are the shared entity types
  return { ok: true, status: res.status, data: body as T };
}
